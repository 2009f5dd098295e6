/**
 * resolver service config from the environment -- includes the agent passcode
 */
export interface EnvConfig {
  /** HTTP port (PORT, default 7677) */
  port: number;
  /** KERIA admin API used by SignifyClient */
  keriaUrl: string;
  /** KERIA boot API */
  keriaBootUrl: string;
  /** KERIA HTTP API for key states and OOBIs */
  keriaHttpUrl: string;
  /** passcode of the agent whose identifiers are local; unset means no local identities */
  keriaPasscode?: string;
  /** URL path the did.json and keri.cesr routes live under, `/`-separated */
  didPath: string;
  /** schema SAID of designated aliases credentials */
  designatedAliasesSchema: string;
  /** JSON location book of witnesses and role endpoints */
  locationsPath?: string;
}

/** the KEL CESR stream behind keri.cesr */
export interface KelSource {
  getKeriCesr(aid: string): Promise<string>;
}

/**
 * KERIA state loader
 *
 * Gathers everything the did:webs synthesizer reads about one AID -- key state,
 * designated aliases credentials, end roles and witness locations -- from KERIA
 * via SignifyClient, and hands it over as an immutable in-memory store.
 */

import {
  DES_ALIASES_SCHEMA,
  designatedAliasCredentials,
  getErrorMessage,
  MemoryKeyStateStore,
  type CredentialRecord,
  type EndpointTable,
  type KeriKeyState,
} from '@did-webs/core';
import {
  endpointTable,
  isEndRole,
  isKeriCredential,
  isKeriKeyState,
  locationRecords,
  mapCredential,
  mapKeyState,
  type KeriaClient,
  type LocationBook,
} from './keria-mapping.js';

const DEFAULT_DA_CACHE_TTL_MS = 5 * 60 * 1000;
const DEFAULT_TIMEOUT_MS = 5000;
/** KERIA's default page size for credential listings */
const CREDENTIAL_PAGE_SIZE = 25;

/** config for the KERIA state loader */
export interface KeriaStateLoaderConfig {
  /** KERIA HTTP endpoint URL for the key state fallback (e.g., "http://localhost:3902") */
  keriaHttpUrl: string;
  /** known URLs of witnesses and role endpoints */
  locations?: LocationBook;
  /** Schema SAID for designated aliases credential (default: standard DA schema) */
  designatedAliasesSchema?: string;
  /** Cache TTL for DA credentials in ms (default: 300000 = 5 min) */
  daCacheTtlMs?: number;
  /** timeout of the key state HTTP fallback in ms (default: 5000) */
  timeoutMs?: number;
}

/** anything that can produce a store for one AID */
export interface KeyStateSource {
  load(aid: string): Promise<MemoryKeyStateStore>;
}

/**
 * Loads per-AID state from KERIA.
 *
 * Takes a callback to get a client for a given AID -- lets the caller handle
 * auth (passcodes, client caching, etc). An AID with a client is treated as a
 * local identity; one without is resolved from its key state alone.
 */
export class KeriaStateLoader implements KeyStateSource {
  readonly designatedAliasesSchema: string;
  private readonly cacheTtl: number;
  private readonly timeoutMs: number;
  private readonly locations: LocationBook;
  private readonly daCache: Map<string, { records: CredentialRecord[]; fetchedAt: number }> = new Map();

  /**
   * @param config - loader config
   * @param getClient - returns a connected client for the AID, or null
   */
  constructor(
    private readonly config: KeriaStateLoaderConfig,
    private readonly getClient: (aid: string) => Promise<KeriaClient | null>,
  ) {
    this.designatedAliasesSchema = config.designatedAliasesSchema ?? DES_ALIASES_SCHEMA;
    this.cacheTtl = config.daCacheTtlMs ?? DEFAULT_DA_CACHE_TTL_MS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.locations = config.locations ?? {};
  }

  /** snapshot of everything known about `aid`; empty when KERIA has no key state for it */
  async load(aid: string): Promise<MemoryKeyStateStore> {
    const client = await this.clientFor(aid);
    const raw = await this.fetchKeyState(client, aid);
    if (!raw) {
      console.log(`[keria-loader] No key state for AID: ${aid}`);
      return new MemoryKeyStateStore();
    }

    const state = mapKeyState(raw);
    const credentials = client ? await this.designatedAliases(client, aid) : [];
    const roleEndpoints = client ? await this.fetchRoleEndpoints(client, aid) : {};

    return new MemoryKeyStateStore({
      states: { [aid]: state },
      locations: Object.fromEntries(state.witnesses.map(wit => [wit, locationRecords(this.locations, wit)])),
      roleEndpoints: { [aid]: roleEndpoints },
      witnessEndpoints: {
        [aid]: endpointTable(state.witnesses.map(eid => ({ role: 'witness', eid })), this.locations),
      },
      localIdentities: client ? [aid] : [],
      credentials,
    });
  }

  /**
   * CESR of every designated aliases credential in force for `aid`,
   * concatenated. Empty when the AID has no client.
   */
  async designatedAliasesCesr(aid: string): Promise<string> {
    const client = await this.clientFor(aid);
    if (!client) {
      return '';
    }

    const registry = new MemoryKeyStateStore({ credentials: await this.designatedAliases(client, aid) });
    let cesr = '';
    for (const record of designatedAliasCredentials(aid, registry, this.designatedAliasesSchema)) {
      const credCesr: unknown = await client.credentials().get(record.said, true);
      if (typeof credCesr === 'string') {
        cesr += credCesr;
      }
    }
    return cesr;
  }

  private async clientFor(aid: string): Promise<KeriaClient | null> {
    try {
      return await this.getClient(aid);
    } catch (error) {
      throw new Error(`Could not get a KERIA client for AID ${aid}: ${getErrorMessage(error)}`);
    }
  }

  private async fetchKeyState(client: KeriaClient | null, aid: string): Promise<KeriKeyState | null> {
    if (client) {
      try {
        const states: unknown = await client.keyStates().get(aid);
        const state: unknown = Array.isArray(states) ? states[0] : states;
        if (isKeriKeyState(state)) {
          return state;
        }
      } catch (error) {
        console.warn(`[keria-loader] Signify key state lookup failed for ${aid}: ${getErrorMessage(error)}`);
      }
    }

    // fallback: fetch key state via KERIA HTTP
    const response = await fetch(`${this.config.keriaHttpUrl}/states/${aid}`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new Error(`KERIA returned ${response.status} for key state of ${aid}: ${response.statusText}`);
    }

    const body: unknown = await response.json();
    const state: unknown = Array.isArray(body) ? body[0] : body;
    if (!isKeriKeyState(state)) {
      throw new Error(`KERIA returned malformed key state for AID: ${aid}`);
    }
    return state;
  }

  /** DA credentials of the AID, by schema only; the alias resolver applies the rest */
  private async designatedAliases(client: KeriaClient, aid: string): Promise<CredentialRecord[]> {
    const cached = this.daCache.get(aid);
    if (cached && Date.now() - cached.fetchedAt < this.cacheTtl) {
      return cached.records;
    }

    const listed = await this.listCredentials(client, aid);
    const records = listed
      .filter(isKeriCredential)
      .map(mapCredential)
      .filter(record => record.schema === this.designatedAliasesSchema);
    this.daCache.set(aid, { records, fetchedAt: Date.now() });
    return records;
  }

  /** every credential of the DA schema, page by page until KERIA runs out */
  private async listCredentials(client: KeriaClient, aid: string): Promise<unknown[]> {
    const all: unknown[] = [];
    for (let skip = 0; ; skip += CREDENTIAL_PAGE_SIZE) {
      let page: unknown;
      try {
        page = await client.credentials().list({
          filter: { '-s': this.designatedAliasesSchema },
          skip,
          limit: CREDENTIAL_PAGE_SIZE,
        });
      } catch (error) {
        throw new Error(`Could not list credentials for AID ${aid}: ${getErrorMessage(error)}`);
      }
      if (!Array.isArray(page)) {
        throw new Error(`KERIA returned a malformed credential listing for AID: ${aid}`);
      }
      all.push(...page);
      if (page.length < CREDENTIAL_PAGE_SIZE) {
        return all;
      }
    }
  }

  private async fetchRoleEndpoints(client: KeriaClient, aid: string): Promise<EndpointTable> {
    const path = `/endroles/${aid}`;
    let response: Response;
    try {
      response = await client.fetch(path, 'GET', null);
    } catch (error) {
      throw new Error(`Could not read end roles from ${path}: ${getErrorMessage(error)}`);
    }
    if (!response.ok) {
      throw new Error(`KERIA returned ${response.status} for ${path}: ${response.statusText}`);
    }

    const body: unknown = await response.json();
    if (!Array.isArray(body)) {
      throw new Error(`KERIA returned malformed end roles for AID: ${aid}`);
    }
    return endpointTable(body.filter(isEndRole), this.locations);
  }
}

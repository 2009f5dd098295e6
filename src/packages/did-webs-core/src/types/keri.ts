/** positive rational weight of one signing key */
export interface Fraction {
  numerator: number;
  denominator: number;
}

/** signing policy of the current key state */
export type SigningPolicy =
  | { kind: 'single' }
  | { kind: 'simple'; threshold: number }
  | { kind: 'weighted'; weights: Fraction[] };

/** a current signing key */
export interface VerifyingKey {
  /** qualified base64 of the key, derivation code included */
  qb64: string;
  /** raw public key bytes */
  raw: Uint8Array;
}

/** authoritative key state of an AID */
export interface KeyState {
  verifyingKeys: VerifyingKey[];
  signingThreshold: SigningPolicy;
  /** witness AIDs in configured order */
  witnesses: string[];
  /** sequence number of the latest event */
  sequenceNumber: number;
}

/** a known network location of an endpoint */
export interface LocationRecord {
  scheme: string;
  url: string;
}

/** role -> endpoint AID -> protocol -> URL, in enumeration order */
export type EndpointTable = Record<string, Record<string, Record<string, string>>>;

/** read-only view of key state and endpoint data */
export interface KeyStateService {
  getState(aid: string): KeyState | null;
  getWitnessLocations(witness: string): LocationRecord[];
  getRoleEndpoints(aid: string): EndpointTable;
  getWitnessEndpoints(aid: string): EndpointTable;
  /** true when the AID is controlled locally, not merely known */
  hasLocalIdentity(aid: string): boolean;
}

/** a credential as the registry reports it */
export interface CredentialRecord {
  /** credential SAID */
  said: string;
  /** issuer AID */
  issuer: string;
  /** issuee AID; absent on self-attested credentials */
  issuee?: string;
  /** schema SAID */
  schema: string;
  /** attribute section (`a`) */
  attributes: Record<string, unknown>;
  /** event type of the latest TEL event, e.g. iss, rev, bis, brv */
  statusEventType: string;
}

/** read-only view of the credential registry */
export interface CredentialRegistry {
  findSelfAttested(aid: string, schema: string): CredentialRecord[];
}

/** KERI key state as KERIA reports it */
export interface KeriKeyState {
  /** Current signing keys */
  k: string[];
  /** Signing threshold */
  kt: string | string[] | string[][];
  /** Next key digests */
  n: string[];
  /** Backer threshold */
  bt: string;
  /** Backers */
  b: string[];
  /** Configuration */
  c: string[];
  /** Establishment event digest */
  d: string;
  /** Identifier */
  i: string;
  /** Sequence number (hex) */
  s: string;
  /** Type */
  t?: string;
}

/** KERI credential from KERIA */
export interface KeriCredential {
  sad: {
    /** Credential SAID */
    d: string;
    /** Issuer AID */
    i: string;
    /** Schema SAID */
    s: string;
    /** Attributes */
    a: {
      /** Issuee AID */
      i?: string;
      [key: string]: unknown;
    };
  };
  status: {
    /** event type of the latest TEL event */
    et: string;
  };
}

/** coerced query parameters of a DID URL */
export type DidQuery = Record<string, boolean | number | string>;

/** did:keri:<aid> */
export interface KeriDidUri {
  method: 'keri';
  aid: string;
}

/** did:web or did:webs -- the two share one grammar */
export interface WebDidUri {
  method: 'web' | 'webs';
  domain: string;
  /** decoded from the %3A-encoded port segment */
  port?: number;
  /** colon-delimited segments between the domain (or port) and the AID */
  path?: string[];
  aid: string;
  query: DidQuery;
  /** query text exactly as it appeared after '?', kept for re-serialization */
  rawQuery?: string;
}

export type DidUri = KeriDidUri | WebDidUri;

export type DidMethodName = DidUri['method'];

/** JWK (JSON Web Key) for an Ed25519 signing key */
export interface JWK {
  kid: string;
  kty: 'OKP';
  crv: 'Ed25519';
  x: string;
}

/** one key of the current signing key list */
export interface JsonWebKeyVerificationMethod {
  id: string;
  type: 'JsonWebKey';
  controller: string;
  publicKeyJwk: JWK;
}

/** multisig with an integer threshold over every key */
export interface ThresholdProofVerificationMethod {
  id: string;
  type: 'ConditionalProof2022';
  controller: string;
  threshold: number;
  conditionThreshold: string[];
}

/** one weighted condition of a fractionally weighted multisig */
export interface WeightedCondition {
  condition: string;
  weight: number;
}

/** multisig with fractional weights normalized to a common denominator */
export interface WeightedThresholdProofVerificationMethod {
  id: string;
  type: 'ConditionalProof2022';
  controller: string;
  threshold: number;
  conditionWeightedThreshold: WeightedCondition[];
}

export type VerificationMethod =
  | JsonWebKeyVerificationMethod
  | ThresholdProofVerificationMethod
  | WeightedThresholdProofVerificationMethod;

/** service endpoint in a DID document, one per (endpoint AID, role) */
export interface DIDService {
  id: string;
  type: string;
  serviceEndpoint: Record<string, string>;
}

/** did:webs DID document */
export interface DIDDocument {
  id: string;
  verificationMethod: VerificationMethod[];
  service: DIDService[];
  alsoKnownAs: string[];
}

/** a network location of a witness, as listed in the document metadata */
export interface WitnessLocation {
  idx: number;
  scheme: string;
  url: string;
}

export interface DIDResolutionMetadata {
  contentType: string;
  /** UTC, YYYY-MM-DDTHH:MM:SSZ */
  retrieved: string;
}

export interface DIDDocumentMetadata {
  witnesses: WitnessLocation[];
  /** sequence number of the latest KEL event */
  versionId: string;
  equivalentId: string[];
}

/** DID resolution result envelope */
export interface DIDResolutionResult {
  didDocument: DIDDocument;
  didResolutionMetadata: DIDResolutionMetadata;
  didDocumentMetadata: DIDDocumentMetadata;
}

/** field of a resolution result that holds the document */
export const DD_FIELD = 'didDocument';

import type { CredentialRecord, KeyState, VerifyingKey } from '../src/index.js';
import { DES_ALIASES_SCHEMA } from '../src/index.js';

export const AID = 'EMFHITWxTHfIvvmOc_cCCDJfoNzx5r1miumzGpzqKV_n';
export const OTHER_AID = 'EOIcE5DeYzaQ5N-YHV5CWIB5dqmMQQREkuezmlBREV4S';
export const AGENT_AID = 'ENTwvFop3ga1EPmqQo8e7bqSYBK1kf73pRjndqfJvRgk';
export const WIT_A = 'BKPZs6QKHirhe95vZQ2hJAKrYuHGAwp5brjNuZU05et9';
export const WIT_B = 'BOg1c1J0c5mFQaef8ffbaZSBXSP8CDgwEhc3J2rQWOil';

/** Ed25519 keys whose raw bytes are 32 x 0x01, 0x02, 0x03 */
export const KEY_1 = 'DAEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEB';
export const KEY_2 = 'DAICAgICAgICAgICAgICAgICAgICAgICAgICAgICAgIC';
export const KEY_3 = 'DAMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMD';

/** base64url of each key's raw bytes */
export const X_1 = 'AQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQE';
export const X_2 = 'AgICAgICAgICAgICAgICAgICAgICAgICAgICAgICAgI';
export const X_3 = 'AwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwM';

export const DID_WEBS = `did:webs:example.com%3A8080:dws:${AID}`;

export function rawKey(fill: number, qb64: string): VerifyingKey {
  return { qb64, raw: new Uint8Array(32).fill(fill) };
}

export const KEYS: VerifyingKey[] = [rawKey(1, KEY_1), rawKey(2, KEY_2), rawKey(3, KEY_3)];

export function singleKeyState(overrides: Partial<KeyState> = {}): KeyState {
  return {
    verifyingKeys: [KEYS[0]],
    signingThreshold: { kind: 'single' },
    witnesses: [],
    sequenceNumber: 0,
    ...overrides,
  };
}

export function aliasCredential(overrides: Partial<CredentialRecord> = {}): CredentialRecord {
  return {
    said: 'EDesignatedAliasesCredentialSaid',
    issuer: AID,
    schema: DES_ALIASES_SCHEMA,
    attributes: { dt: '2024-01-01T00:00:00.000000+00:00', ids: [`did:web:example.com:${AID}`] },
    statusEventType: 'iss',
    ...overrides,
  };
}

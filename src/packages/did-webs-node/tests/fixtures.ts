import { vi } from 'vitest';
import { DES_ALIASES_SCHEMA, type CredentialListing, type KeriaClient } from '../src/index.js';

export const AID = 'EMFHITWxTHfIvvmOc_cCCDJfoNzx5r1miumzGpzqKV_n';
export const AGENT_AID = 'ENTwvFop3ga1EPmqQo8e7bqSYBK1kf73pRjndqfJvRgk';
export const WIT_A = 'BKPZs6QKHirhe95vZQ2hJAKrYuHGAwp5brjNuZU05et9';
export const WIT_B = 'BOg1c1J0c5mFQaef8ffbaZSBXSP8CDgwEhc3J2rQWOil';

export const KEY_1 = 'DAEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEB';
export const KEY_2 = 'DAICAgICAgICAgICAgICAgICAgICAgICAgICAgICAgIC';

export const DA_SAID = 'EDesignatedAliasesCredentialSaid';

/** key state as KERIA reports it */
export function keriaState(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    vn: [1, 0],
    i: AID,
    s: 'a',
    p: '',
    d: AID,
    f: 'a',
    dt: '2024-05-06T07:08:09.123456+00:00',
    et: 'ixn',
    kt: ['1/2', '1/2'],
    k: [KEY_1, KEY_2],
    nt: '1',
    n: ['EKnextKeyDigestPlaceholder'],
    bt: '1',
    b: [WIT_A, WIT_B],
    c: [],
    ee: {},
    di: '',
    ...overrides,
  };
}

/** credential as `credentials().list()` reports it */
export function keriaCredential(
  sad: Record<string, unknown> = {},
  et = 'iss',
): Record<string, unknown> {
  return {
    sad: {
      v: 'ACDC10JSON000000_',
      d: DA_SAID,
      i: AID,
      ri: 'ERegistryPlaceholder',
      s: DES_ALIASES_SCHEMA,
      a: { d: 'EAttributesPlaceholder', dt: '2024-01-01T00:00:00.000000+00:00', ids: [`did:web:example.com:${AID}`] },
      ...sad,
    },
    status: { et },
  };
}

export interface FakeClientData {
  states?: unknown;
  credentials?: unknown;
  credentialCesr?: Record<string, string>;
  endroles?: unknown;
}

export function fakeClient(data: FakeClientData = {}) {
  const getState = vi.fn(async (_pre: string): Promise<unknown> => data.states ?? []);
  const listCredentials = vi.fn(async (kargs: CredentialListing = {}): Promise<unknown> => {
    const all = data.credentials ?? [];
    if (!Array.isArray(all)) {
      return all;
    }
    const skip = kargs.skip ?? 0;
    return all.slice(skip, skip + (kargs.limit ?? 25));
  });
  const getCredential = vi.fn(
    async (said: string, _includeCESR?: boolean): Promise<unknown> => data.credentialCesr?.[said] ?? null,
  );
  const agentFetch = vi.fn(
    async (_path: string, _method: string, _body: unknown): Promise<Response> =>
      new Response(JSON.stringify(data.endroles ?? []), { status: 200 }),
  );

  const client: KeriaClient = {
    keyStates: () => ({ get: getState }),
    credentials: () => ({ list: listCredentials, get: getCredential }),
    fetch: agentFetch,
  };
  return { client, getState, listCredentials, getCredential, agentFetch };
}

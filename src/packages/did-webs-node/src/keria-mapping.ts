/**
 * KERIA wire shapes and their mapping onto core key state.
 *
 * KERIA answers with loosely typed JSON; everything here narrows `unknown`
 * before it reaches the synthesizer.
 */

import {
  parseSigningThreshold,
  verifyingKeyFromQb64,
  type CredentialRecord,
  type EndpointTable,
  type KeriCredential,
  type KeriKeyState,
  type KeyState,
  type LocationRecord,
} from '@did-webs/core';

/**
 * The slice of a SignifyClient the loader and publisher use.
 * `SignifyClient` from signify-ts satisfies it structurally.
 */
export interface KeriaClient {
  keyStates(): { get(pre: string): Promise<unknown> };
  credentials(): {
    list(kargs?: CredentialListing): Promise<unknown>;
    get(said: string, includeCESR?: boolean): Promise<unknown>;
  };
  fetch(path: string, method: string, data: unknown): Promise<Response>;
}

/** query of `credentials().list()`; KERIA pages with `skip` and `limit` */
export interface CredentialListing {
  filter?: object;
  skip?: number;
  limit?: number;
}

/** endpoint AID -> URL scheme -> URL */
export type LocationBook = Record<string, Record<string, string>>;

/** one authorized endpoint role of a controller, as `/endroles` lists it */
export interface EndRole {
  cid?: string;
  role: string;
  eid: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isThreshold(value: unknown): value is KeriKeyState['kt'] {
  return (
    typeof value === 'string' ||
    isStringArray(value) ||
    (Array.isArray(value) && value.every(isStringArray))
  );
}

export function isKeriKeyState(value: unknown): value is KeriKeyState {
  return (
    isRecord(value) &&
    isStringArray(value.k) &&
    isThreshold(value.kt) &&
    isStringArray(value.n) &&
    typeof value.bt === 'string' &&
    isStringArray(value.b) &&
    isStringArray(value.c) &&
    typeof value.d === 'string' &&
    typeof value.i === 'string' &&
    typeof value.s === 'string'
  );
}

export function isKeriCredential(value: unknown): value is KeriCredential {
  if (!isRecord(value) || !isRecord(value.sad) || !isRecord(value.status)) {
    return false;
  }
  const { sad, status } = value;
  return (
    typeof sad.d === 'string' &&
    typeof sad.i === 'string' &&
    typeof sad.s === 'string' &&
    isRecord(sad.a) &&
    (sad.a.i === undefined || typeof sad.a.i === 'string') &&
    typeof status.et === 'string'
  );
}

export function isEndRole(value: unknown): value is EndRole {
  return isRecord(value) && typeof value.role === 'string' && typeof value.eid === 'string';
}

/** KERIA key state -> core KeyState; `s` is hex */
export function mapKeyState(state: KeriKeyState): KeyState {
  if (!/^[0-9a-f]+$/i.test(state.s)) {
    throw new Error(`Malformed sequence number in key state of ${state.i}: ${state.s}`);
  }
  return {
    verifyingKeys: state.k.map(verifyingKeyFromQb64),
    signingThreshold: parseSigningThreshold(state.kt),
    witnesses: [...state.b],
    sequenceNumber: parseInt(state.s, 16),
  };
}

export function mapCredential(credential: KeriCredential): CredentialRecord {
  const { sad, status } = credential;
  const { i: issuee, ...attributes } = sad.a;
  return {
    said: sad.d,
    issuer: sad.i,
    ...(issuee === undefined ? {} : { issuee }),
    schema: sad.s,
    attributes,
    statusEventType: status.et,
  };
}

/** known locations of an endpoint, in book order */
export function locationRecords(book: LocationBook, eid: string): LocationRecord[] {
  if (!Object.hasOwn(book, eid)) {
    return [];
  }
  return Object.entries(book[eid]).map(([scheme, url]) => ({ scheme, url }));
}

/**
 * Join end roles with the location book. Endpoints with no known location are
 * left out.
 */
export function endpointTable(ends: EndRole[], book: LocationBook): EndpointTable {
  const table: EndpointTable = {};
  for (const { role, eid } of ends) {
    const urls = Object.fromEntries(locationRecords(book, eid).map(loc => [loc.scheme, loc.url]));
    if (Object.keys(urls).length === 0) {
      continue;
    }
    table[role] = { ...table[role], [eid]: urls };
  }
  return table;
}

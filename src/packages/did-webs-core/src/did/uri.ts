/**
 * DID URI parsing and normalization for did:keri, did:web and did:webs.
 *
 * did:web and did:webs share one grammar:
 *
 *   did:web[s]:<domain>[%3A<port>][:<path>]*:<aid>[?<query>]
 *
 * The port separator must be percent-encoded. Older publishers wrote it as a
 * bare colon; parseLegacyUnencodedPort / reEncodeDid exist to repair those.
 */

import type { DidMethodName, DidUri, KeriDidUri, WebDidUri } from '../types/did.js';
import { InvalidDidFormatError } from '../utils/errors.js';
import { validatePrefix } from './prefix.js';
import { parseQueryString } from './query.js';

const SCHEMES: ReadonlyArray<readonly [string, DidMethodName]> = [
  ['did:keri:', 'keri'],
  ['did:webs:', 'webs'],
  ['did:web:', 'web'],
];

const ENCODED_PORT = '%3a';
const MAX_PORT = 65535;

type PortStyle = 'encoded' | 'legacy';

/** scheme is matched case-insensitively; the remainder is left untouched */
function splitScheme(did: string): { method: DidMethodName; rest: string } | null {
  for (const [prefix, method] of SCHEMES) {
    if (did.slice(0, prefix.length).toLowerCase() === prefix) {
      return { method, rest: did.slice(prefix.length) };
    }
  }
  return null;
}

function isDigits(s: string): boolean {
  if (s.length === 0) return false;
  for (const ch of s) {
    if (ch < '0' || ch > '9') return false;
  }
  return true;
}

function toPort(did: string, digits: string): number {
  const port = Number(digits);
  if (port > MAX_PORT) {
    throw new InvalidDidFormatError(did, 'did:web(s) (port out of range)');
  }
  return port;
}

/**
 * Scan the part after `did:web[s]:`.
 *
 * Segments are colon-delimited: the first holds the domain (and, encoded, the
 * port), the last is the AID, anything between is path.
 */
function scanWebBody(did: string, method: 'web' | 'webs', rest: string, style: PortStyle): WebDidUri {
  const expected = style === 'encoded' ? 'did:web(s)' : 'unencoded-port did:web(s)';

  const q = rest.indexOf('?');
  const body = q < 0 ? rest : rest.slice(0, q);
  const rawQuery = q < 0 ? undefined : rest.slice(q + 1);

  const tail = body.split(':');
  const head = tail.shift() ?? '';

  let domain = head;
  let port: number | undefined;

  if (style === 'encoded') {
    const pct = head.indexOf('%');
    if (pct >= 0) {
      domain = head.slice(0, pct);
      const encoded = head.slice(pct);
      const digits = encoded.slice(ENCODED_PORT.length);
      if (encoded.slice(0, ENCODED_PORT.length).toLowerCase() !== ENCODED_PORT || !isDigits(digits)) {
        throw new InvalidDidFormatError(did, expected);
      }
      port = toPort(did, digits);
    }
  } else if (tail.length >= 2 && isDigits(tail[0])) {
    port = toPort(did, tail.shift() ?? '');
  }

  if (domain.length === 0 || domain.includes('%')) {
    throw new InvalidDidFormatError(did, expected);
  }

  const aid = tail.pop();
  if (aid === undefined || aid.length === 0 || tail.some(segment => segment.length === 0)) {
    throw new InvalidDidFormatError(did, expected);
  }
  validatePrefix(aid);

  const uri: WebDidUri = { method, domain, aid, query: parseQueryString(rawQuery) };
  if (port !== undefined) uri.port = port;
  if (tail.length > 0) uri.path = tail;
  if (rawQuery !== undefined) uri.rawQuery = rawQuery;
  return uri;
}

/** parse did:keri:<aid> */
export function parseDidKeri(did: string): KeriDidUri {
  const scheme = splitScheme(did);
  if (scheme?.method !== 'keri' || scheme.rest.length === 0 || scheme.rest.includes(':')) {
    throw new InvalidDidFormatError(did, 'did:keri');
  }
  return { method: 'keri', aid: validatePrefix(scheme.rest) };
}

/** parse a canonically encoded did:web or did:webs */
export function parseDidWebs(did: string): WebDidUri {
  const scheme = splitScheme(did);
  if (scheme === null || scheme.method === 'keri') {
    throw new InvalidDidFormatError(did, 'did:web(s)');
  }
  return scanWebBody(did, scheme.method, scheme.rest, 'encoded');
}

/**
 * Parse a did:web(s) whose port colon was not percent-encoded.
 *
 * A digit-only segment directly after the domain is taken as the port when at
 * least one more segment follows it.
 */
export function parseLegacyUnencodedPort(did: string): WebDidUri {
  const scheme = splitScheme(did);
  if (scheme === null || scheme.method === 'keri') {
    throw new InvalidDidFormatError(did, 'unencoded-port did:web(s)');
  }
  return scanWebBody(did, scheme.method, scheme.rest, 'legacy');
}

/** parse any supported DID */
export function parseDid(did: string): DidUri {
  const scheme = splitScheme(did);
  if (scheme === null) {
    throw new InvalidDidFormatError(did, 'did:keri, did:web or did:webs');
  }
  return scheme.method === 'keri' ? parseDidKeri(did) : parseDidWebs(did);
}

function serializeQuery(uri: WebDidUri): string | undefined {
  if (uri.rawQuery !== undefined) {
    return uri.rawQuery;
  }
  const entries = Object.entries(uri.query);
  if (entries.length === 0) {
    return undefined;
  }
  return new URLSearchParams(entries.map(([k, v]): [string, string] => [k, String(v)])).toString();
}

/**
 * Serialize a parsed DID in canonical form: lower-case scheme, %3A port.
 */
export function formatDid(uri: DidUri, options: { includeQuery?: boolean } = {}): string {
  if (uri.method === 'keri') {
    return `did:keri:${uri.aid}`;
  }

  let did = `did:${uri.method}:${uri.domain}`;
  if (uri.port !== undefined) did += `%3A${uri.port}`;
  if (uri.path && uri.path.length > 0) did += `:${uri.path.join(':')}`;
  did += `:${uri.aid}`;

  const query = options.includeQuery === false ? undefined : serializeQuery(uri);
  if (query !== undefined) did += `?${query}`;
  return did;
}

/**
 * Rewrite a DID into canonical encoding.
 *
 * Legacy unencoded ports become %3A; path, AID and query are kept. did:keri
 * is re-validated and returned as is.
 */
export function reEncodeDid(did: string): string {
  const scheme = splitScheme(did);
  if (scheme === null) {
    throw new InvalidDidFormatError(did, 'did:webs or did:keri');
  }
  if (scheme.method === 'keri') {
    return formatDid(parseDidKeri(did));
  }

  let uri: WebDidUri;
  try {
    uri = parseLegacyUnencodedPort(did);
  } catch (error) {
    if (!(error instanceof InvalidDidFormatError)) throw error;
    uri = parseDidWebs(did);
  }
  return formatDid(uri);
}

/**
 * Drop the query component of a did:web(s). did:keri is returned unchanged.
 */
export function stripQuery(did: string): string {
  const scheme = splitScheme(did);
  if (scheme === null || scheme.method === 'keri') {
    return did;
  }
  return formatDid(parseDidWebs(did), { includeQuery: false });
}

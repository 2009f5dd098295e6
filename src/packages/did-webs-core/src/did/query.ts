import type { DidQuery } from '../types/did.js';

const INTEGER = /^[+-]?\d+$/;

/** true/false (any case), then integer, then the string itself */
function coerce(value: string): boolean | number | string {
  const lower = value.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (INTEGER.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
  }
  return value;
}

/**
 * Parse the query component of a DID URL.
 *
 * Pairs without a value are dropped and the first value of a repeated key wins.
 *
 * @example
 * parseQueryString('?versionId=1&meta=true') // { versionId: 1, meta: true }
 */
export function parseQueryString(raw: string | undefined): DidQuery {
  if (!raw || raw === '?') {
    return {};
  }

  const params = new URLSearchParams(raw.startsWith('?') ? raw.slice(1) : raw);
  const result: DidQuery = {};
  for (const [key, value] of params) {
    if (value === '' || Object.hasOwn(result, key)) continue;
    result[key] = coerce(value);
  }
  return result;
}

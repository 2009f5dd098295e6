import { InvalidIdentifierError } from '../utils/errors.js';

/**
 * Derivation codes a KERI identifier prefix may carry, with the full qb64 size
 * of each.
 */
const PREFIX_CODES: ReadonlyMap<string, number> = new Map([
  ['B', 44], // Ed25519 non-transferable
  ['D', 44], // Ed25519
  ['E', 44], // Blake3-256
  ['F', 44], // Blake2b-256
  ['G', 44], // Blake2s-256
  ['H', 44], // SHA3-256
  ['I', 44], // SHA2-256
  ['0D', 88], // Blake3-512
  ['0E', 88], // Blake2b-512
  ['0F', 88], // SHA3-512
  ['0G', 88], // SHA2-512
  ['1AAA', 48], // secp256k1 non-transferable
  ['1AAB', 48], // secp256k1
  ['1AAC', 80], // Ed448 non-transferable
  ['1AAD', 80], // Ed448
  ['1AAI', 48], // secp256r1 non-transferable
  ['1AAJ', 48], // secp256r1
]);

const B64_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

/** hard size of a code, selected by its first character */
function hardSize(first: string): number | null {
  if (/^[A-Za-z]$/.test(first)) return 1;
  if (first === '0') return 2;
  if (first === '1') return 4;
  return null;
}

/**
 * Check a qb64 identifier prefix and return the reason it is invalid, or null.
 */
function prefixProblem(aid: string): string | null {
  if (aid.length === 0) {
    return 'empty prefix';
  }
  for (const ch of aid) {
    if (!B64_ALPHABET.includes(ch)) {
      return `character '${ch}' is not base64url`;
    }
  }

  const hs = hardSize(aid[0]);
  if (hs === null || aid.length < hs) {
    return 'unknown derivation code';
  }
  const code = aid.slice(0, hs);
  const size = PREFIX_CODES.get(code);
  if (size === undefined) {
    return `'${code}' is not an identifier prefix code`;
  }
  if (aid.length !== size) {
    return `expected ${size} characters for code '${code}', got ${aid.length}`;
  }

  // one and two char codes sit on top of zeroed pad bytes; the bits of the
  // first raw character that belong to the pad must be zero
  if (hs === 1 || hs === 2) {
    const padBits = hs * 2;
    const next = B64_ALPHABET.indexOf(aid[hs]);
    if (next >> (6 - padBits) !== 0) {
      return 'non-zero pad bits';
    }
  }

  return null;
}

/** true when the string is a syntactically valid identifier prefix */
export function isValidPrefix(aid: string): boolean {
  return prefixProblem(aid) === null;
}

/**
 * Validate an identifier prefix.
 *
 * @throws InvalidIdentifierError naming the offending prefix
 */
export function validatePrefix(aid: string): string {
  const problem = prefixProblem(aid);
  if (problem !== null) {
    throw new InvalidIdentifierError(aid, problem);
  }
  return aid;
}

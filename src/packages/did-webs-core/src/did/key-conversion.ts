import type { JWK } from '../types/did.js';
import type { VerifyingKey } from '../types/keri.js';

/** base64url (unpadded) to bytes */
function decodeBase64url(text: string): Uint8Array {
  const base64 = text
    .replace(/-/g, '+')
    .replace(/_/g, '/')
    .padEnd(Math.ceil(text.length / 4) * 4, '=');
  return Uint8Array.from(atob(base64), ch => ch.charCodeAt(0));
}

/** bytes to base64url without padding */
export function encodeBase64url(bytes: Uint8Array): string {
  return btoa(String.fromCharCode(...bytes))
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/, '');
}

/**
 * Decode a KERI Ed25519 verification key ('D' code) into its raw bytes.
 *
 * KERI keys use qualified base64 -- the derivation code is part of the string.
 * 44 chars base64url = 33 bytes (1 code/pad byte + 32 key).
 */
export function verifyingKeyFromQb64(qb64: string): VerifyingKey {
  if (qb64.length !== 44 || (qb64[0] !== 'D' && qb64[0] !== 'B')) {
    throw new Error(`Unsupported verification key ${qb64}: expected a 44 char Ed25519 key`);
  }

  // first byte carries the derivation code; remaining 32 are the actual key
  const fullBytes = decodeBase64url(qb64);
  return { qb64, raw: fullBytes.slice(1) };
}

/** JWK form of a verification key, as did:webs resolvers expect it */
export function verifyingKeyToJwk(key: VerifyingKey): JWK {
  return {
    kid: key.qb64,
    kty: 'OKP',
    crv: 'Ed25519',
    x: encodeBase64url(key.raw),
  };
}

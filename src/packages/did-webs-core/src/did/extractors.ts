import type { DIDDocument, DIDResolutionResult } from '../types/did.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Shape check for a DID document received over the wire.
 * Only what the converters and callers rely on is checked.
 */
export function isDidDocument(value: unknown): value is DIDDocument {
  if (!isRecord(value) || typeof value.id !== 'string') {
    return false;
  }
  const { verificationMethod, service, alsoKnownAs } = value;
  return (
    Array.isArray(verificationMethod) &&
    verificationMethod.every(vm => isRecord(vm) && typeof vm.id === 'string' && typeof vm.controller === 'string') &&
    Array.isArray(service) &&
    isStringArray(alsoKnownAs)
  );
}

/** shape check for a resolution result envelope */
export function isDidResolutionResult(value: unknown): value is DIDResolutionResult {
  return (
    isRecord(value) &&
    isDidDocument(value.didDocument) &&
    isRecord(value.didResolutionMetadata) &&
    isRecord(value.didDocumentMetadata)
  );
}

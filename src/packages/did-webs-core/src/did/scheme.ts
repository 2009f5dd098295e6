/**
 * did:webs <-> did:web rewriting of documents, for publishing did.json where
 * plain did:web resolvers can read it and reading it back.
 *
 * Only the document `id` and the verification method controllers are
 * rewritten. Inputs are never mutated; a converted copy is returned.
 */

import { DD_FIELD, type DIDDocument, type DIDResolutionResult } from '../types/did.js';
import { EmptyDocumentError, MissingDocumentFieldError } from '../utils/errors.js';

const WEBS_PREFIX = 'did:webs:';
const WEB_PREFIX = 'did:web:';

function asDidWeb(value: string): string {
  return value.startsWith(WEBS_PREFIX) ? WEB_PREFIX + value.slice(WEBS_PREFIX.length) : value;
}

function asDidWebs(value: string): string {
  return value.startsWith(WEB_PREFIX) ? WEBS_PREFIX + value.slice(WEB_PREFIX.length) : value;
}

/** a parsed `{}` did.json */
function hasNoFields(input: object): boolean {
  return Object.keys(input).length === 0;
}

function rewrite(doc: DIDDocument, convert: (did: string) => string): DIDDocument {
  const copy = structuredClone(doc);
  copy.id = convert(copy.id);
  for (const vm of copy.verificationMethod) {
    vm.controller = convert(vm.controller);
  }
  return copy;
}

/** convert every did:webs id and controller to did:web */
export function diddocToDidWeb(doc: DIDDocument): DIDDocument {
  return rewrite(doc, asDidWeb);
}

/** convert every did:web id and controller to did:webs; already-did:webs values are left alone */
export function diddocToDidWebs(doc: DIDDocument): DIDDocument {
  return rewrite(doc, asDidWebs);
}

/**
 * Convert a did:webs document (or the document inside a resolution result when
 * `meta` is set) to did:web.
 *
 * @throws EmptyDocumentError when there is nothing to convert
 */
export function toDidWeb(doc: DIDDocument | null | undefined, meta?: false): DIDDocument;
export function toDidWeb(result: DIDResolutionResult | null | undefined, meta: true): DIDResolutionResult;
export function toDidWeb(
  input: DIDDocument | DIDResolutionResult | null | undefined,
  meta?: boolean,
): DIDDocument | DIDResolutionResult;
export function toDidWeb(
  input: DIDDocument | DIDResolutionResult | null | undefined,
  meta = false,
): DIDDocument | DIDResolutionResult {
  if (!input || hasNoFields(input)) {
    throw new EmptyDocumentError('did:web');
  }
  if (meta) {
    if (!('didDocument' in input)) {
      throw new MissingDocumentFieldError(DD_FIELD, 'when resolution metadata is in use');
    }
    return { ...structuredClone(input), didDocument: diddocToDidWeb(input.didDocument) };
  }
  if ('didDocument' in input) {
    throw new MissingDocumentFieldError('verificationMethod', 'for a bare DID document');
  }
  return diddocToDidWeb(input);
}

/**
 * Convert a did:web document (or resolution result with `meta`) back to
 * did:webs. Safe to apply twice.
 *
 * @throws MissingDocumentFieldError when `meta` is set but there is no didDocument
 */
export function fromDidWeb(doc: DIDDocument | null | undefined, meta?: false): DIDDocument;
export function fromDidWeb(result: DIDResolutionResult | null | undefined, meta: true): DIDResolutionResult;
export function fromDidWeb(
  input: DIDDocument | DIDResolutionResult | null | undefined,
  meta?: boolean,
): DIDDocument | DIDResolutionResult;
export function fromDidWeb(
  input: DIDDocument | DIDResolutionResult | null | undefined,
  meta = false,
): DIDDocument | DIDResolutionResult {
  if (!input || hasNoFields(input)) {
    throw new EmptyDocumentError('did:webs');
  }
  if (meta) {
    if (!('didDocument' in input)) {
      throw new MissingDocumentFieldError(DD_FIELD, 'when resolution metadata is in use');
    }
    return { ...structuredClone(input), didDocument: diddocToDidWebs(input.didDocument) };
  }
  if ('didDocument' in input) {
    throw new MissingDocumentFieldError('verificationMethod', 'for a bare DID document');
  }
  return diddocToDidWebs(input);
}

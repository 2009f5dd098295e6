/** every failure the resolver core can raise */
export type DidWebsErrorCode =
  | 'InvalidDidFormat'
  | 'InvalidIdentifier'
  | 'MismatchedIdentifier'
  | 'UnknownIdentifier'
  | 'InvalidPolicy'
  | 'EmptyDocument'
  | 'MissingDocumentField';

/** structured context for rendering a diagnostic */
export interface DidWebsErrorDetail {
  /** the offending value */
  input?: string;
  /** what the value should have looked like */
  expected?: string;
}

/**
 * Base class for resolver errors.
 *
 * A request that fails with one of these is terminal: no document is produced.
 */
export class DidWebsError extends Error {
  readonly code: DidWebsErrorCode;
  readonly detail: DidWebsErrorDetail;

  constructor(code: DidWebsErrorCode, message: string, detail: DidWebsErrorDetail = {}) {
    super(message);
    this.name = 'DidWebsError';
    this.code = code;
    this.detail = detail;
  }
}

export class InvalidDidFormatError extends DidWebsError {
  constructor(did: string, expected: string) {
    super('InvalidDidFormat', `${did} is not a valid ${expected} DID`, { input: did, expected });
    this.name = 'InvalidDidFormatError';
  }
}

export class InvalidIdentifierError extends DidWebsError {
  constructor(aid: string, reason: string) {
    super('InvalidIdentifier', `${aid} is an invalid AID: ${reason}`, {
      input: aid,
      expected: 'qb64 identifier prefix',
    });
    this.name = 'InvalidIdentifierError';
  }
}

export class MismatchedIdentifierError extends DidWebsError {
  constructor(did: string, aid: string) {
    super('MismatchedIdentifier', `${did} does not contain AID ${aid}`, { input: did, expected: aid });
    this.name = 'MismatchedIdentifierError';
  }
}

export class UnknownIdentifierError extends DidWebsError {
  constructor(aid: string, did: string) {
    super('UnknownIdentifier', `Unknown AID ${aid} found for ${did}`, { input: aid });
    this.name = 'UnknownIdentifierError';
  }
}

export class InvalidPolicyError extends DidWebsError {
  constructor(message: string, input?: string) {
    super('InvalidPolicy', message, { input });
    this.name = 'InvalidPolicyError';
  }
}

export class EmptyDocumentError extends DidWebsError {
  constructor(target: string) {
    super('EmptyDocument', `Cannot convert empty DID document to ${target}`);
    this.name = 'EmptyDocumentError';
  }
}

export class MissingDocumentFieldError extends DidWebsError {
  constructor(field: string, context: string) {
    super('MissingDocumentField', `Expected '${field}' in did.json ${context}`, { expected: field });
    this.name = 'MissingDocumentFieldError';
  }
}

/** narrow an unknown thrown value to a resolver error */
export function isDidWebsError(error: unknown): error is DidWebsError {
  return error instanceof DidWebsError;
}

/** message text for anything that was thrown */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

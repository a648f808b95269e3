/**
 * Error taxonomy shared by the sync engine, the status manager and the HTTP
 * layer. Every error carries a stable `code` that the HTTP layer maps to a
 * status code.
 */

export type AdapterErrorKind = 'network' | 'filesystem' | 'protocol';

export type ErrorCode =
  | 'ADAPTER_ERROR'
  | 'SYNC_IN_PROGRESS'
  | 'INVALID_URL'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'INVALID_CREDENTIALS';

export class MirrorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A clone, fetch or merge against a working copy failed. */
export class AdapterError extends MirrorError {
  readonly kind: AdapterErrorKind;

  constructor(kind: AdapterErrorKind, message: string) {
    super('ADAPTER_ERROR', message);
    this.kind = kind;
  }
}

/** Another operation currently holds the repository's lock. */
export class SyncInProgressError extends MirrorError {
  constructor(repositoryId: string) {
    super('SYNC_IN_PROGRESS', `A sync is already in progress for ${repositoryId}`);
  }
}

export class InvalidUrlError extends MirrorError {
  constructor(message: string) {
    super('INVALID_URL', `Invalid repository URL: ${message}`);
  }
}

export class AlreadyExistsError extends MirrorError {
  constructor(url: string) {
    super('ALREADY_EXISTS', `Repository already exists: ${url}`);
  }
}

export class NotFoundError extends MirrorError {
  constructor(what: string) {
    super('NOT_FOUND', `${what} not found`);
  }
}

export class AuthenticationError extends MirrorError {
  constructor() {
    super('INVALID_CREDENTIALS', 'Invalid credentials');
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error taxonomy shared by the store, cache, registry and sync engines
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'AMBIGUOUS_MATCH'
  | 'AMBIGUOUS_PREFIX'
  | 'INVALID_INPUT'
  | 'CORRUPT_LOG'
  | 'STORAGE_FAILURE'
  | 'REMOTE_FETCH_FAILURE'
  | 'CANCELLED';

export class TracklogError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EntityNotFoundError extends TracklogError {
  constructor(readonly entityId: string) {
    super('NOT_FOUND', `entity ${entityId} not found`);
  }
}

export class IdentityNotFoundError extends TracklogError {
  constructor(query: string) {
    super('NOT_FOUND', `identity not found: ${query}`);
  }
}

/**
 * Two local records claim the same external identity. Never auto-resolved.
 */
export class AmbiguousMatchError extends TracklogError {
  constructor(
    readonly key: string,
    readonly value: string,
    readonly matches: string[]
  ) {
    super(
      'AMBIGUOUS_MATCH',
      `multiple records match ${key}=${value}: ${matches.join(', ')}`
    );
  }
}

export class AmbiguousPrefixError extends TracklogError {
  constructor(
    readonly prefix: string,
    readonly matches: string[]
  ) {
    super('AMBIGUOUS_PREFIX', `prefix "${prefix}" matches ${matches.length} records`);
  }
}

export class InvalidInputError extends TracklogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_INPUT', message, options);
  }
}

export class CorruptLogError extends TracklogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CORRUPT_LOG', message, options);
  }
}

export class StorageFailureError extends TracklogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_FAILURE', message, options);
  }
}

export class RemoteFetchError extends TracklogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REMOTE_FETCH_FAILURE', message, options);
  }
}

export class CancelledError extends TracklogError {
  constructor(cause?: unknown) {
    super('CANCELLED', 'operation cancelled', { cause });
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

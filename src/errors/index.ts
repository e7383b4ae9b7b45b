/**
 * Error taxonomy for the indexing pipeline
 */

export type IndexErrorCode =
  | 'NORMALIZATION_FAILED'
  | 'CONNECTOR_TRANSIENT'
  | 'CONNECTOR_PERMANENT'
  | 'VERSION_CONFLICT'
  | 'MERGE_FAILED'
  | 'MERGE_AMBIGUOUS'
  | 'EMBEDDING_FAILED'
  | 'DIMENSION_MISMATCH'
  | 'TIMEOUT';

export class IndexError extends Error {
  public readonly code: IndexErrorCode;

  constructor(code: IndexErrorCode, message: string) {
    super(message);
    this.name = 'IndexError';
    this.code = code;
  }
}

export interface FieldViolation {
  path: string;
  message: string;
}

/**
 * A raw record that cannot be mapped into the canonical model. The record
 * is quarantined; the batch carries on.
 */
export class NormalizationError extends IndexError {
  constructor(
    message: string,
    public readonly nativeId: string,
    public readonly violations: FieldViolation[] = []
  ) {
    super('NORMALIZATION_FAILED', message);
    this.name = 'NormalizationError';
  }
}

export type ConnectorFailureKind = 'transient' | 'permanent';

export class ConnectorError extends IndexError {
  constructor(message: string, public readonly kind: ConnectorFailureKind) {
    super(kind === 'transient' ? 'CONNECTOR_TRANSIENT' : 'CONNECTOR_PERMANENT', message);
    this.name = 'ConnectorError';
  }

  static transient(message: string): ConnectorError {
    return new ConnectorError(message, 'transient');
  }

  static permanent(message: string): ConnectorError {
    return new ConnectorError(message, 'permanent');
  }
}

/** Version check failed on write; the caller re-reads and retries */
export class ConflictError extends IndexError {
  constructor(message: string, public readonly entityId: string) {
    super('VERSION_CONFLICT', message);
    this.name = 'ConflictError';
  }
}

export class MergeFailure extends IndexError {
  constructor(message: string, public readonly attempts: number) {
    super('MERGE_FAILED', message);
    this.name = 'MergeFailure';
  }
}

/**
 * Several plausible identities and no safe winner. Never thrown across the
 * pipeline; carried on the resolution so it can be logged for reconciliation.
 */
export class MergeAmbiguity extends IndexError {
  constructor(
    message: string,
    public readonly candidates: Array<{ entityId: string; confidence: number }>
  ) {
    super('MERGE_AMBIGUOUS', message);
    this.name = 'MergeAmbiguity';
  }
}

export class EmbeddingError extends IndexError {
  constructor(message: string, code: 'EMBEDDING_FAILED' | 'DIMENSION_MISMATCH' = 'EMBEDDING_FAILED') {
    super(code, message);
    this.name = 'EmbeddingError';
  }
}

export class TimeoutError extends IndexError {
  constructor(operation: string, public readonly timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

// Both check the shape, not the prototype: fs errors can come from another realm
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/** Errno code of a system error, such as ENOENT */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

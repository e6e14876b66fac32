/**
 * Case Memory Errors
 *
 * Every error raised by the case memory carries a stable `code` and the
 * operation (and case, where there is one) it came from, so callers can
 * log and retry without parsing messages.
 */

/**
 * Stable error codes
 */
export type CaseMemoryErrorCode =
  | 'NOT_FOUND'
  | 'DIMENSION_MISMATCH'
  | 'INVALID_SCORE'
  | 'INVALID_VECTOR'
  | 'INVALID_RECORD'
  | 'EMBEDDING_FAILED'
  | 'INDEX_UNAVAILABLE'
  | 'DEADLINE_EXCEEDED'
  | 'CONCURRENT_MODIFICATION'
  | 'CASE_RETIRED'
  | 'INVALID_CONFIG'
  | 'INVARIANT_VIOLATION';

/**
 * Where an error happened
 */
export interface ErrorContext {
  /** Operation name, e.g. `store.put` or `retrieval.retrieve` */
  operation?: string;
  /** Case the operation was acting on */
  caseId?: string;
}

/**
 * Base class for all case memory errors
 */
export class CaseMemoryError extends Error {
  readonly operation: string | undefined;
  readonly caseId: string | undefined;

  constructor(
    public readonly code: CaseMemoryErrorCode,
    message: string,
    context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CaseMemoryError';
    this.operation = context.operation;
    this.caseId = context.caseId;
  }
}

export class NotFoundError extends CaseMemoryError {
  constructor(caseId: string, operation?: string) {
    super('NOT_FOUND', `Case not found: ${caseId}`, { caseId, operation });
    this.name = 'NotFoundError';
  }
}

export class DimensionMismatchError extends CaseMemoryError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: ErrorContext = {}
  ) {
    super('DIMENSION_MISMATCH', `Vector dimension mismatch: expected ${expected}, got ${actual}`, context);
    this.name = 'DimensionMismatchError';
  }
}

export class InvalidScoreError extends CaseMemoryError {
  constructor(field: string, value: number, context: ErrorContext = {}) {
    super('INVALID_SCORE', `${field} must be a number in [0, 1], got ${value}`, context);
    this.name = 'InvalidScoreError';
  }
}

export class InvalidVectorError extends CaseMemoryError {
  constructor(reason: string, context: ErrorContext = {}) {
    super('INVALID_VECTOR', `Invalid vector: ${reason}`, context);
    this.name = 'InvalidVectorError';
  }
}

export class InvalidRecordError extends CaseMemoryError {
  constructor(field: string, reason: string, context: ErrorContext = {}) {
    super('INVALID_RECORD', `Invalid ${field}: ${reason}`, context);
    this.name = 'InvalidRecordError';
  }
}

export class EmbeddingFailedError extends CaseMemoryError {
  constructor(provider: string, cause: unknown, context: ErrorContext = {}) {
    super('EMBEDDING_FAILED', `Embedding provider '${provider}' failed: ${describe(cause)}`, context, { cause });
    this.name = 'EmbeddingFailedError';
  }
}

export class IndexUnavailableError extends CaseMemoryError {
  constructor(cause: unknown, context: ErrorContext = {}) {
    super('INDEX_UNAVAILABLE', `Case index unavailable: ${describe(cause)}`, context, { cause });
    this.name = 'IndexUnavailableError';
  }
}

export class DeadlineExceededError extends CaseMemoryError {
  constructor(public readonly timeoutMs: number, context: ErrorContext = {}) {
    super(
      'DEADLINE_EXCEEDED',
      `${context.operation ?? 'Operation'} exceeded its deadline of ${timeoutMs}ms`,
      context
    );
    this.name = 'DeadlineExceededError';
  }
}

export class ConcurrentModificationError extends CaseMemoryError {
  constructor(caseId: string, attempts: number, operation?: string) {
    super(
      'CONCURRENT_MODIFICATION',
      `Case ${caseId} kept changing underneath the update (${attempts} attempts)`,
      { caseId, operation }
    );
    this.name = 'ConcurrentModificationError';
  }
}

export class CaseRetiredError extends CaseMemoryError {
  constructor(caseId: string, public readonly reason: string, operation?: string) {
    super('CASE_RETIRED', `Case ${caseId} was ${reason} and cannot be written again`, { caseId, operation });
    this.name = 'CaseRetiredError';
  }
}

export class ConfigError extends CaseMemoryError {
  constructor(public readonly issues: string[]) {
    super('INVALID_CONFIG', `Invalid case memory configuration: ${issues.join('; ')}`, { operation: 'config' });
    this.name = 'ConfigError';
  }
}

export class InvariantViolationError extends CaseMemoryError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Narrow an unknown error to a case memory error code
 */
export function isCaseMemoryError(err: unknown, code?: CaseMemoryErrorCode): err is CaseMemoryError {
  return err instanceof CaseMemoryError && (code === undefined || err.code === code);
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

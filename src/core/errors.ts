import type { JsonValue } from './serialization/json';

export type ErrorCode =
  | 'UNKNOWN_OPERATION'
  | 'INVALID_ARGUMENT'
  | 'INVALID_PAGE_TOKEN'
  | 'STORAGE_UNAVAILABLE'
  | 'TIMEOUT';

export type ErrorCategory =
  | 'validation'
  | 'constraint'
  | 'not_found'
  | 'page_token'
  | 'transient'
  | 'timeout'
  | 'cancelled';

/** The error object a caller sees. Never carries driver or stack text. */
export type ErrorPayload = {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: JsonValue;
};

export type ValidationIssue = {
  path: string;
  message: string;
};

export abstract class MotorpoolError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly category: ErrorCategory;
  abstract readonly retryable: boolean;

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message, retryable: this.retryable };
  }
}

export class ValidationError extends MotorpoolError {
  override readonly name = 'ValidationError';
  readonly code = 'INVALID_ARGUMENT';
  readonly category = 'validation';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: readonly ValidationIssue[] = [],
  ) {
    super(message);
  }

  static fromIssues(issues: readonly ValidationIssue[]): ValidationError {
    const [first] = issues;
    const summary = first ? `${first.path || 'arguments'}: ${first.message}` : 'Invalid arguments';
    const suffix = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';
    return new ValidationError(`${summary}${suffix}`, issues);
  }

  override toPayload(): ErrorPayload {
    return {
      ...super.toPayload(),
      details: { issues: this.issues.map((issue) => ({ ...issue })) },
    };
  }
}

/**
 * A write broke a Record invariant. Reported as one class whichever field triggered it.
 */
export class ConstraintViolation extends MotorpoolError {
  override readonly name = 'ConstraintViolation';
  readonly code = 'INVALID_ARGUMENT';
  readonly category = 'constraint';
  readonly retryable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type StorageFailure = 'timeout' | 'unavailable' | 'cancelled';

export class StorageError extends MotorpoolError {
  override readonly name = 'StorageError';
  readonly retryable = true;

  constructor(
    readonly reason: StorageFailure,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get code(): ErrorCode {
    return this.reason === 'timeout' ? 'TIMEOUT' : 'STORAGE_UNAVAILABLE';
  }

  get category(): ErrorCategory {
    if (this.reason === 'timeout') return 'timeout';
    if (this.reason === 'cancelled') return 'cancelled';
    return 'transient';
  }
}

export class InvalidPageToken extends MotorpoolError {
  override readonly name = 'InvalidPageToken';
  readonly code = 'INVALID_PAGE_TOKEN';
  readonly category = 'page_token';
  readonly retryable = false;

  constructor(message = 'Page token is malformed or belongs to a different search; restart from the first page') {
    super(message);
  }
}

export class UnknownOperation extends MotorpoolError {
  override readonly name = 'UnknownOperation';
  readonly code = 'UNKNOWN_OPERATION';
  readonly category = 'not_found';
  readonly retryable = false;

  constructor(
    readonly operation: string,
    available: readonly string[],
  ) {
    super(`Unknown operation "${operation}". Available: ${available.join(', ')}`);
  }
}

const GENERIC_FAILURE: ErrorPayload = {
  code: 'STORAGE_UNAVAILABLE',
  message: 'The inventory could not be queried; try again',
  retryable: true,
};

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof MotorpoolError) {
    return error.toPayload();
  }
  return { ...GENERIC_FAILURE };
}

export function isErrorPayload(value: unknown): value is ErrorPayload {
  if (!value || typeof value !== 'object') return false;
  return (
    typeof Reflect.get(value, 'code') === 'string' &&
    typeof Reflect.get(value, 'retryable') === 'boolean' &&
    typeof Reflect.get(value, 'message') === 'string'
  );
}

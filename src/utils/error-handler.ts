import { DateRange } from '@/utils/types';

export interface ErrorContext {
  entityType?: string;
  dateRange?: DateRange;
  [key: string]: unknown;
}

export type EtlErrorCode =
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'AUTH_ERROR'
  | 'RATE_LIMIT_EXCEEDED'
  | 'FETCH_FAILED'
  | 'MALFORMED_DATA'
  | 'DELIVERY_FAILED'
  | 'PERSISTENCE_ERROR'
  | 'SYNC_IN_PROGRESS'
  | 'CHECKPOINT_STATE';

/**
 * Base class for every error that crosses a pipeline stage. The `name` is the
 * class name so the invocation boundary can print it as the error tag.
 */
export class EtlError extends Error {
  readonly code: EtlErrorCode;
  readonly context: ErrorContext;
  readonly retryable: boolean;

  constructor(
    code: EtlErrorCode,
    message: string,
    options: { context?: ErrorContext; cause?: unknown; retryable?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.context = options.context ?? {};
    this.retryable = options.retryable ?? false;
  }

  withContext(context: ErrorContext): this {
    Object.assign(this.context, context);
    return this;
  }
}

export class ConfigError extends EtlError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ValidationError extends EtlError {
  constructor(message: string, context?: ErrorContext) {
    super('VALIDATION_ERROR', message, { context });
  }
}

/** Expired or invalid credential. Retrying cannot help. */
export class AuthError extends EtlError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('AUTH_ERROR', message, options);
  }
}

export class RateLimitExceeded extends EtlError {
  readonly attempts: number;

  constructor(attempts: number, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('RATE_LIMIT_EXCEEDED', `API rate limit still exceeded after ${attempts} attempts`, {
      ...options,
      retryable: true
    });
    this.attempts = attempts;
  }
}

export class FetchFailed extends EtlError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('FETCH_FAILED', message, { ...options, retryable: true });
    this.attempts = attempts;
  }
}

export class MalformedDataError extends EtlError {
  constructor(malformed: number, total: number, tolerance: number, context?: ErrorContext) {
    super(
      'MALFORMED_DATA',
      `${malformed} of ${total} records were malformed, above the tolerance of ${(tolerance * 100).toFixed(1)}%`,
      { context: { ...context, malformed, total, tolerance } }
    );
  }
}

export class DeliveryFailed extends EtlError {
  readonly failedLegs: string[];

  constructor(
    message: string,
    failedLegs: string[],
    options: { context?: ErrorContext; cause?: unknown; retryable?: boolean } = {}
  ) {
    super('DELIVERY_FAILED', message, { ...options, retryable: options.retryable ?? true });
    this.failedLegs = failedLegs;
  }
}

export class PersistenceError extends EtlError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('PERSISTENCE_ERROR', message, options);
  }
}

export class SyncInProgressError extends EtlError {
  constructor(entityType: string, since: Date) {
    super(
      'SYNC_IN_PROGRESS',
      `A sync for ${entityType} has been in progress since ${since.toISOString()}`,
      { context: { entityType } }
    );
  }
}

/** A checkpoint transition that the sync state machine does not allow. */
export class CheckpointStateError extends EtlError {
  constructor(message: string, context?: ErrorContext) {
    super('CHECKPOINT_STATE', message, { context });
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}

export function getErrorDetails(error: unknown): { name: string; message: string; stack?: string; code?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code
    };
  }
  return {
    name: 'Error',
    message: getErrorMessage(error)
  };
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/** `ClassName: message`, the line written to stderr at the invocation boundary. */
export function formatErrorLine(error: unknown): string {
  const { name, message } = getErrorDetails(error);
  return `${name}: ${message}`;
}

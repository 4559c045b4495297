/**
 * Application error taxonomy.
 *
 * AppError subclasses reach the client as { success: false, error: publicMessage }
 * with their httpStatus. CacheUnavailableError and BackendError are recovered
 * inside the pipeline and never surface.
 */

export type AppErrorCode =
  | 'TENANT_NOT_FOUND'
  | 'EMPTY_INPUT'
  | 'INVALID_REQUEST'
  | 'STORE_UNAVAILABLE'
  | 'REQUEST_ABORTED'
  | 'INTERNAL_ERROR';

export abstract class AppError extends Error {
  abstract readonly code: AppErrorCode;
  abstract readonly httpStatus: number;

  constructor(
    message: string,
    public readonly publicMessage: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TenantNotFoundError extends AppError {
  readonly code = 'TENANT_NOT_FOUND';
  readonly httpStatus = 404;

  constructor(public readonly identifier?: string) {
    super(
      identifier ? `No active tenant for "${identifier}"` : 'No tenant identifier in request',
      'Restaurant not found'
    );
  }
}

export class EmptyInputError extends AppError {
  readonly code = 'EMPTY_INPUT';
  readonly httpStatus = 400;

  constructor() {
    super('Message is blank', 'Empty message');
  }
}

export class InvalidRequestError extends AppError {
  readonly code = 'INVALID_REQUEST';
  readonly httpStatus = 400;

  constructor(detail: string) {
    super(detail, 'Invalid request');
  }
}

export class StoreUnavailableError extends AppError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly httpStatus = 503;

  constructor(operation: string, cause?: unknown) {
    super(`Durable store failed during ${operation}`, 'Service temporarily unavailable', { cause });
  }
}

/**
 * The client disconnected while the backend was still generating. Nobody reads
 * the answer, so no fallback runs and nothing is recorded.
 */
export class RequestAbortedError extends AppError {
  readonly code = 'REQUEST_ABORTED';
  // client closed request
  readonly httpStatus = 499;

  constructor(cause?: unknown) {
    super('Client disconnected before the backend answered', 'Request cancelled', { cause });
  }
}

export class InternalPipelineError extends AppError {
  readonly code = 'INTERNAL_ERROR';
  readonly httpStatus = 500;

  constructor(cause?: unknown) {
    super('Unexpected failure while generating a response', 'Failed to generate response', { cause });
  }
}

/**
 * Fast cache unreachable, timed out, or returned garbage. Always recovered locally.
 */
export class CacheUnavailableError extends Error {
  constructor(public readonly operation: string, options?: { cause?: unknown }) {
    super(`Cache ${operation} failed`, options);
    this.name = 'CacheUnavailableError';
  }
}

/**
 * Generative backend call failed: transport error, non-2xx status, abort/timeout,
 * or a body without choices[0].message.content.
 */
export class BackendError extends Error {
  constructor(
    public readonly backend: string,
    public readonly detail: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(`${backend} backend failed${status !== undefined ? ` (${status})` : ''}: ${detail}`, options);
    this.name = 'BackendError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

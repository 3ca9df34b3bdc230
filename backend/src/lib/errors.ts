/**
 * Domain Errors
 * Error taxonomy shared by the stores, the hunt engine and the HTTP layer
 */

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
}

/**
 * The urgency classifier could not produce a result.
 * Intake recovers from this with a default classification.
 */
export class ClassificationUnavailableError extends Error implements AppError {
  statusCode = 503;
  code = 'CLASSIFICATION_UNAVAILABLE';

  constructor(message = 'Urgency classifier unavailable', public cause?: unknown) {
    super(message);
    this.name = 'ClassificationUnavailableError';
  }
}

/**
 * A snapshot could not be loaded or flushed.
 * Fatal to the operation that hit it; the state change did not happen.
 */
export class StoreUnavailableError extends Error implements AppError {
  statusCode = 503;
  code = 'STORE_UNAVAILABLE';

  constructor(
    public store: string,
    message: string,
    public cause?: unknown
  ) {
    super(`${store}: ${message}`);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A write would break a ticket or expert invariant (e.g. a backward status move).
 */
export class InvariantViolationError extends Error implements AppError {
  statusCode = 409;
  code = 'INVARIANT_VIOLATION';

  constructor(
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  code = 'NOT_FOUND';

  constructor(resource = 'Resource', identifier?: string) {
    const message = identifier
      ? `${resource} with ID '${identifier}' not found`
      : `${resource} not found`;
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Errors that mean the affected ticket's state can no longer be trusted
 */
export function isIntegrityError(error: unknown): error is StoreUnavailableError | InvariantViolationError {
  return error instanceof StoreUnavailableError || error instanceof InvariantViolationError;
}

/**
 * @fileoverview Mediator exceptions
 *
 * Exceptions are reserved for configuration errors and contract violations.
 * Expected failures (validation, not found, business rules) travel as
 * notifications inside a Response instead.
 */

/**
 * Base class for every error raised by the dispatch layer.
 */
export class MediatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MediatorError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown by `dispatch` when no handler is registered for the exact
 * runtime type of the request.
 */
export class HandlerNotFoundError extends MediatorError {
  constructor(public readonly requestType: string) {
    super(`No handler registered for request type '${requestType}'`);
    this.name = 'HandlerNotFoundError';
  }
}

/**
 * Thrown at registration time when a second handler is registered
 * for a request type that already has one.
 */
export class DuplicateHandlerError extends MediatorError {
  constructor(
    public readonly requestType: string,
    public readonly existingHandler: string,
  ) {
    super(
      `Request type '${requestType}' already has a registered handler (${existingHandler})`,
    );
    this.name = 'DuplicateHandlerError';
  }
}

/**
 * Thrown when a handler class is registered without `@Handles` metadata.
 */
export class InvalidHandlerError extends MediatorError {
  constructor(public readonly handlerType: string) {
    super(
      `Handler '${handlerType}' does not declare its request type; decorate it with @Handles(RequestType)`,
    );
    this.name = 'InvalidHandlerError';
  }
}

/**
 * Thrown by handlers that observe cancellation mid-execution.
 */
export class OperationCancelledError extends MediatorError {
  constructor(
    message: string = 'The operation was cancelled',
    public readonly reason?: unknown,
  ) {
    super(message);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Thrown when paging arguments break the paging contract
 * (page number and size must be integers >= 1, total count an integer >= 0).
 */
export class InvalidPaginationError extends MediatorError {
  constructor(
    public readonly parameter: 'pageNumber' | 'pageSize' | 'totalCount',
    public readonly value: number,
  ) {
    super(`Invalid ${parameter}: ${value}`);
    this.name = 'InvalidPaginationError';
  }
}

/**
 * Thrown when a response would violate the success/failure invariants.
 */
export class ResponseContractError extends MediatorError {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseContractError';
  }
}

/**
 * Thrown when mediator configuration cannot be loaded.
 */
export class ConfigurationError extends MediatorError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Whether an error was raised because the operation was cancelled,
 * either by a handler or by an AbortSignal-aware collaborator.
 */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof OperationCancelledError) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

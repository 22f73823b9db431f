/**
 * @fileoverview CQRS Handler Interfaces
 *
 * Handlers contain the business logic for one request type. The mediator
 * builds a fresh handler for every dispatch through a {@link HandlerFactory},
 * handing it a {@link HandlerScope} that owns a new notificator.
 *
 * @module usecase-dispatch/application/cqrs/IHandler
 */

import { CancellationListeners } from '../../domain/context/CancellationListeners';
import { OperationCancelledError } from '../../domain/exceptions/exceptions';
import type { INotificator } from '../../domain/notifications/Notificator';
import type { EmptyPagePolicy } from '../config/options';
import type { ILogger } from '../logging/ILogger';
import type { AnyResponse, IRequest } from './IRequest';

/**
 * Handler execution context.
 *
 * Per-dispatch information available to handlers and pipeline behaviours.
 *
 * @example
 * ```typescript
 * async execute(query: ListOrdersQuery, context: HandlerContext): Promise<PagedResponse<OrderDto>> {
 *   const [orders, total] = await this.orders.findPage(query.skip, query.pageSize, context.signal);
 *   context.throwIfCancelled();
 *   return this.page(orders, total, query);
 * }
 * ```
 */
export interface HandlerContext {
  /**
   * Unique ID of this dispatch.
   */
  readonly requestId: string;

  /**
   * Trace ID shared with nested dispatches.
   */
  readonly traceId: string;

  /**
   * Constructor name of the request.
   */
  readonly requestType: string;

  /**
   * Cancellation signal given to `dispatch`, passed on unchanged.
   * Forward it to every awaited collaborator.
   */
  readonly signal?: AbortSignal;

  /**
   * Collector for this dispatch only.
   */
  readonly notificator: INotificator;

  /**
   * Start time of the dispatch (ms since epoch).
   */
  readonly startTime: number;

  /**
   * Check if the operation has been cancelled.
   */
  isCancelled(): boolean;

  /**
   * Register a callback invoked on cancellation. Detached when the dispatch
   * settles.
   */
  onCancel(callback: () => void): void;

  /**
   * @throws {OperationCancelledError} If the signal has been aborted
   */
  throwIfCancelled(): void;
}

/**
 * Create a handler context bound to a signal.
 *
 * @internal
 */
export function createHandlerContext(init: {
  requestId: string;
  traceId: string;
  requestType: string;
  notificator: INotificator;
  signal?: AbortSignal;
  startTime?: number;
  listeners?: CancellationListeners;
}): HandlerContext {
  const { signal } = init;
  const listeners = init.listeners ?? new CancellationListeners(signal);

  return {
    requestId: init.requestId,
    traceId: init.traceId,
    requestType: init.requestType,
    notificator: init.notificator,
    signal,
    startTime: init.startTime ?? Date.now(),
    isCancelled: () => signal?.aborted ?? false,
    onCancel: (callback) => listeners.add(callback),
    throwIfCancelled: () => {
      if (signal?.aborted) {
        throw new OperationCancelledError(
          `${init.requestType} was cancelled`,
          signal.reason,
        );
      }
    },
  };
}

/**
 * Services handed to a handler factory for one dispatch.
 *
 * @remarks
 * `notificator` is created fresh for each dispatch, so a handler built from
 * this scope can never see another request's notifications.
 */
export interface HandlerScope {
  readonly notificator: INotificator;
  readonly logger: ILogger;
  readonly emptyPagePolicy: EmptyPagePolicy;
  readonly emptyPageMessage: string;
}

/**
 * IRequestHandler - Processes one concrete request type.
 *
 * @template TRequest - The request type this handler processes
 * @template TResponse - The envelope it returns
 *
 * @remarks
 * Expected failures are returned as failure responses; only configuration
 * errors, cancellation and collaborator defects are thrown.
 */
export interface IRequestHandler<
  TRequest extends IRequest<TResponse>,
  TResponse extends AnyResponse,
> {
  /**
   * @param request - The request to process
   * @param context - Execution context with cancellation and tracing
   */
  execute(request: TRequest, context: HandlerContext): Promise<TResponse>;
}

/**
 * Builds a handler for one dispatch.
 *
 * @example
 * ```typescript
 * const factory: HandlerFactory<CreateOrderCommand, Response<string>> = (scope) =>
 *   new CreateOrderHandler(scope, orderRepository, createOrderValidator);
 * ```
 */
export type HandlerFactory<
  TRequest extends IRequest<TResponse>,
  TResponse extends AnyResponse,
> = (scope: HandlerScope) => IRequestHandler<TRequest, TResponse>;

/**
 * Pipeline behavior interface for cross-cutting concerns.
 *
 * Behaviours wrap handler execution in registration order, the first
 * registered being outermost. A behaviour that returns `next()` unchanged
 * keeps dispatch transparent.
 *
 * @example
 * ```typescript
 * class TimingBehavior implements IPipelineBehavior {
 *   async handle<TResponse extends AnyResponse>(
 *     request: IRequest<TResponse>,
 *     next: () => Promise<TResponse>,
 *     context: HandlerContext,
 *   ): Promise<TResponse> {
 *     const response = await next();
 *     metrics.observe(context.requestType, Date.now() - context.startTime);
 *     return response;
 *   }
 * }
 * ```
 */
export interface IPipelineBehavior {
  handle<TResponse extends AnyResponse>(
    request: IRequest<TResponse>,
    next: () => Promise<TResponse>,
    context: HandlerContext,
  ): Promise<TResponse>;
}

/**
 * @fileoverview Mediator contract
 * @module usecase-dispatch/application/mediator/IMediator
 */

import type { AnyResponse, IRequest, RequestType } from '../cqrs/IRequest';

/**
 * Per-call dispatch options.
 */
export interface DispatchOptions {
  /**
   * Cancellation signal. Passed unchanged to the handler and, through the
   * handler context, to every collaborator the handler awaits.
   */
  signal?: AbortSignal;

  /**
   * Trace ID for this dispatch. Defaults to the enclosing dispatch's trace ID
   * when nested, otherwise a new ID.
   */
  traceId?: string;
}

/**
 * IMediator - Routes a request to the single handler registered for its
 * concrete type and returns that handler's response unchanged.
 *
 * @example
 * ```typescript
 * const response = await mediator.dispatch(new GetOrderByIdQuery(orderId), { signal });
 *
 * if (!response.isSuccess) {
 *   return res.status(response.code).json(response);
 * }
 * return res.json(response.data);
 * ```
 */
export interface IMediator {
  /**
   * Dispatch a request to its handler.
   *
   * @param request - Command, query or paged query instance
   * @param options - Cancellation signal and trace ID
   * @returns The handler's response, as returned by the handler
   * @throws {HandlerNotFoundError} If no handler is registered for the request's exact type
   */
  dispatch<TResponse extends AnyResponse>(
    request: IRequest<TResponse>,
    options?: DispatchOptions,
  ): Promise<TResponse>;

  /**
   * Whether a handler is registered for exactly this request type.
   */
  hasHandler(requestType: RequestType): boolean;
}

/**
 * @fileoverview Request marker shared by commands, queries and paged queries
 * @module usecase-dispatch/application/cqrs/IRequest
 */

import type { PagedResponse } from '../../domain/responses/PagedResponse';
import type { Response } from '../../domain/responses/Response';

/**
 * Any response envelope a handler may return.
 */
export type AnyResponse = Response<unknown> | PagedResponse<unknown>;

/**
 * IRequest - Marker for anything the mediator can dispatch.
 *
 * @template TResponse - Envelope the handler returns: `Response<T>` for
 * commands and queries, `PagedResponse<T>` for paged queries
 *
 * @remarks
 * The phantom property lets `dispatch` infer the response type from the
 * request value. It never exists at runtime.
 */
export interface IRequest<TResponse extends AnyResponse = AnyResponse> {
  /**
   * Phantom property to capture the response type.
   *
   * @internal
   */
  readonly __responseType?: TResponse;
}

/**
 * Constructor of a concrete request type. Handlers are resolved by it.
 */
export type RequestType<TRequest extends IRequest = IRequest> = new (
  ...args: never[]
) => TRequest;

/**
 * Response type declared by a request type.
 *
 * @example
 * ```typescript
 * type Result = ResponseOf<GetOrderByIdQuery>; // Response<OrderDto>
 * ```
 */
export type ResponseOf<TRequest> = TRequest extends IRequest<infer TResponse>
  ? TResponse
  : never;

/**
 * Whether a value can serve as a request type key.
 */
export function isRequestType(value: unknown): value is RequestType {
  return typeof value === 'function';
}

/**
 * Constructor name of a request value, for errors and logs.
 */
export function getRequestTypeName(request: object): string {
  const ctor: unknown = Object.getPrototypeOf(request)?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

/**
 * @fileoverview Handler registration decorator
 *
 * `@Handles` records which request type a handler class processes, so a
 * builder can register handler classes without repeating the request type.
 */

import 'reflect-metadata';
import type { AnyResponse, IRequest, RequestType } from './IRequest';
import { isRequestType } from './IRequest';
import type { IRequestHandler } from './IHandler';

/**
 * Metadata key holding the handled request type.
 */
export const HANDLES_METADATA = 'mediator:handles';

/**
 * Constructor of a handler class.
 */
export type HandlerClass<
  TRequest extends IRequest<TResponse>,
  TResponse extends AnyResponse,
> = abstract new (...args: never[]) => IRequestHandler<TRequest, TResponse>;

/**
 * Declare the request type a handler processes.
 *
 * @example
 * ```typescript
 * @Handles(GetOrderByIdQuery)
 * class GetOrderByIdHandler extends QueryHandler<GetOrderByIdQuery, OrderDto> {
 *   // ...
 * }
 *
 * MediatorBuilder.create()
 *   .addHandler(GetOrderByIdHandler, (scope) => new GetOrderByIdHandler(scope, orders))
 *   .build();
 * ```
 */
export function Handles<TRequest extends IRequest>(requestType: RequestType<TRequest>) {
  return function (target: HandlerClass<TRequest, AnyResponse>): void {
    Reflect.defineMetadata(HANDLES_METADATA, requestType, target);
  };
}

/**
 * Request type declared on a handler class with `@Handles`, if any.
 */
export function getHandledRequestType(handlerType: object): RequestType | undefined {
  const requestType: unknown = Reflect.getMetadata(HANDLES_METADATA, handlerType);
  return isRequestType(requestType) ? requestType : undefined;
}

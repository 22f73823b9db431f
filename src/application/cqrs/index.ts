/**
 * @fileoverview CQRS Exports
 * @description
 * Request markers (commands, queries, paged queries), handler contracts,
 * handler base classes and the `@Handles` registration decorator.
 *
 * @packageDocumentation
 * @module usecase-dispatch/application/cqrs
 *
 * @example
 * ```typescript
 * import { CommandBase, CommandHandler, HandlerScope, Handles, Response } from 'usecase-dispatch';
 *
 * class CancelOrderCommand extends CommandBase<string> {
 *   constructor(readonly orderId: string) {
 *     super();
 *   }
 * }
 *
 * @Handles(CancelOrderCommand)
 * class CancelOrderHandler extends CommandHandler<CancelOrderCommand, string> {
 *   constructor(scope: HandlerScope) {
 *     super(scope);
 *   }
 *
 *   async execute(command: CancelOrderCommand): Promise<Response<string>> {
 *     return Response.success(command.orderId);
 *   }
 * }
 * ```
 */

// Request markers
export type { AnyResponse, IRequest, RequestType, ResponseOf } from './IRequest';
export { isRequestType, getRequestTypeName } from './IRequest';

export { CommandBase } from './ICommand';
export type { ICommand, CommandMetadata } from './ICommand';

export { QueryBase, PagedQueryBase } from './IQuery';
export type { IQuery, IPagedQuery, QueryMetadata } from './IQuery';

// Handler contracts
export { createHandlerContext } from './IHandler';
export type {
  HandlerContext,
  HandlerScope,
  HandlerFactory,
  IRequestHandler,
  IPipelineBehavior,
} from './IHandler';

// Base classes
export {
  RequestHandlerBase,
  CommandHandler,
  QueryHandler,
  PagedQueryHandler,
} from './HandlerBase';

// Registration
export { Handles, getHandledRequestType, HANDLES_METADATA } from './decorators';
export type { HandlerClass } from './decorators';

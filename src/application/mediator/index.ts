/**
 * @fileoverview Mediator Module
 *
 * Dispatcher, handler registry, builder and built-in pipeline behaviours
 */

export { Mediator } from './Mediator';
export { MediatorBuilder } from './MediatorBuilder';
export { HandlerRegistry } from './HandlerRegistry';
export type { AnyRequestHandler, HandlerRegistration } from './HandlerRegistry';
export type { IMediator, DispatchOptions } from './IMediator';
export { LoggingBehavior, CancellationBehavior } from './behaviors';

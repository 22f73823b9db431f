/**
 * @fileoverview Mediator builder
 *
 * Collects handler registrations and pipeline behaviours at startup, then
 * produces a mediator whose registry can no longer change.
 */

import { InvalidHandlerError } from '../../domain/exceptions/exceptions';
import { MediatorOptions, resolveMediatorOptions } from '../config/options';
import { getHandledRequestType } from '../cqrs/decorators';
import type { HandlerFactory, HandlerScope, IPipelineBehavior } from '../cqrs/IHandler';
import type { AnyResponse, IRequest, RequestType } from '../cqrs/IRequest';
import { AnyRequestHandler, HandlerRegistry } from './HandlerRegistry';
import { Mediator } from './Mediator';

/**
 * MediatorBuilder - Fluent startup configuration for a {@link Mediator}.
 *
 * @example
 * ```typescript
 * const mediator = MediatorBuilder.create({ logLevel: 'warn' })
 *   .register(CreateOrderCommand, (scope) => new CreateOrderHandler(scope, orders))
 *   .addHandler(GetOrderByIdHandler, (scope) => new GetOrderByIdHandler(scope, orders))
 *   .addBehavior(new LoggingBehavior(logger))
 *   .build();
 * ```
 */
export class MediatorBuilder {
  private readonly registry = new HandlerRegistry();
  private readonly behaviors: IPipelineBehavior[] = [];

  private constructor(private readonly options: MediatorOptions) {}

  static create(options: MediatorOptions = {}): MediatorBuilder {
    return new MediatorBuilder(options);
  }

  /**
   * Register a handler factory for a request type.
   *
   * @throws {DuplicateHandlerError} If the request type already has a handler
   */
  register<TRequest extends IRequest<TResponse>, TResponse extends AnyResponse>(
    requestType: RequestType<TRequest>,
    factory: HandlerFactory<TRequest, TResponse>,
  ): this {
    this.registry.register(requestType, factory);
    return this;
  }

  /**
   * Register a handler class decorated with `@Handles`.
   *
   * @throws {InvalidHandlerError} If the class has no `@Handles` metadata
   * @throws {DuplicateHandlerError} If the request type already has a handler
   */
  addHandler<THandler extends AnyRequestHandler>(
    handlerType: abstract new (...args: never[]) => THandler,
    factory: (scope: HandlerScope) => THandler,
  ): this {
    const requestType = getHandledRequestType(handlerType);
    if (!requestType) {
      throw new InvalidHandlerError(handlerType.name);
    }
    this.registry.add(requestType, factory, handlerType.name);
    return this;
  }

  /**
   * Add a pipeline behaviour. Behaviours run in the order added, the first
   * one outermost.
   */
  addBehavior(behavior: IPipelineBehavior): this {
    this.behaviors.push(behavior);
    return this;
  }

  /**
   * Build the mediator. The registry is frozen from here on.
   */
  build(): Mediator {
    return new Mediator(this.registry, [...this.behaviors], resolveMediatorOptions(this.options));
  }
}

/**
 * @fileoverview Request type to handler factory table
 */

import { DuplicateHandlerError, MediatorError } from '../../domain/exceptions/exceptions';
import type {
  HandlerContext,
  HandlerFactory,
  HandlerScope,
} from '../cqrs/IHandler';
import type { AnyResponse, IRequest, RequestType } from '../cqrs/IRequest';

/**
 * A handler with its request and response types erased, as stored in the registry.
 */
export interface AnyRequestHandler {
  execute(request: IRequest, context: HandlerContext): Promise<unknown>;
}

/**
 * One registry entry.
 */
export interface HandlerRegistration {
  readonly requestType: RequestType;
  readonly requestName: string;
  readonly handlerName: string;
  readonly create: (scope: HandlerScope) => AnyRequestHandler;
}

/**
 * HandlerRegistry - Maps concrete request constructors to handler factories.
 *
 * @remarks
 * Built once at startup and frozen when the mediator is created; after that
 * it is only read, so concurrent dispatches share it without locking.
 * Keys are exact constructors: a subclass of a registered request type is a
 * different key and needs its own handler.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<Function, HandlerRegistration>();
  private frozen = false;

  /**
   * Register a typed handler factory.
   *
   * @throws {DuplicateHandlerError} If the request type already has a handler
   */
  register<TRequest extends IRequest<TResponse>, TResponse extends AnyResponse>(
    requestType: RequestType<TRequest>,
    factory: HandlerFactory<TRequest, TResponse>,
    handlerName: string = `${requestType.name}Handler (factory)`,
  ): void {
    this.add(requestType, factory, handlerName);
  }

  /**
   * Register a factory for a request type known only at runtime.
   *
   * @throws {DuplicateHandlerError} If the request type already has a handler
   */
  add(
    requestType: RequestType,
    create: (scope: HandlerScope) => AnyRequestHandler,
    handlerName: string,
  ): void {
    if (this.frozen) {
      throw new MediatorError(
        `Cannot register ${handlerName}: handlers must be registered before the mediator is built`,
      );
    }

    const existing = this.handlers.get(requestType);
    if (existing) {
      throw new DuplicateHandlerError(requestType.name, existing.handlerName);
    }

    this.handlers.set(requestType, {
      requestType,
      requestName: requestType.name,
      handlerName,
      create,
    });
  }

  /**
   * Registration for an exact constructor, if any.
   */
  get(requestType: Function): HandlerRegistration | undefined {
    return this.handlers.get(requestType);
  }

  has(requestType: RequestType): boolean {
    return this.handlers.has(requestType);
  }

  /**
   * Reject further registrations.
   */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Registered request type names, in registration order.
   */
  requestTypeNames(): string[] {
    return [...this.handlers.values()].map((r) => r.requestName);
  }
}

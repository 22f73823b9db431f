/**
 * @fileoverview Mediator implementation
 * @module usecase-dispatch/application/mediator/Mediator
 */

import { v4 as uuidv4 } from 'uuid';
import { CancellationListeners } from '../../domain/context/CancellationListeners';
import { RequestContext } from '../../domain/context/RequestContext';
import {
  HandlerNotFoundError,
  ResponseContractError,
  isCancellationError,
} from '../../domain/exceptions/exceptions';
import { Notificator } from '../../domain/notifications/Notificator';
import { PagedResponse } from '../../domain/responses/PagedResponse';
import { Response } from '../../domain/responses/Response';
import type { ResolvedMediatorOptions } from '../config/options';
import { CommandBase } from '../cqrs/ICommand';
import { createHandlerContext } from '../cqrs/IHandler';
import type { HandlerContext, HandlerScope, IPipelineBehavior } from '../cqrs/IHandler';
import { PagedQueryBase, QueryBase } from '../cqrs/IQuery';
import type { AnyResponse, IRequest, RequestType } from '../cqrs/IRequest';
import { getRequestTypeName } from '../cqrs/IRequest';
import type { ILogger } from '../logging/ILogger';
import type { HandlerRegistration, HandlerRegistry } from './HandlerRegistry';
import type { DispatchOptions, IMediator } from './IMediator';

type EnvelopeKind = 'Response' | 'PagedResponse' | 'Response or PagedResponse';

/**
 * Envelope a request must be answered with. Requests built on the base
 * classes declare it; other request objects accept either.
 */
function expectedEnvelope(request: IRequest): EnvelopeKind {
  if (request instanceof PagedQueryBase) {
    return 'PagedResponse';
  }
  if (request instanceof CommandBase || request instanceof QueryBase) {
    return 'Response';
  }
  return 'Response or PagedResponse';
}

/**
 * Whether a handler's return value is the envelope its request declared.
 */
function isResponseFor<TResponse extends AnyResponse>(
  request: IRequest<TResponse>,
  value: unknown,
): value is TResponse {
  switch (expectedEnvelope(request)) {
    case 'PagedResponse':
      return value instanceof PagedResponse;
    case 'Response':
      return value instanceof Response;
    default:
      return value instanceof Response || value instanceof PagedResponse;
  }
}

/**
 * Mediator - Default IMediator implementation.
 *
 * For each dispatch it:
 * 1. Looks up the registration for the request's exact constructor
 * 2. Creates a fresh notificator and handler scope
 * 3. Opens a RequestContext scope carrying the trace and request IDs
 * 4. Builds the handler and runs it through the pipeline behaviours
 * 5. Returns the handler's response unchanged
 *
 * It never validates and never inspects notifications. Exceptions thrown by
 * handlers or collaborators are logged and rethrown.
 *
 * @remarks
 * Usually built with {@link MediatorBuilder}.
 */
export class Mediator implements IMediator {
  private readonly logger: ILogger;

  constructor(
    private readonly registry: HandlerRegistry,
    private readonly behaviors: readonly IPipelineBehavior[],
    private readonly options: ResolvedMediatorOptions,
  ) {
    this.registry.freeze();
    this.logger = options.logger;
  }

  async dispatch<TResponse extends AnyResponse>(
    request: IRequest<TResponse>,
    options: DispatchOptions = {},
  ): Promise<TResponse> {
    const registration = this.resolve(request);

    const parent = RequestContext.current();
    const traceId = options.traceId ?? parent?.traceId ?? this.nextId();
    const signal = options.signal ?? parent?.signal;
    const notificator = new Notificator();
    const listeners = new CancellationListeners(signal);

    const context = createHandlerContext({
      requestId: this.nextId(),
      traceId,
      requestType: registration.requestName,
      notificator,
      signal,
      listeners,
    });

    const scope: HandlerScope = {
      notificator,
      logger: this.logger,
      emptyPagePolicy: this.options.emptyPagePolicy,
      emptyPageMessage: this.options.emptyPageMessage,
    };

    try {
      return await RequestContext.run(
        {
          traceId,
          requestId: context.requestId,
          requestType: context.requestType,
        },
        () => this.invoke(registration, request, scope, context),
        signal,
        listeners,
      );
    } finally {
      listeners.clear();
    }
  }

  hasHandler(requestType: RequestType): boolean {
    return this.registry.has(requestType);
  }

  private resolve(request: IRequest): HandlerRegistration {
    const requestType: unknown = Object.getPrototypeOf(request)?.constructor;
    const registration =
      typeof requestType === 'function' ? this.registry.get(requestType) : undefined;

    if (!registration) {
      const name = getRequestTypeName(request);
      this.logger.error(`No handler registered for ${name}`);
      throw new HandlerNotFoundError(name);
    }
    return registration;
  }

  private async invoke<TResponse extends AnyResponse>(
    registration: HandlerRegistration,
    request: IRequest<TResponse>,
    scope: HandlerScope,
    context: HandlerContext,
  ): Promise<TResponse> {
    const meta = { traceId: context.traceId, requestId: context.requestId };
    this.logger.debug(`Dispatching ${context.requestType} to ${registration.handlerName}`, meta);

    const handler = registration.create(scope);

    const invokeHandler = async (): Promise<TResponse> => {
      const response = await handler.execute(request, context);
      if (!isResponseFor(request, response)) {
        throw new ResponseContractError(
          `${registration.handlerName} must return a ${expectedEnvelope(request)}`,
        );
      }
      return response;
    };

    // First registered behaviour is outermost.
    const pipeline = this.behaviors.reduceRight<() => Promise<TResponse>>(
      (next, behavior) => () => behavior.handle(request, next, context),
      invokeHandler,
    );

    try {
      const response = await pipeline();
      const duration = Date.now() - context.startTime;

      if (response.isSuccess) {
        this.logger.debug(`${context.requestType} succeeded`, {
          ...meta,
          code: response.code,
          duration,
        });
      } else {
        this.logger.info(`${context.requestType} failed`, {
          ...meta,
          code: response.code,
          notifications: response.notifications.length,
          duration,
        });
      }
      return response;
    } catch (error) {
      if (isCancellationError(error)) {
        this.logger.warn(`${context.requestType} cancelled`, meta);
      } else {
        this.logger.error(`${context.requestType} threw`, error, meta);
      }
      throw error;
    }
  }

  private nextId(): string {
    return this.options.idFactory ? this.options.idFactory() : uuidv4();
  }
}

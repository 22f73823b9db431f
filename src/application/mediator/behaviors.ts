/**
 * @fileoverview Built-in pipeline behaviours
 */

import type { HandlerContext, IPipelineBehavior } from '../cqrs/IHandler';
import type { AnyResponse, IRequest } from '../cqrs/IRequest';
import type { ILogger } from '../logging/ILogger';

/**
 * Logs every dispatch with its outcome and duration.
 */
export class LoggingBehavior implements IPipelineBehavior {
  constructor(private readonly logger: ILogger) {}

  async handle<TResponse extends AnyResponse>(
    _request: IRequest<TResponse>,
    next: () => Promise<TResponse>,
    context: HandlerContext,
  ): Promise<TResponse> {
    const { requestType, traceId, requestId } = context;
    this.logger.info(`Handling ${requestType}`, { traceId, requestId });

    const response = await next();

    this.logger.info(`Handled ${requestType}`, {
      traceId,
      requestId,
      isSuccess: response.isSuccess,
      code: response.code,
      duration: Date.now() - context.startTime,
    });
    return response;
  }
}

/**
 * Refuses to start a handler once the dispatch has been cancelled.
 *
 * @throws {OperationCancelledError} If the signal is already aborted
 */
export class CancellationBehavior implements IPipelineBehavior {
  async handle<TResponse extends AnyResponse>(
    _request: IRequest<TResponse>,
    next: () => Promise<TResponse>,
    context: HandlerContext,
  ): Promise<TResponse> {
    context.throwIfCancelled();
    return next();
  }
}

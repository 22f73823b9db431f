/**
 * @fileoverview Handler base classes
 *
 * Shared validation-and-notification workflow for concrete handlers.
 *
 * Every handler follows the same protocol:
 * 1. Validate; on failure return a 400 failure built from the notifications.
 * 2. Run business logic.
 * 3. On a domain failure, `notify` and return a failure with a fitting code.
 * 4. On success, return a success response (notifications are not consulted).
 *
 * @module usecase-dispatch/application/cqrs/HandlerBase
 */

import { Notification } from '../../domain/notifications/Notification';
import type { INotificator } from '../../domain/notifications/Notificator';
import { HttpStatus } from '../../domain/responses/HttpStatus';
import { PagedResponse } from '../../domain/responses/PagedResponse';
import { Response } from '../../domain/responses/Response';
import type { PaginationParams } from '../../domain/responses/pagination';
import type { EmptyPagePolicy } from '../config/options';
import type { ILogger } from '../logging/ILogger';
import type { IValidator } from '../validation/IValidator';
import type { ICommand } from './ICommand';
import type { HandlerContext, HandlerScope, IRequestHandler } from './IHandler';
import type { IPagedQuery, IQuery } from './IQuery';

/**
 * Abstract base for all handlers. Owns the notificator of one dispatch.
 */
export abstract class RequestHandlerBase {
  protected readonly notificator: INotificator;
  protected readonly logger: ILogger;

  protected constructor(scope: HandlerScope) {
    this.notificator = scope.notificator;
    this.logger = scope.logger;
  }

  /**
   * Run a validator and record one notification per failure.
   *
   * @returns `false` if any failure was reported; business logic must not run then
   *
   * @example
   * ```typescript
   * if (!(await this.executeValidation(this.validator, command, context.signal))) {
   *   return this.fail();
   * }
   * ```
   */
  protected async executeValidation<T>(
    validator: IValidator<T>,
    request: T,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const failures = await validator.validate(request, signal);
    for (const failure of failures) {
      this.notificator.append(new Notification(failure.field, failure.message));
    }
    return failures.length === 0;
  }

  /**
   * Record a business-rule failure found during execution.
   *
   * @param field - Field path; empty for failures not tied to an input
   */
  protected notify(message: string, field: string = ''): void {
    this.notificator.append(new Notification(field, message));
  }

  protected getNotifications(): readonly Notification[] {
    return this.notificator.list();
  }

  protected hasNotification(): boolean {
    return this.notificator.hasAny();
  }
}

/**
 * Base for command handlers.
 *
 * @template TCommand - The command type this handler processes
 * @template TResult - Payload type of the success response
 *
 * @example
 * ```typescript
 * @Handles(CreateOrderCommand)
 * class CreateOrderHandler extends CommandHandler<CreateOrderCommand, string> {
 *   constructor(scope: HandlerScope, private readonly orders: IOrderRepository) {
 *     super(scope);
 *   }
 *
 *   async execute(command: CreateOrderCommand, context: HandlerContext): Promise<Response<string>> {
 *     if (!(await this.executeValidation(createOrderValidator, command, context.signal))) {
 *       return this.fail();
 *     }
 *     const id = await this.orders.create(command, context.signal);
 *     if (!id) {
 *       this.notify('Failed to create the order.');
 *       return this.fail();
 *     }
 *     return Response.success(id);
 *   }
 * }
 * ```
 */
export abstract class CommandHandler<TCommand extends ICommand<TResult>, TResult>
  extends RequestHandlerBase
  implements IRequestHandler<TCommand, Response<TResult>>
{
  abstract execute(command: TCommand, context: HandlerContext): Promise<Response<TResult>>;

  /**
   * Failure response carrying every notification recorded so far.
   */
  protected fail(code: number = HttpStatus.BAD_REQUEST): Response<TResult> {
    return Response.fromNotificator<TResult>(this.notificator, code);
  }
}

/**
 * Base for query handlers.
 *
 * @template TQuery - The query type this handler processes
 * @template TResult - Payload type of the success response
 */
export abstract class QueryHandler<TQuery extends IQuery<TResult>, TResult>
  extends RequestHandlerBase
  implements IRequestHandler<TQuery, Response<TResult>>
{
  abstract execute(query: TQuery, context: HandlerContext): Promise<Response<TResult>>;

  protected fail(code: number = HttpStatus.BAD_REQUEST): Response<TResult> {
    return Response.fromNotificator<TResult>(this.notificator, code);
  }
}

/**
 * Base for paged query handlers.
 *
 * @remarks
 * {@link page} applies the configured empty-page policy: with `failure`
 * (the default) a query matching no rows yields a 404 failure carrying the
 * empty-page message; with `success` it yields an empty page.
 */
export abstract class PagedQueryHandler<TQuery extends IPagedQuery<TResult>, TResult>
  extends RequestHandlerBase
  implements IRequestHandler<TQuery, PagedResponse<TResult>>
{
  protected readonly emptyPagePolicy: EmptyPagePolicy;
  protected readonly emptyPageMessage: string;

  protected constructor(scope: HandlerScope) {
    super(scope);
    this.emptyPagePolicy = scope.emptyPagePolicy;
    this.emptyPageMessage = scope.emptyPageMessage;
  }

  abstract execute(query: TQuery, context: HandlerContext): Promise<PagedResponse<TResult>>;

  /**
   * Build the response for one page of results.
   *
   * @param items - Items on the requested page
   * @param totalCount - Items across all pages
   * @param paging - The query's page number and size
   */
  protected page(
    items: readonly TResult[],
    totalCount: number,
    paging: PaginationParams,
  ): PagedResponse<TResult> {
    if (totalCount === 0 && this.emptyPagePolicy === 'failure') {
      this.notify(this.emptyPageMessage);
      return this.fail(paging, HttpStatus.NOT_FOUND);
    }
    return PagedResponse.success(items, totalCount, paging.pageNumber, paging.pageSize);
  }

  protected fail(
    paging: PaginationParams,
    code: number = HttpStatus.BAD_REQUEST,
  ): PagedResponse<TResult> {
    return PagedResponse.fromNotificator<TResult>(
      this.notificator,
      code,
      { pageNumber: paging.pageNumber, pageSize: paging.pageSize },
    );
  }
}

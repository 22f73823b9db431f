/**
 * @fileoverview CQRS Query Interface
 *
 * Queries read data without modifying state. Paged queries additionally ask
 * for one bounded page of a larger result set.
 *
 * @module usecase-dispatch/application/cqrs/IQuery
 */

import type { PagedResponse } from '../../domain/responses/PagedResponse';
import type { Response } from '../../domain/responses/Response';
import {
  DEFAULT_PAGE_SIZE,
  PaginationParams,
  assertPagination,
  calculateOffset,
} from '../../domain/responses/pagination';
import type { IRequest } from './IRequest';

/**
 * Query metadata for tracing and debugging.
 */
export interface QueryMetadata {
  /**
   * Constructor name of the query (e.g., 'GetOrderByIdQuery').
   */
  readonly queryType: string;

  /**
   * When the query was created.
   */
  readonly timestamp: Date;
}

/**
 * IQuery - Marker interface for read-only requests answered with a `Response<TResult>`.
 *
 * @example
 * ```typescript
 * class GetOrderByIdQuery extends QueryBase<OrderDto> {
 *   constructor(readonly orderId: string) {
 *     super();
 *   }
 * }
 *
 * const response = await mediator.dispatch(new GetOrderByIdQuery(id));
 * ```
 */
export interface IQuery<TResult> extends IRequest<Response<TResult>> {}

/**
 * IPagedQuery - Read-only request for one page of results, answered with a
 * `PagedResponse<TResult>`.
 */
export interface IPagedQuery<TResult>
  extends IRequest<PagedResponse<TResult>>,
    Readonly<PaginationParams> {}

/**
 * Abstract base class for queries.
 */
export abstract class QueryBase<TResult> implements IQuery<TResult> {
  readonly metadata: QueryMetadata;

  protected constructor() {
    this.metadata = Object.freeze({
      queryType: new.target.name,
      timestamp: new Date(),
    });
  }

  /**
   * @internal
   */
  readonly __responseType?: Response<TResult>;
}

/**
 * Abstract base class for paged queries.
 *
 * @remarks
 * Paging is validated at construction: a page number or size below 1 throws
 * {@link InvalidPaginationError} instead of being clamped.
 *
 * @example
 * ```typescript
 * class ListOrdersQuery extends PagedQueryBase<OrderDto> {
 *   constructor(readonly customerId: string, pageNumber: number, pageSize: number) {
 *     super(pageNumber, pageSize);
 *   }
 * }
 * ```
 */
export abstract class PagedQueryBase<TResult> implements IPagedQuery<TResult> {
  readonly metadata: QueryMetadata;
  readonly pageNumber: number;
  readonly pageSize: number;

  protected constructor(pageNumber: number = 1, pageSize: number = DEFAULT_PAGE_SIZE) {
    assertPagination({ pageNumber, pageSize });
    this.pageNumber = pageNumber;
    this.pageSize = pageSize;
    this.metadata = Object.freeze({
      queryType: new.target.name,
      timestamp: new Date(),
    });
  }

  /**
   * Number of items before this page.
   */
  get skip(): number {
    return calculateOffset(this);
  }

  /**
   * @internal
   */
  readonly __responseType?: PagedResponse<TResult>;
}

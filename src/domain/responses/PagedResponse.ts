/**
 * @fileoverview Paged response envelope returned by paged query handlers
 * @module usecase-dispatch/domain/responses
 */

import { ResponseContractError } from '../exceptions/exceptions';
import { Notification } from '../notifications/Notification';
import type { INotificator } from '../notifications/Notificator';
import { HttpStatus } from './HttpStatus';
import {
  DEFAULT_PAGE_SIZE,
  PaginationParams,
  assertPagination,
  assertTotalCount,
  calculateTotalPages,
} from './pagination';
import { IResponse, ResponseJSON, assertFailure, assertSuccessCode } from './Response';

/**
 * Serialized form of a paged response.
 */
export interface PagedResponseJSON<T> extends ResponseJSON<readonly T[]> {
  totalCount: number;
  pageNumber: number;
  pageSize: number;
  totalPages: number;
}

/**
 * PagedResponse - Response for one page of a larger result set.
 *
 * Same success/failure invariants as {@link Response}, plus paging data.
 * `totalPages` is always `ceil(totalCount / pageSize)`.
 *
 * @remarks
 * Paging arguments are validated, not clamped: a page number or size below 1,
 * or a negative total count, throws {@link InvalidPaginationError}.
 *
 * @example
 * ```typescript
 * const [orders, total] = await this.orders.findPage(query.skip, query.pageSize);
 * return PagedResponse.success(orders, total, query.pageNumber, query.pageSize);
 * ```
 */
export class PagedResponse<T> implements IResponse<readonly T[]> {
  readonly totalPages: number;

  private constructor(
    readonly isSuccess: boolean,
    readonly data: readonly T[] | undefined,
    readonly notifications: readonly Notification[],
    readonly code: number,
    readonly totalCount: number,
    readonly pageNumber: number,
    readonly pageSize: number,
  ) {
    this.totalPages = calculateTotalPages(totalCount, pageSize);
    Object.freeze(this);
  }

  /**
   * Successful page.
   *
   * @param data - Items on this page
   * @param totalCount - Items across all pages
   * @throws {InvalidPaginationError} On invalid paging arguments
   */
  static success<T>(
    data: readonly T[],
    totalCount: number,
    pageNumber: number,
    pageSize: number,
    code: number = HttpStatus.OK,
  ): PagedResponse<T> {
    assertPagination({ pageNumber, pageSize });
    assertTotalCount(totalCount);
    assertSuccessCode(code);
    if (data.length > totalCount) {
      throw new ResponseContractError(
        `Page holds ${data.length} items but totalCount is ${totalCount}`,
      );
    }
    return new PagedResponse<T>(
      true,
      Object.freeze([...data]),
      Object.freeze([]),
      code,
      totalCount,
      pageNumber,
      pageSize,
    );
  }

  /**
   * Successful page with no items.
   */
  static empty<T>(pageNumber: number, pageSize: number): PagedResponse<T> {
    return PagedResponse.success<T>([], 0, pageNumber, pageSize);
  }

  /**
   * Failed paged response. Carries no data and a total count of 0; the
   * requested paging is echoed back when given.
   */
  static failure<T = never>(
    notifications: readonly Notification[],
    code: number = HttpStatus.BAD_REQUEST,
    paging: PaginationParams = { pageNumber: 1, pageSize: DEFAULT_PAGE_SIZE },
  ): PagedResponse<T> {
    assertFailure(notifications, code);
    assertPagination(paging);
    return new PagedResponse<T>(
      false,
      undefined,
      Object.freeze([...notifications]),
      code,
      0,
      paging.pageNumber,
      paging.pageSize,
    );
  }

  static fromNotificator<T = never>(
    notificator: INotificator,
    code: number = HttpStatus.BAD_REQUEST,
    paging?: PaginationParams,
  ): PagedResponse<T> {
    return PagedResponse.failure<T>(notificator.list(), code, paging);
  }

  get hasNextPage(): boolean {
    return this.pageNumber < this.totalPages;
  }

  get hasPreviousPage(): boolean {
    return this.pageNumber > 1;
  }

  get messages(): string[] {
    return this.notifications.map((n) => n.message);
  }

  /**
   * @throws {ResponseContractError} If the response is a failure
   */
  unwrap(): readonly T[] {
    if (!this.isSuccess || this.data === undefined) {
      throw new ResponseContractError(
        `Cannot unwrap a failed response (${this.code}): ${this.messages.join('; ')}`,
      );
    }
    return this.data;
  }

  toJSON(): PagedResponseJSON<T> {
    return {
      isSuccess: this.isSuccess,
      ...(this.data !== undefined && { data: this.data }),
      notifications: this.notifications.map((n) => n.toJSON()),
      code: this.code,
      totalCount: this.totalCount,
      pageNumber: this.pageNumber,
      pageSize: this.pageSize,
      totalPages: this.totalPages,
    };
  }
}

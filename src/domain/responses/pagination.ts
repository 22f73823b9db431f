/**
 * @fileoverview Paging parameters shared by paged queries and paged responses
 */

import { InvalidPaginationError } from '../exceptions/exceptions';

/**
 * Page size used when a caller does not choose one.
 */
export const DEFAULT_PAGE_SIZE = 10;

/**
 * Pagination parameters for paged queries.
 *
 * @example
 * ```typescript
 * const params: PaginationParams = { pageNumber: 2, pageSize: 20 };
 * ```
 */
export interface PaginationParams {
  /**
   * Current page number (1-indexed).
   */
  pageNumber: number;

  /**
   * Number of items per page.
   */
  pageSize: number;
}

/**
 * Reject page numbers and sizes that are not integers >= 1.
 *
 * Invalid paging is a caller contract violation, so it is never clamped.
 *
 * @throws {InvalidPaginationError}
 */
export function assertPagination(params: PaginationParams): void {
  if (!Number.isInteger(params.pageNumber) || params.pageNumber < 1) {
    throw new InvalidPaginationError('pageNumber', params.pageNumber);
  }
  if (!Number.isInteger(params.pageSize) || params.pageSize < 1) {
    throw new InvalidPaginationError('pageSize', params.pageSize);
  }
}

/**
 * @throws {InvalidPaginationError} If the count is not an integer >= 0
 */
export function assertTotalCount(totalCount: number): void {
  if (!Number.isInteger(totalCount) || totalCount < 0) {
    throw new InvalidPaginationError('totalCount', totalCount);
  }
}

/**
 * Number of pages needed to hold `totalCount` items, `ceil(totalCount / pageSize)`.
 */
export function calculateTotalPages(totalCount: number, pageSize: number): number {
  return Math.ceil(totalCount / pageSize);
}

/**
 * Zero-based offset of the first item on a page.
 */
export function calculateOffset(params: PaginationParams): number {
  return (params.pageNumber - 1) * params.pageSize;
}

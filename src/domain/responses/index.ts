/**
 * @fileoverview Response Module
 *
 * Uniform success/failure envelopes returned by handlers
 */

export { HttpStatus } from './HttpStatus';
export { Response } from './Response';
export type { IResponse, ResponseJSON } from './Response';
export { PagedResponse } from './PagedResponse';
export type { PagedResponseJSON } from './PagedResponse';
export {
  DEFAULT_PAGE_SIZE,
  assertPagination,
  assertTotalCount,
  calculateTotalPages,
  calculateOffset,
} from './pagination';
export type { PaginationParams } from './pagination';

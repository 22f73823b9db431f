/**
 * @fileoverview Shared test utilities
 *
 * Response assertions and small async helpers.
 */

import { expect } from '@jest/globals';
import { PagedResponse, Response } from '../src';

type AnyEnvelope = Response<unknown> | PagedResponse<unknown>;

/**
 * Assert a successful response: data present, no notifications.
 */
export function expectSuccess(response: AnyEnvelope, code: number = 200): void {
  expect(response.isSuccess).toBe(true);
  expect(response.data).toBeDefined();
  expect(response.notifications).toHaveLength(0);
  expect(response.code).toBe(code);
}

/**
 * Assert a failed response with exactly these messages, in order.
 */
export function expectFailure(
  response: AnyEnvelope,
  code: number,
  messages: readonly string[],
): void {
  expect(response.isSuccess).toBe(false);
  expect(response.data).toBeUndefined();
  expect(response.code).toBe(code);
  expect(response.messages).toEqual(messages);
}

/**
 * Resolve after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sequential ID generator for deterministic trace and request IDs.
 *
 * @example
 * ```typescript
 * const ids = sequentialIds('id');
 * ids(); // 'id-1'
 * ids(); // 'id-2'
 * ```
 */
export function sequentialIds(prefix: string): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

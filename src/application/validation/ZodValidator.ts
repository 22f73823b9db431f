/**
 * @fileoverview zod adapter for the validation collaborator
 */

import type { ZodIssue, ZodTypeAny } from 'zod';
import { OperationCancelledError } from '../../domain/exceptions/exceptions';
import type { IValidator, ValidationFailure } from './IValidator';

/**
 * Map zod issues to validation failures, one per issue, in order.
 */
export function toValidationFailures(issues: readonly ZodIssue[]): ValidationFailure[] {
  return issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * ZodValidator - Validates requests against a synchronous zod schema.
 *
 * @template T - Request type
 *
 * @example
 * ```typescript
 * const createOrderValidator = new ZodValidator<CreateOrderCommand>(
 *   z.object({
 *     customerId: z.string().refine((id) => id !== NIL, 'Customer ID cannot be empty.'),
 *     items: z.array(OrderItemSchema).min(1, 'An order needs at least one item.'),
 *   }),
 * );
 * ```
 */
export class ZodValidator<T> implements IValidator<T> {
  constructor(private readonly schema: ZodTypeAny) {}

  /**
   * Failures come back in schema order. The schema must be synchronous:
   * async refinements make zod throw here.
   */
  validate(request: T, signal?: AbortSignal): readonly ValidationFailure[] {
    if (signal?.aborted) {
      throw new OperationCancelledError('Validation was cancelled', signal.reason);
    }
    const result = this.schema.safeParse(request);
    return result.success ? [] : toValidationFailures(result.error.issues);
  }
}

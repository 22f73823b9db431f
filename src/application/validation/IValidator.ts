/**
 * @fileoverview Validation collaborator contract
 */

/**
 * One rule violation reported by a validator.
 */
export interface ValidationFailure {
  /** Dotted path of the offending field, e.g. `items.0.quantity` */
  readonly field: string;
  readonly message: string;
}

/**
 * IValidator - Validates a request before business logic runs.
 *
 * Failures are returned in the order the validator found them. An empty
 * result means the request is valid.
 *
 * @template T - Request type
 */
export interface IValidator<T> {
  validate(
    request: T,
    signal?: AbortSignal,
  ): readonly ValidationFailure[] | Promise<readonly ValidationFailure[]>;
}

/**
 * Build a validator from a plain function.
 *
 * @example
 * ```typescript
 * const validator = createValidator<ListOrdersQuery>((query) =>
 *   query.customerId ? [] : [{ field: 'customerId', message: 'Customer ID is required.' }],
 * );
 * ```
 */
export function createValidator<T>(
  validate: (request: T) => readonly ValidationFailure[],
): IValidator<T> {
  return { validate };
}

/**
 * Validator that accepts every request.
 */
export function acceptAll<T>(): IValidator<T> {
  return { validate: () => [] };
}

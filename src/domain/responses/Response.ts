/**
 * @fileoverview Response envelope returned by every handler
 * @module usecase-dispatch/domain/responses
 */

import { ResponseContractError } from '../exceptions/exceptions';
import { Notification } from '../notifications/Notification';
import type { INotificator } from '../notifications/Notificator';
import { HttpStatus } from './HttpStatus';

/**
 * Shape shared by Response and PagedResponse.
 *
 * @remarks
 * Invariants, enforced by the static constructors:
 * - `isSuccess === true` implies `data` is neither null nor undefined, and no notifications
 * - `isSuccess === false` implies at least one notification and no data
 */
export interface IResponse<T> {
  readonly isSuccess: boolean;
  readonly data: T | undefined;
  readonly notifications: readonly Notification[];
  readonly code: number;
}

/**
 * Serialized form of a response, for transports.
 */
export interface ResponseJSON<T> {
  isSuccess: boolean;
  data?: T;
  notifications: Array<{ field: string; message: string }>;
  code: number;
}

/**
 * @internal
 */
export function assertSuccessCode(code: number): void {
  if (!Number.isInteger(code) || code < 200 || code > 299) {
    throw new ResponseContractError(`Success code must be a 2xx status, got ${code}`);
  }
}

/**
 * @internal
 */
export function assertFailure(notifications: readonly Notification[], code: number): void {
  if (notifications.length === 0) {
    throw new ResponseContractError('A failure response needs at least one notification');
  }
  if (!Number.isInteger(code) || code < 400 || code > 599) {
    throw new ResponseContractError(`Failure code must be a 4xx or 5xx status, got ${code}`);
  }
}

/**
 * Response - Immutable success/failure envelope.
 *
 * Handlers build it once as their terminal output; the mediator hands it back
 * to the caller unchanged. Callers branch on `isSuccess` and map `code` onto
 * their own transport.
 *
 * @template T - Payload type on success
 *
 * @example
 * ```typescript
 * if (!(await this.executeValidation(this.validator, command))) {
 *   return Response.failure(this.getNotifications());
 * }
 *
 * const order = await this.orders.findById(command.orderId);
 * if (!order) {
 *   this.notify('Order not found.');
 *   return Response.failure(this.getNotifications(), HttpStatus.NOT_FOUND);
 * }
 *
 * return Response.success(order);
 * ```
 */
export class Response<T> implements IResponse<T> {
  private constructor(
    readonly isSuccess: boolean,
    readonly data: T | undefined,
    readonly notifications: readonly Notification[],
    readonly code: number,
  ) {
    Object.freeze(this);
  }

  /**
   * Successful response carrying `data`.
   *
   * @param code - 2xx status, 200 unless given
   * @throws {ResponseContractError} If `data` is null or undefined, or the code is not 2xx
   */
  static success<T>(data: T, code: number = HttpStatus.OK): Response<NonNullable<T>> {
    if (data === undefined || data === null) {
      throw new ResponseContractError('A success response must carry data');
    }
    assertSuccessCode(code);
    return new Response<NonNullable<T>>(true, data, Object.freeze([]), code);
  }

  /**
   * Failed response carrying the notifications that explain the failure.
   *
   * @param code - 4xx/5xx status, 400 unless given
   * @throws {ResponseContractError} If `notifications` is empty or the code is not 4xx/5xx
   */
  static failure<T = never>(
    notifications: readonly Notification[],
    code: number = HttpStatus.BAD_REQUEST,
  ): Response<T> {
    assertFailure(notifications, code);
    return new Response<T>(false, undefined, Object.freeze([...notifications]), code);
  }

  /**
   * Failed response built from everything a notificator collected.
   */
  static fromNotificator<T = never>(
    notificator: INotificator,
    code: number = HttpStatus.BAD_REQUEST,
  ): Response<T> {
    return Response.failure<T>(notificator.list(), code);
  }

  /**
   * Notification messages, in order.
   */
  get messages(): string[] {
    return this.notifications.map((n) => n.message);
  }

  /**
   * Payload of a successful response.
   *
   * @throws {ResponseContractError} If the response is a failure
   */
  unwrap(): T {
    if (!this.isSuccess || this.data === undefined) {
      throw new ResponseContractError(
        `Cannot unwrap a failed response (${this.code}): ${this.messages.join('; ')}`,
      );
    }
    return this.data;
  }

  toJSON(): ResponseJSON<T> {
    return {
      isSuccess: this.isSuccess,
      ...(this.data !== undefined && { data: this.data }),
      notifications: this.notifications.map((n) => n.toJSON()),
      code: this.code,
    };
  }
}

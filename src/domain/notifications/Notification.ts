/**
 * @fileoverview Notification value object
 * @module usecase-dispatch/domain/notifications
 */

/**
 * Notification - A single expected failure raised while handling a request.
 *
 * Notifications are plain `(field, message)` pairs. There are no severity
 * levels: a notification present in a response means the request failed.
 *
 * @example
 * ```typescript
 * const notification = new Notification('customerId', 'Customer ID cannot be empty.');
 * const general = Notification.general('Order not found.');
 * ```
 */
export class Notification {
  /**
   * @param field - Dotted path of the offending input, or '' for business-rule failures
   * @param message - Human-readable description of the failure
   */
  constructor(
    public readonly field: string,
    public readonly message: string,
  ) {
    Object.freeze(this);
  }

  /**
   * Create a notification that is not tied to any input field.
   */
  static general(message: string): Notification {
    return new Notification('', message);
  }

  /**
   * Whether this notification points at a specific input field.
   */
  get hasField(): boolean {
    return this.field.length > 0;
  }

  toJSON(): { field: string; message: string } {
    return { field: this.field, message: this.message };
  }

  toString(): string {
    return this.hasField ? `${this.field}: ${this.message}` : this.message;
  }
}

/**
 * @fileoverview Request-scoped notification collector
 * @module usecase-dispatch/domain/notifications
 */

import { Notification } from './Notification';

/**
 * INotificator - Collects the notifications raised while one request is handled.
 *
 * @remarks
 * One instance exists per dispatched request. The mediator creates it when a
 * dispatch starts and drops it when the handler returns, so an instance never
 * carries notifications from a previous request. Sharing an instance between
 * concurrent dispatches would mix their error lists.
 */
export interface INotificator {
  /**
   * Append a notification. Insertion order is preserved.
   */
  append(notification: Notification): void;

  /**
   * Snapshot of the collected notifications, in insertion order.
   */
  list(): readonly Notification[];

  /**
   * Whether at least one notification has been collected.
   */
  hasAny(): boolean;
}

/**
 * Default in-memory notificator.
 */
export class Notificator implements INotificator {
  private readonly notifications: Notification[] = [];

  append(notification: Notification): void {
    this.notifications.push(notification);
  }

  list(): readonly Notification[] {
    return Object.freeze([...this.notifications]);
  }

  hasAny(): boolean {
    return this.notifications.length > 0;
  }

  get count(): number {
    return this.notifications.length;
  }
}

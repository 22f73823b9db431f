/**
 * @fileoverview Notification Module
 *
 * Value type and request-scoped collector for expected failures.
 */

export { Notification } from './Notification';
export { Notificator } from './Notificator';
export type { INotificator } from './Notificator';

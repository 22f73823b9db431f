/**
 * @fileoverview Context Interface
 * @packageDocumentation
 * @module usecase-dispatch/domain/context
 *
 * Context carries request-scoped metadata (trace ID, request ID, request type)
 * across async boundaries and exposes the dispatch's cancellation state.
 *
 * It does not carry the notificator; handlers receive theirs through the
 * handler scope.
 */

/**
 * IContext - Read/write access to the active request's metadata.
 *
 * @template T - Context data type
 *
 * @example
 * ```typescript
 * RequestContext.run({ traceId: 'abc-123' }, async () => {
 *   const ctx = RequestContext.current();
 *   logger.info('Loading orders', { traceId: ctx?.get('traceId') });
 * });
 * ```
 */
export interface IContext<T extends DispatchContextData = DispatchContextData> {
  /**
   * Get a value from the context by key.
   */
  get<K extends keyof T>(key: K): T[K] | undefined;

  /**
   * Set a value in the context.
   *
   * @remarks
   * The store is isolated per async execution, so enriching it inside one
   * dispatch never affects a concurrent one.
   */
  set<K extends keyof T>(key: K, value: T[K]): void;

  /**
   * Check whether a key has been set.
   */
  has<K extends keyof T>(key: K): boolean;

  /**
   * Whether the dispatch this context belongs to has been cancelled.
   */
  isCancelled(): boolean;

  /**
   * Register a callback invoked when the dispatch is cancelled.
   * Invoked immediately if cancellation already happened.
   */
  onCancel(callback: () => void): void;

  /**
   * Snapshot of all values, for logging.
   */
  getAll(): Readonly<Partial<T>>;
}

/**
 * Standard context data keys set by the mediator.
 *
 * @example
 * ```typescript
 * interface TenantContextData extends DispatchContextData {
 *   tenantId?: string;
 * }
 * ```
 */
export interface DispatchContextData {
  /**
   * Correlation ID shared by every dispatch started from the same entry point.
   * Nested dispatches inherit it.
   */
  traceId?: string;

  /**
   * Unique ID of one dispatch.
   */
  requestId?: string;

  /**
   * Constructor name of the request being handled.
   */
  requestType?: string;

  /**
   * ID of the user on whose behalf the request runs, when the host sets one.
   */
  userId?: string;

  /**
   * Additional custom fields.
   */
  [key: string]: unknown;
}

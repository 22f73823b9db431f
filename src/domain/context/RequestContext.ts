/**
 * @fileoverview RequestContext - AsyncLocalStorage-based Context Implementation
 * @module usecase-dispatch/domain/context
 *
 * The mediator opens one RequestContext scope per dispatch. Everything the
 * handler awaits (validators, repositories, nested dispatches) runs inside
 * that scope and can read the trace ID without it being passed around.
 *
 * @see {@link https://nodejs.org/api/async_context.html | Node.js AsyncLocalStorage}
 */

import { AsyncLocalStorage } from 'async_hooks';
import { CancellationListeners } from './CancellationListeners';
import { DispatchContextData, IContext } from './IContext';

/**
 * @internal
 */
interface ContextStore<T extends DispatchContextData> {
  data: Partial<T>;
  signal?: AbortSignal;
  listeners: CancellationListeners;
}

/**
 * RequestContext - AsyncLocalStorage-backed implementation of IContext.
 *
 * @remarks
 * One static AsyncLocalStorage is shared by all scopes; each `run()` gets its
 * own store, so concurrent dispatches never observe each other's values.
 * Cancellation is read from the AbortSignal the scope was opened with.
 *
 * @example
 * ```typescript
 * await RequestContext.run({ traceId: 'trace-1' }, async () => {
 *   await mediator.dispatch(new GetOrderByIdQuery(orderId));
 *   // nested dispatches reuse traceId 'trace-1'
 * });
 * ```
 */
export class RequestContext<T extends DispatchContextData = DispatchContextData>
  implements IContext<T>
{
  // Stores are typed per call site through current<T>(); the storage itself is untyped.
  private static als = new AsyncLocalStorage<ContextStore<DispatchContextData>>();

  private constructor(private readonly store: ContextStore<T>) {}

  /**
   * Open a new, independent context scope and run `callback` inside it.
   *
   * @param initialData - Initial context values
   * @param callback - Function to run within the scope
   * @param signal - Cancellation signal the scope reports through `isCancelled()`
   * @param listeners - Tracker for `onCancel` callbacks; the caller clears it when the scope ends
   * @returns Result of the callback
   */
  static run<R>(
    initialData: Partial<DispatchContextData>,
    callback: () => R,
    signal?: AbortSignal,
    listeners: CancellationListeners = new CancellationListeners(signal),
  ): R {
    const store: ContextStore<DispatchContextData> = {
      data: { ...initialData },
      signal,
      listeners,
    };
    return RequestContext.als.run(store, callback);
  }

  /**
   * Current context, or undefined outside any scope.
   */
  static current(): RequestContext | undefined {
    const store = RequestContext.als.getStore();
    return store ? new RequestContext(store) : undefined;
  }

  /**
   * Whether code is running inside a context scope.
   */
  static hasContext(): boolean {
    return RequestContext.als.getStore() !== undefined;
  }

  get<K extends keyof T>(key: K): T[K] | undefined {
    return this.store.data[key];
  }

  set<K extends keyof T>(key: K, value: T[K]): void {
    this.store.data[key] = value;
  }

  has<K extends keyof T>(key: K): boolean {
    return this.store.data[key] !== undefined;
  }

  isCancelled(): boolean {
    return this.store.signal?.aborted ?? false;
  }

  onCancel(callback: () => void): void {
    this.store.listeners.add(callback);
  }

  getAll(): Readonly<Partial<T>> {
    return { ...this.store.data };
  }

  /**
   * The cancellation signal of this scope, if any.
   */
  get signal(): AbortSignal | undefined {
    return this.store.signal;
  }

  get traceId(): string | undefined {
    return this.store.data.traceId;
  }

  get requestId(): string | undefined {
    return this.store.data.requestId;
  }
}

/**
 * Get the current context or throw if there is none.
 *
 * @throws {Error} If called outside a RequestContext scope
 */
export function getCurrentContext(): RequestContext {
  const context = RequestContext.current();
  if (!context) {
    throw new Error(
      'No active context. Make sure you are within a RequestContext.run() scope.',
    );
  }
  return context;
}

/**
 * Get the current context, or null outside any scope.
 */
export function tryGetCurrentContext(): RequestContext | null {
  return RequestContext.current() ?? null;
}

/**
 * @fileoverview Abort listeners bound to one dispatch
 */

/**
 * CancellationListeners - `onCancel` callbacks registered against a signal.
 *
 * @remarks
 * A signal may outlive many dispatches (a host shutdown signal, for example).
 * The mediator calls {@link clear} when a dispatch settles, detaching every
 * listener that dispatch added.
 */
export class CancellationListeners {
  private readonly registered: Array<() => void> = [];

  constructor(private readonly signal?: AbortSignal) {}

  /**
   * Run `callback` on abort; immediately if the signal is already aborted.
   */
  add(callback: () => void): void {
    const signal = this.signal;
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      callback();
      return;
    }
    signal.addEventListener('abort', callback, { once: true });
    this.registered.push(callback);
  }

  /**
   * Detach every listener added so far.
   */
  clear(): void {
    const signal = this.signal;
    for (const callback of this.registered.splice(0)) {
      signal?.removeEventListener('abort', callback);
    }
  }

  /**
   * Listeners still attached.
   */
  get pending(): number {
    return this.registered.length;
  }
}

/**
 * @fileoverview CancellationListeners tests
 */

import { describe, it, expect } from '@jest/globals';
import { CancellationListeners } from '../../../src';

describe('CancellationListeners', () => {
  it('should run callbacks when the signal aborts', () => {
    const controller = new AbortController();
    const listeners = new CancellationListeners(controller.signal);
    const calls: string[] = [];

    listeners.add(() => calls.push('first'));
    listeners.add(() => calls.push('second'));
    expect(listeners.pending).toBe(2);

    controller.abort();

    expect(calls).toEqual(['first', 'second']);
  });

  it('should run a callback at once when the signal is already aborted', () => {
    const controller = new AbortController();
    controller.abort();
    const listeners = new CancellationListeners(controller.signal);
    const calls: string[] = [];

    listeners.add(() => calls.push('now'));

    expect(calls).toEqual(['now']);
    expect(listeners.pending).toBe(0);
  });

  it('should detach every callback on clear', () => {
    const controller = new AbortController();
    const listeners = new CancellationListeners(controller.signal);
    const calls: string[] = [];

    listeners.add(() => calls.push('late'));
    listeners.clear();
    controller.abort();

    expect(calls).toEqual([]);
    expect(listeners.pending).toBe(0);
  });

  it('should leave listeners added elsewhere on the same signal', () => {
    const controller = new AbortController();
    const first = new CancellationListeners(controller.signal);
    const second = new CancellationListeners(controller.signal);
    const calls: string[] = [];

    first.add(() => calls.push('first'));
    second.add(() => calls.push('second'));
    first.clear();
    controller.abort();

    expect(calls).toEqual(['second']);
  });

  it('should ignore callbacks without a signal', () => {
    const listeners = new CancellationListeners();
    const calls: string[] = [];

    listeners.add(() => calls.push('never'));
    listeners.clear();

    expect(calls).toEqual([]);
    expect(listeners.pending).toBe(0);
  });
});

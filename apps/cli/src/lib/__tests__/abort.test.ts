/// <reference types="vitest" />

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { settleUnlessAborted, waitFor } from '../abort.js';

describe('waitFor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    const done = vi.fn();
    void waitFor(500).then(done);

    await vi.advanceTimersByTimeAsync(499);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const done = vi.fn();
    void waitFor(60_000, controller.signal).then(done);

    controller.abort();
    await vi.advanceTimersByTimeAsync(0);

    expect(done).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('does not schedule a timer for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await waitFor(1000, controller.signal);

    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('settleUnlessAborted', () => {
  it('reports fulfilment and rejection without throwing', async () => {
    await expect(settleUnlessAborted(Promise.resolve(42))).resolves.toEqual({ status: 'fulfilled', value: 42 });

    const failure = new Error('boom');
    await expect(settleUnlessAborted(Promise.reject(failure))).resolves.toEqual({
      status: 'rejected',
      reason: failure
    });
  });

  it('resolves as aborted when the signal fires before the promise settles', async () => {
    const controller = new AbortController();
    const pending = settleUnlessAborted(new Promise<number>(() => {}), controller.signal);

    controller.abort();

    await expect(pending).resolves.toEqual({ status: 'aborted' });
  });

  it('resolves as aborted for a signal that is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(settleUnlessAborted(Promise.resolve(1), controller.signal)).resolves.toEqual({ status: 'aborted' });
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AbortedError, sleep } from './sleep.js';

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    const done = vi.fn();
    const pending = sleep(500).then(done);

    await vi.advanceTimersByTimeAsync(499);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;

    expect(done).toHaveBeenCalledTimes(1);
  });

  it('rejects and clears its timer on abort', async () => {
    const controller = new AbortController();
    const pending = sleep(500, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects immediately for an aborted signal', async () => {
    await expect(sleep(500, AbortSignal.abort())).rejects.toBeInstanceOf(AbortedError);
    expect(vi.getTimerCount()).toBe(0);
  });
});

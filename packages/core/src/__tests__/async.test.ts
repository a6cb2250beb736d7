import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { withRetry, withTimeout } from '../async.js';
import { CollabError } from '../errors/index.js';

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 100, 'get')).resolves.toBe('ok');
  });

  it('should reject with STORE_TIMEOUT when the timer wins', async () => {
    const pending = withTimeout(new Promise<never>(() => undefined), 100, 'publish');
    const assertion = expect(pending).rejects.toMatchObject({
      code: 'STORE_TIMEOUT',
      message: 'publish timed out after 100ms',
    });
    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });
});

describe('withRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should retry with linear backoff until success', async () => {
    let calls = 0;
    const onRetry = vi.fn();
    const pending = withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`fail ${calls}`);
        return calls;
      },
      { retries: 3, delayMs: 10, onRetry }
    );

    await vi.advanceTimersByTimeAsync(10);
    await vi.advanceTimersByTimeAsync(20);
    await expect(pending).resolves.toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenLastCalledWith(expect.objectContaining({ message: 'fail 2' }), 2);
  });

  it('should rethrow the last error', async () => {
    const pending = withRetry(
      () => Promise.reject(new CollabError({ code: 'STORE_UNAVAILABLE' })),
      { retries: 1, delayMs: 5 }
    );
    const assertion = expect(pending).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
    await vi.advanceTimersByTimeAsync(5);
    await assertion;
  });
});

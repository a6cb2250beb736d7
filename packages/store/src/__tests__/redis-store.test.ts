import { Redis } from 'ioredis';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { RedisStore } from '../redis-store.js';

describe('RedisStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should retry a pattern subscription that failed', async () => {
    const psubscribe = vi
      .spyOn(Redis.prototype, 'psubscribe')
      .mockRejectedValueOnce(new Error('connection lost'))
      .mockResolvedValue(1);
    const store = new RedisStore({ options: { lazyConnect: true } });

    await expect(store.psubscribe('test:room:*', vi.fn())).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
    await store.psubscribe('test:room:*', vi.fn());

    expect(psubscribe).toHaveBeenCalledTimes(2);
  });

  it('should subscribe to a pattern once for several handlers', async () => {
    const psubscribe = vi.spyOn(Redis.prototype, 'psubscribe').mockResolvedValue(1);
    const punsubscribe = vi.spyOn(Redis.prototype, 'punsubscribe').mockResolvedValue(0);
    const store = new RedisStore({ options: { lazyConnect: true } });

    const first = await store.psubscribe('test:conn:*', vi.fn());
    const second = await store.psubscribe('test:conn:*', vi.fn());
    await first();
    expect(punsubscribe).not.toHaveBeenCalled();
    await second();

    expect(psubscribe).toHaveBeenCalledTimes(1);
    expect(punsubscribe).toHaveBeenCalledTimes(1);
  });
});

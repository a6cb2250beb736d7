/**
 * Redis-backed shared store.
 *
 * Conditional operations run as Lua scripts so each one is a single atomic
 * server-side step. Pattern subscriptions use a duplicated connection, since
 * a Redis connection in subscriber mode cannot issue commands.
 *
 * @module redis-store
 */

import { CollabError, createLogger, type Logger } from '@tessera/core';
import { Redis, type RedisOptions } from 'ioredis';
import type { MessageHandler, SharedStore, Unsubscribe } from './types.js';

const SET_IF_ABSENT_OR_EQUAL = `
local current = redis.call('GET', KEYS[1])
if current == false or current == ARGV[1] then
  redis.call('SET', KEYS[1], ARGV[1], 'PX', ARGV[2])
  return 1
end
return 0
`;

const ADD_TO_SET_EXTENDING_TTL = `
redis.call('SADD', KEYS[1], ARGV[1])
if ARGV[2] ~= '' and redis.call('PTTL', KEYS[1]) < tonumber(ARGV[2]) then
  redis.call('PEXPIRE', KEYS[1], ARGV[2])
end
return 1
`;

const DELETE_IF_EQUAL = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

/** Redis store configuration */
export interface RedisStoreConfig {
  /** Connection URL, e.g. `redis://localhost:6379` */
  url?: string;
  /** Extra ioredis options */
  options?: RedisOptions;
  logger?: Logger;
}

/**
 * SharedStore over a Redis server.
 *
 * @example
 * ```typescript
 * const store = createRedisStore({ url: process.env.TESSERA_REDIS_URL });
 * await store.ping();
 * ```
 */
export class RedisStore implements SharedStore {
  private readonly client: Redis;
  private readonly subscriber: Redis;
  private readonly logger: Logger;
  private readonly handlers = new Map<string, Set<MessageHandler>>();
  private readonly patterns = new Map<string, Promise<void>>();

  constructor(config: RedisStoreConfig = {}) {
    this.logger = config.logger ?? createLogger({ module: 'redis-store' });
    const options: RedisOptions = { maxRetriesPerRequest: 1, ...config.options };
    this.client = config.url ? new Redis(config.url, options) : new Redis(options);
    this.subscriber = this.client.duplicate();

    this.client.on('error', (error: unknown) => {
      this.logger.error('Redis command connection error', error);
    });
    this.subscriber.on('error', (error: unknown) => {
      this.logger.error('Redis subscriber connection error', error);
    });
    this.subscriber.on('pmessage', (pattern: string, channel: string, message: string) => {
      this.dispatch(pattern, channel, message);
    });
  }

  async setIfAbsentOrEqual(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.command('setIfAbsentOrEqual', () =>
      this.client.eval(SET_IF_ABSENT_OR_EQUAL, 1, key, value, String(Math.max(1, Math.ceil(ttlMs))))
    );
    return result === 1;
  }

  async deleteIfEqual(key: string, value: string): Promise<boolean> {
    const result = await this.command('deleteIfEqual', () => this.client.eval(DELETE_IF_EQUAL, 1, key, value));
    return result === 1;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    await this.command('set', () =>
      ttlMs === undefined ? this.client.set(key, value) : this.client.set(key, value, 'PX', Math.ceil(ttlMs))
    );
  }

  get(key: string): Promise<string | null> {
    return this.command('get', () => this.client.get(key));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.command('delete', () => this.client.del(key));
    return removed > 0;
  }

  async addToSet(key: string, member: string, ttlMs?: number): Promise<void> {
    await this.command('addToSet', () =>
      this.client.eval(
        ADD_TO_SET_EXTENDING_TTL,
        1,
        key,
        member,
        ttlMs === undefined ? '' : String(Math.max(1, Math.ceil(ttlMs)))
      )
    );
  }

  async removeFromSet(key: string, member: string): Promise<void> {
    await this.command('removeFromSet', () => this.client.srem(key, member));
  }

  setMembers(key: string): Promise<string[]> {
    return this.command('setMembers', () => this.client.smembers(key));
  }

  publish(channel: string, message: string): Promise<number> {
    return this.command('publish', () => this.client.publish(channel, message));
  }

  async psubscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe> {
    let subscribed = this.patterns.get(pattern);
    if (!subscribed) {
      const request = this.command('psubscribe', () => this.subscriber.psubscribe(pattern)).then(() => undefined);
      this.patterns.set(pattern, request);
      subscribed = request;
      request.catch(() => {
        if (this.patterns.get(pattern) === request) {
          this.patterns.delete(pattern);
        }
      });
    }
    await subscribed;

    let handlers = this.handlers.get(pattern);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(pattern, handlers);
    }
    handlers.add(handler);

    return async () => {
      const current = this.handlers.get(pattern);
      if (!current?.delete(handler) || current.size > 0) return;
      this.handlers.delete(pattern);
      this.patterns.delete(pattern);
      await this.command('punsubscribe', () => this.subscriber.punsubscribe(pattern));
    };
  }

  async ping(): Promise<void> {
    await this.command('ping', () => this.client.ping());
  }

  async close(): Promise<void> {
    this.handlers.clear();
    this.patterns.clear();
    await Promise.all([this.subscriber.quit(), this.client.quit()]);
  }

  private dispatch(pattern: string, channel: string, message: string): void {
    const handlers = this.handlers.get(pattern);
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        handler(channel, message);
      } catch (error) {
        this.logger.error('Subscription handler failed', error, { pattern, channel });
      }
    }
  }

  private async command<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new CollabError({
        code: 'STORE_UNAVAILABLE',
        message: `Redis ${operation} failed`,
        context: { operation },
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

/**
 * Create a Redis-backed shared store
 */
export function createRedisStore(config?: RedisStoreConfig): RedisStore {
  return new RedisStore(config);
}

/**
 * In-process shared store.
 *
 * Several coordinators constructed over the same `MemoryStore` behave like
 * server instances sharing one store, which is how the cluster paths are
 * exercised in tests and single-process deployments. Every operation runs
 * to completion in one turn of the event loop, which makes the conditional
 * operations atomic.
 *
 * @module memory-store
 */

import { CollabError, delay } from '@tessera/core';
import { globToRegExp } from './glob.js';
import type { MessageHandler, SharedStore, Unsubscribe } from './types.js';

interface Entry {
  value: string | Set<string>;
  expiresAt: number | null;
}

interface PatternSubscription {
  pattern: string;
  matcher: RegExp;
  handler: MessageHandler;
}

/** Memory store configuration */
export interface MemoryStoreConfig {
  /** Artificial latency applied to every call, in ms (default: 0) */
  latencyMs?: number;
}

/**
 * SharedStore backed by process memory.
 *
 * @example
 * ```typescript
 * const store = new MemoryStore();
 * const instanceA = createSessionCoordinator({ store });
 * const instanceB = createSessionCoordinator({ store });
 * ```
 */
export class MemoryStore implements SharedStore {
  private readonly entries = new Map<string, Entry>();
  private readonly subscriptions = new Set<PatternSubscription>();
  private latencyMs: number;
  private available = true;
  private closed = false;

  constructor(config: MemoryStoreConfig = {}) {
    this.latencyMs = config.latencyMs ?? 0;
  }

  // ---------------------------------------------------------------------------
  // Fault injection
  // ---------------------------------------------------------------------------

  /** Simulate an outage; every call rejects with `STORE_UNAVAILABLE` until restored */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  setLatency(latencyMs: number): void {
    this.latencyMs = latencyMs;
  }

  // ---------------------------------------------------------------------------
  // Keys
  // ---------------------------------------------------------------------------

  setIfAbsentOrEqual(key: string, value: string, ttlMs: number): Promise<boolean> {
    return this.run(() => {
      const current = this.read(key);
      if (current !== null && current.value !== value) {
        return false;
      }
      this.entries.set(key, { value, expiresAt: Date.now() + ttlMs });
      return true;
    });
  }

  deleteIfEqual(key: string, value: string): Promise<boolean> {
    return this.run(() => {
      const current = this.read(key);
      if (current === null || current.value !== value) {
        return false;
      }
      this.entries.delete(key);
      return true;
    });
  }

  set(key: string, value: string, ttlMs?: number): Promise<void> {
    return this.run(() => {
      this.entries.set(key, { value, expiresAt: ttlMs === undefined ? null : Date.now() + ttlMs });
    });
  }

  get(key: string): Promise<string | null> {
    return this.run(() => {
      const entry = this.read(key);
      return entry !== null && typeof entry.value === 'string' ? entry.value : null;
    });
  }

  delete(key: string): Promise<boolean> {
    return this.run(() => this.read(key) !== null && this.entries.delete(key));
  }

  // ---------------------------------------------------------------------------
  // Sets
  // ---------------------------------------------------------------------------

  addToSet(key: string, member: string, ttlMs?: number): Promise<void> {
    return this.run(() => {
      const entry = this.read(key);
      const members = entry !== null && entry.value instanceof Set ? entry.value : new Set<string>();
      members.add(member);
      this.entries.set(key, { value: members, expiresAt: this.extendedExpiry(entry, ttlMs) });
    });
  }

  removeFromSet(key: string, member: string): Promise<void> {
    return this.run(() => {
      const entry = this.read(key);
      if (entry === null || !(entry.value instanceof Set)) return;
      entry.value.delete(member);
      if (entry.value.size === 0) {
        this.entries.delete(key);
      }
    });
  }

  setMembers(key: string): Promise<string[]> {
    return this.run(() => {
      const entry = this.read(key);
      return entry !== null && entry.value instanceof Set ? [...entry.value] : [];
    });
  }

  // ---------------------------------------------------------------------------
  // Pub/sub
  // ---------------------------------------------------------------------------

  publish(channel: string, message: string): Promise<number> {
    return this.run(() => {
      const targets = [...this.subscriptions].filter((sub) => sub.matcher.test(channel));
      // Delivery is asynchronous, as with a networked broker
      queueMicrotask(() => {
        for (const sub of targets) {
          if (this.subscriptions.has(sub)) {
            sub.handler(channel, message);
          }
        }
      });
      return targets.length;
    });
  }

  psubscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe> {
    return this.run(() => {
      const subscription: PatternSubscription = { pattern, matcher: globToRegExp(pattern), handler };
      this.subscriptions.add(subscription);
      return async () => {
        this.subscriptions.delete(subscription);
      };
    });
  }

  /** Number of live pattern subscriptions */
  get subscriptionCount(): number {
    return this.subscriptions.size;
  }

  ping(): Promise<void> {
    return this.run(() => undefined);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.subscriptions.clear();
    this.entries.clear();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private extendedExpiry(entry: Entry | null, ttlMs: number | undefined): number | null {
    const current = entry?.expiresAt ?? null;
    if (ttlMs === undefined) return current;
    const requested = Date.now() + ttlMs;
    return current !== null && current > requested ? current : requested;
  }

  private read(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private async run<T>(operation: () => T): Promise<T> {
    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }
    if (this.closed) {
      throw new CollabError({ code: 'STORE_UNAVAILABLE', message: 'Store is closed' });
    }
    if (!this.available) {
      throw new CollabError({ code: 'STORE_UNAVAILABLE' });
    }
    return operation();
  }
}

/**
 * Create an in-process shared store
 */
export function createMemoryStore(config?: MemoryStoreConfig): MemoryStore {
  return new MemoryStore(config);
}

/**
 * Distributed Lock Manager - per-object edit exclusivity across instances
 *
 * Locks live only in the shared store. Each acquisition is a single atomic
 * conditional set with a TTL, so a crashed holder's locks expire on their
 * own. A per-holder index set lets disconnect cleanup find a holder's locks
 * without scanning the keyspace.
 *
 * @module lock-manager
 */

import { createLogger, withTimeout, type Logger } from '@tessera/core';
import { type Observable, Subject } from 'rxjs';
import type { SharedStore } from './types.js';

/** Lock manager configuration */
export interface LockManagerConfig {
  /** Key namespace shared by every instance of one deployment (default: 'tessera') */
  namespace?: string;
  /** Lock time-to-live in ms (default: 30000) */
  lockTtlMs?: number;
  /** Upper bound for a single store call in ms (default: 2000) */
  storeTimeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_CONFIG: Required<Omit<LockManagerConfig, 'logger'>> = {
  namespace: 'tessera',
  lockTtlMs: 30_000,
  storeTimeoutMs: 2_000,
};

/**
 * Outcome of a lock attempt
 */
export type LockAttempt =
  | { acquired: true; objectId: string; holderId: string; expiresAt: number }
  | { acquired: false; objectId: string; holderId: string; reason: 'busy' | 'unavailable' };

/**
 * Lock lifecycle notification
 */
export interface LockEvent {
  type: 'lock-acquired' | 'lock-denied' | 'lock-released';
  objectId: string;
  holderId: string;
  timestamp: number;
  reason?: 'busy' | 'unavailable';
}

/**
 * Grants short-lived, TTL'd edit locks through a {@link SharedStore}.
 *
 * Acquisition fails closed: a store error or timeout reports the object as
 * unavailable and is never retried here, so callers see a denial promptly.
 *
 * @example
 * ```typescript
 * const locks = createLockManager(store, { namespace: 'puzzles' });
 *
 * if (await locks.tryAcquire('piece-7', 'user-1')) {
 *   // move the piece
 *   await locks.release('piece-7', 'user-1');
 * }
 * ```
 */
export class DistributedLockManager {
  private readonly config: Required<Omit<LockManagerConfig, 'logger'>>;
  private readonly store: SharedStore;
  private readonly logger: Logger;
  private readonly events$ = new Subject<LockEvent>();

  constructor(store: SharedStore, config: LockManagerConfig = {}) {
    this.store = store;
    this.config = {
      namespace: config.namespace ?? DEFAULT_CONFIG.namespace,
      lockTtlMs: config.lockTtlMs ?? DEFAULT_CONFIG.lockTtlMs,
      storeTimeoutMs: config.storeTimeoutMs ?? DEFAULT_CONFIG.storeTimeoutMs,
    };
    this.logger = config.logger ?? createLogger({ module: 'locks' });
  }

  /** Default lock TTL in ms */
  get lockTtlMs(): number {
    return this.config.lockTtlMs;
  }

  /** Lock lifecycle notifications */
  get events(): Observable<LockEvent> {
    return this.events$.asObservable();
  }

  lockKey(objectId: string): string {
    return `${this.config.namespace}:lock:${objectId}`;
  }

  holderKey(holderId: string): string {
    return `${this.config.namespace}:locks-held:${holderId}`;
  }

  /**
   * Acquire or re-acquire the lock on `objectId`. Resolves `true` only when
   * `holderId` now holds it.
   */
  async tryAcquire(objectId: string, holderId: string, ttlMs?: number): Promise<boolean> {
    const attempt = await this.acquire(objectId, holderId, ttlMs);
    return attempt.acquired;
  }

  /**
   * Like {@link tryAcquire}, but tells a held lock apart from an unreachable
   * store.
   */
  async acquire(objectId: string, holderId: string, ttlMs: number = this.config.lockTtlMs): Promise<LockAttempt> {
    let acquired: boolean;
    try {
      acquired = await withTimeout(
        this.store.setIfAbsentOrEqual(this.lockKey(objectId), holderId, ttlMs),
        this.config.storeTimeoutMs,
        'lock acquire'
      );
    } catch (error) {
      this.logger.warn('Lock store unavailable; denying acquisition', {
        objectId,
        holderId,
        error: error instanceof Error ? error.message : String(error),
      });
      this.emit('lock-denied', objectId, holderId, 'unavailable');
      return { acquired: false, objectId, holderId, reason: 'unavailable' };
    }

    if (!acquired) {
      this.emit('lock-denied', objectId, holderId, 'busy');
      return { acquired: false, objectId, holderId, reason: 'busy' };
    }

    await this.bestEffort('index lock', () => this.store.addToSet(this.holderKey(holderId), objectId, ttlMs));
    this.emit('lock-acquired', objectId, holderId);
    return { acquired: true, objectId, holderId, expiresAt: Date.now() + ttlMs };
  }

  /**
   * Release the lock only if `holderId` still holds it. Releasing an expired
   * lock, or someone else's, resolves `false` and changes nothing.
   */
  async release(objectId: string, holderId: string): Promise<boolean> {
    let released: boolean;
    try {
      released = await withTimeout(
        this.store.deleteIfEqual(this.lockKey(objectId), holderId),
        this.config.storeTimeoutMs,
        'lock release'
      );
    } catch (error) {
      this.logger.warn('Lock release failed; lock will expire by TTL', {
        objectId,
        holderId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }

    await this.bestEffort('unindex lock', () => this.store.removeFromSet(this.holderKey(holderId), objectId));
    if (released) {
      this.emit('lock-released', objectId, holderId);
    }
    return released;
  }

  /**
   * Release every lock `holderId` still holds. Entries that already expired
   * are skipped. Resolves with the ids actually released.
   */
  async releaseAllFor(holderId: string): Promise<string[]> {
    let objectIds: string[];
    try {
      objectIds = await withTimeout(
        this.store.setMembers(this.holderKey(holderId)),
        this.config.storeTimeoutMs,
        'lock sweep'
      );
    } catch (error) {
      this.logger.warn('Lock sweep failed; locks will expire by TTL', {
        holderId,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    const released: string[] = [];
    for (const objectId of objectIds) {
      if (await this.release(objectId, holderId)) {
        released.push(objectId);
      }
    }

    await this.bestEffort('drop lock index', () => this.store.delete(this.holderKey(holderId)));
    return released;
  }

  /** Current holder of `objectId`, or `null` when unlocked or unknown */
  async getHolder(objectId: string): Promise<string | null> {
    try {
      return await withTimeout(this.store.get(this.lockKey(objectId)), this.config.storeTimeoutMs, 'lock lookup');
    } catch (error) {
      this.logger.warn('Lock lookup failed', {
        objectId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  destroy(): void {
    this.events$.complete();
  }

  private async bestEffort(operation: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await withTimeout(fn(), this.config.storeTimeoutMs, operation);
    } catch (error) {
      this.logger.debug(`Failed to ${operation}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private emit(type: LockEvent['type'], objectId: string, holderId: string, reason?: LockEvent['reason']): void {
    this.events$.next({
      type,
      objectId,
      holderId,
      timestamp: Date.now(),
      ...(reason ? { reason } : {}),
    });
  }
}

/**
 * Create a distributed lock manager
 */
export function createLockManager(store: SharedStore, config?: LockManagerConfig): DistributedLockManager {
  return new DistributedLockManager(store, config);
}

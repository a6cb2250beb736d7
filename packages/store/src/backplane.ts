/**
 * Backplane Fanout - cross-instance pub/sub over the shared store
 *
 * Every instance publishes room and connection traffic here and subscribes
 * once to the patterns it serves. Envelopes carry the publishing instance
 * id so an instance can skip its own messages, which it already delivered
 * locally.
 *
 * @module backplane
 */

import { createLogger, generateInstanceId, withRetry, withTimeout, type Logger } from '@tessera/core';
import { BehaviorSubject, type Observable, distinctUntilChanged } from 'rxjs';
import { z } from 'zod';
import type { SharedStore, Unsubscribe } from './types.js';

/** Backplane configuration */
export interface BackplaneConfig {
  /** Channel namespace shared by every instance of one deployment (default: 'tessera') */
  namespace?: string;
  /** Identifier of this process (default: generated) */
  instanceId?: string;
  /** Upper bound for a single publish in ms (default: 2000) */
  publishTimeoutMs?: number;
  /** Publish attempts after the first (default: 2) */
  publishRetries?: number;
  /** Base delay for linear publish backoff in ms (default: 50) */
  retryDelayMs?: number;
  logger?: Logger;
}

const DEFAULT_CONFIG = {
  namespace: 'tessera',
  publishTimeoutMs: 2_000,
  publishRetries: 2,
  retryDelayMs: 50,
} as const;

export type BackplaneHealth = 'healthy' | 'degraded';

/**
 * What travels on a backplane channel
 */
export interface BackplaneEnvelope {
  origin: string;
  channel: string;
  payload: unknown;
}

const envelopeSchema = z.object({
  origin: z.string(),
  channel: z.string(),
  payload: z.unknown(),
});

/** Receives payloads published by other instances */
export type BackplaneHandler = (channel: string, payload: unknown, origin: string) => void;

/** Channel carrying a room's events */
export function roomChannel(roomId: string): string {
  return `room:${roomId}`;
}

/** Channel carrying point-to-point traffic for one connection */
export function connectionChannel(connectionId: string): string {
  return `conn:${connectionId}`;
}

/**
 * Namespaced pub/sub with bounded, retried publishes and a health signal.
 *
 * @example
 * ```typescript
 * const backplane = createBackplane(store, { namespace: 'puzzles' });
 *
 * await backplane.subscribe('room:*', (channel, payload) => {
 *   coordinator.deliverRemote(channel, payload);
 * });
 *
 * backplane.health.subscribe((state) => log.warn('Backplane', { state }));
 * ```
 */
export class BackplaneFanout {
  private readonly store: SharedStore;
  private readonly logger: Logger;
  private readonly namespace: string;
  private readonly publishTimeoutMs: number;
  private readonly publishRetries: number;
  private readonly retryDelayMs: number;
  private readonly health$ = new BehaviorSubject<BackplaneHealth>('healthy');

  /** Identifier stamped on every envelope this instance publishes */
  readonly instanceId: string;

  constructor(store: SharedStore, config: BackplaneConfig = {}) {
    this.store = store;
    this.namespace = config.namespace ?? DEFAULT_CONFIG.namespace;
    this.instanceId = config.instanceId ?? generateInstanceId();
    this.publishTimeoutMs = config.publishTimeoutMs ?? DEFAULT_CONFIG.publishTimeoutMs;
    this.publishRetries = config.publishRetries ?? DEFAULT_CONFIG.publishRetries;
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_CONFIG.retryDelayMs;
    this.logger = config.logger ?? createLogger({ module: 'backplane' });
  }

  /** Health transitions, starting with the current state */
  get health(): Observable<BackplaneHealth> {
    return this.health$.pipe(distinctUntilChanged());
  }

  getHealth(): BackplaneHealth {
    return this.health$.value;
  }

  /**
   * Publish `payload` to every other instance subscribed to `channel`.
   * Never rejects: resolves `false` and marks the backplane degraded once
   * retries are exhausted.
   */
  async publish(channel: string, payload: unknown): Promise<boolean> {
    const envelope: BackplaneEnvelope = { origin: this.instanceId, channel, payload };
    const message = JSON.stringify(envelope);
    const storeChannel = this.qualify(channel);

    try {
      await withRetry(
        () => withTimeout(this.store.publish(storeChannel, message), this.publishTimeoutMs, 'backplane publish'),
        {
          retries: this.publishRetries,
          delayMs: this.retryDelayMs,
          onRetry: (error, attempt) => {
            this.logger.debug('Retrying backplane publish', { channel, attempt, error: error.message });
          },
        }
      );
    } catch (error) {
      this.logger.error('Backplane publish failed; delivering locally only', error, { channel });
      this.health$.next('degraded');
      return false;
    }

    if (this.health$.value === 'degraded') {
      this.logger.info('Backplane recovered');
      this.health$.next('healthy');
    }
    return true;
  }

  /**
   * Subscribe to channels matching `pattern` (e.g. `room:*`). Messages this
   * instance published are not handed back.
   */
  async subscribe(pattern: string, handler: BackplaneHandler): Promise<Unsubscribe> {
    const prefix = `${this.namespace}:`;
    return this.store.psubscribe(this.qualify(pattern), (storeChannel, message) => {
      const envelope = this.decode(storeChannel, message);
      if (!envelope || envelope.origin === this.instanceId) return;
      const channel = storeChannel.startsWith(prefix) ? storeChannel.slice(prefix.length) : storeChannel;
      handler(channel, envelope.payload, envelope.origin);
    });
  }

  destroy(): void {
    this.health$.complete();
  }

  private qualify(channel: string): string {
    return `${this.namespace}:${channel}`;
  }

  private decode(channel: string, message: string): BackplaneEnvelope | null {
    let raw: unknown;
    try {
      raw = JSON.parse(message);
    } catch (error) {
      this.logger.warn('Dropping unparseable backplane message', {
        channel,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Dropping malformed backplane envelope', { channel });
      return null;
    }
    return { origin: parsed.data.origin, channel: parsed.data.channel, payload: parsed.data.payload };
  }
}

/**
 * Create a backplane over a shared store
 */
export function createBackplane(store: SharedStore, config?: BackplaneConfig): BackplaneFanout {
  return new BackplaneFanout(store, config);
}

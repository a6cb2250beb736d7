/**
 * Throttling Pipeline - last-value-wins coalescing for high-frequency streams
 *
 * Each (connection, stream key) pair gets its own stream on first push. On
 * every tick the latest value received since the previous tick is flushed;
 * ticks with nothing new emit nothing. Earlier values are overwritten, so
 * staleness is bounded by one tick and output by one flush per tick.
 *
 * @module throttling-pipeline
 */

import { createLogger, type ConnectionId, type Logger } from '@tessera/core';
import { Subject, sampleTime, takeUntil } from 'rxjs';

/** Throttling pipeline configuration */
export interface ThrottlingPipelineConfig {
  /** Flush tick in ms (default: 100) */
  tickMs?: number;
  logger?: Logger;
}

/** Receives coalesced values */
export type FlushHandler<T> = (connectionId: ConnectionId, streamKey: string, value: T) => void;

interface ConnectionStreams<T> {
  readonly teardown$: Subject<void>;
  readonly streams: Map<string, Subject<T>>;
}

/**
 * @example
 * ```typescript
 * const cursors = createThrottlingPipeline<{ x: number; y: number }>(
 *   (connectionId, stream, position) => broadcastCursor(connectionId, stream, position),
 *   { tickMs: 100 }
 * );
 *
 * cursors.push(connectionId, 'cursor', { x: 10, y: 20 });
 * cursors.teardown(connectionId);
 * ```
 */
export class ThrottlingPipeline<T> {
  private readonly connections = new Map<ConnectionId, ConnectionStreams<T>>();
  private readonly tickMs: number;
  private readonly logger: Logger;
  private readonly onFlush: FlushHandler<T>;

  constructor(onFlush: FlushHandler<T>, config: ThrottlingPipelineConfig = {}) {
    this.onFlush = onFlush;
    this.tickMs = config.tickMs ?? 100;
    this.logger = config.logger ?? createLogger({ module: 'throttle' });
  }

  /** Record the latest value for a stream */
  push(connectionId: ConnectionId, streamKey: string, value: T): void {
    this.streamFor(connectionId, streamKey).next(value);
  }

  /** End every stream of a connection; pending values are dropped */
  teardown(connectionId: ConnectionId): void {
    const entry = this.connections.get(connectionId);
    if (!entry) return;
    this.connections.delete(connectionId);
    entry.teardown$.next();
    entry.teardown$.complete();
    for (const stream of entry.streams.values()) {
      stream.complete();
    }
  }

  dispose(): void {
    for (const connectionId of [...this.connections.keys()]) {
      this.teardown(connectionId);
    }
  }

  /** Number of live streams across all connections */
  get activeStreams(): number {
    let count = 0;
    for (const entry of this.connections.values()) {
      count += entry.streams.size;
    }
    return count;
  }

  private streamFor(connectionId: ConnectionId, streamKey: string): Subject<T> {
    let entry = this.connections.get(connectionId);
    if (!entry) {
      entry = { teardown$: new Subject<void>(), streams: new Map() };
      this.connections.set(connectionId, entry);
    }

    let stream = entry.streams.get(streamKey);
    if (!stream) {
      stream = new Subject<T>();
      entry.streams.set(streamKey, stream);
      stream.pipe(sampleTime(this.tickMs), takeUntil(entry.teardown$)).subscribe((value) => {
        try {
          this.onFlush(connectionId, streamKey, value);
        } catch (error) {
          this.logger.error('Throttled flush failed', error, { connectionId, streamKey });
        }
      });
    }
    return stream;
  }
}

export function createThrottlingPipeline<T>(
  onFlush: FlushHandler<T>,
  config?: ThrottlingPipelineConfig
): ThrottlingPipeline<T> {
  return new ThrottlingPipeline(onFlush, config);
}

/**
 * Cluster-wide directory of live connections
 *
 * Maps a connection id to the instance serving it, with a TTL refreshed on
 * keep-alive so entries of crashed instances age out.
 */

import { createLogger, withTimeout, type ConnectionId, type Logger } from '@tessera/core';
import type { SharedStore } from '@tessera/store';

export interface ConnectionDirectoryConfig {
  namespace?: string;
  instanceId: string;
  /** Entry time-to-live in ms (default: 90000) */
  entryTtlMs?: number;
  storeTimeoutMs?: number;
  logger?: Logger;
}

export class ConnectionDirectory {
  private readonly namespace: string;
  private readonly instanceId: string;
  private readonly entryTtlMs: number;
  private readonly storeTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: SharedStore,
    config: ConnectionDirectoryConfig
  ) {
    this.namespace = config.namespace ?? 'tessera';
    this.instanceId = config.instanceId;
    this.entryTtlMs = config.entryTtlMs ?? 90_000;
    this.storeTimeoutMs = config.storeTimeoutMs ?? 2_000;
    this.logger = config.logger ?? createLogger({ module: 'directory' });
  }

  key(connectionId: ConnectionId): string {
    return `${this.namespace}:conn:${connectionId}`;
  }

  /** Record (or refresh) a local connection; failures are logged only */
  async register(connectionId: ConnectionId): Promise<void> {
    try {
      await withTimeout(
        this.store.set(this.key(connectionId), this.instanceId, this.entryTtlMs),
        this.storeTimeoutMs,
        'directory register'
      );
    } catch (error) {
      this.logger.warn('Failed to record connection in directory', {
        connectionId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async remove(connectionId: ConnectionId): Promise<void> {
    try {
      await withTimeout(
        this.store.deleteIfEqual(this.key(connectionId), this.instanceId),
        this.storeTimeoutMs,
        'directory remove'
      );
    } catch (error) {
      this.logger.warn('Failed to remove connection from directory', {
        connectionId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /** Instance serving `connectionId`, or `null` when unknown or unreachable */
  async lookup(connectionId: ConnectionId): Promise<string | null> {
    try {
      return await withTimeout(this.store.get(this.key(connectionId)), this.storeTimeoutMs, 'directory lookup');
    } catch (error) {
      this.logger.warn('Directory lookup failed', {
        connectionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

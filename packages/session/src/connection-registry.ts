/**
 * Instance-owned registry of local connections
 */

import type { ConnectionId, Identity, MemberInfo, ProtocolVariant, RoomId } from '@tessera/core';
import { ConnectionStateMachine } from './connection-state.js';
import type { Transport } from './transport.js';

/**
 * Everything the coordinator tracks for one local connection
 */
export interface ConnectionRecord {
  readonly id: ConnectionId;
  readonly protocol: ProtocolVariant;
  readonly transport: Transport;
  readonly identity: Identity | null;
  readonly lifecycle: ConnectionStateMachine;
  roomId: RoomId | null;
  joinedAt: number | null;
  readonly connectedAt: number;
  lastActivity: number;
}

/**
 * Identity under which a connection holds edit locks
 */
export function lockHolderOf(record: ConnectionRecord): string {
  return record.identity?.userId ?? record.id;
}

export function memberInfoOf(record: ConnectionRecord): MemberInfo {
  return {
    connectionId: record.id,
    joinedAt: record.joinedAt ?? record.connectedAt,
    ...(record.identity?.userId ? { userId: record.identity.userId } : {}),
    ...(record.identity?.displayName ? { displayName: record.identity.displayName } : {}),
  };
}

export class ConnectionRegistry {
  private readonly connections = new Map<ConnectionId, ConnectionRecord>();

  register(id: ConnectionId, transport: Transport, identity: Identity | null): ConnectionRecord {
    const now = Date.now();
    const record: ConnectionRecord = {
      id,
      protocol: transport.protocol,
      transport,
      identity,
      lifecycle: new ConnectionStateMachine(id),
      roomId: null,
      joinedAt: null,
      connectedAt: now,
      lastActivity: now,
    };
    this.connections.set(id, record);
    return record;
  }

  get(id: ConnectionId): ConnectionRecord | undefined {
    return this.connections.get(id);
  }

  has(id: ConnectionId): boolean {
    return this.connections.has(id);
  }

  /** True while the connection is registered and not torn down */
  isActive(id: ConnectionId): boolean {
    const record = this.connections.get(id);
    return record !== undefined && !record.lifecycle.is('disconnected');
  }

  remove(id: ConnectionId): boolean {
    return this.connections.delete(id);
  }

  values(): ConnectionRecord[] {
    return Array.from(this.connections.values());
  }

  /** Connections idle since before `cutoff` (epoch ms) */
  idleSince(cutoff: number): ConnectionRecord[] {
    return this.values().filter((record) => record.lastActivity < cutoff);
  }

  get size(): number {
    return this.connections.size;
  }
}

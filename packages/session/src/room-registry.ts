/**
 * Room Registry - local membership of broadcast groups
 *
 * A room exists on an instance while it has local members, plus a grace
 * period after the last one leaves. Membership elsewhere in the cluster is
 * only reachable through the backplane.
 *
 * @module room-registry
 */

import { createLogger, type ConnectionId, type Logger, type RoomId } from '@tessera/core';
import { type Observable, Subject } from 'rxjs';

/** Room registry configuration */
export interface RoomRegistryConfig {
  /** How long an empty room is kept, in ms (default: 30000) */
  gracePeriodMs?: number;
  /** How often empty rooms are swept, in ms (default: 10000) */
  sweepIntervalMs?: number;
  logger?: Logger;
}

/** Local state of one room */
export interface RoomState {
  readonly id: RoomId;
  readonly createdAt: number;
  lastActivityAt: number;
  readonly members: Set<ConnectionId>;
  emptySince: number | null;
}

export interface RoomRegistryEvent {
  type: 'room-created' | 'room-removed';
  roomId: RoomId;
  timestamp: number;
}

export class RoomRegistry {
  private readonly rooms = new Map<RoomId, RoomState>();
  private readonly events$ = new Subject<RoomRegistryEvent>();
  private readonly gracePeriodMs: number;
  private readonly sweepIntervalMs: number;
  private readonly logger: Logger;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(config: RoomRegistryConfig = {}) {
    this.gracePeriodMs = config.gracePeriodMs ?? 30_000;
    this.sweepIntervalMs = config.sweepIntervalMs ?? 10_000;
    this.logger = config.logger ?? createLogger({ module: 'rooms' });
  }

  get events(): Observable<RoomRegistryEvent> {
    return this.events$.asObservable();
  }

  /** Start the periodic sweep of empty rooms */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);
    this.sweepTimer.unref?.();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Add a member, creating the room on first use */
  addMember(roomId: RoomId, connectionId: ConnectionId): RoomState {
    const now = Date.now();
    let room = this.rooms.get(roomId);
    if (!room) {
      room = { id: roomId, createdAt: now, lastActivityAt: now, members: new Set(), emptySince: null };
      this.rooms.set(roomId, room);
      this.logger.debug('Room created', { roomId });
      this.events$.next({ type: 'room-created', roomId, timestamp: now });
    }
    room.members.add(connectionId);
    room.lastActivityAt = now;
    room.emptySince = null;
    return room;
  }

  removeMember(roomId: RoomId, connectionId: ConnectionId): void {
    const room = this.rooms.get(roomId);
    if (!room?.members.delete(connectionId)) return;
    room.lastActivityAt = Date.now();
    if (room.members.size === 0) {
      room.emptySince = room.lastActivityAt;
    }
  }

  touch(roomId: RoomId): void {
    const room = this.rooms.get(roomId);
    if (room) {
      room.lastActivityAt = Date.now();
    }
  }

  /** Local members of a room */
  members(roomId: RoomId): ConnectionId[] {
    const room = this.rooms.get(roomId);
    return room ? Array.from(room.members) : [];
  }

  memberCount(roomId: RoomId): number {
    return this.rooms.get(roomId)?.members.size ?? 0;
  }

  get size(): number {
    return this.rooms.size;
  }

  /**
   * Remove rooms that have been empty for longer than the grace period.
   * Returns the removed ids.
   */
  sweep(now: number = Date.now()): RoomId[] {
    const removed: RoomId[] = [];
    for (const room of this.rooms.values()) {
      if (room.emptySince !== null && now - room.emptySince >= this.gracePeriodMs) {
        this.rooms.delete(room.id);
        removed.push(room.id);
        this.events$.next({ type: 'room-removed', roomId: room.id, timestamp: now });
      }
    }
    if (removed.length > 0) {
      this.logger.debug('Swept empty rooms', { count: removed.length });
    }
    return removed;
  }

  destroy(): void {
    this.stop();
    this.rooms.clear();
    this.events$.complete();
  }
}

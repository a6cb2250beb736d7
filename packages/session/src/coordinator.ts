/**
 * Session Coordinator - connections, rooms and room-scoped edits
 *
 * Owns every local connection and its lifecycle, local room membership,
 * and the edit operations that run inside a room. Room events are handed
 * to local members directly and published on the backplane so the other
 * instances deliver them to theirs; events arriving from the backplane are
 * delivered locally only.
 *
 * @module coordinator
 */

import {
  CollabError,
  createLogger,
  createRoomEvent,
  failure,
  generateConnectionId,
  generateId,
  generateInstanceId,
  type ConnectionId,
  type EventOriginator,
  type IceServer,
  type Identity,
  type IdentityResolver,
  type JoinResult,
  type LockResult,
  type Logger,
  type MemberInfo,
  type MetricsSink,
  type OperationFailure,
  type OperationResult,
  type ProtocolVariant,
  type RoomAccessDecision,
  type RoomAccessPolicy,
  type RoomEvent,
  type RoomId,
  type TransportCredentials,
} from '@tessera/core';
import {
  type BackplaneFanout,
  type BackplaneHealth,
  type DistributedLockManager,
  type LockEvent,
  type SharedStore,
  type Unsubscribe,
  createBackplane,
  createLockManager,
  roomChannel,
} from '@tessera/store';
import { type Observable, Subject, type Subscription, skip } from 'rxjs';
import { type RoomBroadcast, parseRoomBroadcast, parseSignalDelivery } from './backplane-messages.js';
import { ConnectionDirectory } from './connection-directory.js';
import {
  type ConnectionRecord,
  ConnectionRegistry,
  lockHolderOf,
  memberInfoOf,
} from './connection-registry.js';
import type { ConnectionState } from './connection-state.js';
import { type RoomRegistryEvent, RoomRegistry } from './room-registry.js';
import { StaticRoomPolicy } from './policies.js';
import { SignalingRelay } from './signaling-relay.js';
import { ThrottlingPipeline } from './throttling-pipeline.js';
import type { Transport } from './transport.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Session coordinator configuration
 */
export interface SessionCoordinatorConfig {
  /** Shared store used for locks, the connection directory and the backplane */
  store: SharedStore;
  /** Key and channel namespace of the deployment */
  namespace?: string;
  /** Identifier of this process */
  instanceId?: string;
  /** Edit lock time-to-live in ms */
  lockTtlMs?: number;
  /** Upper bound for a single store call in ms */
  storeTimeoutMs?: number;
  /** Cursor throttling tick in ms */
  throttleTickMs?: number;
  /** How long an empty room is kept in ms */
  roomGracePeriodMs?: number;
  /** How often empty rooms are swept in ms */
  roomSweepIntervalMs?: number;
  /** Connection directory entry time-to-live in ms */
  directoryTtlMs?: number;
  /** Longest accepted chat message */
  maxChatLength?: number;
  /** Backplane publish attempts after the first */
  publishRetries?: number;
  /** ICE servers handed to clients on join */
  iceServers?: IceServer[];
  roomPolicy?: RoomAccessPolicy;
  identityResolver?: IdentityResolver;
  metrics?: MetricsSink;
  logger?: Logger;
}

export const DEFAULT_COORDINATOR_CONFIG = {
  namespace: 'tessera',
  lockTtlMs: 30_000,
  storeTimeoutMs: 2_000,
  throttleTickMs: 100,
  roomGracePeriodMs: 30_000,
  roomSweepIntervalMs: 10_000,
  directoryTtlMs: 90_000,
  maxChatLength: 1_000,
  publishRetries: 2,
} as const;

/** Options for {@link SessionCoordinator.connect} */
export interface ConnectOptions {
  /** Credentials from the transport handshake, resolved through the identity resolver */
  credentials?: TransportCredentials;
  /** Already resolved identity; skips the resolver */
  identity?: Identity | null;
}

/** Position carried by cursor streams */
export interface CursorPosition {
  x: number;
  y: number;
}

/** Payload of {@link SessionCoordinator.moveObject} */
export interface ObjectMove {
  objectId: string;
  x: number;
  y: number;
  rotation?: number;
}

/**
 * Lifecycle notifications for observers outside the delivery path
 */
export type CoordinatorEvent =
  | { type: 'connection-opened'; connectionId: ConnectionId; protocol: ProtocolVariant; timestamp: number }
  | { type: 'connection-closed'; connectionId: ConnectionId; reason: string; timestamp: number }
  | { type: 'degraded' | 'recovered'; timestamp: number }
  | LockEvent
  | RoomRegistryEvent;

type Membership = { ok: true; record: ConnectionRecord; roomId: RoomId } | OperationFailure;

const DENIAL_CODES = {
  closed: 'ROOM_UNAVAILABLE',
  full: 'ROOM_FULL',
  forbidden: 'FORBIDDEN',
} as const;

function originatorOf(record: ConnectionRecord): EventOriginator {
  return {
    connectionId: record.id,
    ...(record.identity ? { userId: record.identity.userId } : {}),
    ...(record.identity?.displayName ? { displayName: record.identity.displayName } : {}),
  };
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

/**
 * @example
 * ```typescript
 * const coordinator = createSessionCoordinator({ store: createMemoryStore() });
 * await coordinator.start();
 *
 * const connectionId = await coordinator.connect(transport);
 * const joined = await coordinator.joinRoom(connectionId, 'puzzle-42');
 * if (!joined.ok) {
 *   transport.send({ type: 'error', command: 'join', ...joined.error });
 * }
 * ```
 */
export class SessionCoordinator {
  readonly instanceId: string;
  readonly locks: DistributedLockManager;
  readonly backplane: BackplaneFanout;
  readonly relay: SignalingRelay;

  private readonly connections = new ConnectionRegistry();
  private readonly rooms: RoomRegistry;
  private readonly directory: ConnectionDirectory;
  private readonly throttle: ThrottlingPipeline<CursorPosition>;
  private readonly roomPolicy: RoomAccessPolicy;
  private readonly identityResolver: IdentityResolver | undefined;
  private readonly metrics: MetricsSink | undefined;
  private readonly iceServers: IceServer[] | undefined;
  private readonly maxChatLength: number;
  private readonly logger: Logger;

  private readonly events$ = new Subject<CoordinatorEvent>();
  private readonly subscriptions: Subscription[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly leaving = new Map<ConnectionId, Promise<void>>();
  private readonly closing = new Map<ConnectionId, Promise<void>>();
  private readonly joining = new Map<ConnectionId, Promise<void>>();
  private readonly grantedSeats = new Map<RoomId, number>();
  private backplaneSubscriptions: Unsubscribe[] = [];
  private started = false;
  private starting: Promise<void> | null = null;
  private draining = false;

  constructor(config: SessionCoordinatorConfig) {
    const settings = {
      namespace: config.namespace ?? DEFAULT_COORDINATOR_CONFIG.namespace,
      lockTtlMs: config.lockTtlMs ?? DEFAULT_COORDINATOR_CONFIG.lockTtlMs,
      storeTimeoutMs: config.storeTimeoutMs ?? DEFAULT_COORDINATOR_CONFIG.storeTimeoutMs,
      throttleTickMs: config.throttleTickMs ?? DEFAULT_COORDINATOR_CONFIG.throttleTickMs,
      roomGracePeriodMs: config.roomGracePeriodMs ?? DEFAULT_COORDINATOR_CONFIG.roomGracePeriodMs,
      roomSweepIntervalMs: config.roomSweepIntervalMs ?? DEFAULT_COORDINATOR_CONFIG.roomSweepIntervalMs,
      directoryTtlMs: config.directoryTtlMs ?? DEFAULT_COORDINATOR_CONFIG.directoryTtlMs,
      maxChatLength: config.maxChatLength ?? DEFAULT_COORDINATOR_CONFIG.maxChatLength,
      publishRetries: config.publishRetries ?? DEFAULT_COORDINATOR_CONFIG.publishRetries,
    };
    this.instanceId = config.instanceId ?? generateInstanceId();
    this.logger = config.logger ?? createLogger({ module: 'coordinator' });
    this.metrics = config.metrics;
    this.iceServers = config.iceServers;
    this.maxChatLength = settings.maxChatLength;
    this.roomPolicy = config.roomPolicy ?? new StaticRoomPolicy();
    this.identityResolver = config.identityResolver;

    this.locks = createLockManager(config.store, {
      namespace: settings.namespace,
      lockTtlMs: settings.lockTtlMs,
      storeTimeoutMs: settings.storeTimeoutMs,
      logger: this.logger.child('locks'),
    });
    this.backplane = createBackplane(config.store, {
      namespace: settings.namespace,
      instanceId: this.instanceId,
      publishTimeoutMs: settings.storeTimeoutMs,
      publishRetries: settings.publishRetries,
      logger: this.logger.child('backplane'),
    });
    this.directory = new ConnectionDirectory(config.store, {
      namespace: settings.namespace,
      instanceId: this.instanceId,
      entryTtlMs: settings.directoryTtlMs,
      storeTimeoutMs: settings.storeTimeoutMs,
      logger: this.logger.child('directory'),
    });
    this.rooms = new RoomRegistry({
      gracePeriodMs: settings.roomGracePeriodMs,
      sweepIntervalMs: settings.roomSweepIntervalMs,
      logger: this.logger.child('rooms'),
    });
    this.throttle = new ThrottlingPipeline<CursorPosition>(
      (connectionId, stream, position) => this.flushCursor(connectionId, stream, position),
      { tickMs: settings.throttleTickMs, logger: this.logger.child('throttle') }
    );
    this.relay = new SignalingRelay({
      registry: this.connections,
      directory: this.directory,
      backplane: this.backplane,
      metrics: this.metrics,
      logger: this.logger.child('signaling'),
    });

    this.subscriptions.push(
      this.locks.events.subscribe((event) => this.events$.next(event)),
      this.rooms.events.subscribe((event) => this.events$.next(event)),
      this.backplane.health.pipe(skip(1)).subscribe((health: BackplaneHealth) => {
        this.events$.next({ type: health === 'degraded' ? 'degraded' : 'recovered', timestamp: Date.now() });
      })
    );
  }

  /** Lifecycle notifications */
  get events(): Observable<CoordinatorEvent> {
    return this.events$.asObservable();
  }

  get isDraining(): boolean {
    return this.draining;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Subscribe to the backplane and start sweeping empty rooms */
  async start(): Promise<void> {
    if (this.started) return;
    if (!this.starting) {
      this.starting = this.subscribeBackplane().finally(() => {
        this.starting = null;
      });
    }
    await this.starting;
  }

  /**
   * Shut down: refuse new connections, let in-flight broadcasts finish,
   * leave the backplane, then disconnect every local connection.
   */
  async drain(reason = 'server-shutdown'): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    this.logger.info('Draining coordinator', { connections: this.connections.size });

    await this.settleInFlight();
    await Promise.all(this.backplaneSubscriptions.map((unsubscribe) => unsubscribe()));
    this.backplaneSubscriptions = [];

    await Promise.all(
      this.connections.values().map(async (record) => {
        try {
          record.transport.close(1001, 'Server shutting down');
        } catch (error) {
          this.logger.debug('Transport close failed during drain', {
            connectionId: record.id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
        await this.disconnect(record.id, reason);
      })
    );
    await this.settleInFlight();

    this.throttle.dispose();
    this.rooms.destroy();
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.locks.destroy();
    this.backplane.destroy();
    this.events$.complete();
    this.logger.info('Coordinator drained');
  }

  // ---------------------------------------------------------------------------
  // Connections
  // ---------------------------------------------------------------------------

  /** Register a new connection */
  async connect(transport: Transport, options: ConnectOptions = {}): Promise<ConnectionId> {
    if (this.draining) {
      throw new CollabError({ code: 'SERVER_DRAINING' });
    }

    const identity = options.identity !== undefined ? options.identity : await this.resolveIdentity(options.credentials);
    const connectionId = generateConnectionId();
    this.connections.register(connectionId, transport, identity);
    await this.directory.register(connectionId);

    this.logger.debug('Connection opened', { connectionId, protocol: transport.protocol });
    this.metrics?.increment('connections.opened', { protocol: transport.protocol });
    this.events$.next({
      type: 'connection-opened',
      connectionId,
      protocol: transport.protocol,
      timestamp: Date.now(),
    });
    return connectionId;
  }

  /**
   * Tear a connection down: leave its room (releasing its locks), drop its
   * streams and forget it. Safe to call repeatedly.
   */
  disconnect(connectionId: ConnectionId, reason = 'closed'): Promise<void> {
    const pending = this.closing.get(connectionId);
    if (pending) return pending;

    const record = this.connections.get(connectionId);
    if (!record || record.lifecycle.is('disconnected')) return Promise.resolve();

    const task = this.performDisconnect(record, reason).finally(() => {
      this.closing.delete(connectionId);
    });
    this.closing.set(connectionId, task);
    return task;
  }

  /** Record activity on a connection */
  touch(connectionId: ConnectionId): void {
    const record = this.connections.get(connectionId);
    if (record) {
      record.lastActivity = Date.now();
    }
  }

  /** Refresh directory entries of every local connection */
  async refreshPresence(): Promise<void> {
    await Promise.all(this.connections.values().map((record) => this.directory.register(record.id)));
  }

  /** Connections with no activity since `cutoff` (epoch ms) */
  idleConnections(cutoff: number): ConnectionId[] {
    return this.connections.idleSince(cutoff).map((record) => record.id);
  }

  getConnection(connectionId: ConnectionId): ConnectionRecord | undefined {
    return this.connections.get(connectionId);
  }

  getConnectionState(connectionId: ConnectionId): ConnectionState | null {
    return this.connections.get(connectionId)?.lifecycle.state ?? null;
  }

  // ---------------------------------------------------------------------------
  // Rooms
  // ---------------------------------------------------------------------------

  /**
   * Join `roomId`, leaving the current room first. Resolves with the local
   * members (including the caller) or a structured refusal.
   */
  joinRoom(connectionId: ConnectionId, roomId: RoomId): Promise<JoinResult> {
    const previous = this.joining.get(connectionId) ?? Promise.resolve();
    const task = previous.then(() => this.performJoin(connectionId, roomId));
    const settled = task.then(
      () => undefined,
      () => undefined
    );
    this.joining.set(connectionId, settled);
    void settled.then(() => {
      if (this.joining.get(connectionId) === settled) {
        this.joining.delete(connectionId);
      }
    });
    return task;
  }

  /**
   * Leave the current room: announce the departure, release the locks held
   * under this connection's identity and end its throttled streams.
   * Released locks are announced to the room being left, whichever room
   * last moved the object. Idempotent.
   */
  leaveRoom(connectionId: ConnectionId, reason = 'left'): Promise<void> {
    const pending = this.leaving.get(connectionId);
    if (pending) return pending;

    const record = this.connections.get(connectionId);
    if (!record?.lifecycle.is('joined')) return Promise.resolve();

    const task = this.performLeave(record, reason, 'connecting').finally(() => {
      this.leaving.delete(connectionId);
    });
    this.leaving.set(connectionId, task);
    return task;
  }

  private async performJoin(connectionId: ConnectionId, roomId: RoomId): Promise<JoinResult> {
    const record = this.connections.get(connectionId);
    if (!record || record.lifecycle.is('disconnected')) {
      return failure('NOT_CONNECTED');
    }
    if (this.draining) {
      return failure('SERVER_DRAINING');
    }
    if (record.roomId === roomId && record.lifecycle.is('joined')) {
      return this.joinedResult(roomId);
    }

    const decision = await this.claimSeat(roomId, record);
    if (!decision.allowed) {
      this.metrics?.increment('rooms.join_denied', { reason: decision.reason });
      return failure(DENIAL_CODES[decision.reason], decision.message);
    }

    try {
      if (record.roomId !== null) {
        await this.leaveRoom(connectionId, 'switched-room');
      }
      if (!record.lifecycle.is('connecting')) {
        return failure('NOT_CONNECTED');
      }
      return this.admit(record, roomId);
    } finally {
      this.adjustGrantedSeats(roomId, -1);
    }
  }

  private admit(record: ConnectionRecord, roomId: RoomId): JoinResult {
    const connectionId = record.id;

    const joinedAt = Date.now();
    record.lifecycle.transition('joined');
    record.roomId = roomId;
    record.joinedAt = joinedAt;
    record.lastActivity = joinedAt;
    this.rooms.addMember(roomId, connectionId);

    this.logger.debug('Connection joined room', { connectionId, roomId });
    this.metrics?.increment('rooms.joined');
    this.broadcast(roomId, createRoomEvent('user-joined', roomId, originatorOf(record), { joinedAt }, joinedAt), [
      connectionId,
    ]);
    return this.joinedResult(roomId);
  }

  /** Local members of a room */
  getMembers(roomId: RoomId): MemberInfo[] {
    const members: MemberInfo[] = [];
    for (const connectionId of this.rooms.members(roomId)) {
      const record = this.connections.get(connectionId);
      if (record) members.push(memberInfoOf(record));
    }
    return members;
  }

  // ---------------------------------------------------------------------------
  // Delivery
  // ---------------------------------------------------------------------------

  /**
   * Deliver to local members and publish for the other instances. Does not
   * wait for the publish; failures degrade to local-only delivery.
   */
  broadcast(roomId: RoomId, event: RoomEvent, exclude: readonly ConnectionId[] = []): void {
    this.deliverLocal(roomId, event, exclude);
    this.rooms.touch(roomId);

    const payload: RoomBroadcast = { type: 'room-event', event, exclude: [...exclude] };
    const publish: Promise<void> = this.backplane
      .publish(roomChannel(roomId), payload)
      .then((published) => {
        if (!published) this.metrics?.increment('backplane.publish_failed');
      })
      .finally(() => {
        this.inFlight.delete(publish);
      });
    this.inFlight.add(publish);
  }

  /** Deliver to local members only; never publishes. Returns the number reached. */
  deliverLocal(roomId: RoomId, event: RoomEvent, exclude: readonly ConnectionId[] = []): number {
    let delivered = 0;
    for (const connectionId of this.rooms.members(roomId)) {
      if (exclude.includes(connectionId)) continue;
      const record = this.connections.get(connectionId);
      if (!record) continue;

      try {
        record.transport.send({ type: 'event', event });
        delivered++;
      } catch (error) {
        this.logger.warn('Transport send failed; closing connection', {
          connectionId,
          error: error instanceof Error ? error.message : String(error),
        });
        this.disconnect(connectionId, 'transport-error').catch((disconnectError: unknown) => {
          this.logger.error('Cleanup after transport failure failed', disconnectError, { connectionId });
        });
      }
    }
    return delivered;
  }

  // ---------------------------------------------------------------------------
  // Edit operations
  // ---------------------------------------------------------------------------

  async lockObject(connectionId: ConnectionId, objectId: string): Promise<LockResult> {
    const member = this.requireMember(connectionId);
    if (!member.ok) return member;

    const attempt = await this.locks.acquire(objectId, lockHolderOf(member.record));
    if (!attempt.acquired) {
      return attempt.reason === 'busy'
        ? failure('LOCK_BUSY', `Object ${objectId} is locked by another participant`)
        : failure('LOCK_UNAVAILABLE');
    }

    this.broadcast(
      member.roomId,
      createRoomEvent('object-locked', member.roomId, originatorOf(member.record), {
        objectId,
        expiresAt: attempt.expiresAt,
      }),
      [connectionId]
    );
    return { ok: true, objectId, expiresAt: attempt.expiresAt };
  }

  async unlockObject(connectionId: ConnectionId, objectId: string): Promise<OperationResult> {
    const member = this.requireMember(connectionId);
    if (!member.ok) return member;

    if (!(await this.locks.release(objectId, lockHolderOf(member.record)))) {
      return failure('LOCK_NOT_HELD');
    }

    this.broadcast(
      member.roomId,
      createRoomEvent('object-unlocked', member.roomId, originatorOf(member.record), { objectId }),
      [connectionId]
    );
    return { ok: true };
  }

  /** Move an object; the caller must hold its lock */
  async moveObject(connectionId: ConnectionId, move: ObjectMove): Promise<OperationResult> {
    const member = this.requireMember(connectionId);
    if (!member.ok) return member;

    const holder = await this.locks.getHolder(move.objectId);
    if (holder !== lockHolderOf(member.record)) {
      return failure('LOCK_REQUIRED');
    }

    this.broadcast(
      member.roomId,
      createRoomEvent('object-moved', member.roomId, originatorOf(member.record), {
        objectId: move.objectId,
        x: move.x,
        y: move.y,
        rotation: move.rotation ?? 0,
      }),
      [connectionId]
    );
    return { ok: true };
  }

  /** Send a chat message to everyone in the room, sender included */
  sendChat(connectionId: ConnectionId, text: string): OperationResult {
    const member = this.requireMember(connectionId);
    if (!member.ok) return member;

    const trimmed = text.trim();
    if (trimmed.length === 0 || trimmed.length > this.maxChatLength) {
      return failure('INVALID_MESSAGE', `Message must be between 1 and ${this.maxChatLength} characters`);
    }

    this.broadcast(
      member.roomId,
      createRoomEvent('chat-message', member.roomId, originatorOf(member.record), {
        messageId: generateId(),
        text: trimmed,
      })
    );
    return { ok: true };
  }

  /** Queue a cursor position; at most one per tick reaches the room */
  updateCursor(connectionId: ConnectionId, position: CursorPosition, stream = 'cursor'): OperationResult {
    const member = this.requireMember(connectionId);
    if (!member.ok) return member;

    this.throttle.push(connectionId, stream, position);
    return { ok: true };
  }

  /** Broadcast a named application event to the other room members */
  emitCustom(connectionId: ConnectionId, name: string, data?: unknown): OperationResult {
    const member = this.requireMember(connectionId);
    if (!member.ok) return member;

    this.broadcast(
      member.roomId,
      createRoomEvent('custom', member.roomId, originatorOf(member.record), {
        name,
        ...(data !== undefined ? { data } : {}),
      }),
      [connectionId]
    );
    return { ok: true };
  }

  getStats(): {
    connections: number;
    rooms: number;
    activeStreams: number;
    backplane: BackplaneHealth;
    draining: boolean;
  } {
    return {
      connections: this.connections.size,
      rooms: this.rooms.size,
      activeStreams: this.throttle.activeStreams,
      backplane: this.backplane.getHealth(),
      draining: this.draining,
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private requireMember(connectionId: ConnectionId): Membership {
    const record = this.connections.get(connectionId);
    if (!record || record.lifecycle.is('disconnected')) {
      return failure('NOT_CONNECTED');
    }
    if (record.roomId === null || !record.lifecycle.is('joined')) {
      return failure('NOT_IN_ROOM');
    }
    record.lastActivity = Date.now();
    return { ok: true, record, roomId: record.roomId };
  }

  private joinedResult(roomId: RoomId): JoinResult {
    return {
      ok: true,
      roomId,
      members: this.getMembers(roomId),
      ...(this.iceServers ? { iceServers: this.iceServers } : {}),
    };
  }

  /**
   * Ask the room policy for a seat. An allowed decision holds a granted
   * seat, which the caller gives back once the connection is admitted or
   * the join is abandoned.
   */
  private async claimSeat(roomId: RoomId, record: ConnectionRecord): Promise<RoomAccessDecision> {
    try {
      for (;;) {
        const occupancy = this.occupancy(roomId);
        const decision = await this.roomPolicy.check(roomId, record.identity, occupancy);
        if (!decision.allowed) return decision;
        // Ask again if another join took a seat while the policy was consulted
        if (this.occupancy(roomId) === occupancy) {
          this.adjustGrantedSeats(roomId, 1);
          return decision;
        }
      }
    } catch (error) {
      this.logger.error('Room access check failed', error, { roomId, connectionId: record.id });
      return { allowed: false, reason: 'closed', message: 'Room availability could not be verified' };
    }
  }

  /** Members plus joins that were granted a seat but are not yet admitted */
  private occupancy(roomId: RoomId): number {
    return this.rooms.memberCount(roomId) + (this.grantedSeats.get(roomId) ?? 0);
  }

  private adjustGrantedSeats(roomId: RoomId, delta: number): void {
    const seats = (this.grantedSeats.get(roomId) ?? 0) + delta;
    if (seats > 0) {
      this.grantedSeats.set(roomId, seats);
    } else {
      this.grantedSeats.delete(roomId);
    }
  }

  private async resolveIdentity(credentials: TransportCredentials | undefined): Promise<Identity | null> {
    if (!this.identityResolver || !credentials) return null;
    try {
      return await this.identityResolver.resolve(credentials);
    } catch (error) {
      throw new CollabError({
        code: 'FORBIDDEN',
        message: 'Could not verify credentials',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private async performLeave(
    record: ConnectionRecord,
    reason: string,
    next: Extract<ConnectionState, 'connecting' | 'disconnected'>
  ): Promise<void> {
    const roomId = record.roomId;
    if (roomId === null) return;

    record.lifecycle.transition('leaving');
    this.rooms.removeMember(roomId, record.id);
    record.roomId = null;
    record.joinedAt = null;
    this.throttle.teardown(record.id);

    const originator = originatorOf(record);
    this.broadcast(roomId, createRoomEvent('user-left', roomId, originator, { reason }), [record.id]);

    const holderId = lockHolderOf(record);
    if (!this.holderStillPresent(holderId, record.id)) {
      const released = await this.locks.releaseAllFor(holderId);
      for (const objectId of released) {
        this.broadcast(roomId, createRoomEvent('object-unlocked', roomId, originator, { objectId }));
      }
    }

    record.lifecycle.transition(next);
    this.logger.debug('Connection left room', { connectionId: record.id, roomId, reason });
  }

  /** Another local connection of the same user still sits in a room */
  private holderStillPresent(holderId: string, exceptConnectionId: ConnectionId): boolean {
    return this.connections
      .values()
      .some(
        (other) =>
          other.id !== exceptConnectionId && other.lifecycle.is('joined') && lockHolderOf(other) === holderId
      );
  }

  private async performDisconnect(record: ConnectionRecord, reason: string): Promise<void> {
    const pendingLeave = this.leaving.get(record.id);
    if (pendingLeave) {
      await pendingLeave;
    }

    if (record.lifecycle.is('joined')) {
      await this.performLeave(record, reason, 'disconnected');
    } else if (!record.lifecycle.is('disconnected')) {
      record.lifecycle.transition('disconnected');
    }

    this.throttle.teardown(record.id);
    this.connections.remove(record.id);
    await this.directory.remove(record.id);

    this.logger.debug('Connection closed', { connectionId: record.id, reason });
    this.metrics?.increment('connections.closed', { reason });
    this.events$.next({ type: 'connection-closed', connectionId: record.id, reason, timestamp: Date.now() });
  }

  private flushCursor(connectionId: ConnectionId, stream: string, position: CursorPosition): void {
    const record = this.connections.get(connectionId);
    if (!record?.roomId || !record.lifecycle.is('joined')) return;
    this.broadcast(
      record.roomId,
      createRoomEvent('cursor-update', record.roomId, originatorOf(record), { stream, x: position.x, y: position.y }),
      [connectionId]
    );
  }

  private handleRoomTraffic(channel: string, payload: unknown): void {
    const message = parseRoomBroadcast(payload);
    if (!message || roomChannel(message.event.roomId) !== channel) {
      this.logger.warn('Dropping malformed room traffic', { channel });
      return;
    }
    this.deliverLocal(message.event.roomId, message.event, message.exclude);
  }

  private handleConnectionTraffic(channel: string, payload: unknown): void {
    const message = parseSignalDelivery(payload);
    if (!message) {
      this.logger.warn('Dropping malformed connection traffic', { channel });
      return;
    }
    this.relay.deliverLocal(message.signal);
  }

  private async subscribeBackplane(): Promise<void> {
    const subscriptions: Unsubscribe[] = [];
    try {
      subscriptions.push(
        await this.backplane.subscribe('room:*', (channel, payload) => this.handleRoomTraffic(channel, payload))
      );
      subscriptions.push(
        await this.backplane.subscribe('conn:*', (channel, payload) => this.handleConnectionTraffic(channel, payload))
      );
    } catch (error) {
      await Promise.allSettled(subscriptions.map((unsubscribe) => unsubscribe()));
      throw error;
    }

    this.backplaneSubscriptions = subscriptions;
    this.started = true;
    this.rooms.start();
    this.logger.info('Coordinator started', { instanceId: this.instanceId });
  }

  private async settleInFlight(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }
}

/**
 * Create a session coordinator
 */
export function createSessionCoordinator(config: SessionCoordinatorConfig): SessionCoordinator {
  return new SessionCoordinator(config);
}

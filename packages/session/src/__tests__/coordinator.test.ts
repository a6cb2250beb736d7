import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CollabError, type Identity, type JoinResult, type OperationResult } from '@tessera/core';
import { MemoryStore } from '@tessera/store';
import { SessionCoordinator, type CoordinatorEvent, type SessionCoordinatorConfig } from '../coordinator.js';
import { StaticIdentityResolver, StaticRoomPolicy } from '../policies.js';
import { FakeTransport, flush } from './helpers.js';

interface Participant {
  id: string;
  transport: FakeTransport;
}

function expectCode(result: OperationResult | JoinResult, code: string): void {
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.code).toBe(code);
  }
}

describe('SessionCoordinator', () => {
  let store: MemoryStore;
  let nodes: SessionCoordinator[];

  function createNode(config: Partial<SessionCoordinatorConfig> = {}): SessionCoordinator {
    const node = new SessionCoordinator({ store, publishRetries: 0, ...config });
    nodes.push(node);
    return node;
  }

  async function connect(node: SessionCoordinator, identity?: Identity): Promise<Participant> {
    const transport = new FakeTransport();
    const id = await node.connect(transport, identity ? { identity } : {});
    return { id, transport };
  }

  async function join(node: SessionCoordinator, roomId: string, identity?: Identity): Promise<Participant> {
    const participant = await connect(node, identity);
    const result = await node.joinRoom(participant.id, roomId);
    expect(result.ok).toBe(true);
    return participant;
  }

  beforeEach(() => {
    store = new MemoryStore();
    nodes = [];
  });

  afterEach(async () => {
    await Promise.all(nodes.map((node) => node.drain()));
    await store.close();
    vi.useRealTimers();
  });

  describe('connections', () => {
    it('should register connections in the connecting state', async () => {
      const node = createNode();
      const a = await connect(node);

      expect(a.id).toMatch(/^c_[0-9a-f]{32}$/);
      expect(node.getConnectionState(a.id)).toBe('connecting');
      expect(node.getStats().connections).toBe(1);
    });

    it('should resolve identities from credentials', async () => {
      const node = createNode({
        identityResolver: new StaticIdentityResolver({ 'test-token': { userId: 'u1', displayName: 'Ada' } }),
      });
      const id = await node.connect(new FakeTransport(), { credentials: { token: 'test-token' } });
      expect(node.getConnection(id)?.identity).toEqual({ userId: 'u1', displayName: 'Ada' });
    });

    it('should refuse connections when the resolver fails', async () => {
      const node = createNode({
        identityResolver: {
          resolve: () => Promise.reject(new Error('provider down')),
        },
      });

      await expect(node.connect(new FakeTransport(), { credentials: { token: 'test-token' } })).rejects.toSatisfy(
        (error: unknown) => CollabError.isCode(error, 'FORBIDDEN')
      );
    });

    it('should emit connection lifecycle events', async () => {
      const node = createNode();
      const events: CoordinatorEvent['type'][] = [];
      node.events.subscribe((event) => events.push(event.type));

      const a = await connect(node);
      await node.disconnect(a.id, 'client-closed');

      expect(events).toEqual(['connection-opened', 'connection-closed']);
    });

    it('should make disconnect idempotent', async () => {
      const node = createNode();
      const a = await join(node, 'r1');

      await Promise.all([node.disconnect(a.id), node.disconnect(a.id)]);
      await node.disconnect(a.id);

      expect(node.getConnectionState(a.id)).toBeNull();
      expect(node.getStats().connections).toBe(0);
    });

    it('should report idle connections', async () => {
      const node = createNode();
      const a = await connect(node);
      const cutoff = Date.now() + 1;

      expect(node.idleConnections(cutoff)).toEqual([a.id]);
      expect(node.idleConnections(cutoff - 60_000)).toEqual([]);
    });
  });

  describe('rooms', () => {
    it('should return the local members on join', async () => {
      const node = createNode({ iceServers: [{ urls: ['stun:stun.example.test:3478'] }] });
      const a = await join(node, 'r1', { userId: 'u1' });
      const b = await connect(node);

      const result = await node.joinRoom(b.id, 'r1');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.roomId).toBe('r1');
        expect(result.members.map((m) => m.connectionId)).toEqual([a.id, b.id]);
        expect(result.members[0]?.userId).toBe('u1');
        expect(result.iceServers).toEqual([{ urls: ['stun:stun.example.test:3478'] }]);
      }
      expect(node.getConnectionState(b.id)).toBe('joined');
    });

    it('should announce joins to the other members only', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      const joined = a.transport.events('user-joined');
      expect(joined).toHaveLength(1);
      expect(joined[0]?.originator.connectionId).toBe(b.id);
      expect(b.transport.events('user-joined')).toEqual([]);
    });

    it('should treat joining the current room as a no-op', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      const again = await node.joinRoom(b.id, 'r1');

      expect(again.ok).toBe(true);
      expect(a.transport.events('user-joined')).toHaveLength(1);
    });

    it('should refuse closed rooms with ROOM_UNAVAILABLE', async () => {
      const node = createNode({ roomPolicy: new StaticRoomPolicy({ closedRooms: ['closed'] }) });
      const a = await connect(node);

      const result = await node.joinRoom(a.id, 'closed');

      expectCode(result, 'ROOM_UNAVAILABLE');
      if (!result.ok) {
        expect(result.error.message).toBe('Room closed is closed');
      }
      expect(node.getConnectionState(a.id)).toBe('connecting');
    });

    it('should refuse full rooms with ROOM_FULL', async () => {
      const node = createNode({ roomPolicy: new StaticRoomPolicy({ maxMembers: 1 }) });
      await join(node, 'r1');
      const b = await connect(node);

      expectCode(await node.joinRoom(b.id, 'r1'), 'ROOM_FULL');
    });

    it('should seat only one of two concurrent joins to a room with one place left', async () => {
      const node = createNode({ roomPolicy: new StaticRoomPolicy({ maxMembers: 1 }) });
      const a = await connect(node);
      const b = await connect(node);

      const results = await Promise.all([node.joinRoom(a.id, 'r1'), node.joinRoom(b.id, 'r1')]);

      expect(results.map((result) => result.ok)).toEqual([true, false]);
      expectCode(results[1], 'ROOM_FULL');
      expect(node.getMembers('r1').map((m) => m.connectionId)).toEqual([a.id]);
      expect(node.getConnectionState(b.id)).toBe('connecting');
    });

    it('should apply repeated joins from one connection in order', async () => {
      const node = createNode();
      const b = await join(node, 'r1');
      const a = await connect(node);

      const first = node.joinRoom(a.id, 'r1');
      const second = node.joinRoom(a.id, 'r1');
      expect((await first).ok).toBe(true);
      expect((await node.lockObject(a.id, 'p1')).ok).toBe(true);
      expect((await second).ok).toBe(true);

      expect(b.transport.events('user-joined')).toHaveLength(1);
      expect(b.transport.events('user-left')).toEqual([]);
      expect(b.transport.events('object-unlocked')).toEqual([]);
      expect(await node.locks.getHolder('p1')).toBe(a.id);
    });

    it('should refuse anonymous joins with FORBIDDEN when identity is required', async () => {
      const node = createNode({ roomPolicy: new StaticRoomPolicy({ requireIdentity: true }) });
      const anonymous = await connect(node);
      const known = await connect(node, { userId: 'u1' });

      expectCode(await node.joinRoom(anonymous.id, 'r1'), 'FORBIDDEN');
      expect((await node.joinRoom(known.id, 'r1')).ok).toBe(true);
    });

    it('should refuse joins of unknown connections', async () => {
      const node = createNode();
      expectCode(await node.joinRoom('c_missing', 'r1'), 'NOT_CONNECTED');
    });

    it('should leave the current room when switching', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      expect((await node.joinRoom(b.id, 'r2')).ok).toBe(true);

      expect(node.getMembers('r1').map((m) => m.connectionId)).toEqual([a.id]);
      expect(node.getMembers('r2').map((m) => m.connectionId)).toEqual([b.id]);
      const left = a.transport.events('user-left');
      expect(left).toHaveLength(1);
      expect(left[0]?.payload).toEqual({ reason: 'switched-room' });
    });

    it('should return to connecting after leaving', async () => {
      const node = createNode();
      const a = await join(node, 'r1');

      await Promise.all([node.leaveRoom(a.id), node.leaveRoom(a.id)]);

      expect(node.getConnectionState(a.id)).toBe('connecting');
      expect(node.getMembers('r1')).toEqual([]);
      expectCode(node.sendChat(a.id, 'hello'), 'NOT_IN_ROOM');
    });
  });

  describe('room operations', () => {
    it('should deliver chat to every member including the sender', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      expect(node.sendChat(a.id, '  hello there  ').ok).toBe(true);

      for (const participant of [a, b]) {
        const chat = participant.transport.events('chat-message');
        expect(chat).toHaveLength(1);
        expect(chat[0]?.payload).toMatchObject({ text: 'hello there' });
        expect(chat[0]?.originator.connectionId).toBe(a.id);
      }
    });

    it('should reject empty and oversized chat messages', async () => {
      const node = createNode({ maxChatLength: 5 });
      const a = await join(node, 'r1');

      expectCode(node.sendChat(a.id, '   '), 'INVALID_MESSAGE');
      expectCode(node.sendChat(a.id, 'toolong'), 'INVALID_MESSAGE');
      expect(node.sendChat(a.id, 'short').ok).toBe(true);
      expect(a.transport.events('chat-message')).toHaveLength(1);
    });

    it('should keep the default chat limit when the option is left undefined', async () => {
      const node = createNode({ maxChatLength: undefined });
      const a = await join(node, 'r1');

      expectCode(node.sendChat(a.id, 'x'.repeat(1_001)), 'INVALID_MESSAGE');
      expect(node.sendChat(a.id, 'x'.repeat(1_000)).ok).toBe(true);
    });

    it('should reject operations from connections outside a room', async () => {
      const node = createNode();
      const a = await connect(node);

      expectCode(node.sendChat(a.id, 'hi'), 'NOT_IN_ROOM');
      expectCode(await node.lockObject(a.id, 'p1'), 'NOT_IN_ROOM');
      expectCode(node.emitCustom('c_missing', 'wave'), 'NOT_CONNECTED');
    });

    it('should broadcast custom events to the other members', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      node.emitCustom(a.id, 'wave', { hand: 'left' });

      expect(a.transport.events('custom')).toEqual([]);
      expect(b.transport.events('custom')[0]?.payload).toEqual({ name: 'wave', data: { hand: 'left' } });
    });
  });

  describe('locks', () => {
    it('should hand an object to one participant at a time', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      expect((await node.lockObject(a.id, 'p1')).ok).toBe(true);
      expectCode(await node.lockObject(b.id, 'p1'), 'LOCK_BUSY');

      expect((await node.unlockObject(a.id, 'p1')).ok).toBe(true);
      expect((await node.lockObject(b.id, 'p1')).ok).toBe(true);
      expect(await node.locks.getHolder('p1')).toBe(b.id);
    });

    it('should announce lock changes to the other members', async () => {
      const node = createNode({ lockTtlMs: 5_000 });
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      const locked = await node.lockObject(a.id, 'p1');
      await node.unlockObject(a.id, 'p1');

      const lockEvents = b.transport.events('object-locked');
      expect(lockEvents).toHaveLength(1);
      if (locked.ok) {
        expect(lockEvents[0]?.payload).toEqual({ objectId: 'p1', expiresAt: locked.expiresAt });
      }
      expect(b.transport.events('object-unlocked')[0]?.payload).toEqual({ objectId: 'p1' });
      expect(a.transport.events('object-locked')).toEqual([]);
    });

    it('should refuse to unlock a lock held by someone else', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      await node.lockObject(a.id, 'p1');

      expectCode(await node.unlockObject(b.id, 'p1'), 'LOCK_NOT_HELD');
      expect(await node.locks.getHolder('p1')).toBe(a.id);
    });

    it('should require the lock to move an object', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      expectCode(await node.moveObject(a.id, { objectId: 'p1', x: 10, y: 20 }), 'LOCK_REQUIRED');

      await node.lockObject(a.id, 'p1');
      expect((await node.moveObject(a.id, { objectId: 'p1', x: 10, y: 20 })).ok).toBe(true);
      expectCode(await node.moveObject(b.id, { objectId: 'p1', x: 0, y: 0 }), 'LOCK_REQUIRED');

      const moved = b.transport.events('object-moved');
      expect(moved).toHaveLength(1);
      expect(moved[0]?.payload).toEqual({ objectId: 'p1', x: 10, y: 20, rotation: 0 });
    });

    it('should fail closed with LOCK_UNAVAILABLE when the store is down', async () => {
      const node = createNode();
      const a = await join(node, 'r1');

      store.setAvailable(false);
      const result = await node.lockObject(a.id, 'p1');
      store.setAvailable(true);

      expectCode(result, 'LOCK_UNAVAILABLE');
      expect(await node.locks.getHolder('p1')).toBeNull();
    });

    it('should release locks and membership on disconnect', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');
      await node.lockObject(a.id, 'p1');
      await node.lockObject(a.id, 'p2');

      await node.disconnect(a.id, 'client-closed');

      expect(await node.locks.getHolder('p1')).toBeNull();
      expect(await node.locks.getHolder('p2')).toBeNull();
      expect(node.getMembers('r1').map((m) => m.connectionId)).toEqual([b.id]);
      expect(b.transport.events('user-left')[0]?.payload).toEqual({ reason: 'client-closed' });
      expect(
        b.transport
          .events('object-unlocked')
          .map((event) => event.payload)
          .sort((x, y) => x.objectId.localeCompare(y.objectId))
      ).toEqual([{ objectId: 'p1' }, { objectId: 'p2' }]);
    });

    it('should keep a user lock while another of their connections is in a room', async () => {
      const node = createNode();
      const first = await join(node, 'r1', { userId: 'u1' });
      const second = await join(node, 'r1', { userId: 'u1' });

      await node.lockObject(first.id, 'p1');
      await node.leaveRoom(first.id);

      expect(await node.locks.getHolder('p1')).toBe('u1');
      expect((await node.moveObject(second.id, { objectId: 'p1', x: 1, y: 1 })).ok).toBe(true);

      await node.leaveRoom(second.id);
      expect(await node.locks.getHolder('p1')).toBeNull();
    });
  });

  describe('cursor throttling', () => {
    it('should coalesce a burst of cursor updates into one broadcast', async () => {
      vi.useFakeTimers();
      const node = createNode({ throttleTickMs: 100 });
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      for (let i = 0; i < 100; i++) {
        expect(node.updateCursor(a.id, { x: i, y: i * 2 }).ok).toBe(true);
      }
      await vi.advanceTimersByTimeAsync(100);

      const updates = b.transport.events('cursor-update');
      expect(updates).toHaveLength(1);
      expect(updates[0]?.payload).toEqual({ stream: 'cursor', x: 99, y: 198 });
      expect(a.transport.events('cursor-update')).toEqual([]);
    });

    it('should drop pending cursor updates when the sender leaves', async () => {
      vi.useFakeTimers();
      const node = createNode({ throttleTickMs: 100 });
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      node.updateCursor(a.id, { x: 1, y: 1 });
      await node.leaveRoom(a.id);
      await vi.advanceTimersByTimeAsync(100);

      expect(b.transport.events('cursor-update')).toEqual([]);
      expect(node.getStats().activeStreams).toBe(0);
    });
  });

  describe('across instances', () => {
    it('should deliver room events to members on every instance', async () => {
      const first = createNode({ instanceId: 'i_one' });
      const second = createNode({ instanceId: 'i_two' });
      await Promise.all([first.start(), second.start()]);

      const a1 = await join(first, 'r1');
      const a2 = await join(first, 'r1');
      const b1 = await join(second, 'r1');
      await flush();

      first.sendChat(a1.id, 'hello');
      await flush();

      for (const participant of [a1, a2, b1]) {
        const chat = participant.transport.events('chat-message');
        expect(chat).toHaveLength(1);
        expect(chat[0]?.payload).toMatchObject({ text: 'hello' });
      }
      expect(a1.transport.events('user-joined').map((event) => event.originator.connectionId)).toEqual([
        a2.id,
        b1.id,
      ]);
    });

    it('should honour exclusions for remote deliveries', async () => {
      const first = createNode({ instanceId: 'i_one' });
      const second = createNode({ instanceId: 'i_two' });
      await Promise.all([first.start(), second.start()]);

      const a = await join(first, 'r1');
      const b = await join(second, 'r1');
      await flush();

      first.emitCustom(a.id, 'wave');
      await flush();

      expect(b.transport.events('custom')).toHaveLength(1);
      expect(a.transport.events('custom')).toEqual([]);
    });

    it('should serialize locks across instances', async () => {
      const first = createNode({ instanceId: 'i_one' });
      const second = createNode({ instanceId: 'i_two' });
      await Promise.all([first.start(), second.start()]);
      const a = await join(first, 'r1');
      const b = await join(second, 'r1');

      expect((await first.lockObject(a.id, 'p1')).ok).toBe(true);
      expectCode(await second.lockObject(b.id, 'p1'), 'LOCK_BUSY');

      await first.unlockObject(a.id, 'p1');
      expect((await second.lockObject(b.id, 'p1')).ok).toBe(true);
    });

    it('should ignore malformed backplane traffic', async () => {
      const node = createNode({ instanceId: 'i_one' });
      await node.start();
      const a = await join(node, 'r1');

      await store.publish(
        'tessera:room:r1',
        JSON.stringify({ origin: 'i_other', channel: 'room:r1', payload: { type: 'room-event', event: { kind: 'nope' } } })
      );
      await flush();

      expect(a.transport.messages).toEqual([]);
    });
  });

  describe('degradation', () => {
    it('should keep delivering locally while the backplane is down', async () => {
      const node = createNode();
      const health: CoordinatorEvent['type'][] = [];
      node.events.subscribe((event) => {
        if (event.type === 'degraded' || event.type === 'recovered') health.push(event.type);
      });
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');

      store.setAvailable(false);
      node.emitCustom(a.id, 'first');
      await vi.waitFor(() => expect(health).toEqual(['degraded']));
      expect(b.transport.events('custom')).toHaveLength(1);
      expect(node.getStats().backplane).toBe('degraded');

      store.setAvailable(true);
      node.emitCustom(a.id, 'second');
      await vi.waitFor(() => expect(health).toEqual(['degraded', 'recovered']));
    });

    it('should disconnect members whose transport fails', async () => {
      const node = createNode();
      const a = await join(node, 'r1');
      const b = await join(node, 'r1');
      b.transport.failSends = true;

      node.sendChat(a.id, 'hello');
      await vi.waitFor(() => expect(node.getConnectionState(b.id)).toBeNull());

      expect(node.getMembers('r1').map((m) => m.connectionId)).toEqual([a.id]);
    });
  });

  describe('start', () => {
    it('should subscribe to room and connection traffic once', async () => {
      const node = createNode();
      await Promise.all([node.start(), node.start()]);
      await node.start();
      expect(store.subscriptionCount).toBe(2);
    });

    it('should allow start to be retried after the store recovers', async () => {
      const node = createNode();
      store.setAvailable(false);
      await expect(node.start()).rejects.toSatisfy((error: unknown) => CollabError.isCode(error, 'STORE_UNAVAILABLE'));
      expect(store.subscriptionCount).toBe(0);

      store.setAvailable(true);
      await node.start();
      expect(store.subscriptionCount).toBe(2);
    });
  });

  describe('drain', () => {
    it('should close every transport and refuse new connections', async () => {
      const node = createNode();
      await node.start();
      const a = await join(node, 'r1');
      await node.lockObject(a.id, 'p1');

      await node.drain();

      expect(a.transport.closed).toEqual({ code: 1001, reason: 'Server shutting down' });
      expect(node.getStats()).toMatchObject({ connections: 0, draining: true });
      expect(await node.locks.getHolder('p1')).toBeNull();
      expect(store.subscriptionCount).toBe(0);
      await expect(node.connect(new FakeTransport())).rejects.toSatisfy((error: unknown) =>
        CollabError.isCode(error, 'SERVER_DRAINING')
      );
    });
  });
});

/**
 * Canonical events
 *
 * Every wire protocol translates to and from these records. Room events are
 * broadcast to a room; signals are delivered to exactly one connection.
 *
 * @module events
 */

import type { ConnectionId, RoomId } from './types.js';

/** Version stamped on every event record */
export const EVENT_VERSION = 1;

/**
 * Who caused an event
 */
export interface EventOriginator {
  connectionId: ConnectionId;
  userId?: string;
  displayName?: string;
}

// ---------------------------------------------------------------------------
// Room events
// ---------------------------------------------------------------------------

/**
 * Payload per room event kind
 */
export interface RoomEventPayloads {
  'user-joined': { joinedAt: number };
  'user-left': { reason: string };
  'object-moved': { objectId: string; x: number; y: number; rotation: number };
  'object-locked': { objectId: string; expiresAt: number };
  'object-unlocked': { objectId: string };
  'chat-message': { messageId: string; text: string };
  'cursor-update': { stream: string; x: number; y: number };
  custom: { name: string; data?: unknown };
}

export type RoomEventKind = keyof RoomEventPayloads;

/**
 * A single room event record of kind `K`
 */
export interface RoomEventRecord<K extends RoomEventKind> {
  readonly version: typeof EVENT_VERSION;
  readonly kind: K;
  readonly roomId: RoomId;
  readonly originator: EventOriginator;
  readonly timestamp: number;
  readonly payload: RoomEventPayloads[K];
}

/**
 * Closed union over every room event kind
 */
export type RoomEvent = { [K in RoomEventKind]: RoomEventRecord<K> }[RoomEventKind];

/**
 * Create an immutable room event
 *
 * @example
 * ```typescript
 * const event = createRoomEvent('chat-message', 'room-1', { connectionId }, {
 *   messageId: generateId(),
 *   text: 'hello',
 * });
 * ```
 */
export function createRoomEvent<K extends RoomEventKind>(
  kind: K,
  roomId: RoomId,
  originator: EventOriginator,
  payload: RoomEventPayloads[K],
  timestamp: number = Date.now()
): RoomEventRecord<K> {
  const event: RoomEventRecord<K> = {
    version: EVENT_VERSION,
    kind,
    roomId,
    originator,
    timestamp,
    payload,
  };
  return Object.freeze(event);
}

// ---------------------------------------------------------------------------
// Signals
// ---------------------------------------------------------------------------

/** Point-to-point negotiation message kinds */
export const SIGNAL_KINDS = [
  'call-request',
  'call-response',
  'offer',
  'answer',
  'ice-candidate',
  'call-ended',
] as const;

export type SignalKind = (typeof SIGNAL_KINDS)[number];

/**
 * A relayed signal. The payload is opaque to the server.
 */
export interface SignalMessage {
  readonly version: typeof EVENT_VERSION;
  readonly kind: SignalKind;
  readonly from: ConnectionId;
  readonly fromUserId?: string;
  readonly to: ConnectionId;
  readonly payload: Record<string, unknown>;
  readonly timestamp: number;
}

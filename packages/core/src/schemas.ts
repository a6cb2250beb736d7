/**
 * Runtime schemas for records that cross process boundaries
 *
 * Events and signals are re-validated when they arrive from the backplane
 * so a peer running a different build cannot push malformed records into
 * local delivery.
 */

import { z } from 'zod';
import { EVENT_VERSION, SIGNAL_KINDS, type RoomEvent, type SignalMessage } from './events.js';

const originatorSchema = z.object({
  connectionId: z.string(),
  userId: z.string().optional(),
  displayName: z.string().optional(),
});

function roomEventRecord<K extends string, P extends z.ZodRawShape>(kind: K, payload: P) {
  return z.object({
    version: z.literal(EVENT_VERSION),
    kind: z.literal(kind),
    roomId: z.string(),
    originator: originatorSchema,
    timestamp: z.number(),
    payload: z.object(payload),
  });
}

export const roomEventSchema = z.discriminatedUnion('kind', [
  roomEventRecord('user-joined', { joinedAt: z.number() }),
  roomEventRecord('user-left', { reason: z.string() }),
  roomEventRecord('object-moved', { objectId: z.string(), x: z.number(), y: z.number(), rotation: z.number() }),
  roomEventRecord('object-locked', { objectId: z.string(), expiresAt: z.number() }),
  roomEventRecord('object-unlocked', { objectId: z.string() }),
  roomEventRecord('chat-message', { messageId: z.string(), text: z.string() }),
  roomEventRecord('cursor-update', { stream: z.string(), x: z.number(), y: z.number() }),
  roomEventRecord('custom', { name: z.string(), data: z.unknown().optional() }),
]);

export const signalMessageSchema = z.object({
  version: z.literal(EVENT_VERSION),
  kind: z.enum(SIGNAL_KINDS),
  from: z.string(),
  fromUserId: z.string().optional(),
  to: z.string(),
  payload: z.record(z.unknown()),
  timestamp: z.number(),
});

export function parseRoomEvent(value: unknown): RoomEvent | null {
  const parsed = roomEventSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function parseSignalMessage(value: unknown): SignalMessage | null {
  const parsed = signalMessageSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

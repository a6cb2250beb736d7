/**
 * Payloads the coordinator exchanges over the backplane
 */

import { parseRoomEvent, parseSignalMessage, type RoomEvent, type SignalMessage } from '@tessera/core';
import { z } from 'zod';

/** Room channel payload */
export interface RoomBroadcast {
  type: 'room-event';
  event: RoomEvent;
  exclude: string[];
}

/** Connection channel payload */
export interface SignalDelivery {
  type: 'signal';
  signal: SignalMessage;
}

const roomBroadcastSchema = z.object({
  type: z.literal('room-event'),
  event: z.unknown(),
  exclude: z.array(z.string()).default([]),
});

const signalDeliverySchema = z.object({
  type: z.literal('signal'),
  signal: z.unknown(),
});

export function parseRoomBroadcast(payload: unknown): RoomBroadcast | null {
  const parsed = roomBroadcastSchema.safeParse(payload);
  if (!parsed.success) return null;
  const event = parseRoomEvent(parsed.data.event);
  return event ? { type: 'room-event', event, exclude: parsed.data.exclude } : null;
}

export function parseSignalDelivery(payload: unknown): SignalDelivery | null {
  const parsed = signalDeliverySchema.safeParse(payload);
  if (!parsed.success) return null;
  const signal = parseSignalMessage(parsed.data.signal);
  return signal ? { type: 'signal', signal } : null;
}

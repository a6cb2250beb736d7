/**
 * Legacy text-protocol adapter
 *
 * Packets are text: `<type>[<namespace>,][<ackId>][<json>]` with packet
 * types connect 0, disconnect 1, event 2, ack 3 and error 4. Event packets
 * carry `["name", data]`. The bare packets `2` and `3` are keep-alive ping
 * and pong.
 *
 * Acks are at-least-once: a client that resends a packet with the same ack
 * id gets the command executed and acknowledged again.
 */

import {
  parseClientCommand,
  type ConnectionId,
  type RoomEvent,
  type ServerMessage,
  type SignalMessage,
} from '@tessera/core';
import type { InboundItem, ProtocolAdapter, ProtocolDecoder, ReplyRoute, WireData } from '../types.js';

// ─── Packets ────────────────────────────────────────────────────

export const PacketType = {
  Connect: 0,
  Disconnect: 1,
  Event: 2,
  Ack: 3,
  Error: 4,
} as const;

export type PacketType = (typeof PacketType)[keyof typeof PacketType];

const PACKET_TYPES: readonly PacketType[] = Object.values(PacketType);

export interface LegacyPacket {
  type: PacketType;
  namespace?: string;
  ackId?: number;
  data?: unknown;
}

export type PacketParseResult = { ok: true; packet: LegacyPacket } | { ok: false; message: string };

export function encodePacket(packet: LegacyPacket): string {
  let text = String(packet.type);
  if (packet.namespace !== undefined && packet.namespace !== '/') {
    text += `${packet.namespace},`;
  }
  if (packet.ackId !== undefined) {
    text += String(packet.ackId);
  }
  if (packet.data !== undefined) {
    text += JSON.stringify(packet.data);
  }
  return text;
}

export function decodePacket(text: string): PacketParseResult {
  const typeChar = text.charAt(0);
  const type = PACKET_TYPES.find((candidate) => String(candidate) === typeChar);
  if (type === undefined) {
    return { ok: false, message: text.length === 0 ? 'Empty packet' : `Unknown packet type: ${typeChar}` };
  }

  const packet: LegacyPacket = { type };
  let cursor = 1;

  if (text.charAt(cursor) === '/') {
    const end = text.indexOf(',', cursor);
    if (end === -1) {
      return { ok: false, message: 'Unterminated namespace' };
    }
    packet.namespace = text.slice(cursor, end);
    cursor = end + 1;
  }

  const ack = /^\d+/.exec(text.slice(cursor));
  if (ack) {
    packet.ackId = Number(ack[0]);
    cursor += ack[0].length;
  }

  const body = text.slice(cursor);
  if (body.length > 0) {
    try {
      packet.data = JSON.parse(body);
    } catch {
      return { ok: false, message: 'Malformed packet payload' };
    }
  }

  return { ok: true, packet };
}

// ─── Event mapping ──────────────────────────────────────────────

function field(data: unknown, key: string): unknown {
  return data !== null && typeof data === 'object' ? Reflect.get(data, key) : undefined;
}

function objectIdOf(data: unknown): unknown {
  return field(data, 'objectId') ?? field(data, 'pieceId');
}

/** Canonical command shape for a legacy event, before validation */
export function commandForEvent(name: string, data: unknown): Record<string, unknown> {
  switch (name) {
    case 'join':
      return { type: 'join', roomId: typeof data === 'string' ? data : (field(data, 'roomId') ?? field(data, 'room')) };
    case 'leave':
      return { type: 'leave' };
    case 'message':
      return { type: 'chat', text: typeof data === 'string' ? data : (field(data, 'text') ?? field(data, 'message')) };
    case 'move':
    case 'puzzle-move':
      return {
        type: 'move',
        objectId: objectIdOf(data),
        x: field(data, 'x'),
        y: field(data, 'y'),
        rotation: field(data, 'rotation'),
      };
    case 'lock':
    case 'unlock':
      return { type: name, objectId: objectIdOf(data) };
    case 'cursor':
    case 'cursor-update':
      return { type: 'cursor', x: field(data, 'x'), y: field(data, 'y'), stream: field(data, 'stream') };
    case 'signal':
      return { type: 'signal', to: field(data, 'to'), kind: field(data, 'kind'), payload: field(data, 'payload') };
    case 'ping-test':
      return { type: 'ping' };
    case 'online':
      return { type: 'online' };
    default:
      return { type: 'emit', name, data };
  }
}

/** Events sent back after a successful command, keyed by the inbound event */
const REPLY_EVENTS = new Map<string, string>([
  ['join', 'joined'],
  ['message', 'message-sent'],
  ['ping-test', 'pong-test'],
  ['online', 'online-users'],
]);

function legacyEventName(event: RoomEvent): string {
  switch (event.kind) {
    case 'chat-message':
      return 'message';
    case 'object-moved':
      return 'puzzle-move';
    case 'custom':
      return event.payload.name;
    default:
      return event.kind;
  }
}

function legacyEventBody(event: RoomEvent): Record<string, unknown> {
  const { originator } = event;
  const base = {
    roomId: event.roomId,
    from: originator.connectionId,
    ...(originator.userId !== undefined ? { userId: originator.userId } : {}),
    ...(originator.displayName !== undefined ? { displayName: originator.displayName } : {}),
    timestamp: event.timestamp,
  };
  if (event.kind === 'custom') {
    return { ...base, data: event.payload.data ?? null };
  }
  return { ...base, ...event.payload };
}

function legacySignalBody(signal: SignalMessage): Record<string, unknown> {
  return {
    kind: signal.kind,
    from: signal.from,
    to: signal.to,
    ...(signal.fromUserId !== undefined ? { fromUserId: signal.fromUserId } : {}),
    payload: signal.payload,
    timestamp: signal.timestamp,
  };
}

function base64(data: Uint8Array): string {
  return Buffer.from(data).toString('base64');
}

function ackBody(reply: ServerMessage): Record<string, unknown> {
  switch (reply.type) {
    case 'result':
      return { ok: true, ...(reply.data !== undefined ? { data: reply.data } : {}) };
    case 'error':
      return { ok: false, code: reply.code, message: reply.message };
    case 'pong':
      return { ok: true, timestamp: reply.timestamp };
    case 'echo':
      return { ok: true, data: reply.data };
    case 'binary':
      return { ok: true, data: base64(reply.data) };
    default:
      return { ok: true };
  }
}

function replyEventBody(reply: ServerMessage): unknown {
  switch (reply.type) {
    case 'result':
      return reply.data ?? { success: true };
    case 'pong':
      return { timestamp: reply.timestamp };
    case 'echo':
      return { data: reply.data };
    case 'binary':
      return base64(reply.data);
    default:
      return {};
  }
}

// ─── Adapter ────────────────────────────────────────────────────

export interface LegacyAdapterConfig {
  /** Ping interval announced in the connect packet (default: 25000) */
  pingIntervalMs?: number;
  /** Ping timeout announced in the connect packet (default: 60000) */
  pingTimeoutMs?: number;
}

export const DEFAULT_LEGACY_CONFIG: Required<LegacyAdapterConfig> = {
  pingIntervalMs: 25_000,
  pingTimeoutMs: 60_000,
};

class LegacyDecoder implements ProtocolDecoder {
  constructor(private readonly connectionId: ConnectionId) {}

  decode(data: WireData): InboundItem[] {
    if (typeof data !== 'string') {
      return [{ kind: 'error', code: 'INVALID_MESSAGE', message: 'Expected a text packet', route: {} }];
    }

    const parsed = decodePacket(data);
    if (!parsed.ok) {
      return [{ kind: 'error', code: 'INVALID_MESSAGE', message: parsed.message, route: {} }];
    }

    const { packet } = parsed;
    switch (packet.type) {
      case PacketType.Connect:
        return [
          {
            kind: 'reply',
            frames: [
              encodePacket({ type: PacketType.Connect, namespace: packet.namespace, data: { sid: this.connectionId } }),
            ],
          },
        ];
      case PacketType.Disconnect:
        return [{ kind: 'close', reason: 'client-disconnect' }];
      case PacketType.Event:
        if (packet.data === undefined && packet.ackId === undefined && packet.namespace === undefined) {
          return [{ kind: 'reply', frames: [String(PacketType.Ack)] }];
        }
        return [this.decodeEvent(packet)];
      case PacketType.Ack:
      case PacketType.Error:
        return [];
    }
  }

  private decodeEvent(packet: LegacyPacket): InboundItem {
    const route: ReplyRoute = {
      ...(packet.namespace !== undefined ? { namespace: packet.namespace } : {}),
      ...(packet.ackId !== undefined ? { ackId: packet.ackId, requestId: String(packet.ackId) } : {}),
    };

    const data: unknown = packet.data;
    const name: unknown = Array.isArray(data) ? data[0] : undefined;
    if (!Array.isArray(data) || typeof name !== 'string') {
      return { kind: 'error', code: 'INVALID_MESSAGE', message: 'Event packet must be ["name", data]', route };
    }

    const payload: unknown = data[1];
    const eventRoute: ReplyRoute = { ...route, event: name };
    const parsed = parseClientCommand({
      ...commandForEvent(name, payload),
      ...(route.requestId !== undefined ? { requestId: route.requestId } : {}),
    });
    if (!parsed.ok) {
      return { kind: 'error', code: parsed.code, message: parsed.message, route: eventRoute };
    }
    return { kind: 'command', command: parsed.command, route: eventRoute };
  }
}

export class LegacyTextAdapter implements ProtocolAdapter {
  readonly protocol = 'legacy' as const;
  private readonly config: Required<LegacyAdapterConfig>;

  constructor(config: LegacyAdapterConfig = {}) {
    this.config = { ...DEFAULT_LEGACY_CONFIG, ...config };
  }

  createDecoder(connectionId: ConnectionId): ProtocolDecoder {
    return new LegacyDecoder(connectionId);
  }

  handshake(connectionId: ConnectionId): WireData[] {
    return [
      encodePacket({
        type: PacketType.Connect,
        data: {
          sid: connectionId,
          pingInterval: this.config.pingIntervalMs,
          pingTimeout: this.config.pingTimeoutMs,
        },
      }),
    ];
  }

  encode(message: ServerMessage): WireData[] {
    switch (message.type) {
      case 'welcome':
        return [];
      case 'event':
        return [
          encodePacket({
            type: PacketType.Event,
            data: [legacyEventName(message.event), legacyEventBody(message.event)],
          }),
        ];
      case 'signal':
        return [encodePacket({ type: PacketType.Event, data: ['signal', legacySignalBody(message.signal)] })];
      default:
        return this.encodeReply(message, {});
    }
  }

  encodeReply(reply: ServerMessage, route: ReplyRoute): WireData[] {
    const frames: string[] = [];
    const namespace = route.namespace;

    if (route.ackId !== undefined) {
      frames.push(encodePacket({ type: PacketType.Ack, namespace, ackId: route.ackId, data: [ackBody(reply)] }));
    }

    if (reply.type === 'error') {
      if (route.ackId === undefined) {
        frames.push(
          encodePacket({
            type: PacketType.Error,
            namespace,
            data: {
              code: reply.code,
              message: reply.message,
              ...(route.event !== undefined ? { event: route.event } : {}),
            },
          })
        );
      }
      return frames;
    }

    const replyEvent = route.event !== undefined ? REPLY_EVENTS.get(route.event) : undefined;
    if (replyEvent !== undefined) {
      frames.push(encodePacket({ type: PacketType.Event, namespace, data: [replyEvent, replyEventBody(reply)] }));
    }
    return frames;
  }
}

export function createLegacyTextAdapter(config?: LegacyAdapterConfig): LegacyTextAdapter {
  return new LegacyTextAdapter(config);
}

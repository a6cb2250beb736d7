/**
 * Binary-framed socket adapter
 *
 * JSON frames carry commands and replies; raw frames carry opaque bytes.
 * Besides the canonical commands, clients of this protocol send a few
 * message types of their own: `pong` and `error` are accepted silently,
 * `broadcast` becomes a custom room event and raw frames are echoed back.
 */

import { parseClientCommand, type ConnectionId, type ServerMessage } from '@tessera/core';
import type { InboundItem, ProtocolAdapter, ProtocolDecoder, ReplyRoute, WireData } from '../types.js';
import {
  DEFAULT_MAX_FRAME_BYTES,
  FrameDecoder,
  encodeJsonFrame,
  encodeRawFrame,
  withLengthHeader,
} from './frame.js';

export interface BinaryAdapterConfig {
  /** Largest accepted frame in bytes (default: 1 MiB) */
  maxFrameBytes?: number;
}

function decodeJsonFrame(text: string): InboundItem[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return [{ kind: 'error', code: 'INVALID_MESSAGE', message: 'Malformed JSON frame', route: {} }];
  }

  if (raw !== null && typeof raw === 'object' && !Array.isArray(raw)) {
    const type: unknown = Reflect.get(raw, 'type');
    if (type === 'pong' || type === 'error') {
      return [];
    }
    if (type === 'broadcast') {
      raw = { type: 'emit', name: 'broadcast', data: Reflect.get(raw, 'data'), requestId: Reflect.get(raw, 'requestId') };
    }
  }

  const parsed = parseClientCommand(raw);
  if (!parsed.ok) {
    const route: ReplyRoute = parsed.requestId !== undefined ? { requestId: parsed.requestId } : {};
    return [{ kind: 'error', code: parsed.code, message: parsed.message, route }];
  }
  const route: ReplyRoute = parsed.command.requestId !== undefined ? { requestId: parsed.command.requestId } : {};
  return [{ kind: 'command', command: parsed.command, route }];
}

class BinaryDecoder implements ProtocolDecoder {
  private readonly frames: FrameDecoder;

  constructor(maxFrameBytes: number) {
    this.frames = new FrameDecoder(maxFrameBytes);
  }

  decode(data: WireData): InboundItem[] {
    if (typeof data === 'string') {
      return [{ kind: 'error', code: 'INVALID_MESSAGE', message: 'Expected a binary frame', route: {} }];
    }

    return this.frames.push(data).flatMap((frame): InboundItem[] => {
      switch (frame.kind) {
        case 'json':
          return decodeJsonFrame(frame.text);
        case 'raw':
          return [{ kind: 'reply', frames: [encodeRawFrame(withLengthHeader(frame.bytes))] }];
        case 'invalid':
          return [{ kind: 'error', code: frame.code, message: frame.message, route: {} }];
      }
    });
  }
}

export class BinaryAdapter implements ProtocolAdapter {
  readonly protocol = 'binary' as const;
  private readonly maxFrameBytes: number;

  constructor(config: BinaryAdapterConfig = {}) {
    this.maxFrameBytes = config.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  createDecoder(): ProtocolDecoder {
    return new BinaryDecoder(this.maxFrameBytes);
  }

  handshake(connectionId: ConnectionId): WireData[] {
    return this.encode({ type: 'welcome', connectionId, protocol: this.protocol, timestamp: Date.now() });
  }

  encode(message: ServerMessage): WireData[] {
    if (message.type === 'binary') {
      return [encodeRawFrame(message.data)];
    }
    return [encodeJsonFrame(message)];
  }

  encodeReply(reply: ServerMessage): WireData[] {
    return this.encode(reply);
  }
}

export function createBinaryAdapter(config?: BinaryAdapterConfig): BinaryAdapter {
  return new BinaryAdapter(config);
}

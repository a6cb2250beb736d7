/**
 * Native JSON hub codec
 *
 * One JSON object per text message in each direction. Commands are
 * validated against the canonical command schema; binary payloads travel
 * as base64 strings.
 */

import {
  parseClientCommand,
  type ConnectionId,
  type ServerMessage,
} from '@tessera/core';
import type { InboundItem, ProtocolAdapter, ProtocolDecoder, ReplyRoute, WireData } from '../types.js';

const textDecoder = new TextDecoder();

/** Serialize a server message as JSON text */
export function encodeJsonMessage(message: ServerMessage): string {
  if (message.type === 'binary') {
    return JSON.stringify({ type: 'binary', data: Buffer.from(message.data).toString('base64') });
  }
  return JSON.stringify(message);
}

/** Parse JSON text into a command item or an error item */
export function decodeJsonCommand(text: string): InboundItem {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { kind: 'error', code: 'INVALID_MESSAGE', message: 'Malformed JSON message', route: {} };
  }

  const parsed = parseClientCommand(raw);
  if (!parsed.ok) {
    return {
      kind: 'error',
      code: parsed.code,
      message: parsed.message,
      route: parsed.requestId !== undefined ? { requestId: parsed.requestId } : {},
    };
  }

  const route: ReplyRoute = parsed.command.requestId !== undefined ? { requestId: parsed.command.requestId } : {};
  return { kind: 'command', command: parsed.command, route };
}

class NativeDecoder implements ProtocolDecoder {
  decode(data: WireData): InboundItem[] {
    const text = typeof data === 'string' ? data : textDecoder.decode(data);
    return [decodeJsonCommand(text)];
  }
}

export class NativeAdapter implements ProtocolAdapter {
  readonly protocol = 'native' as const;

  createDecoder(): ProtocolDecoder {
    return new NativeDecoder();
  }

  handshake(connectionId: ConnectionId): WireData[] {
    return this.encode({ type: 'welcome', connectionId, protocol: this.protocol, timestamp: Date.now() });
  }

  encode(message: ServerMessage): WireData[] {
    return [encodeJsonMessage(message)];
  }

  encodeReply(reply: ServerMessage): WireData[] {
    return this.encode(reply);
  }
}

export function createNativeAdapter(): NativeAdapter {
  return new NativeAdapter();
}

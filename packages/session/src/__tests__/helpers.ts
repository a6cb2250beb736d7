import type { ProtocolVariant, RoomEvent, ServerMessage, SignalMessage } from '@tessera/core';
import type { Transport } from '../transport.js';

function isEventOfKind<K extends RoomEvent['kind']>(
  event: RoomEvent,
  kind: K | undefined
): event is Extract<RoomEvent, { kind: K }> {
  return kind === undefined || event.kind === kind;
}

/** Transport that records everything sent to it */
export class FakeTransport implements Transport {
  readonly messages: ServerMessage[] = [];
  closed: { code?: number; reason?: string } | null = null;
  failSends = false;

  constructor(readonly protocol: ProtocolVariant = 'native') {}

  send(message: ServerMessage): void {
    if (this.failSends) {
      throw new Error('socket reset');
    }
    this.messages.push(message);
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  events<K extends RoomEvent['kind'] = RoomEvent['kind']>(kind?: K): Extract<RoomEvent, { kind: K }>[] {
    return this.messages.flatMap((message) =>
      message.type === 'event' && isEventOfKind(message.event, kind) ? [message.event] : []
    );
  }

  signals(): SignalMessage[] {
    return this.messages.flatMap((message) => (message.type === 'signal' ? [message.signal] : []));
  }
}

/** Let pending pub/sub deliveries run */
export const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

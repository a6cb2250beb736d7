/**
 * Protocol adapter contracts
 *
 * An adapter turns wire data into canonical commands and server messages
 * back into wire data. It keeps no session state; the only per-connection
 * state it may hold is a framing buffer inside its decoder.
 */

import type {
  ClientCommand,
  ConnectionId,
  ErrorCode,
  ProtocolVariant,
  ServerMessage,
} from '@tessera/core';

/** What travels over a socket: a text message or a binary one */
export type WireData = string | Uint8Array;

/**
 * Wire details a reply has to carry back to the client
 */
export interface ReplyRoute {
  /** Correlation id sent by the client */
  requestId?: string;
  /** Acknowledgement id of a legacy packet */
  ackId?: number;
  /** Legacy event name the command arrived as */
  event?: string;
  /** Legacy namespace the packet was addressed to */
  namespace?: string;
}

/**
 * One decoded unit of inbound traffic
 */
export type InboundItem =
  | { kind: 'command'; command: ClientCommand; route: ReplyRoute }
  | { kind: 'reply'; frames: WireData[] }
  | { kind: 'error'; code: ErrorCode; message: string; route: ReplyRoute }
  | { kind: 'close'; reason: string };

/**
 * Per-connection decoder. Never throws; malformed input becomes an
 * `error` item.
 */
export interface ProtocolDecoder {
  decode(data: WireData): InboundItem[];
}

export interface ProtocolAdapter {
  readonly protocol: ProtocolVariant;
  createDecoder(connectionId: ConnectionId): ProtocolDecoder;
  /** Frames sent once a connection is registered */
  handshake(connectionId: ConnectionId): WireData[];
  /** Frames for a message pushed to the client */
  encode(message: ServerMessage): WireData[];
  /** Frames answering a decoded command */
  encodeReply(reply: ServerMessage, route: ReplyRoute): WireData[];
}

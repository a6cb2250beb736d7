/**
 * Wire-independent server messages
 *
 * What the session layer hands to a transport. Each protocol adapter owns
 * the encoding of these onto its own framing.
 *
 * @module messages
 */

import type { ClientCommandType } from './commands.js';
import { getErrorInfo, type ErrorCode } from './errors/index.js';
import type { RoomEvent, SignalMessage } from './events.js';
import type { ConnectionId, IceServer, MemberInfo, ProtocolVariant, RoomId } from './types.js';

export interface WelcomeMessage {
  type: 'welcome';
  connectionId: ConnectionId;
  protocol: ProtocolVariant;
  timestamp: number;
}

export interface EventMessage {
  type: 'event';
  event: RoomEvent;
}

export interface SignalEnvelope {
  type: 'signal';
  signal: SignalMessage;
}

export interface ResultMessage {
  type: 'result';
  requestId?: string;
  command: ClientCommandType;
  data?: unknown;
}

export interface ErrorMessage {
  type: 'error';
  requestId?: string;
  command?: ClientCommandType;
  code: ErrorCode;
  message: string;
}

export interface PongMessage {
  type: 'pong';
  requestId?: string;
  timestamp: number;
}

export interface EchoMessage {
  type: 'echo';
  requestId?: string;
  data: unknown;
  timestamp: number;
}

export interface BinaryMessage {
  type: 'binary';
  data: Uint8Array;
}

/**
 * Every message the server can send to a client
 */
export type ServerMessage =
  | WelcomeMessage
  | EventMessage
  | SignalEnvelope
  | ResultMessage
  | ErrorMessage
  | PongMessage
  | EchoMessage
  | BinaryMessage;

// ---------------------------------------------------------------------------
// Operation results
// ---------------------------------------------------------------------------

/** Structured failure returned instead of thrown */
export interface OperationFailure {
  ok: false;
  error: { code: ErrorCode; message: string };
}

export type JoinResult =
  | { ok: true; roomId: RoomId; members: MemberInfo[]; iceServers?: IceServer[] }
  | OperationFailure;

export type LockResult = { ok: true; objectId: string; expiresAt: number } | OperationFailure;

export type OperationResult = { ok: true } | OperationFailure;

export type RelayResult = { ok: true; delivered: 'local' | 'remote' } | OperationFailure;

/**
 * Build an {@link OperationFailure} from a code, using the default message
 * for that code unless one is given.
 */
export function failure(code: ErrorCode, message?: string): OperationFailure {
  return { ok: false, error: { code, message: message ?? getErrorInfo(code).message } };
}

/**
 * Tessera Error Codes
 *
 * Codes travel on the wire inside error envelopes, so they are stable
 * upper-case identifiers rather than numbers. Each code belongs to one
 * category:
 * - protocol: malformed frames or envelopes, reported to the sender only
 * - validation: refused requests (closed room, missing lock, bad input)
 * - infrastructure: shared store timeouts and outages
 * - transport: connection-level failures and shutdown
 * - internal: programming errors
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation
  ROOM_UNAVAILABLE: {
    category: 'validation',
    message: 'Room is closed or does not exist',
    suggestion: 'Ask the room owner to reopen the session or pick another room.',
  },
  ROOM_FULL: {
    category: 'validation',
    message: 'Room has reached its participant limit',
    suggestion: 'Retry once another participant has left.',
  },
  FORBIDDEN: {
    category: 'validation',
    message: 'Not allowed to join this room',
    suggestion: 'Authenticate with an account that has access to the room.',
  },
  NOT_IN_ROOM: {
    category: 'validation',
    message: 'Not connected to a room',
    suggestion: 'Join a room before sending room-scoped commands.',
  },
  LOCK_BUSY: {
    category: 'validation',
    message: 'Object is locked by another participant',
    suggestion: 'Wait for the object-unlocked event and try again.',
  },
  LOCK_NOT_HELD: {
    category: 'validation',
    message: 'You do not hold the lock for this object',
    suggestion: 'Only the current holder can release a lock.',
  },
  LOCK_REQUIRED: {
    category: 'validation',
    message: 'Acquire the lock before moving this object',
    suggestion: 'Send a lock command for the object first.',
  },
  INVALID_MESSAGE: {
    category: 'validation',
    message: 'Invalid message length',
    suggestion: 'Chat messages must contain 1 to 1000 characters.',
  },
  PEER_UNAVAILABLE: {
    category: 'validation',
    message: 'Target connection is not active',
    suggestion: 'The peer disconnected; refresh the participant list.',
  },
  NOT_CONNECTED: {
    category: 'validation',
    message: 'Connection not found',
    suggestion: 'Reconnect and join the room again.',
  },

  // Protocol
  INVALID_PAYLOAD: {
    category: 'protocol',
    message: 'Invalid message format',
    suggestion: 'Check the message against the protocol documentation.',
  },
  UNKNOWN_COMMAND: {
    category: 'protocol',
    message: 'Unknown message type',
    suggestion: 'Use one of the documented command types.',
  },
  FRAME_TOO_LARGE: {
    category: 'protocol',
    message: 'Frame exceeds the maximum size',
    suggestion: 'Split large payloads into several frames.',
  },

  // Infrastructure
  STORE_TIMEOUT: {
    category: 'infrastructure',
    message: 'Shared store did not answer in time',
    suggestion: 'Check the latency and health of the shared store.',
  },
  STORE_UNAVAILABLE: {
    category: 'infrastructure',
    message: 'Shared store is unavailable',
    suggestion: 'Check the shared store connection settings.',
  },
  LOCK_UNAVAILABLE: {
    category: 'infrastructure',
    message: 'Lock service unavailable',
    suggestion: 'Edits are paused until the shared store recovers.',
  },

  // Transport
  SERVER_DRAINING: {
    category: 'transport',
    message: 'Server is shutting down',
    suggestion: 'Reconnect; the load balancer will pick another instance.',
  },
  CONNECTION_CLOSED: {
    category: 'transport',
    message: 'Connection is closed',
    suggestion: 'Reconnect to continue.',
  },
  SLOW_CONSUMER: {
    category: 'transport',
    message: 'Client is not reading fast enough',
    suggestion: 'Reconnect; undelivered updates were dropped.',
  },

  // Internal
  INVALID_STATE: {
    category: 'internal',
    message: 'Invalid connection state transition',
    suggestion: 'This indicates a bug in the session lifecycle.',
  },
  INTERNAL_ERROR: {
    category: 'internal',
    message: 'Internal server error',
    suggestion: 'Check the server logs for details.',
  },
} as const satisfies Record<string, { category: ErrorCategory; message: string; suggestion: string }>;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'protocol' | 'validation' | 'infrastructure' | 'transport' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return ERROR_CODES[code].category;
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}

/**
 * Check whether a string is a known error code
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_CODES, value);
}

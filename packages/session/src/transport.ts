/**
 * Outbound side of one client connection, as seen by the session layer.
 * Protocol adapters implement it over their own framing.
 */

import type { ProtocolVariant, ServerMessage } from '@tessera/core';

export interface Transport {
  readonly protocol: ProtocolVariant;
  /** Encode and write a message; throws when the transport is unusable */
  send(message: ServerMessage): void;
  close(code?: number, reason?: string): void;
}

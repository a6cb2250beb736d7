/**
 * Per-connection lifecycle
 *
 * ```
 * connecting ──join──▶ joined ──leave──▶ leaving ──▶ connecting
 *     │                                     │
 *     └──────────────▶ disconnected ◀───────┘
 * ```
 */

import { CollabError } from '@tessera/core';

export type ConnectionState = 'connecting' | 'joined' | 'leaving' | 'disconnected';

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  connecting: ['joined', 'disconnected'],
  joined: ['leaving'],
  leaving: ['connecting', 'disconnected'],
  disconnected: [],
};

/**
 * Explicit state machine owned by the coordinator for each connection.
 * Illegal transitions throw `INVALID_STATE`.
 */
export class ConnectionStateMachine {
  private current: ConnectionState = 'connecting';

  constructor(private readonly connectionId: string) {}

  get state(): ConnectionState {
    return this.current;
  }

  is(state: ConnectionState): boolean {
    return this.current === state;
  }

  canTransition(to: ConnectionState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: ConnectionState): void {
    if (!this.canTransition(to)) {
      throw new CollabError({
        code: 'INVALID_STATE',
        message: `Cannot move connection from ${this.current} to ${to}`,
        context: { connectionId: this.connectionId, from: this.current, to },
      });
    }
    this.current = to;
  }
}

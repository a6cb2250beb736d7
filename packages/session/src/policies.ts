/**
 * Default collaborators for room access and identity
 */

import type {
  Identity,
  IdentityResolver,
  RoomAccessDecision,
  RoomAccessPolicy,
  RoomId,
  TransportCredentials,
} from '@tessera/core';

export interface RoomPolicyOptions {
  /** Rooms that refuse every join */
  closedRooms?: Iterable<RoomId>;
  /** Local participant limit per room; unlimited when omitted */
  maxMembers?: number;
  /** Require an authenticated identity to join */
  requireIdentity?: boolean;
}

/**
 * Room policy driven by a closed-room list and an optional member limit.
 * Rooms can be closed and reopened at runtime.
 */
export class StaticRoomPolicy implements RoomAccessPolicy {
  private readonly closed: Set<RoomId>;
  private readonly maxMembers: number | undefined;
  private readonly requireIdentity: boolean;

  constructor(options: RoomPolicyOptions = {}) {
    this.closed = new Set(options.closedRooms ?? []);
    this.maxMembers = options.maxMembers;
    this.requireIdentity = options.requireIdentity ?? false;
  }

  close(roomId: RoomId): void {
    this.closed.add(roomId);
  }

  reopen(roomId: RoomId): void {
    this.closed.delete(roomId);
  }

  async check(roomId: RoomId, identity: Identity | null, localMemberCount: number): Promise<RoomAccessDecision> {
    if (this.closed.has(roomId)) {
      return { allowed: false, reason: 'closed', message: `Room ${roomId} is closed` };
    }
    if (this.requireIdentity && identity === null) {
      return { allowed: false, reason: 'forbidden', message: 'Sign in to join this room' };
    }
    if (this.maxMembers !== undefined && localMemberCount >= this.maxMembers) {
      return { allowed: false, reason: 'full', message: `Room ${roomId} is full` };
    }
    return { allowed: true };
  }
}

/**
 * Resolves bearer tokens against a fixed table. Unknown or missing tokens
 * leave the connection anonymous.
 */
export class StaticIdentityResolver implements IdentityResolver {
  private readonly identities: Map<string, Identity>;

  constructor(identities: Record<string, Identity> = {}) {
    this.identities = new Map(Object.entries(identities));
  }

  async resolve(credentials: TransportCredentials): Promise<Identity | null> {
    if (!credentials.token) return null;
    return this.identities.get(credentials.token) ?? null;
  }
}

export function createRoomPolicy(options?: RoomPolicyOptions): StaticRoomPolicy {
  return new StaticRoomPolicy(options);
}

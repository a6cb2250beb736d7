/**
 * Shared types for the collaboration core
 */

/** Opaque connection identifier, unique per transport handshake */
export type ConnectionId = string;

/** Room (broadcast group) identifier */
export type RoomId = string;

/** Wire protocol a connection speaks */
export type ProtocolVariant = 'native' | 'binary' | 'legacy';

/**
 * Authenticated identity attached to a connection
 */
export interface Identity {
  /** Stable user identifier */
  userId: string;
  /** Name shown to other participants */
  displayName?: string;
  /** Roles granted by the identity provider */
  roles?: string[];
}

/**
 * Credentials presented during the transport handshake
 */
export interface TransportCredentials {
  /** Bearer token from the query string or Authorization header */
  token?: string;
  /** Remote address of the peer */
  remoteAddress?: string;
}

/**
 * Resolves transport credentials into an identity (external collaborator).
 * Returning `null` leaves the connection anonymous.
 */
export interface IdentityResolver {
  resolve(credentials: TransportCredentials): Promise<Identity | null>;
}

/**
 * Outcome of a room access check
 */
export type RoomAccessDecision =
  | { allowed: true }
  | { allowed: false; reason: 'closed' | 'full' | 'forbidden'; message?: string };

/**
 * Room existence / authorization check (external collaborator)
 */
export interface RoomAccessPolicy {
  check(roomId: RoomId, identity: Identity | null, localMemberCount: number): Promise<RoomAccessDecision>;
}

/**
 * Fire-and-forget telemetry sink (external collaborator)
 */
export interface MetricsSink {
  increment(name: string, tags?: Record<string, string>): void;
}

/**
 * ICE server entry handed to clients on join for peer-to-peer media
 */
export interface IceServer {
  urls: string[];
  username?: string;
  credential?: string;
}

/**
 * A room member as reported in join results
 */
export interface MemberInfo {
  connectionId: ConnectionId;
  userId?: string;
  displayName?: string;
  joinedAt: number;
}

/**
 * Signaling Relay - point-to-point delivery for peer negotiation
 *
 * Relays call requests, session descriptions and ICE candidates to exactly
 * one target connection. Payloads are opaque; the relay only checks that
 * both ends are live connections.
 *
 * @module signaling-relay
 */

import {
  EVENT_VERSION,
  createLogger,
  failure,
  type ConnectionId,
  type Logger,
  type MemberInfo,
  type MetricsSink,
  type RelayResult,
  type SignalKind,
  type SignalMessage,
} from '@tessera/core';
import { type BackplaneFanout, connectionChannel } from '@tessera/store';
import type { SignalDelivery } from './backplane-messages.js';
import type { ConnectionDirectory } from './connection-directory.js';
import { type ConnectionRegistry, memberInfoOf } from './connection-registry.js';

export interface SignalingRelayDeps {
  registry: ConnectionRegistry;
  directory: ConnectionDirectory;
  backplane: BackplaneFanout;
  metrics?: MetricsSink;
  logger?: Logger;
}

export class SignalingRelay {
  private readonly registry: ConnectionRegistry;
  private readonly directory: ConnectionDirectory;
  private readonly backplane: BackplaneFanout;
  private readonly metrics: MetricsSink | undefined;
  private readonly logger: Logger;

  constructor(deps: SignalingRelayDeps) {
    this.registry = deps.registry;
    this.directory = deps.directory;
    this.backplane = deps.backplane;
    this.metrics = deps.metrics;
    this.logger = deps.logger ?? createLogger({ module: 'signaling' });
  }

  /**
   * Deliver a negotiation message to `to`, on this instance or through the
   * target's connection channel.
   */
  async relayToPeer(
    from: ConnectionId,
    to: ConnectionId,
    kind: SignalKind,
    payload: Record<string, unknown>
  ): Promise<RelayResult> {
    const sender = this.registry.get(from);
    if (!sender || sender.lifecycle.is('disconnected')) {
      return failure('NOT_CONNECTED', `Connection ${from} is not active`);
    }
    if (to === from) {
      return failure('PEER_UNAVAILABLE', 'Cannot signal your own connection');
    }

    const signal: SignalMessage = {
      version: EVENT_VERSION,
      kind,
      from,
      to,
      payload,
      timestamp: Date.now(),
      ...(sender.identity ? { fromUserId: sender.identity.userId } : {}),
    };

    if (this.registry.isActive(to)) {
      this.deliverLocal(signal);
      this.metrics?.increment('signal.relayed', { delivery: 'local', kind });
      return { ok: true, delivered: 'local' };
    }

    const instanceId = await this.directory.lookup(to);
    if (instanceId === null || instanceId === this.backplane.instanceId) {
      return failure('PEER_UNAVAILABLE', `Connection ${to} is not active`);
    }

    const delivery: SignalDelivery = { type: 'signal', signal };
    if (!(await this.backplane.publish(connectionChannel(to), delivery))) {
      return failure('PEER_UNAVAILABLE', 'Peer is on another server that cannot be reached right now');
    }

    this.metrics?.increment('signal.relayed', { delivery: 'remote', kind });
    return { ok: true, delivered: 'remote' };
  }

  /** Hand a signal to its target if the target lives on this instance */
  deliverLocal(signal: SignalMessage): boolean {
    const target = this.registry.get(signal.to);
    if (!target || target.lifecycle.is('disconnected')) {
      this.logger.debug('Dropping signal for unknown connection', { to: signal.to, kind: signal.kind });
      return false;
    }

    try {
      target.transport.send({ type: 'signal', signal });
      return true;
    } catch (error) {
      this.logger.warn('Failed to deliver signal', {
        to: signal.to,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /** Authenticated users connected to this instance */
  listOnline(): MemberInfo[] {
    return this.registry
      .values()
      .filter((record) => record.identity !== null && !record.lifecycle.is('disconnected'))
      .map(memberInfoOf);
  }
}

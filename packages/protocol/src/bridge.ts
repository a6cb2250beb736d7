/**
 * Protocol Bridge - sockets of any protocol onto the session coordinator
 *
 * For every socket the bridge registers a connection with the coordinator,
 * decodes inbound data with the socket's adapter, dispatches the resulting
 * commands and encodes replies and pushed messages back onto the wire.
 * Inbound data of one connection is processed strictly in arrival order.
 *
 * @module bridge
 */

import {
  createLogger,
  ensureCollabError,
  type ConnectionId,
  type Logger,
  type ProtocolVariant,
  type ServerMessage,
} from '@tessera/core';
import {
  CommandDispatcher,
  type CommandDispatcherConfig,
  type ConnectOptions,
  type SessionCoordinator,
  type Transport,
} from '@tessera/session';
import { BinaryAdapter } from './codecs/binary.js';
import { LegacyTextAdapter } from './codecs/legacy-text.js';
import { NativeAdapter } from './codecs/native.js';
import type { InboundItem, ProtocolAdapter, ProtocolDecoder, WireData } from './types.js';

/**
 * The slice of a socket the bridge needs
 */
export interface SocketLike {
  send(data: WireData): void;
  close(code?: number, reason?: string): void;
}

export interface ProtocolBridgeConfig {
  /** Adapter overrides per protocol */
  adapters?: Partial<Record<ProtocolVariant, ProtocolAdapter>>;
  dispatcher?: CommandDispatcherConfig;
  logger?: Logger;
}

/** WebSocket close codes used when refusing or ending a connection */
export const CLOSE_CODES = {
  normal: 1000,
  goingAway: 1001,
  policyViolation: 1008,
  tryAgainLater: 1013,
} as const;

/**
 * One bridged socket
 */
export class BridgeConnection {
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    readonly id: ConnectionId,
    readonly protocol: ProtocolVariant,
    private readonly socket: SocketLike,
    private readonly adapter: ProtocolAdapter,
    private readonly decoder: ProtocolDecoder,
    private readonly coordinator: SessionCoordinator,
    private readonly dispatcher: CommandDispatcher,
    private readonly logger: Logger
  ) {}

  /**
   * Handle data received from the socket. Resolves once this and every
   * earlier message has been processed; never rejects.
   */
  receive(data: WireData): Promise<void> {
    this.queue = this.queue.then(() => this.process(data));
    return this.queue;
  }

  /** The socket went away; tear the connection down */
  async close(reason = 'client-closed'): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.coordinator.disconnect(this.id, reason);
  }

  private async process(data: WireData): Promise<void> {
    if (this.closed) return;
    this.coordinator.touch(this.id);

    try {
      for (const item of this.decoder.decode(data)) {
        await this.handle(item);
        if (this.closed) return;
      }
    } catch (error) {
      const collabError = ensureCollabError(error);
      this.logger.error('Failed to process inbound message', error, { connectionId: this.id });
      this.sendFrames(this.adapter.encode({ type: 'error', ...collabError.toWire() }));
    }
  }

  private async handle(item: InboundItem): Promise<void> {
    switch (item.kind) {
      case 'command': {
        const reply = await this.dispatcher.dispatch(this.id, item.command);
        this.sendFrames(this.adapter.encodeReply(reply, item.route));
        return;
      }
      case 'reply':
        this.sendFrames(item.frames);
        return;
      case 'error': {
        this.logger.debug('Rejected inbound message', { connectionId: this.id, code: item.code });
        const reply: ServerMessage = {
          type: 'error',
          code: item.code,
          message: item.message,
          ...(item.route.requestId !== undefined ? { requestId: item.route.requestId } : {}),
        };
        this.sendFrames(this.adapter.encodeReply(reply, item.route));
        return;
      }
      case 'close':
        await this.close(item.reason);
        this.socket.close(CLOSE_CODES.normal, 'Client disconnect');
        return;
    }
  }

  private sendFrames(frames: WireData[]): void {
    for (const frame of frames) {
      try {
        this.socket.send(frame);
      } catch (error) {
        this.logger.warn('Socket send failed; closing connection', {
          connectionId: this.id,
          error: error instanceof Error ? error.message : String(error),
        });
        this.close('transport-error').catch((closeError: unknown) => {
          this.logger.error('Cleanup after socket failure failed', closeError, { connectionId: this.id });
        });
        return;
      }
    }
  }
}

/**
 * @example
 * ```typescript
 * const bridge = createProtocolBridge(coordinator);
 *
 * wss.on('connection', (socket) => {
 *   void bridge.open(socket, 'native').then((connection) => {
 *     socket.on('message', (data) => void connection.receive(toWireData(data)));
 *     socket.on('close', () => void connection.close());
 *   });
 * });
 * ```
 */
export class ProtocolBridge {
  private readonly adapters: Record<ProtocolVariant, ProtocolAdapter>;
  private readonly dispatcher: CommandDispatcher;
  private readonly logger: Logger;

  constructor(
    private readonly coordinator: SessionCoordinator,
    config: ProtocolBridgeConfig = {}
  ) {
    this.logger = config.logger ?? createLogger({ module: 'bridge' });
    this.adapters = {
      native: config.adapters?.native ?? new NativeAdapter(),
      binary: config.adapters?.binary ?? new BinaryAdapter(),
      legacy: config.adapters?.legacy ?? new LegacyTextAdapter(),
    };
    this.dispatcher = new CommandDispatcher(coordinator, {
      logger: this.logger.child('dispatcher'),
      ...config.dispatcher,
    });
  }

  adapterFor(protocol: ProtocolVariant): ProtocolAdapter {
    return this.adapters[protocol];
  }

  /**
   * Register a socket with the coordinator and send the protocol handshake.
   * Rejects with the coordinator's error when the connection is refused.
   */
  async open(socket: SocketLike, protocol: ProtocolVariant, options: ConnectOptions = {}): Promise<BridgeConnection> {
    const adapter = this.adapters[protocol];
    const transport: Transport = {
      protocol,
      send: (message) => {
        for (const frame of adapter.encode(message)) {
          socket.send(frame);
        }
      },
      close: (code, reason) => socket.close(code, reason),
    };

    const connectionId = await this.coordinator.connect(transport, options);
    for (const frame of adapter.handshake(connectionId)) {
      socket.send(frame);
    }

    this.logger.debug('Socket bridged', { connectionId, protocol });
    return new BridgeConnection(
      connectionId,
      protocol,
      socket,
      adapter,
      adapter.createDecoder(connectionId),
      this.coordinator,
      this.dispatcher,
      this.logger
    );
  }

  /**
   * Tell a refused socket why, in its own protocol, and close it.
   */
  reject(socket: SocketLike, protocol: ProtocolVariant, error: unknown): void {
    const collabError = ensureCollabError(error);
    const closeCode =
      collabError.code === 'SERVER_DRAINING'
        ? CLOSE_CODES.tryAgainLater
        : collabError.code === 'FORBIDDEN'
          ? CLOSE_CODES.policyViolation
          : CLOSE_CODES.goingAway;

    try {
      for (const frame of this.adapters[protocol].encode({ type: 'error', ...collabError.toWire() })) {
        socket.send(frame);
      }
    } catch (sendError) {
      this.logger.debug('Could not report refusal to socket', {
        code: collabError.code,
        error: sendError instanceof Error ? sendError.message : String(sendError),
      });
    }
    socket.close(closeCode, collabError.code);
  }
}

export function createProtocolBridge(
  coordinator: SessionCoordinator,
  config?: ProtocolBridgeConfig
): ProtocolBridge {
  return new ProtocolBridge(coordinator, config);
}

/**
 * Collaboration Server
 *
 * One HTTP server carrying a WebSocket endpoint per wire protocol, a health
 * endpoint, keep-alive with idle disconnects, periodic presence refresh and
 * an orderly drain on shutdown.
 */

import { createServer, type IncomingHttpHeaders, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import {
  CollabError,
  createLogger,
  type ConnectionId,
  type Logger,
  type ProtocolVariant,
  type TransportCredentials,
} from '@tessera/core';
import {
  ProtocolBridge,
  type BridgeConnection,
  type ProtocolBridgeConfig,
  type SocketLike,
  type WireData,
} from '@tessera/protocol';
import { type CoordinatorEvent, SessionCoordinator, type SessionCoordinatorConfig } from '@tessera/session';
import { type SharedStore, createMemoryStore } from '@tessera/store';
import type { Observable } from 'rxjs';
import { type RawData, WebSocket, WebSocketServer } from 'ws';

/**
 * Server configuration
 */
export interface CollabServerConfig {
  /** Port to listen on; 0 picks a free port (default: 8080) */
  port?: number;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Endpoint path per protocol */
  paths?: Partial<Record<ProtocolVariant, string>>;
  /** Keep-alive ping interval in ms (default: 30000) */
  heartbeatInterval?: number;
  /** Silence after which a client is disconnected in ms (default: 60000) */
  clientTimeout?: number;
  /** Largest accepted WebSocket message in bytes (default: 1 MiB) */
  maxMessageSize?: number;
  /** Unsent bytes a socket may queue before it is dropped (default: 4 MiB) */
  maxBufferedBytes?: number;
  /** Connection directory refresh interval in ms (default: 30000) */
  presenceRefreshInterval?: number;
  /** Shared store; an in-process store when omitted */
  store?: SharedStore;
  coordinator?: Omit<SessionCoordinatorConfig, 'store' | 'logger'>;
  bridge?: Omit<ProtocolBridgeConfig, 'logger'>;
  logger?: Logger;
}

export const DEFAULT_SERVER_CONFIG = {
  port: 8080,
  host: '0.0.0.0',
  paths: {
    native: '/hub',
    binary: '/ws',
    legacy: '/socket.io/',
  },
  heartbeatInterval: 30_000,
  clientTimeout: 60_000,
  maxMessageSize: 1024 * 1024,
  maxBufferedBytes: 4 * 1024 * 1024,
  presenceRefreshInterval: 30_000,
} as const;

/**
 * A socket as the server drives it
 */
export interface ServerSocket extends SocketLike {
  ping(): void;
  terminate(): void;
}

/**
 * The parts of a `ws` socket the server writes through
 */
export interface OutboundSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: WireData): void;
  close(code?: number, reason?: string): void;
  ping(): void;
  terminate(): void;
}

interface ClientSession {
  connection: BridgeConnection;
  socket: ServerSocket;
}

// ---------------------------------------------------------------------------
// Request helpers
// ---------------------------------------------------------------------------

/** Protocol served at `pathname`, or `null` when nothing is */
export function protocolForPath(
  pathname: string,
  paths: Record<ProtocolVariant, string>
): ProtocolVariant | null {
  const normalized = pathname.replace(/\/+$/, '') || '/';
  for (const protocol of ['native', 'binary', 'legacy'] as const) {
    const path = paths[protocol].replace(/\/+$/, '') || '/';
    if (normalized === path) return protocol;
  }
  return null;
}

/** Bearer token from the Authorization header or the query string */
export function credentialsFromRequest(
  url: string | undefined,
  headers: IncomingHttpHeaders,
  remoteAddress?: string
): TransportCredentials {
  const authorization = headers.authorization;
  const bearer = authorization?.startsWith('Bearer ') ? authorization.slice('Bearer '.length).trim() : undefined;
  const query = new URL(url ?? '/', 'http://localhost').searchParams;
  const token = bearer || query.get('access_token') || query.get('token') || undefined;

  return {
    ...(token ? { token } : {}),
    ...(remoteAddress ? { remoteAddress } : {}),
  };
}

/** Normalize a `ws` message into wire data */
export function toWireData(data: RawData, isBinary: boolean): WireData {
  const bytes = Array.isArray(data) ? Buffer.concat(data) : Buffer.isBuffer(data) ? data : Buffer.from(data);
  return isBinary ? bytes : bytes.toString('utf8');
}

/**
 * Wrap a socket so sends fail once the client has fallen `maxBufferedBytes`
 * behind. The socket is terminated and the send throws, which disconnects
 * the connection like any other transport failure.
 */
export function boundedSocket(socket: OutboundSocket, maxBufferedBytes: number): ServerSocket {
  return {
    send: (data) => {
      if (socket.readyState !== WebSocket.OPEN) return;
      if (socket.bufferedAmount > maxBufferedBytes) {
        socket.terminate();
        throw new CollabError({
          code: 'SLOW_CONSUMER',
          context: { bufferedAmount: socket.bufferedAmount, maxBufferedBytes },
        });
      }
      socket.send(data);
    },
    close: (code, reason) => socket.close(code, reason),
    ping: () => socket.ping(),
    terminate: () => socket.terminate(),
  };
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

/**
 * @example
 * ```typescript
 * const server = createCollabServer({
 *   port: 8080,
 *   store: createRedisStore({ url: 'redis://localhost:6379' }),
 * });
 * await server.start();
 *
 * process.on('SIGTERM', () => void server.stop());
 * ```
 */
export class CollabServer {
  readonly coordinator: SessionCoordinator;

  private readonly config: {
    port: number;
    host: string;
    paths: Record<ProtocolVariant, string>;
    heartbeatInterval: number;
    clientTimeout: number;
    maxMessageSize: number;
    maxBufferedBytes: number;
    presenceRefreshInterval: number;
  };
  private readonly store: SharedStore;
  private readonly bridge: ProtocolBridge;
  private readonly logger: Logger;
  private readonly sessions = new Map<ConnectionId, ClientSession>();
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private presenceTimer: ReturnType<typeof setInterval> | null = null;
  private stopped = false;

  constructor(config: CollabServerConfig = {}) {
    this.config = {
      port: config.port ?? DEFAULT_SERVER_CONFIG.port,
      host: config.host ?? DEFAULT_SERVER_CONFIG.host,
      paths: { ...DEFAULT_SERVER_CONFIG.paths, ...config.paths },
      heartbeatInterval: config.heartbeatInterval ?? DEFAULT_SERVER_CONFIG.heartbeatInterval,
      clientTimeout: config.clientTimeout ?? DEFAULT_SERVER_CONFIG.clientTimeout,
      maxMessageSize: config.maxMessageSize ?? DEFAULT_SERVER_CONFIG.maxMessageSize,
      maxBufferedBytes: config.maxBufferedBytes ?? DEFAULT_SERVER_CONFIG.maxBufferedBytes,
      presenceRefreshInterval: config.presenceRefreshInterval ?? DEFAULT_SERVER_CONFIG.presenceRefreshInterval,
    };
    this.logger = config.logger ?? createLogger({ module: 'server' });
    this.store = config.store ?? createMemoryStore();
    this.coordinator = new SessionCoordinator({
      ...config.coordinator,
      store: this.store,
      logger: this.logger.child('coordinator'),
    });
    this.bridge = new ProtocolBridge(this.coordinator, {
      ...config.bridge,
      logger: this.logger.child('bridge'),
    });
  }

  /** Coordinator lifecycle notifications */
  get events(): Observable<CoordinatorEvent> {
    return this.coordinator.events;
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    if (this.httpServer) {
      throw new Error('Server already running');
    }
    if (this.stopped) {
      throw new Error('Server has been stopped');
    }

    await this.coordinator.start();

    const wss = new WebSocketServer({ noServer: true, maxPayload: this.config.maxMessageSize });
    const httpServer = createServer((request, response) => this.handleHttp(request, response));
    httpServer.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(wss, request, socket, head);
    });
    wss.on('error', (error) => {
      this.logger.error('WebSocket server error', error);
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(this.config.port, this.config.host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });

    this.httpServer = httpServer;
    this.wss = wss;
    this.startTimers();

    const address = this.address();
    this.logger.info('Server started', {
      host: this.config.host,
      port: address?.port ?? this.config.port,
      paths: this.config.paths,
      instanceId: this.coordinator.instanceId,
    });
  }

  /**
   * Drain the coordinator, stop listening and close the store
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.presenceTimer) {
      clearInterval(this.presenceTimer);
      this.presenceTimer = null;
    }

    await this.coordinator.drain('server-shutdown');
    this.sessions.clear();

    const wss = this.wss;
    if (wss) {
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
      this.wss = null;
    }

    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      this.httpServer = null;
    }

    await this.store.close();
    this.logger.info('Server stopped');
  }

  /** Bound address once listening */
  address(): { host: string; port: number } | null {
    const address = this.httpServer?.address();
    if (!address || typeof address === 'string') return null;
    return { host: address.address, port: address.port };
  }

  getInfo(): {
    running: boolean;
    host: string;
    port: number;
    paths: Record<ProtocolVariant, string>;
    instanceId: string;
    connections: number;
  } {
    return {
      running: this.httpServer !== null,
      host: this.config.host,
      port: this.address()?.port ?? this.config.port,
      paths: { ...this.config.paths },
      instanceId: this.coordinator.instanceId,
      connections: this.sessions.size,
    };
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  /**
   * Bridge an upgraded socket. Resolves `null` when the connection is
   * refused; the socket has then been told why and closed.
   */
  async accept(
    socket: ServerSocket,
    protocol: ProtocolVariant,
    credentials: TransportCredentials = {}
  ): Promise<BridgeConnection | null> {
    try {
      const connection = await this.bridge.open(socket, protocol, { credentials });
      this.sessions.set(connection.id, { connection, socket });
      return connection;
    } catch (error) {
      this.logger.info('Connection refused', {
        protocol,
        error: error instanceof Error ? error.message : String(error),
      });
      this.bridge.reject(socket, protocol, error);
      return null;
    }
  }

  /** Data arrived on a session's socket */
  receive(connectionId: ConnectionId, data: WireData): Promise<void> {
    const session = this.sessions.get(connectionId);
    if (!session) return Promise.resolve();
    this.coordinator.touch(connectionId);
    return session.connection.receive(data);
  }

  /** The socket answered a keep-alive ping */
  markAlive(connectionId: ConnectionId): void {
    this.coordinator.touch(connectionId);
  }

  /** The socket is gone; clean the connection up */
  async release(connectionId: ConnectionId, reason = 'client-closed'): Promise<void> {
    const session = this.sessions.get(connectionId);
    if (!session) return;
    this.sessions.delete(connectionId);
    await session.connection.close(reason);
  }

  /**
   * Disconnect sessions silent for longer than the client timeout and ping
   * the rest. Returns the ids that timed out.
   */
  async checkHeartbeats(now: number = Date.now()): Promise<ConnectionId[]> {
    const timedOut: ConnectionId[] = [];
    const idle = new Set(this.coordinator.idleConnections(now - this.config.clientTimeout));

    for (const [connectionId, session] of this.sessions) {
      if (idle.has(connectionId)) {
        this.logger.info('Client timed out', { connectionId });
        timedOut.push(connectionId);
        session.socket.terminate();
        continue;
      }

      try {
        session.socket.ping();
      } catch (error) {
        this.logger.debug('Keep-alive ping failed', {
          connectionId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    await Promise.all(timedOut.map((connectionId) => this.release(connectionId, 'timeout')));
    return timedOut;
  }

  // ---------------------------------------------------------------------------
  // Transport plumbing
  // ---------------------------------------------------------------------------

  private handleHttp(request: IncomingMessage, response: ServerResponse): void {
    const { pathname } = new URL(request.url ?? '/', 'http://localhost');

    if (request.method === 'GET' && pathname === '/health') {
      const stats = this.coordinator.getStats();
      const healthy = stats.backplane === 'healthy' && !stats.draining;
      response.writeHead(healthy ? 200 : 503, { 'Content-Type': 'application/json' });
      response.end(
        JSON.stringify({
          status: stats.draining ? 'draining' : stats.backplane,
          instanceId: this.coordinator.instanceId,
          connections: stats.connections,
          rooms: stats.rooms,
        })
      );
      return;
    }

    const upgradeOnly = protocolForPath(pathname, this.config.paths) !== null;
    response.writeHead(upgradeOnly ? 426 : 404, { 'Content-Type': 'text/plain' });
    response.end(upgradeOnly ? 'Upgrade Required' : 'Not Found');
  }

  private handleUpgrade(wss: WebSocketServer, request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const { pathname } = new URL(request.url ?? '/', 'http://localhost');
    const protocol = protocolForPath(pathname, this.config.paths);

    if (protocol === null) {
      socket.end('HTTP/1.1 404 Not Found\r\n\r\n');
      return;
    }
    if (this.coordinator.isDraining) {
      socket.end('HTTP/1.1 503 Service Unavailable\r\n\r\n');
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      void this.handleConnection(ws, request, protocol);
    });
  }

  private async handleConnection(ws: WebSocket, request: IncomingMessage, protocol: ProtocolVariant): Promise<void> {
    const early: WireData[] = [];
    let connectionId: ConnectionId | null = null;
    let closedEarly = false;

    ws.on('message', (data: RawData, isBinary: boolean) => {
      const wire = toWireData(data, isBinary);
      if (connectionId === null) {
        early.push(wire);
      } else {
        void this.receive(connectionId, wire);
      }
    });
    ws.on('pong', () => {
      if (connectionId !== null) this.markAlive(connectionId);
    });
    ws.on('close', () => {
      if (connectionId === null) {
        closedEarly = true;
      } else {
        void this.release(connectionId);
      }
    });
    ws.on('error', (error) => {
      this.logger.warn('Socket error', { connectionId, error: error.message });
    });

    const connection = await this.accept(
      boundedSocket(ws, this.config.maxBufferedBytes),
      protocol,
      credentialsFromRequest(request.url, request.headers, request.socket.remoteAddress)
    );
    if (!connection) return;

    connectionId = connection.id;
    if (closedEarly) {
      await this.release(connection.id);
      return;
    }
    for (const data of early.splice(0)) {
      void this.receive(connection.id, data);
    }
  }

  private startTimers(): void {
    this.heartbeatTimer = setInterval(() => {
      this.checkHeartbeats().catch((error: unknown) => {
        this.logger.error('Heartbeat sweep failed', error);
      });
    }, this.config.heartbeatInterval);
    this.heartbeatTimer.unref();

    this.presenceTimer = setInterval(() => {
      this.coordinator.refreshPresence().catch((error: unknown) => {
        this.logger.error('Presence refresh failed', error);
      });
    }, this.config.presenceRefreshInterval);
    this.presenceTimer.unref();
  }
}

/**
 * Create a collaboration server
 */
export function createCollabServer(config?: CollabServerConfig): CollabServer {
  return new CollabServer(config);
}

/**
 * CLI for the collaboration server
 */

import { createLogger, prettySink, type Logger } from '@tessera/core';
import { StaticRoomPolicy } from '@tessera/session';
import { createMemoryStore, createRedisStore, type SharedStore } from '@tessera/store';
import { envFromArgs, loadConfig, parseArgs, type ServerSettings } from './config.js';
import { createCollabServer } from './server.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
Tessera - real-time collaboration server

Usage: tessera [options]

Options:
  -p, --port <port>        Port to listen on (default: 8080)
  -h, --host <host>        Host to bind to (default: 0.0.0.0)
  -r, --redis <url>        Redis URL; in-process store when omitted
  --namespace <name>       Key and channel namespace (default: tessera)
  --instance <id>          Instance identifier
  --max-members <n>        Participant limit per room
  --log-level <level>      debug | info | warn | error (default: info)
  --debug                  Shorthand for --log-level debug
  --pretty                 Human readable logs instead of JSON lines
  --help                   Show this help message
  --version                Show version

Endpoints:
  /hub          JSON messages
  /ws           Length-prefixed binary frames
  /socket.io/   Legacy text packets
  /health       Health check

Environment Variables:
  TESSERA_PORT, TESSERA_HOST, TESSERA_REDIS_URL, TESSERA_NAMESPACE,
  TESSERA_INSTANCE_ID, TESSERA_LOG_LEVEL, TESSERA_LOG_JSON,
  TESSERA_LOCK_TTL_MS, TESSERA_THROTTLE_TICK_MS, TESSERA_STORE_TIMEOUT_MS,
  TESSERA_HEARTBEAT_INTERVAL_MS, TESSERA_CLIENT_TIMEOUT_MS,
  TESSERA_MAX_MESSAGE_BYTES, TESSERA_ROOM_MAX_MEMBERS
`);
}

function printVersion(): void {
  console.log(`tessera v${VERSION}`);
}

function createStore(settings: ServerSettings, logger: Logger): SharedStore {
  if (settings.redisUrl) {
    return createRedisStore({ url: settings.redisUrl, logger: logger.child('redis') });
  }
  logger.warn('No Redis URL configured; running as a single instance with an in-process store');
  return createMemoryStore();
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    printVersion();
    process.exit(0);
  }

  const config = loadConfig(envFromArgs(args));
  if (!config.ok) {
    console.error('Invalid configuration:');
    for (const error of config.errors) {
      console.error(`  ${error}`);
    }
    process.exit(1);
  }

  const { settings } = config;
  const logger = createLogger({
    module: 'tessera',
    level: settings.logLevel,
    ...(settings.logJson ? { json: true } : { handler: prettySink }),
  });

  const server = createCollabServer({
    port: settings.port,
    host: settings.host,
    heartbeatInterval: settings.heartbeatIntervalMs,
    clientTimeout: settings.clientTimeoutMs,
    maxMessageSize: settings.maxMessageBytes,
    store: createStore(settings, logger),
    coordinator: {
      namespace: settings.namespace,
      lockTtlMs: settings.lockTtlMs,
      throttleTickMs: settings.throttleTickMs,
      storeTimeoutMs: settings.storeTimeoutMs,
      roomPolicy: new StaticRoomPolicy(
        settings.roomMaxMembers !== undefined ? { maxMembers: settings.roomMaxMembers } : {}
      ),
      ...(settings.instanceId !== undefined ? { instanceId: settings.instanceId } : {}),
    },
    logger,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  server.events.subscribe((event) => {
    if (event.type === 'connection-opened') {
      logger.debug('Client connected', { connectionId: event.connectionId, protocol: event.protocol });
    } else if (event.type === 'connection-closed') {
      logger.debug('Client disconnected', { connectionId: event.connectionId, reason: event.reason });
    } else if (event.type === 'degraded' || event.type === 'recovered') {
      logger.warn(`Backplane ${event.type}`);
    }
  });

  try {
    await server.start();
    const info = server.getInfo();
    logger.info('Listening', {
      address: `ws://${info.host}:${info.port}`,
      paths: info.paths,
      instanceId: info.instanceId,
      store: settings.redisUrl ? 'redis' : 'memory',
    });
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
}

void main();

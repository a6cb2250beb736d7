/**
 * Server configuration from environment variables
 */

import type { LogLevel } from '@tessera/core';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  TESSERA_PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  TESSERA_HOST: z.string().min(1).default('0.0.0.0'),
  TESSERA_REDIS_URL: z.string().url().optional(),
  TESSERA_NAMESPACE: z.string().min(1).default('tessera'),
  TESSERA_INSTANCE_ID: z.string().min(1).optional(),
  TESSERA_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  TESSERA_LOG_JSON: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  TESSERA_LOCK_TTL_MS: positiveInt.default(30_000),
  TESSERA_THROTTLE_TICK_MS: positiveInt.default(100),
  TESSERA_STORE_TIMEOUT_MS: positiveInt.default(2_000),
  TESSERA_HEARTBEAT_INTERVAL_MS: positiveInt.default(30_000),
  TESSERA_CLIENT_TIMEOUT_MS: positiveInt.default(60_000),
  TESSERA_MAX_MESSAGE_BYTES: positiveInt.default(1024 * 1024),
  TESSERA_ROOM_MAX_MEMBERS: positiveInt.optional(),
});

/**
 * Settings the server process runs with
 */
export interface ServerSettings {
  port: number;
  host: string;
  redisUrl?: string;
  namespace: string;
  instanceId?: string;
  logLevel: LogLevel;
  logJson: boolean;
  lockTtlMs: number;
  throttleTickMs: number;
  storeTimeoutMs: number;
  heartbeatIntervalMs: number;
  clientTimeoutMs: number;
  maxMessageBytes: number;
  roomMaxMembers?: number;
}

export type ConfigResult = { ok: true; settings: ServerSettings } | { ok: false; errors: string[] };

/**
 * Read and validate settings from `env`. Unset variables take their
 * defaults; invalid ones are reported by name.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  const values = parsed.data;
  return {
    ok: true,
    settings: {
      port: values.TESSERA_PORT,
      host: values.TESSERA_HOST,
      namespace: values.TESSERA_NAMESPACE,
      logLevel: values.TESSERA_LOG_LEVEL,
      logJson: values.TESSERA_LOG_JSON,
      lockTtlMs: values.TESSERA_LOCK_TTL_MS,
      throttleTickMs: values.TESSERA_THROTTLE_TICK_MS,
      storeTimeoutMs: values.TESSERA_STORE_TIMEOUT_MS,
      heartbeatIntervalMs: values.TESSERA_HEARTBEAT_INTERVAL_MS,
      clientTimeoutMs: values.TESSERA_CLIENT_TIMEOUT_MS,
      maxMessageBytes: values.TESSERA_MAX_MESSAGE_BYTES,
      ...(values.TESSERA_REDIS_URL !== undefined ? { redisUrl: values.TESSERA_REDIS_URL } : {}),
      ...(values.TESSERA_INSTANCE_ID !== undefined ? { instanceId: values.TESSERA_INSTANCE_ID } : {}),
      ...(values.TESSERA_ROOM_MAX_MEMBERS !== undefined ? { roomMaxMembers: values.TESSERA_ROOM_MAX_MEMBERS } : {}),
    },
  };
}

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

export type ParsedArgs = Record<string, string | boolean>;

/**
 * Parse `--key value`, `-k value` and bare `--flag` arguments
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('-')) continue;

    const key = arg.startsWith('--') ? arg.slice(2) : arg.slice(1);
    const next = args[i + 1];

    if (next !== undefined && !next.startsWith('-')) {
      result[key] = next;
      i++;
    } else {
      result[key] = true;
    }
  }

  return result;
}

const FLAG_VARIABLES: ReadonlyArray<readonly [flags: readonly string[], variable: string]> = [
  [['port', 'p'], 'TESSERA_PORT'],
  [['host', 'h'], 'TESSERA_HOST'],
  [['redis', 'r'], 'TESSERA_REDIS_URL'],
  [['namespace'], 'TESSERA_NAMESPACE'],
  [['instance'], 'TESSERA_INSTANCE_ID'],
  [['log-level'], 'TESSERA_LOG_LEVEL'],
  [['max-members'], 'TESSERA_ROOM_MAX_MEMBERS'],
];

/**
 * Overlay command line flags onto `env`. Flags win over variables.
 */
export function envFromArgs(args: ParsedArgs, env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const merged: NodeJS.ProcessEnv = { ...env };

  for (const [flags, variable] of FLAG_VARIABLES) {
    for (const flag of flags) {
      const value = args[flag];
      if (typeof value === 'string') {
        merged[variable] = value;
        break;
      }
    }
  }
  if (args.debug === true) {
    merged.TESSERA_LOG_LEVEL = 'debug';
  }
  if (args.pretty === true) {
    merged.TESSERA_LOG_JSON = 'false';
  }

  return merged;
}

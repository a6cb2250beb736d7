/**
 * Canonical client commands
 *
 * The protocol-agnostic requests a client can make. Each wire adapter
 * decodes its own format into one of these and nothing else reaches the
 * session layer.
 *
 * @module commands
 */

import { z } from 'zod';
import { SIGNAL_KINDS } from './events.js';

const requestId = z.string().max(128).optional();
const identifier = z.string().min(1).max(128);
const coordinate = z.number().finite();

export const joinCommandSchema = z.object({
  type: z.literal('join'),
  requestId,
  roomId: identifier,
});

export const leaveCommandSchema = z.object({
  type: z.literal('leave'),
  requestId,
});

export const moveCommandSchema = z.object({
  type: z.literal('move'),
  requestId,
  objectId: identifier,
  x: coordinate,
  y: coordinate,
  rotation: z.number().int().default(0),
});

export const lockCommandSchema = z.object({
  type: z.literal('lock'),
  requestId,
  objectId: identifier,
});

export const unlockCommandSchema = z.object({
  type: z.literal('unlock'),
  requestId,
  objectId: identifier,
});

export const chatCommandSchema = z.object({
  type: z.literal('chat'),
  requestId,
  text: z.string(),
});

export const cursorCommandSchema = z.object({
  type: z.literal('cursor'),
  requestId,
  stream: z.string().min(1).max(64).default('cursor'),
  x: coordinate,
  y: coordinate,
});

export const emitCommandSchema = z.object({
  type: z.literal('emit'),
  requestId,
  name: identifier,
  data: z.unknown().optional(),
});

export const signalCommandSchema = z.object({
  type: z.literal('signal'),
  requestId,
  to: identifier,
  kind: z.enum(SIGNAL_KINDS),
  payload: z.record(z.unknown()).default({}),
});

export const pingCommandSchema = z.object({
  type: z.literal('ping'),
  requestId,
});

export const echoCommandSchema = z.object({
  type: z.literal('echo'),
  requestId,
  data: z.unknown().optional(),
});

export const binaryRequestCommandSchema = z.object({
  type: z.literal('binary-request'),
  requestId,
});

export const onlineCommandSchema = z.object({
  type: z.literal('online'),
  requestId,
});

/**
 * Schema for every canonical command, discriminated on `type`
 */
export const clientCommandSchema = z.discriminatedUnion('type', [
  joinCommandSchema,
  leaveCommandSchema,
  moveCommandSchema,
  lockCommandSchema,
  unlockCommandSchema,
  chatCommandSchema,
  cursorCommandSchema,
  emitCommandSchema,
  signalCommandSchema,
  pingCommandSchema,
  echoCommandSchema,
  binaryRequestCommandSchema,
  onlineCommandSchema,
]);

export type ClientCommand = z.infer<typeof clientCommandSchema>;

export type ClientCommandType = ClientCommand['type'];

/** Every command type, in declaration order */
export const CLIENT_COMMAND_TYPES: readonly ClientCommandType[] = clientCommandSchema.options.map(
  (option) => option.shape.type.value
);

export function isClientCommandType(value: unknown): value is ClientCommandType {
  return typeof value === 'string' && CLIENT_COMMAND_TYPES.some((type) => type === value);
}

/**
 * Outcome of decoding untrusted input into a command
 */
export type CommandParseResult =
  | { ok: true; command: ClientCommand }
  | { ok: false; code: 'UNKNOWN_COMMAND' | 'INVALID_PAYLOAD'; message: string; requestId?: string };

/**
 * Validate an already JSON-decoded value as a {@link ClientCommand}.
 */
export function parseClientCommand(value: unknown): CommandParseResult {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return { ok: false, code: 'INVALID_PAYLOAD', message: 'Message must be a JSON object' };
  }

  const type: unknown = Reflect.get(value, 'type');
  const rawRequestId: unknown = Reflect.get(value, 'requestId');
  const requestIdValue = typeof rawRequestId === 'string' ? rawRequestId : undefined;

  if (typeof type !== 'string') {
    return { ok: false, code: 'INVALID_PAYLOAD', message: 'Missing message type', requestId: requestIdValue };
  }

  if (!isClientCommandType(type)) {
    return {
      ok: false,
      code: 'UNKNOWN_COMMAND',
      message: `Unknown message type: ${type}`,
      requestId: requestIdValue,
    };
  }

  const parsed = clientCommandSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return {
      ok: false,
      code: 'INVALID_PAYLOAD',
      message: `Invalid ${type} message: ${where}${issue?.message ?? 'malformed'}`,
      requestId: requestIdValue,
    };
  }

  return { ok: true, command: parsed.data };
}

/**
 * Command Dispatcher - canonical commands to coordinator calls
 *
 * Shared by every protocol adapter, so a command has the same effect and
 * the same reply whichever wire format carried it.
 *
 * @module dispatcher
 */

import { randomBytes } from 'node:crypto';
import {
  createLogger,
  ensureCollabError,
  type ClientCommand,
  type ClientCommandType,
  type ConnectionId,
  type Logger,
  type OperationFailure,
  type ServerMessage,
} from '@tessera/core';
import type { SessionCoordinator } from './coordinator.js';

export interface CommandDispatcherConfig {
  /** Random bytes appended to binary-request replies (default: 1024) */
  binaryPayloadBytes?: number;
  logger?: Logger;
}

/**
 * Build the raw binary-request reply: an 8-byte little-endian epoch-ms
 * timestamp followed by random bytes.
 */
export function createBinaryPayload(size: number, now: number = Date.now()): Uint8Array {
  const payload = new Uint8Array(8 + size);
  new DataView(payload.buffer).setBigUint64(0, BigInt(now), true);
  payload.set(randomBytes(size), 8);
  return payload;
}

export class CommandDispatcher {
  private readonly binaryPayloadBytes: number;
  private readonly logger: Logger;

  constructor(
    private readonly coordinator: SessionCoordinator,
    config: CommandDispatcherConfig = {}
  ) {
    this.binaryPayloadBytes = config.binaryPayloadBytes ?? 1024;
    this.logger = config.logger ?? createLogger({ module: 'dispatcher' });
  }

  /**
   * Execute a command for a connection and produce the reply to send back
   * to it. Never rejects; failures become error messages.
   */
  async dispatch(connectionId: ConnectionId, command: ClientCommand): Promise<ServerMessage> {
    this.coordinator.touch(connectionId);
    try {
      return await this.execute(connectionId, command);
    } catch (error) {
      const collabError = ensureCollabError(error);
      if (collabError.category === 'internal') {
        this.logger.error('Command failed', error, { connectionId, command: command.type });
      } else {
        this.logger.debug('Command refused', { connectionId, command: command.type, code: collabError.code });
      }
      return { type: 'error', requestId: command.requestId, command: command.type, ...collabError.toWire() };
    }
  }

  private async execute(connectionId: ConnectionId, command: ClientCommand): Promise<ServerMessage> {
    const coordinator = this.coordinator;

    switch (command.type) {
      case 'join': {
        const result = await coordinator.joinRoom(connectionId, command.roomId);
        if (!result.ok) return this.refusal(command, result);
        return this.result(command, {
          roomId: result.roomId,
          members: result.members,
          ...(result.iceServers ? { iceServers: result.iceServers } : {}),
        });
      }

      case 'leave':
        await coordinator.leaveRoom(connectionId);
        return this.result(command);

      case 'lock': {
        const result = await coordinator.lockObject(connectionId, command.objectId);
        if (!result.ok) return this.refusal(command, result);
        return this.result(command, { objectId: result.objectId, expiresAt: result.expiresAt });
      }

      case 'unlock': {
        const result = await coordinator.unlockObject(connectionId, command.objectId);
        return result.ok ? this.result(command, { objectId: command.objectId }) : this.refusal(command, result);
      }

      case 'move': {
        const result = await coordinator.moveObject(connectionId, command);
        return result.ok ? this.result(command, { objectId: command.objectId }) : this.refusal(command, result);
      }

      case 'chat': {
        const result = coordinator.sendChat(connectionId, command.text);
        return result.ok ? this.result(command) : this.refusal(command, result);
      }

      case 'cursor': {
        const result = coordinator.updateCursor(connectionId, { x: command.x, y: command.y }, command.stream);
        return result.ok ? this.result(command) : this.refusal(command, result);
      }

      case 'emit': {
        const result = coordinator.emitCustom(connectionId, command.name, command.data);
        return result.ok ? this.result(command, { name: command.name }) : this.refusal(command, result);
      }

      case 'signal': {
        const result = await coordinator.relay.relayToPeer(connectionId, command.to, command.kind, command.payload);
        if (!result.ok) return this.refusal(command, result);
        return this.result(command, { to: command.to, delivered: result.delivered });
      }

      case 'online':
        return this.result(command, { users: coordinator.relay.listOnline() });

      case 'ping':
        return { type: 'pong', requestId: command.requestId, timestamp: Date.now() };

      case 'echo':
        return { type: 'echo', requestId: command.requestId, data: command.data ?? null, timestamp: Date.now() };

      case 'binary-request':
        return { type: 'binary', data: createBinaryPayload(this.binaryPayloadBytes) };
    }
  }

  private result(command: { type: ClientCommandType; requestId?: string }, data?: unknown): ServerMessage {
    return {
      type: 'result',
      command: command.type,
      ...(command.requestId !== undefined ? { requestId: command.requestId } : {}),
      ...(data !== undefined ? { data } : {}),
    };
  }

  private refusal(command: { type: ClientCommandType; requestId?: string }, result: OperationFailure): ServerMessage {
    return {
      type: 'error',
      command: command.type,
      code: result.error.code,
      message: result.error.message,
      ...(command.requestId !== undefined ? { requestId: command.requestId } : {}),
    };
  }
}

export function createCommandDispatcher(
  coordinator: SessionCoordinator,
  config?: CommandDispatcherConfig
): CommandDispatcher {
  return new CommandDispatcher(coordinator, config);
}

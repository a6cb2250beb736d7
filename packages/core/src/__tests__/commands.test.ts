import { describe, expect, it } from 'vitest';
import { CLIENT_COMMAND_TYPES, isClientCommandType, parseClientCommand } from '../commands.js';

describe('parseClientCommand', () => {
  it('should accept a join command', () => {
    expect(parseClientCommand({ type: 'join', roomId: 'room-1', requestId: 'r1' })).toEqual({
      ok: true,
      command: { type: 'join', roomId: 'room-1', requestId: 'r1' },
    });
  });

  it('should apply defaults', () => {
    const move = parseClientCommand({ type: 'move', objectId: 'p1', x: 1, y: 2 });
    expect(move).toEqual({ ok: true, command: { type: 'move', objectId: 'p1', x: 1, y: 2, rotation: 0 } });

    const cursor = parseClientCommand({ type: 'cursor', x: 5, y: 6 });
    expect(cursor).toEqual({ ok: true, command: { type: 'cursor', stream: 'cursor', x: 5, y: 6 } });

    const signal = parseClientCommand({ type: 'signal', to: 'c2', kind: 'offer' });
    expect(signal).toEqual({ ok: true, command: { type: 'signal', to: 'c2', kind: 'offer', payload: {} } });
  });

  it('should reject non-objects', () => {
    expect(parseClientCommand('join')).toEqual({
      ok: false,
      code: 'INVALID_PAYLOAD',
      message: 'Message must be a JSON object',
    });
    expect(parseClientCommand([1]).ok).toBe(false);
    expect(parseClientCommand(null).ok).toBe(false);
  });

  it('should report unknown types with the request id', () => {
    expect(parseClientCommand({ type: 'teleport', requestId: 'r9' })).toEqual({
      ok: false,
      code: 'UNKNOWN_COMMAND',
      message: 'Unknown message type: teleport',
      requestId: 'r9',
    });
  });

  it('should report a missing type', () => {
    expect(parseClientCommand({ roomId: 'x' })).toEqual({
      ok: false,
      code: 'INVALID_PAYLOAD',
      message: 'Missing message type',
      requestId: undefined,
    });
  });

  it('should name the offending field', () => {
    const result = parseClientCommand({ type: 'join', roomId: '' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe('INVALID_PAYLOAD');
      expect(result.message.startsWith('Invalid join message: roomId: ')).toBe(true);
    }
  });

  it('should reject unknown signal kinds', () => {
    expect(parseClientCommand({ type: 'signal', to: 'c2', kind: 'hangup' }).ok).toBe(false);
  });

  it('should reject non-finite coordinates', () => {
    expect(parseClientCommand({ type: 'cursor', x: Number.NaN, y: 1 }).ok).toBe(false);
  });
});

describe('CLIENT_COMMAND_TYPES', () => {
  it('should list every command type', () => {
    expect(CLIENT_COMMAND_TYPES).toContain('binary-request');
    expect(CLIENT_COMMAND_TYPES).toHaveLength(13);
    expect(isClientCommandType('chat')).toBe(true);
    expect(isClientCommandType(7)).toBe(false);
  });
});

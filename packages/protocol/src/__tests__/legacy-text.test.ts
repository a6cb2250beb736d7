import { describe, expect, it } from 'vitest';
import { createRoomEvent } from '@tessera/core';
import { LegacyTextAdapter, PacketType, decodePacket, encodePacket } from '../codecs/legacy-text.js';

describe('legacy packets', () => {
  it('should parse type, namespace, ack id and payload', () => {
    expect(decodePacket('2')).toEqual({ ok: true, packet: { type: 2 } });
    expect(decodePacket('21["join",{"roomId":"r1"}]')).toEqual({
      ok: true,
      packet: { type: 2, ackId: 1, data: ['join', { roomId: 'r1' }] },
    });
    expect(decodePacket('2/chat,3["wave"]')).toEqual({
      ok: true,
      packet: { type: 2, namespace: '/chat', ackId: 3, data: ['wave'] },
    });
  });

  it('should reject malformed packets', () => {
    expect(decodePacket('')).toEqual({ ok: false, message: 'Empty packet' });
    expect(decodePacket('9')).toEqual({ ok: false, message: 'Unknown packet type: 9' });
    expect(decodePacket('2{bad')).toEqual({ ok: false, message: 'Malformed packet payload' });
    expect(decodePacket('2/chat')).toEqual({ ok: false, message: 'Unterminated namespace' });
  });

  it('should encode packets', () => {
    expect(encodePacket({ type: PacketType.Ack, ackId: 4, data: [{ ok: true }] })).toBe('34[{"ok":true}]');
    expect(encodePacket({ type: PacketType.Event, namespace: '/', data: ['x'] })).toBe('2["x"]');
    expect(encodePacket({ type: PacketType.Ack })).toBe('3');
  });
});

describe('LegacyTextAdapter', () => {
  const adapter = new LegacyTextAdapter();

  describe('decoding', () => {
    const decoder = adapter.createDecoder('c_1');

    it('should answer keep-alive pings', () => {
      expect(decoder.decode('2')).toEqual([{ kind: 'reply', frames: ['3'] }]);
    });

    it('should answer connect packets with the session id', () => {
      expect(decoder.decode('0')).toEqual([{ kind: 'reply', frames: ['0{"sid":"c_1"}'] }]);
    });

    it('should close on disconnect packets and ignore acks and errors', () => {
      expect(decoder.decode('1')).toEqual([{ kind: 'close', reason: 'client-disconnect' }]);
      expect(decoder.decode('3')).toEqual([]);
      expect(decoder.decode('4{"message":"client"}')).toEqual([]);
    });

    it('should map join with an ack id', () => {
      expect(decoder.decode('25["join",{"room":"lobby"}]')).toEqual([
        {
          kind: 'command',
          command: { type: 'join', roomId: 'lobby', requestId: '5' },
          route: { ackId: 5, requestId: '5', event: 'join' },
        },
      ]);
    });

    it('should map message, move and unknown events', () => {
      expect(decoder.decode('2["message","hi"]')).toEqual([
        { kind: 'command', command: { type: 'chat', text: 'hi' }, route: { event: 'message' } },
      ]);
      expect(decoder.decode('2["puzzle-move",{"pieceId":"p1","x":1,"y":2}]')).toEqual([
        {
          kind: 'command',
          command: { type: 'move', objectId: 'p1', x: 1, y: 2, rotation: 0 },
          route: { event: 'puzzle-move' },
        },
      ]);
      expect(decoder.decode('2["confetti",{"n":3}]')).toEqual([
        { kind: 'command', command: { type: 'emit', name: 'confetti', data: { n: 3 } }, route: { event: 'confetti' } },
      ]);
    });

    it('should report invalid events', () => {
      expect(decoder.decode('2["lock",{}]')).toEqual([
        {
          kind: 'error',
          code: 'INVALID_PAYLOAD',
          message: 'Invalid lock message: objectId: Required',
          route: { event: 'lock' },
        },
      ]);
      expect(decoder.decode('2{"a":1}')).toEqual([
        { kind: 'error', code: 'INVALID_MESSAGE', message: 'Event packet must be ["name", data]', route: {} },
      ]);
    });
  });

  describe('encoding', () => {
    it('should announce the session on handshake', () => {
      expect(adapter.handshake('c_1')).toEqual(['0{"sid":"c_1","pingInterval":25000,"pingTimeout":60000}']);
    });

    it('should ack a join and send the joined event', () => {
      const frames = adapter.encodeReply(
        { type: 'result', command: 'join', requestId: '5', data: { roomId: 'r1', members: [] } },
        { ackId: 5, requestId: '5', event: 'join' }
      );
      expect(frames).toEqual([
        '35[{"ok":true,"data":{"roomId":"r1","members":[]}}]',
        '2["joined",{"roomId":"r1","members":[]}]',
      ]);
    });

    it('should send errors as error packets unless acked', () => {
      const error = { type: 'error', code: 'LOCK_BUSY', message: 'busy' } as const;
      expect(adapter.encodeReply(error, { event: 'lock' })).toEqual([
        '4{"code":"LOCK_BUSY","message":"busy","event":"lock"}',
      ]);
      expect(adapter.encodeReply(error, { ackId: 2, event: 'lock' })).toEqual([
        '32[{"ok":false,"code":"LOCK_BUSY","message":"busy"}]',
      ]);
    });

    it('should reply to named events only', () => {
      expect(adapter.encodeReply({ type: 'pong', timestamp: 123 }, { event: 'ping-test' })).toEqual([
        '2["pong-test",{"timestamp":123}]',
      ]);
      expect(adapter.encodeReply({ type: 'result', command: 'chat' }, { event: 'message', namespace: '/chat' })).toEqual([
        '2/chat,["message-sent",{"success":true}]',
      ]);
      expect(adapter.encodeReply({ type: 'result', command: 'lock' }, { event: 'lock' })).toEqual([]);
    });

    it('should encode room events as named event packets', () => {
      const chat = createRoomEvent(
        'chat-message',
        'r1',
        { connectionId: 'c_1', userId: 'u1' },
        { messageId: 'm1', text: 'hi' },
        1000
      );
      const custom = createRoomEvent('custom', 'r1', { connectionId: 'c_1' }, { name: 'confetti', data: { n: 3 } }, 1000);

      expect(adapter.encode({ type: 'event', event: chat })).toEqual([
        '2["message",{"roomId":"r1","from":"c_1","userId":"u1","timestamp":1000,"messageId":"m1","text":"hi"}]',
      ]);
      expect(adapter.encode({ type: 'event', event: custom })).toEqual([
        '2["confetti",{"roomId":"r1","from":"c_1","timestamp":1000,"data":{"n":3}}]',
      ]);
      expect(adapter.encode({ type: 'welcome', connectionId: 'c_1', protocol: 'legacy', timestamp: 1 })).toEqual([]);
    });
  });
});

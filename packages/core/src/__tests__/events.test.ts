import { describe, expect, it } from 'vitest';
import { EVENT_VERSION, createRoomEvent } from '../events.js';

describe('createRoomEvent', () => {
  it('should build a frozen, versioned record', () => {
    const event = createRoomEvent('object-moved', 'room-1', { connectionId: 'c1' }, {
      objectId: 'p1',
      x: 10,
      y: 20,
      rotation: 90,
    }, 1000);

    expect(event).toEqual({
      version: EVENT_VERSION,
      kind: 'object-moved',
      roomId: 'room-1',
      originator: { connectionId: 'c1' },
      timestamp: 1000,
      payload: { objectId: 'p1', x: 10, y: 20, rotation: 90 },
    });
    expect(Object.isFrozen(event)).toBe(true);
  });
});

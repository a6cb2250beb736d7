import { describe, expect, it } from 'vitest';
import {
  FrameDecoder,
  FrameTag,
  encodeFrame,
  encodeJsonFrame,
  withLengthHeader,
  type DecodedFrame,
} from '../codecs/frame.js';

describe('frame codec', () => {
  it('should prefix the tag and body with a little-endian length', () => {
    const frame = encodeFrame(FrameTag.Raw, new Uint8Array([9, 8, 7]));
    expect(Array.from(frame)).toEqual([4, 0, 0, 0, 0x02, 9, 8, 7]);
  });

  it('should prefix raw echoes with their own length', () => {
    expect(Array.from(withLengthHeader(new Uint8Array([1, 2])))).toEqual([2, 0, 0, 0, 1, 2]);
  });

  it('should decode a JSON frame', () => {
    const decoder = new FrameDecoder();
    expect(decoder.push(encodeJsonFrame({ type: 'ping' }))).toEqual([{ kind: 'json', text: '{"type":"ping"}' }]);
  });

  it('should reassemble a frame split at every byte', () => {
    const decoder = new FrameDecoder();
    const frame = encodeJsonFrame({ type: 'echo', data: 'hi' });
    const decoded: DecodedFrame[] = [];

    for (const byte of frame) {
      decoded.push(...decoder.push(new Uint8Array([byte])));
    }

    expect(decoded).toEqual([{ kind: 'json', text: '{"type":"echo","data":"hi"}' }]);
    expect(decoder.pending).toBe(0);
  });

  it('should split coalesced frames', () => {
    const decoder = new FrameDecoder();
    const first = encodeJsonFrame({ type: 'ping' });
    const second = encodeFrame(FrameTag.Raw, new Uint8Array([1, 2, 3]));
    const chunk = new Uint8Array(first.length + second.length - 2);
    chunk.set(first);
    chunk.set(second.subarray(0, second.length - 2), first.length);

    const frames = decoder.push(chunk);
    expect(frames).toEqual([{ kind: 'json', text: '{"type":"ping"}' }]);
    expect(decoder.pending).toBe(second.length - 2);

    expect(decoder.push(second.subarray(second.length - 2))).toEqual([
      { kind: 'raw', bytes: new Uint8Array([1, 2, 3]) },
    ]);
  });

  it('should reject frames over the size limit and drop the buffer', () => {
    const decoder = new FrameDecoder(8);
    const frames = decoder.push(encodeFrame(FrameTag.Raw, new Uint8Array(16)));

    expect(frames).toEqual([
      { kind: 'invalid', code: 'FRAME_TOO_LARGE', message: 'Frame of 17 bytes exceeds the 8 byte limit' },
    ]);
    expect(decoder.pending).toBe(0);
  });

  it('should report unknown tags and empty frames', () => {
    const decoder = new FrameDecoder();
    const unknownTag = new Uint8Array([1, 0, 0, 0, 0x09]);
    const empty = new Uint8Array([0, 0, 0, 0]);

    expect(decoder.push(unknownTag)).toEqual([
      { kind: 'invalid', code: 'INVALID_MESSAGE', message: 'Unknown frame tag 9' },
    ]);
    expect(decoder.push(empty)).toEqual([{ kind: 'invalid', code: 'INVALID_MESSAGE', message: 'Empty frame' }]);
  });
});

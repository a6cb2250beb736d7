/**
 * Length-prefixed frame codec.
 *
 * Frame layout: `[u32 LE length][tag][body]`, where `length` counts the tag
 * and body bytes. Tag `0x01` marks UTF-8 JSON, tag `0x02` raw bytes.
 */

import type { ErrorCode } from '@tessera/core';

// ─── Constants ──────────────────────────────────────────────────

export const FRAME_HEADER_BYTES = 4;

export const FrameTag = {
  Json: 0x01,
  Raw: 0x02,
} as const;

export type FrameTag = (typeof FrameTag)[keyof typeof FrameTag];

/** Default largest accepted frame body (1 MiB) */
export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// ─── Encoding ───────────────────────────────────────────────────

/** Wrap a tagged body in a length-prefixed frame */
export function encodeFrame(tag: FrameTag, body: Uint8Array): Uint8Array {
  const frame = new Uint8Array(FRAME_HEADER_BYTES + 1 + body.length);
  new DataView(frame.buffer).setUint32(0, body.length + 1, true);
  frame[FRAME_HEADER_BYTES] = tag;
  frame.set(body, FRAME_HEADER_BYTES + 1);
  return frame;
}

export function encodeJsonFrame(value: unknown): Uint8Array {
  return encodeFrame(FrameTag.Json, textEncoder.encode(JSON.stringify(value)));
}

export function encodeRawFrame(bytes: Uint8Array): Uint8Array {
  return encodeFrame(FrameTag.Raw, bytes);
}

/** Prefix bytes with their u32 LE length, as raw echoes carry */
export function withLengthHeader(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(FRAME_HEADER_BYTES + bytes.length);
  new DataView(out.buffer).setUint32(0, bytes.length, true);
  out.set(bytes, FRAME_HEADER_BYTES);
  return out;
}

// ─── Decoding ───────────────────────────────────────────────────

export type DecodedFrame =
  | { kind: 'json'; text: string }
  | { kind: 'raw'; bytes: Uint8Array }
  | { kind: 'invalid'; code: ErrorCode; message: string };

/**
 * Streaming frame decoder. Accepts chunks split or coalesced at any byte
 * boundary and yields every frame completed so far.
 *
 * @example
 * ```typescript
 * const decoder = new FrameDecoder();
 * for (const frame of decoder.push(chunk)) {
 *   if (frame.kind === 'json') handle(JSON.parse(frame.text));
 * }
 * ```
 */
export class FrameDecoder {
  private buffer: Uint8Array = new Uint8Array(0);

  constructor(private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  /** Bytes received but not yet part of a complete frame */
  get pending(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): DecodedFrame[] {
    this.append(chunk);
    const frames: DecodedFrame[] = [];

    while (this.buffer.length >= FRAME_HEADER_BYTES) {
      const view = new DataView(this.buffer.buffer, this.buffer.byteOffset, this.buffer.byteLength);
      const length = view.getUint32(0, true);

      if (length > this.maxFrameBytes) {
        // The stream cannot be resynchronised after a bad length
        this.buffer = new Uint8Array(0);
        frames.push({
          kind: 'invalid',
          code: 'FRAME_TOO_LARGE',
          message: `Frame of ${length} bytes exceeds the ${this.maxFrameBytes} byte limit`,
        });
        break;
      }
      if (length === 0) {
        this.buffer = this.buffer.subarray(FRAME_HEADER_BYTES);
        frames.push({ kind: 'invalid', code: 'INVALID_MESSAGE', message: 'Empty frame' });
        continue;
      }
      if (this.buffer.length < FRAME_HEADER_BYTES + length) break;

      const tag = this.buffer[FRAME_HEADER_BYTES];
      const body = this.buffer.slice(FRAME_HEADER_BYTES + 1, FRAME_HEADER_BYTES + length);
      this.buffer = this.buffer.subarray(FRAME_HEADER_BYTES + length);

      if (tag === FrameTag.Json) {
        frames.push({ kind: 'json', text: textDecoder.decode(body) });
      } else if (tag === FrameTag.Raw) {
        frames.push({ kind: 'raw', bytes: body });
      } else {
        frames.push({ kind: 'invalid', code: 'INVALID_MESSAGE', message: `Unknown frame tag ${String(tag)}` });
      }
    }

    return frames;
  }

  reset(): void {
    this.buffer = new Uint8Array(0);
  }

  private append(chunk: Uint8Array): void {
    if (this.buffer.length === 0) {
      this.buffer = chunk.slice();
      return;
    }
    const merged = new Uint8Array(this.buffer.length + chunk.length);
    merged.set(this.buffer);
    merged.set(chunk, this.buffer.length);
    this.buffer = merged;
  }
}

/**
 * @tessera/protocol - wire codecs and the protocol bridge
 *
 * @packageDocumentation
 */

export type {
  InboundItem,
  ProtocolAdapter,
  ProtocolDecoder,
  ReplyRoute,
  WireData,
} from './types.js';
export { NativeAdapter, createNativeAdapter, decodeJsonCommand, encodeJsonMessage } from './codecs/native.js';
export {
  DEFAULT_MAX_FRAME_BYTES,
  FRAME_HEADER_BYTES,
  FrameDecoder,
  FrameTag,
  encodeFrame,
  encodeJsonFrame,
  encodeRawFrame,
  withLengthHeader,
  type DecodedFrame,
} from './codecs/frame.js';
export { BinaryAdapter, createBinaryAdapter, type BinaryAdapterConfig } from './codecs/binary.js';
export {
  DEFAULT_LEGACY_CONFIG,
  LegacyTextAdapter,
  PacketType,
  commandForEvent,
  createLegacyTextAdapter,
  decodePacket,
  encodePacket,
  type LegacyAdapterConfig,
  type LegacyPacket,
  type PacketParseResult,
} from './codecs/legacy-text.js';
export {
  BridgeConnection,
  CLOSE_CODES,
  ProtocolBridge,
  createProtocolBridge,
  type ProtocolBridgeConfig,
  type SocketLike,
} from './bridge.js';

/**
 * @tessera/session - connections, rooms, edits, throttling and signaling
 *
 * @packageDocumentation
 */

export type { Transport } from './transport.js';
export { ConnectionStateMachine, type ConnectionState } from './connection-state.js';
export {
  ConnectionRegistry,
  lockHolderOf,
  memberInfoOf,
  type ConnectionRecord,
} from './connection-registry.js';
export { ConnectionDirectory, type ConnectionDirectoryConfig } from './connection-directory.js';
export {
  RoomRegistry,
  type RoomRegistryConfig,
  type RoomRegistryEvent,
  type RoomState,
} from './room-registry.js';
export {
  ThrottlingPipeline,
  createThrottlingPipeline,
  type FlushHandler,
  type ThrottlingPipelineConfig,
} from './throttling-pipeline.js';
export {
  StaticIdentityResolver,
  StaticRoomPolicy,
  createRoomPolicy,
  type RoomPolicyOptions,
} from './policies.js';
export { SignalingRelay, type SignalingRelayDeps } from './signaling-relay.js';
export {
  DEFAULT_COORDINATOR_CONFIG,
  SessionCoordinator,
  createSessionCoordinator,
  type ConnectOptions,
  type CoordinatorEvent,
  type CursorPosition,
  type ObjectMove,
  type SessionCoordinatorConfig,
} from './coordinator.js';
export {
  CommandDispatcher,
  createBinaryPayload,
  createCommandDispatcher,
  type CommandDispatcherConfig,
} from './dispatcher.js';

/**
 * @tessera/store - shared store, distributed locks and backplane fan-out
 *
 * @packageDocumentation
 */

export type { MessageHandler, SharedStore, Unsubscribe } from './types.js';
export { globToRegExp } from './glob.js';
export { MemoryStore, createMemoryStore, type MemoryStoreConfig } from './memory-store.js';
export { RedisStore, createRedisStore, type RedisStoreConfig } from './redis-store.js';
export {
  DistributedLockManager,
  createLockManager,
  type LockAttempt,
  type LockEvent,
  type LockManagerConfig,
} from './lock-manager.js';
export {
  BackplaneFanout,
  connectionChannel,
  createBackplane,
  roomChannel,
  type BackplaneConfig,
  type BackplaneEnvelope,
  type BackplaneHandler,
  type BackplaneHealth,
} from './backplane.js';

/**
 * Shared store contract
 *
 * The only cross-instance mutable resource. Any backend offering atomic
 * conditional set/delete with TTL and pattern pub/sub can implement it.
 */

/** Handler for pattern subscriptions */
export type MessageHandler = (channel: string, message: string) => void;

/** Cancels a subscription */
export type Unsubscribe = () => Promise<void>;

export interface SharedStore {
  /**
   * Atomically set `key` to `value` with a TTL when the key is absent or
   * already holds `value`. Resolves `true` when the key now holds `value`.
   */
  setIfAbsentOrEqual(key: string, value: string, ttlMs: number): Promise<boolean>;

  /** Atomically delete `key` only when it holds `value` */
  deleteIfEqual(key: string, value: string): Promise<boolean>;

  set(key: string, value: string, ttlMs?: number): Promise<void>;

  get(key: string): Promise<string | null>;

  delete(key: string): Promise<boolean>;

  /** Add a member to a set. A given TTL only ever extends the set's expiry. */
  addToSet(key: string, member: string, ttlMs?: number): Promise<void>;

  removeFromSet(key: string, member: string): Promise<void>;

  setMembers(key: string): Promise<string[]>;

  /** Publish a message; resolves with the number of receiving subscriptions */
  publish(channel: string, message: string): Promise<number>;

  /** Subscribe to channels matching a glob pattern (`*` and `?`) */
  psubscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe>;

  ping(): Promise<void>;

  close(): Promise<void>;
}

/**
 * Cache Handle Interfaces
 *
 * Key-value operations in two flavours: sync variants return (or throw) before the
 * call returns; `…Async` variants return a promise settled by the client later.
 *
 * @packageDocumentation
 */

import type { TransactionHandle } from './transaction.js';

export type CacheAtomicity = 'ATOMIC' | 'TRANSACTIONAL';

export type CacheMode = 'PARTITIONED' | 'REPLICATED';

/** Cache creation options */
export interface CacheConfiguration {
  /** Number of backup copies per partition */
  backups?: number;
  /** `ATOMIC` caches ignore transactions */
  atomicity?: CacheAtomicity;
  mode?: CacheMode;
}

/** Explicit lock on one cache key */
export interface LockHandle {
  /**
   * Releases the lock
   *
   * @throws If the lock was already released
   */
  release(): void;
}

/**
 * Cache handle
 *
 * Read operations return a map holding one entry per key found; a miss is an absent
 * entry, never a key paired with `undefined`.
 */
export interface CacheHandle<K, V> {
  readonly name: string;

  get(key: K): Map<K, V>;
  getAll(keys: readonly K[]): Map<K, V>;
  put(key: K, value: V): void;
  putAll(entries: ReadonlyMap<K, V>): void;
  remove(key: K): void;
  removeAll(keys: readonly K[]): void;
  /** Stores `value` and returns the previous entry, if any */
  getAndPut(key: K, value: V): Map<K, V>;
  /** Removes the key and returns the removed entry, if any */
  getAndRemove(key: K): Map<K, V>;

  getAsync(key: K): Promise<Map<K, V>>;
  getAllAsync(keys: readonly K[]): Promise<Map<K, V>>;
  putAsync(key: K, value: V): Promise<void>;
  putAllAsync(entries: ReadonlyMap<K, V>): Promise<void>;
  removeAsync(key: K): Promise<void>;
  removeAllAsync(keys: readonly K[]): Promise<void>;
  getAndPutAsync(key: K, value: V): Promise<Map<K, V>>;
  getAndRemoveAsync(key: K): Promise<Map<K, V>>;

  /**
   * Acquires an explicit lock on `key`
   *
   * @throws If another owner holds the key
   */
  lock(key: K): LockHandle;

  /** View whose values stay in the cluster's binary form */
  withKeepBinary(): CacheHandle<K, V>;

  /** View whose operations join `transaction` */
  withTransaction(transaction: TransactionHandle): CacheHandle<K, V>;
}

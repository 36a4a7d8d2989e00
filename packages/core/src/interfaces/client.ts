/**
 * Client Handle Interface
 *
 * Top-level capability supplied by the cluster client layer. One handle is shared by
 * every session of a scenario; implementations must be safe for concurrent use.
 *
 * @packageDocumentation
 */

import type { CacheConfiguration, CacheHandle } from './cache.js';
import type { TransactionHandle, TransactionOptions } from './transaction.js';

/**
 * Operation mode the client runs cache actions in when an action does not pick one
 */
export type ApiMode = 'sync' | 'async';

/**
 * Client handle
 *
 * @example
 * ```typescript
 * const cache = client.cache<number, string>('accounts');
 * const tx = client.beginTransaction({ concurrency: 'PESSIMISTIC', isolation: 'REPEATABLE_READ' });
 * cache.withTransaction(tx).put(1, 'opened');
 * tx.commit();
 * tx.close();
 * ```
 */
export interface ClientHandle {
  readonly mode: ApiMode;

  /**
   * Looks up an existing cache
   *
   * @throws If no cache with this name exists
   */
  cache<K, V>(name: string): CacheHandle<K, V>;

  /** Returns the named cache, creating it with `config` when absent */
  getOrCreateCache<K, V>(name: string, config?: CacheConfiguration): CacheHandle<K, V>;

  /** Starts a transaction owned by the caller */
  beginTransaction(options?: TransactionOptions): TransactionHandle;
}

/**
 * Memory Grid
 *
 * In-process `ClientHandle`: named caches, transactions and explicit locks in one
 * Node.js process. Backups and cache mode are recorded but have no effect.
 *
 * @packageDocumentation
 */

import type { ApiMode, CacheConfiguration, ClientHandle, TransactionOptions } from '@cache-chain/core';
import { MemoryCache } from './cache.js';
import { CacheNotFoundError, GridError } from './errors.js';
import { CacheStore } from './store.js';
import { MemoryTransaction } from './transaction.js';
import { gridLog } from './utils/debug.js';

export const DEFAULT_CACHE_CONFIGURATION = {
  backups: 0,
  atomicity: 'ATOMIC',
  mode: 'PARTITIONED',
} as const satisfies Required<CacheConfiguration>;

export interface MemoryGridOptions {
  /** Mode cache actions inherit when they do not pick one (default: `sync`) */
  mode?: ApiMode;
  /** Milliseconds every `…Async` operation waits before running (default: 0) */
  asyncDelay?: number;
  /** Caches created up front */
  caches?: Readonly<Record<string, CacheConfiguration>>;
  /** Time source for transaction timeouts (default: `Date.now`) */
  clock?: () => number;
}

const resolveConfiguration = (name: string, config: CacheConfiguration): Required<CacheConfiguration> => {
  const backups = config.backups ?? DEFAULT_CACHE_CONFIGURATION.backups;
  if (!Number.isInteger(backups) || backups < 0) {
    throw new GridError(`cache '${name}': backups must be a non-negative integer, got ${backups}`);
  }
  return {
    backups,
    atomicity: config.atomicity ?? DEFAULT_CACHE_CONFIGURATION.atomicity,
    mode: config.mode ?? DEFAULT_CACHE_CONFIGURATION.mode,
  };
};

export class MemoryGrid implements ClientHandle {
  readonly mode: ApiMode;

  private readonly stores = new Map<string, CacheStore<unknown, unknown>>();
  private readonly asyncDelay: number;
  private readonly clock: () => number;
  private transactionCount = 0;

  constructor(options: MemoryGridOptions = {}) {
    const asyncDelay = options.asyncDelay ?? 0;
    if (!Number.isFinite(asyncDelay) || asyncDelay < 0) {
      throw new GridError(`asyncDelay must be a non-negative number, got ${asyncDelay}`);
    }
    this.mode = options.mode ?? 'sync';
    this.asyncDelay = asyncDelay;
    this.clock = options.clock ?? Date.now;

    for (const [name, config] of Object.entries(options.caches ?? {})) {
      this.createStore(name, config);
    }
  }

  /** @throws {CacheNotFoundError} */
  cache<K, V>(name: string): MemoryCache<K, V> {
    const store = this.stores.get(name);
    if (store === undefined) {
      throw new CacheNotFoundError(name);
    }
    return this.view<K, V>(store);
  }

  /** An existing cache keeps the configuration it was created with */
  getOrCreateCache<K, V>(name: string, config: CacheConfiguration = {}): MemoryCache<K, V> {
    return this.view<K, V>(this.stores.get(name) ?? this.createStore(name, config));
  }

  beginTransaction(options: TransactionOptions = {}): MemoryTransaction {
    this.transactionCount += 1;
    return new MemoryTransaction(this.transactionCount, options, this.clock);
  }

  cacheNames(): string[] {
    return [...this.stores.keys()];
  }

  configurationOf(name: string): Readonly<Required<CacheConfiguration>> | undefined {
    return this.stores.get(name)?.config;
  }

  /** Returns whether the cache existed */
  destroyCache(name: string): boolean {
    gridLog('destroy cache %s', name);
    return this.stores.delete(name);
  }

  private createStore(name: string, config: CacheConfiguration): CacheStore<unknown, unknown> {
    const store = new CacheStore<unknown, unknown>(name, resolveConfiguration(name, config));
    this.stores.set(name, store);
    gridLog('create cache %s %o', name, store.config);
    return store;
  }

  private view<K, V>(store: CacheStore<unknown, unknown>): MemoryCache<K, V> {
    // Typed view over untyped storage
    return new MemoryCache(store as CacheStore<K, V>, { keepBinary: false, asyncDelay: this.asyncDelay });
  }
}

/**
 * Creates an in-process grid
 *
 * @example
 * ```typescript
 * const grid = createMemoryGrid({ caches: { accounts: { atomicity: 'TRANSACTIONAL' } } });
 * const session = Session.create({ client: grid });
 * ```
 */
export const createMemoryGrid = (options?: MemoryGridOptions): MemoryGrid => new MemoryGrid(options);

/**
 * Memory Cache
 *
 * `CacheHandle` view over a store. Values are copied on the way in and out, so callers
 * never share state with the grid; keep-binary views hand out frozen copies instead.
 *
 * @packageDocumentation
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { CacheHandle, LockHandle, TransactionHandle } from '@cache-chain/core';
import { GridError } from './errors.js';
import { MemoryLock } from './lock.js';
import type { CacheStore } from './store.js';
import { MemoryTransaction } from './transaction.js';

export interface MemoryCacheOptions {
  readonly keepBinary: boolean;
  /** Milliseconds every `…Async` operation waits before running */
  readonly asyncDelay: number;
  readonly transaction?: MemoryTransaction;
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

export class MemoryCache<K, V> implements CacheHandle<K, V> {
  constructor(
    private readonly store: CacheStore<K, V>,
    private readonly options: MemoryCacheOptions,
  ) {}

  get name(): string {
    return this.store.name;
  }

  get keepsBinary(): boolean {
    return this.options.keepBinary;
  }

  get transaction(): MemoryTransaction | undefined {
    return this.options.transaction;
  }

  get(key: K): Map<K, V> {
    return this.getAll([key]);
  }

  getAll(keys: readonly K[]): Map<K, V> {
    const found = new Map<K, V>();
    for (const key of keys) {
      const slot = this.store.read(key, this.options.transaction);
      if (slot !== undefined) {
        found.set(key, this.output(slot.value));
      }
    }
    return found;
  }

  put(key: K, value: V): void {
    this.store.write(key, { removed: false, value: structuredClone(value) }, this.options.transaction);
  }

  putAll(entries: ReadonlyMap<K, V>): void {
    for (const [key, value] of entries) {
      this.put(key, value);
    }
  }

  remove(key: K): void {
    this.store.write(key, { removed: true }, this.options.transaction);
  }

  removeAll(keys: readonly K[]): void {
    for (const key of keys) {
      this.remove(key);
    }
  }

  getAndPut(key: K, value: V): Map<K, V> {
    const previous = this.get(key);
    this.put(key, value);
    return previous;
  }

  getAndRemove(key: K): Map<K, V> {
    const previous = this.get(key);
    this.remove(key);
    return previous;
  }

  async getAsync(key: K): Promise<Map<K, V>> {
    await this.pause();
    return this.get(key);
  }

  async getAllAsync(keys: readonly K[]): Promise<Map<K, V>> {
    await this.pause();
    return this.getAll(keys);
  }

  async putAsync(key: K, value: V): Promise<void> {
    await this.pause();
    this.put(key, value);
  }

  async putAllAsync(entries: ReadonlyMap<K, V>): Promise<void> {
    await this.pause();
    this.putAll(entries);
  }

  async removeAsync(key: K): Promise<void> {
    await this.pause();
    this.remove(key);
  }

  async removeAllAsync(keys: readonly K[]): Promise<void> {
    await this.pause();
    this.removeAll(keys);
  }

  async getAndPutAsync(key: K, value: V): Promise<Map<K, V>> {
    await this.pause();
    return this.getAndPut(key, value);
  }

  async getAndRemoveAsync(key: K): Promise<Map<K, V>> {
    await this.pause();
    return this.getAndRemove(key);
  }

  lock(key: K): LockHandle {
    return new MemoryLock(this.store, key);
  }

  withKeepBinary(): MemoryCache<K, V> {
    return new MemoryCache(this.store, { ...this.options, keepBinary: true });
  }

  /** Atomic caches ignore transactions and return this view unchanged */
  withTransaction(transaction: TransactionHandle): MemoryCache<K, V> {
    if (!this.store.transactional) {
      return this;
    }
    if (!(transaction instanceof MemoryTransaction)) {
      throw new GridError(`cache '${this.name}' cannot join a transaction begun outside the memory grid`);
    }
    return new MemoryCache(this.store, { ...this.options, transaction });
  }

  /** Number of committed entries */
  size(): number {
    return this.store.size();
  }

  /** Committed keys in insertion order */
  keys(): K[] {
    return this.store.keys();
  }

  private output(value: V): V {
    const copy = structuredClone(value);
    return this.options.keepBinary ? deepFreeze(copy) : copy;
  }

  private async pause(): Promise<void> {
    if (this.options.asyncDelay > 0) {
      await delay(this.options.asyncDelay);
    }
  }
}

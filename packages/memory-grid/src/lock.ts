import { formatValue, type LockHandle } from '@cache-chain/core';
import { GridError } from './errors.js';
import { type CacheStore, encodeKey } from './store.js';

/**
 * Explicit lock on one key, held from construction until `release`
 *
 * @throws {LockUnavailableError} On construction, if another owner holds the key
 */
export class MemoryLock<K> implements LockHandle {
  private readonly encoded: string;
  private released = false;

  constructor(
    private readonly store: CacheStore<K, unknown>,
    readonly key: K,
  ) {
    this.encoded = encodeKey(key);
    store.acquire(this.encoded, key, this);
  }

  release(): void {
    if (this.released) {
      throw new GridError(`lock on key ${formatValue(this.key)} of cache '${this.store.name}' was already released`);
    }
    this.store.releaseOwner(this.encoded, this);
    this.released = true;
  }
}

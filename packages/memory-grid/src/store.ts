/**
 * Cache Store
 *
 * Committed entries of one cache plus the pending work of every transaction that
 * touched it. Keys are compared by value: primitives by type and value, arrays and
 * plain objects by their JSON form. Any other object key is refused.
 *
 * Locking:
 * - Pessimistic transactions own a key from its first write (and first read, above
 *   `READ_COMMITTED`) until they finish
 * - Optimistic transactions take their write keys at commit
 * - Explicit locks share the ownership table with transactions
 * - Writes outside a transaction are not blocked by owners
 *
 * @packageDocumentation
 */

import type { CacheConfiguration } from '@cache-chain/core';
import { LockUnavailableError, OptimisticConflictError, UnsupportedKeyError } from './errors.js';
import type { TransactionContext, TransactionParticipant } from './types.js';
import { gridLog } from './utils/debug.js';

/** Value present for a key */
export interface Slot<V> {
  readonly value: V;
}

export type Change<V> = { readonly removed: false; readonly value: V } | { readonly removed: true };

interface Versioned<K, V> extends Slot<V> {
  readonly key: K;
  readonly version: number;
}

type PendingWrite<K, V> = Change<V> & { readonly key: K };

interface ReadMark<K, V> {
  readonly key: K;
  readonly seen: Versioned<K, V> | undefined;
}

interface PendingWork<K, V> {
  readonly writes: Map<string, PendingWrite<K, V>>;
  readonly reads: Map<string, ReadMark<K, V>>;
}

const plainKeyPart = (_name: string, value: unknown): unknown => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype !== Object.prototype && prototype !== null) {
    throw new UnsupportedKeyError(value.constructor.name);
  }
  return value;
};

/** @throws {UnsupportedKeyError} For a key holding an object other than an array or plain object */
export const encodeKey = (key: unknown): string =>
  typeof key === 'object' && key !== null
    ? `object:${JSON.stringify(key, plainKeyPart)}`
    : `${typeof key}:${String(key)}`;

export class CacheStore<K, V> implements TransactionParticipant {
  private readonly entries = new Map<string, Versioned<K, V>>();
  private readonly owners = new Map<string, object>();
  private readonly pending = new Map<TransactionContext, PendingWork<K, V>>();
  private version = 0;

  constructor(
    readonly name: string,
    readonly config: Readonly<Required<CacheConfiguration>>,
  ) {}

  get transactional(): boolean {
    return this.config.atomicity === 'TRANSACTIONAL';
  }

  /** Number of committed entries */
  size(): number {
    return this.entries.size;
  }

  /** Committed keys in insertion order */
  keys(): K[] {
    return [...this.entries.values()].map((entry) => entry.key);
  }

  read(key: K, transaction?: TransactionContext): Slot<V> | undefined {
    const encoded = encodeKey(key);
    const work = this.join(transaction);
    if (work === undefined || transaction === undefined) {
      return this.entries.get(encoded);
    }

    const written = work.writes.get(encoded);
    if (written !== undefined) {
      return written.removed ? undefined : written;
    }
    if (transaction.isolation === 'READ_COMMITTED') {
      return this.entries.get(encoded);
    }

    const mark = work.reads.get(encoded);
    if (mark !== undefined) {
      return mark.seen;
    }
    if (transaction.concurrency === 'PESSIMISTIC') {
      this.acquire(encoded, key, transaction);
    }
    const seen = this.entries.get(encoded);
    work.reads.set(encoded, { key, seen });
    return seen;
  }

  write(key: K, change: Change<V>, transaction?: TransactionContext): void {
    const encoded = encodeKey(key);
    const work = this.join(transaction);
    if (work === undefined || transaction === undefined) {
      this.commitChange(encoded, { ...change, key });
      return;
    }

    if (transaction.concurrency === 'PESSIMISTIC') {
      this.acquire(encoded, key, transaction);
    }
    work.writes.set(encoded, { ...change, key });
  }

  /**
   * Makes `owner` the owner of `key`
   *
   * @throws {LockUnavailableError} If another owner holds the key
   */
  acquire(encoded: string, key: K, owner: object): void {
    const holder = this.owners.get(encoded);
    if (holder !== undefined && holder !== owner) {
      throw new LockUnavailableError(this.name, key);
    }
    this.owners.set(encoded, owner);
  }

  /** Returns whether `owner` held the key */
  releaseOwner(encoded: string, owner: object): boolean {
    if (this.owners.get(encoded) !== owner) {
      return false;
    }
    this.owners.delete(encoded);
    return true;
  }

  validate(transaction: TransactionContext): void {
    const work = this.pending.get(transaction);
    if (work === undefined || transaction.concurrency === 'PESSIMISTIC') {
      return;
    }

    for (const [encoded, write] of work.writes) {
      this.acquire(encoded, write.key, transaction);
    }
    if (transaction.isolation !== 'SERIALIZABLE') {
      return;
    }
    for (const [encoded, mark] of work.reads) {
      if (this.entries.get(encoded)?.version !== mark.seen?.version) {
        throw new OptimisticConflictError(this.name, mark.key);
      }
    }
  }

  apply(transaction: TransactionContext): void {
    const work = this.pending.get(transaction);
    if (work === undefined) {
      return;
    }
    for (const [encoded, write] of work.writes) {
      this.commitChange(encoded, write);
    }
    gridLog('cache %s: applied %d writes of transaction %d', this.name, work.writes.size, transaction.id);
  }

  release(transaction: TransactionContext): void {
    this.pending.delete(transaction);
    for (const [encoded, owner] of this.owners) {
      if (owner === transaction) {
        this.owners.delete(encoded);
      }
    }
  }

  private join(transaction: TransactionContext | undefined): PendingWork<K, V> | undefined {
    if (transaction === undefined || !this.transactional) {
      return undefined;
    }
    transaction.ensureUsable();

    const existing = this.pending.get(transaction);
    if (existing !== undefined) {
      return existing;
    }
    const work: PendingWork<K, V> = { writes: new Map(), reads: new Map() };
    this.pending.set(transaction, work);
    transaction.enlist(this);
    return work;
  }

  private commitChange(encoded: string, write: PendingWrite<K, V>): void {
    if (write.removed) {
      this.entries.delete(encoded);
      return;
    }
    this.version += 1;
    this.entries.set(encoded, { key: write.key, value: write.value, version: this.version });
  }
}

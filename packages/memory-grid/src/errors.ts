/**
 * Grid errors
 *
 * Every capability failure of the in-process grid is a `GridError`; actions surface
 * them as operation failures named after the subclass.
 */

import { formatValue } from '@cache-chain/core';

export class GridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridError';
  }
}

export class CacheNotFoundError extends GridError {
  constructor(public readonly cacheName: string) {
    super(`cache '${cacheName}' does not exist`);
    this.name = 'CacheNotFoundError';
  }
}

/** Operation on a transaction that is no longer active, or has timed out */
export class TransactionStateError extends GridError {
  constructor(
    public readonly transactionId: number,
    message: string,
  ) {
    super(`transaction ${transactionId} ${message}`);
    this.name = 'TransactionStateError';
  }
}

/** Key read by an optimistic serializable transaction changed before commit */
export class OptimisticConflictError extends GridError {
  constructor(
    public readonly cacheName: string,
    public readonly key: unknown,
  ) {
    super(`key ${formatValue(key)} of cache '${cacheName}' changed since it was read`);
    this.name = 'OptimisticConflictError';
  }
}

/** Key held by another transaction or explicit lock */
export class LockUnavailableError extends GridError {
  constructor(
    public readonly cacheName: string,
    public readonly key: unknown,
  ) {
    super(`key ${formatValue(key)} of cache '${cacheName}' is locked by another owner`);
    this.name = 'LockUnavailableError';
  }
}

/** Object key the grid cannot compare by value */
export class UnsupportedKeyError extends GridError {
  constructor(public readonly typeName: string) {
    super(`keys of type ${typeName} are not supported; use primitives, arrays or plain objects`);
    this.name = 'UnsupportedKeyError';
  }
}

/**
 * Internal seams between transactions and the cache stores they touch
 *
 * @packageDocumentation
 */

import type { TransactionConcurrency, TransactionIsolation } from '@cache-chain/core';

/** Transaction as seen by a store taking part in it */
export interface TransactionContext {
  readonly id: number;
  readonly concurrency: TransactionConcurrency;
  readonly isolation: TransactionIsolation;

  /** @throws {TransactionStateError} If the transaction is finished or has timed out */
  ensureUsable(): void;

  enlist(participant: TransactionParticipant): void;
}

/**
 * Two-phase commit participant
 *
 * `validate` runs for every participant before any `apply`; a throwing `validate`
 * rolls the whole transaction back. `release` runs once, whatever the outcome.
 */
export interface TransactionParticipant {
  validate(transaction: TransactionContext): void;
  apply(transaction: TransactionContext): void;
  release(transaction: TransactionContext): void;
}

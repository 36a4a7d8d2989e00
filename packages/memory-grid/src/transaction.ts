/**
 * Memory Transaction
 *
 * @packageDocumentation
 */

import type {
  TransactionConcurrency,
  TransactionHandle,
  TransactionIsolation,
  TransactionOptions,
  TransactionState,
} from '@cache-chain/core';
import { TransactionStateError } from './errors.js';
import type { TransactionContext, TransactionParticipant } from './types.js';
import { gridLog } from './utils/debug.js';

export const DEFAULT_TRANSACTION_OPTIONS = {
  concurrency: 'PESSIMISTIC',
  isolation: 'REPEATABLE_READ',
  timeout: 0,
} as const satisfies Required<TransactionOptions>;

/**
 * Transaction over the caches of one grid
 *
 * A `timeout` of 0 never expires. An expired transaction rolls back on its next use.
 *
 * @example
 * ```typescript
 * const transaction = grid.beginTransaction({ concurrency: 'OPTIMISTIC', isolation: 'SERIALIZABLE' });
 * grid.cache<number, string>('accounts').withTransaction(transaction).put(1, 'opened');
 * transaction.commit(); // throws OptimisticConflictError if a read key changed meanwhile
 * transaction.close();
 * ```
 */
export class MemoryTransaction implements TransactionHandle, TransactionContext {
  readonly concurrency: TransactionConcurrency;
  readonly isolation: TransactionIsolation;
  readonly timeout: number;

  private currentState: TransactionState = 'ACTIVE';
  private isClosed = false;
  private readonly participants = new Set<TransactionParticipant>();
  private readonly startedAt: number;

  constructor(
    readonly id: number,
    options: TransactionOptions,
    private readonly clock: () => number,
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_TRANSACTION_OPTIONS.concurrency;
    this.isolation = options.isolation ?? DEFAULT_TRANSACTION_OPTIONS.isolation;
    this.timeout = options.timeout ?? DEFAULT_TRANSACTION_OPTIONS.timeout;
    this.startedAt = clock();
    gridLog('transaction %d: begin %s %s', id, this.concurrency, this.isolation);
  }

  get state(): TransactionState {
    return this.currentState;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  ensureUsable(): void {
    if (this.currentState !== 'ACTIVE') {
      throw new TransactionStateError(this.id, `is not active (${this.currentState})`);
    }
    if (this.timeout > 0 && this.clock() - this.startedAt > this.timeout) {
      this.finish('ROLLED_BACK');
      throw new TransactionStateError(this.id, `timed out after ${this.timeout} ms`);
    }
  }

  enlist(participant: TransactionParticipant): void {
    this.participants.add(participant);
  }

  commit(): void {
    this.ensureUsable();
    try {
      for (const participant of this.participants) {
        participant.validate(this);
      }
    } catch (error) {
      this.finish('ROLLED_BACK');
      throw error;
    }
    for (const participant of this.participants) {
      participant.apply(this);
    }
    this.finish('COMMITTED');
  }

  rollback(): void {
    if (this.currentState !== 'ACTIVE') {
      throw new TransactionStateError(this.id, `is not active (${this.currentState})`);
    }
    this.finish('ROLLED_BACK');
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    if (this.currentState === 'ACTIVE') {
      this.finish('ROLLED_BACK');
    }
    this.isClosed = true;
  }

  private finish(state: TransactionState): void {
    for (const participant of this.participants) {
      participant.release(this);
    }
    this.participants.clear();
    this.currentState = state;
    gridLog('transaction %d: %s', this.id, state);
  }
}

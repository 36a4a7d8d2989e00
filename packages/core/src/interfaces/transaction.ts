/**
 * Transaction Handle Interfaces
 *
 * @packageDocumentation
 */

export type TransactionConcurrency = 'OPTIMISTIC' | 'PESSIMISTIC';

export type TransactionIsolation = 'READ_COMMITTED' | 'REPEATABLE_READ' | 'SERIALIZABLE';

/** Transaction begin options */
export interface TransactionOptions {
  concurrency?: TransactionConcurrency;
  isolation?: TransactionIsolation;
  /** Milliseconds after begin past which the transaction can no longer commit */
  timeout?: number;
}

/**
 * Transaction lifecycle state
 *
 * `ACTIVE` moves to exactly one of `COMMITTED` or `ROLLED_BACK`; `close()` on an
 * active transaction rolls it back.
 */
export type TransactionState = 'ACTIVE' | 'COMMITTED' | 'ROLLED_BACK';

/**
 * Transaction handle, exclusively owned by the session that began it
 */
export interface TransactionHandle {
  readonly state: TransactionState;
  /** True once `close` has run; interrupted scopes and session cleanup skip a closed transaction */
  readonly closed: boolean;

  /** @throws If the transaction is not active or cannot be committed */
  commit(): void;

  /** @throws If the transaction is not active */
  rollback(): void;

  /** Releases the transaction, rolling back uncommitted work. Closing twice is a no-op. */
  close(): void;
}

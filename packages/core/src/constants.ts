/** Constants and default configuration values for action chains */

import type { CheckPolicy, NestedTransactionPolicy } from './types.js';

/** Cache action types */
export type CacheActionType =
  | 'put'
  | 'putAll'
  | 'get'
  | 'getAll'
  | 'remove'
  | 'removeAll'
  | 'getAndPut'
  | 'getAndRemove'
  | 'lock'
  | 'unlock';

/** Transaction lifecycle action types */
export type TransactionActionType = 'txBegin' | 'txCommit' | 'txRollback' | 'txClose';

/** Client-level action types */
export type ClientActionType = 'getOrCreateCache';

export type ActionType = CacheActionType | TransactionActionType | ClientActionType;

/** Transaction action type constants */
export const TRANSACTION_ACTION = {
  BEGIN: 'txBegin',
  COMMIT: 'txCommit',
  ROLLBACK: 'txRollback',
  CLOSE: 'txClose',
} as const satisfies Record<string, TransactionActionType>;

/** Resolution failure messages shared by actions and tests */
export const RESOLUTION_MESSAGES = {
  NO_CLIENT: 'no active client',
  ASYNC_CONFLICT: 'async API cannot be used in a transaction or with explicit locks',
  NO_TRANSACTION: 'no active transaction',
  TRANSACTION_ACTIVE: 'a transaction is already active',
  LOCK_IN_TRANSACTION: 'explicit locks cannot be acquired inside a transaction',
} as const;

/** Default configuration values for chain execution */
export const DEFAULTS = {
  CHECK_POLICY: 'aggregate',
  NESTED_TRANSACTIONS: 'fail',
} as const satisfies { CHECK_POLICY: CheckPolicy; NESTED_TRANSACTIONS: NestedTransactionPolicy };

export type { CacheAtomicity, CacheConfiguration, CacheHandle, CacheMode, LockHandle } from './cache.js';
export type { ApiMode, ClientHandle } from './client.js';
export type {
  TransactionConcurrency,
  TransactionHandle,
  TransactionIsolation,
  TransactionOptions,
  TransactionState,
} from './transaction.js';

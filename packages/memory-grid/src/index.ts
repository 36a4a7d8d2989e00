/** @cache-chain/memory-grid - In-process cache grid for chains and tests */

export type { MemoryCacheOptions } from './cache.js';
export { MemoryCache } from './cache.js';
export type { MemoryGridOptions } from './client.js';
export { createMemoryGrid, DEFAULT_CACHE_CONFIGURATION, MemoryGrid } from './client.js';
export {
  CacheNotFoundError,
  GridError,
  LockUnavailableError,
  OptimisticConflictError,
  TransactionStateError,
  UnsupportedKeyError,
} from './errors.js';
export { MemoryLock } from './lock.js';
export { DEFAULT_TRANSACTION_OPTIONS, MemoryTransaction } from './transaction.js';

/** @cache-chain/core - Session-scoped action chains over cache capabilities */

// Actions
export type { Action, ActionLifecycle, ActionOutcome } from './actions/action.js';
export {
  callAsync,
  callInMode,
  callSync,
  ChainInterruptedError,
  reportOutcome,
  runActionLifecycle,
} from './actions/action.js';
export type { CacheActionSpec, CacheOperation } from './actions/cache-actions.js';
export {
  CacheActionBuilder,
  get,
  getAll,
  getAndPut,
  getAndRemove,
  put,
  putAll,
  putEntry,
  remove,
  removeAll,
} from './actions/cache-actions.js';
export { CacheCreationAction, getOrCreateCache } from './actions/client-actions.js';
export { LockAcquireAction, LockReleaseAction, lock, lockId, unlock } from './actions/lock-actions.js';
export {
  commit,
  rollback,
  TransactionBeginAction,
  TransactionCloseAction,
  TransactionCommitAction,
  TransactionRollbackAction,
  txBegin,
  txClose,
} from './actions/transaction-actions.js';
// Chain
export type { ActionContextOptions } from './chain/context.js';
export { createActionContext } from './chain/context.js';
export type { ChainOutcome } from './chain/driver.js';
export { executeWithTimeout, runChain } from './chain/driver.js';
export type { ChainElement, ChainPart, GroupBlock } from './chain/elements.js';
export { chain, group, TransactionScope, TransactionScopeBuilder, tx } from './chain/elements.js';
// Checks
export type { Entry, Extractor, Found } from './checks/builders.js';
export { CheckBuilder, EntriesCheckBuilder, entries, entry, mapResult, ValidatedCheck } from './checks/builders.js';
export type { Check, SessionUpdate } from './checks/check.js';
export { runChecks } from './checks/check.js';
// Constants
export type { ActionType, CacheActionType, ClientActionType, TransactionActionType } from './constants.js';
export { DEFAULTS, RESOLUTION_MESSAGES, TRANSACTION_ACTION } from './constants.js';
// Domain
export type { SessionId } from './domain/branded-types.js';
export { createSessionId, generateSessionId, IdValidationError, isSessionId } from './domain/branded-types.js';
export type { ActionFailure, FailureKind, FailureReason, Result } from './domain/result.js';
export { fail, failure, flatMapSuccess, formatActionFailure, mapSuccess, success } from './domain/result.js';
// Expressions
export type { Expression } from './expressions/expression.js';
export {
  describeExpression,
  formatValue,
  fromSession,
  isSessionExpression,
  resolveExpression,
  SessionExpression,
  template,
} from './expressions/expression.js';
// Interfaces
export type {
  ApiMode,
  CacheAtomicity,
  CacheConfiguration,
  CacheHandle,
  CacheMode,
  ClientHandle,
  LockHandle,
  TransactionConcurrency,
  TransactionHandle,
  TransactionIsolation,
  TransactionOptions,
  TransactionState,
} from './interfaces/index.js';
// Resolver
export type { CacheParameters, CacheRequest, ClientParameters } from './resolver/parameter-resolver.js';
export { resolveCacheParameters, resolveClientParameters } from './resolver/parameter-resolver.js';
// Session
export type { CreateSessionOptions } from './session/session.js';
export { Session } from './session/session.js';
export { anyKey, booleanKey, numberKey, SessionKey, sessionKey, stringKey } from './session/session-key.js';
// Types
export type {
  ActionContext,
  CheckPolicy,
  NestedTransactionPolicy,
  OutcomeReporter,
  RequestOutcome,
  RequestStatus,
} from './types.js';
// Utilities
export type { ErrorHandler, ErrorStrategy } from './utils/error-handler.js';
export { createErrorHandler, describeError, normalizeError, withErrorHandlingSync } from './utils/error-handler.js';

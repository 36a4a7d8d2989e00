import type { SessionId } from './domain/branded-types.js';

/**
 * How a group of checks reports failures
 * - `aggregate`: evaluate every check and report all failures
 * - `failFast`: stop at the first failing check
 */
export type CheckPolicy = 'aggregate' | 'failFast';

/**
 * What a transaction begin does when the session already holds a transaction
 * - `fail`: fail the begin action
 * - `reuse`: keep the active transaction; a scope that reused it leaves closing to its owner
 */
export type NestedTransactionPolicy = 'fail' | 'reuse';

export type RequestStatus = 'OK' | 'KO';

/**
 * Outcome of one executed request, as handed to the harness
 */
export interface RequestOutcome {
  /** Request name (explicit, or `<actionType> <cacheName>`) */
  request: string;
  /** Enclosing group names, outermost first */
  groups: readonly string[];
  sessionId: SessionId;
  userId: number;
  /** Clock reading before the capability call */
  start: number;
  /** Clock reading after the result and checks were processed */
  end: number;
  status: RequestStatus;
  /** Failure description for `KO` outcomes */
  message?: string;
}

/**
 * Sink for request outcomes, supplied by the harness
 *
 * @example
 * ```typescript
 * const reporter: OutcomeReporter = {
 *   record: (outcome) => stats.add(outcome.request, outcome.end - outcome.start, outcome.status),
 * };
 * ```
 */
export interface OutcomeReporter {
  record(outcome: RequestOutcome): void;
}

/**
 * Execution context handed to every action by the chain driver
 */
export interface ActionContext {
  readonly reporter: OutcomeReporter;
  readonly checkPolicy: CheckPolicy;
  readonly nestedTransactions: NestedTransactionPolicy;
  /** Group path of the element being executed */
  readonly groups: readonly string[];
  /** Millisecond clock used for outcome timestamps */
  readonly clock: () => number;
  /** Milliseconds an action may take before it is abandoned */
  readonly requestTimeout?: number;
  /** Aborts the chain before its next action */
  readonly signal?: AbortSignal;
}

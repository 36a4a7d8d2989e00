import type {
  ChainOutcome,
  CheckPolicy,
  ClientHandle,
  ErrorHandler,
  ErrorStrategy,
  NestedTransactionPolicy,
  OutcomeReporter,
  RequestOutcome,
  Session,
} from '@cache-chain/core';

/** Shared client, or a factory called once per run */
export type ClientSource = ClientHandle | (() => ClientHandle);

/**
 * Initial session attributes per user
 *
 * A list is cycled through by user id (user 1 gets the first record); a function is
 * called with the user id.
 */
export type Feeder = readonly Readonly<Record<string, unknown>>[] | ((userId: number) => Readonly<Record<string, unknown>>);

/**
 * Scenario run configuration
 *
 * @example
 * ```typescript
 * const report = await runScenario(transfers, {
 *   users: 10,
 *   client: () => createMemoryGrid({ mode: 'async' }),
 *   feeder: (userId) => ({ account: userId }),
 *   requestTimeout: 2_000,
 * });
 * ```
 */
export interface RunnerOptions {
  client: ClientSource;
  /** Number of sessions started at once (default: 1) */
  users?: number;
  feeder?: Feeder;
  checkPolicy?: CheckPolicy;
  nestedTransactions?: NestedTransactionPolicy;
  /** Milliseconds an action may take before it fails with a timeout */
  requestTimeout?: number;
  /** Aborts every session before its next action */
  signal?: AbortSignal;
  /** Receives every outcome as it is recorded */
  reporter?: OutcomeReporter;
  /**
   * Handling of reporter and cleanup errors (default: `log`)
   *
   * Under `throw` the run rejects with the first such error.
   */
  errorHandler?: ErrorStrategy | ErrorHandler;
  clock?: () => number;
}

export interface SessionResult {
  userId: number;
  outcome: ChainOutcome;
  /** Final session, after abandoned resources were released */
  session: Session;
}

export interface ScenarioReport {
  scenario: string;
  /** One entry per user, in user id order */
  sessions: readonly SessionResult[];
  /** Outcomes in recording order */
  outcomes: readonly RequestOutcome[];
  okRequests: number;
  failedRequests: number;
  failedSessions: number;
}

/**
 * Scenario Runner
 *
 * Starts every user's session at once against one shared client and threads each
 * through the chain driver. Sessions never share state beyond the client.
 *
 * @module runner
 */

import {
  ChainInterruptedError,
  type ChainOutcome,
  type ClientHandle,
  createActionContext,
  createErrorHandler,
  describeError,
  type ErrorHandler,
  type OutcomeReporter,
  type RequestOutcome,
  runChain,
  Session,
  withErrorHandlingSync,
} from '@cache-chain/core';
import { releaseSessionResources } from './cleanup.js';
import { RUNNER_DEFAULTS, validateRunnerOptions } from './config/index.js';
import type { ScenarioBuilder } from './scenario.js';
import type { Feeder, RunnerOptions, ScenarioReport, SessionResult } from './types.js';
import { runnerLog } from './utils/debug.js';

const resolveErrorHandler = (option: RunnerOptions['errorHandler']): ErrorHandler =>
  typeof option === 'function' ? option : createErrorHandler(option ?? RUNNER_DEFAULTS.ERROR_STRATEGY);

const resolveClient = (source: RunnerOptions['client']): ClientHandle =>
  typeof source === 'function' ? source() : source;

const attributesFor = (feeder: Feeder | undefined, userId: number): Readonly<Record<string, unknown>> => {
  if (feeder === undefined) {
    return {};
  }
  if (typeof feeder === 'function') {
    return feeder(userId);
  }
  return feeder[(userId - 1) % feeder.length] ?? {};
};

/** Keeps every outcome and forwards it to the configured reporter */
const createCollectingReporter = (
  outcomes: RequestOutcome[],
  forward: OutcomeReporter | undefined,
  errorHandler: ErrorHandler,
): OutcomeReporter => ({
  record: (outcome) => {
    outcomes.push(outcome);
    if (forward !== undefined) {
      withErrorHandlingSync(() => forward.record(outcome), errorHandler, `outcome reporter (${outcome.request})`);
    }
  },
});

/**
 * Releases what an interrupted chain left in its session and returns the error to raise
 *
 * The interrupting error wins over any cleanup failure, which is only logged.
 */
const abandonInterrupted = (error: unknown, started: Session, errorHandler: ErrorHandler): unknown => {
  const interrupted = error instanceof ChainInterruptedError ? error : undefined;
  const latest = interrupted?.session ?? started;
  try {
    releaseSessionResources(latest, errorHandler);
  } catch (cleanupError) {
    runnerLog('session %s: cleanup after interruption failed: %s', latest.id, describeError(cleanupError));
  }
  return interrupted ? interrupted.cause : error;
};

/**
 * Runs `scenario` once per user
 *
 * @throws {Error} If the options are invalid, or a reporter or cleanup error reaches a
 * `throw` error handler
 *
 * @example
 * ```typescript
 * const report = await runScenario(scenario('smoke').exec(put<number, number>('accounts', 1, 1)), {
 *   users: 5,
 *   client: createMemoryGrid({ caches: { accounts: {} } }),
 * });
 * console.log(`${report.okRequests} OK, ${report.failedRequests} KO`);
 * ```
 */
export const runScenario = async (scenario: ScenarioBuilder, options: RunnerOptions): Promise<ScenarioReport> => {
  validateRunnerOptions(options);

  const users = options.users ?? RUNNER_DEFAULTS.USERS;
  const errorHandler = resolveErrorHandler(options.errorHandler);
  const client = resolveClient(options.client);
  const outcomes: RequestOutcome[] = [];
  const ctx = createActionContext({
    reporter: createCollectingReporter(outcomes, options.reporter, errorHandler),
    ...(options.checkPolicy !== undefined ? { checkPolicy: options.checkPolicy } : {}),
    ...(options.nestedTransactions !== undefined ? { nestedTransactions: options.nestedTransactions } : {}),
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
    ...(options.requestTimeout !== undefined ? { requestTimeout: options.requestTimeout } : {}),
    ...(options.signal !== undefined ? { signal: options.signal } : {}),
  });

  runnerLog('scenario %s: starting %d users', scenario.name, users);

  const runUser = async (userId: number): Promise<SessionResult> => {
    const session = Session.create({
      userId,
      scenario: scenario.name,
      client,
      attributes: attributesFor(options.feeder, userId),
    });
    let outcome: ChainOutcome;
    try {
      outcome = await runChain(scenario.elements, session, ctx);
    } catch (error) {
      throw abandonInterrupted(error, session, errorHandler);
    }
    runnerLog('user %d: chain %s', userId, outcome.status);
    return { userId, outcome, session: releaseSessionResources(outcome.session, errorHandler) };
  };

  const sessions = await Promise.all(Array.from({ length: users }, (_, index) => runUser(index + 1)));

  const okRequests = outcomes.filter((outcome) => outcome.status === 'OK').length;
  const report: ScenarioReport = {
    scenario: scenario.name,
    sessions,
    outcomes,
    okRequests,
    failedRequests: outcomes.length - okRequests,
    failedSessions: sessions.filter((result) => result.outcome.status === 'failed').length,
  };
  runnerLog('scenario %s: %d OK, %d KO', scenario.name, report.okRequests, report.failedRequests);
  return report;
};

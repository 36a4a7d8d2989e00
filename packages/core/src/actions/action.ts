/**
 * Action lifecycle
 *
 * Every action runs the same steps:
 * resolve parameters → invoke the capability → run checks → update the session → report
 *
 * Each step returns a `Result`; the first failing step short-circuits the rest and the
 * action fails with a reason naming its type and resource. Only a throwing reporter
 * escapes, as a `ChainInterruptedError` carrying the session the action left behind.
 *
 * @module actions/action
 */

import type { ActionType } from '../constants.js';
import { type Check, runChecks } from '../checks/check.js';
import {
  type ActionFailure,
  type FailureReason,
  fail,
  flatMapSuccess,
  formatActionFailure,
  mapSuccess,
  type Result,
  success,
} from '../domain/result.js';
import type { Session } from '../session/session.js';
import type { ActionContext } from '../types.js';
import { actionLog } from '../utils/debug.js';
import { describeError } from '../utils/error-handler.js';

/** Result of executing one action */
export type ActionOutcome =
  | { status: 'continue'; session: Session }
  | {
      status: 'fail';
      failure: ActionFailure;
      /** Session the chain is left in; unchanged unless the action must release a resource */
      session: Session;
    };

/**
 * Error that escaped a chain, with the latest session known when it did
 *
 * The session still holds whatever transaction and locks were taken before the error,
 * so the caller can release them.
 */
export class ChainInterruptedError extends Error {
  constructor(
    public readonly session: Session,
    cause: unknown,
  ) {
    super(describeError(cause), { cause });
    this.name = 'ChainInterruptedError';
  }
}

/**
 * Unit of work in a chain
 */
export interface Action {
  readonly kind: 'action';
  readonly actionType: ActionType;
  /** Name outcomes are reported under */
  readonly request: string;
  /** Cache or resource name; empty for transaction actions */
  readonly resource: string;
  execute(session: Session, ctx: ActionContext): Promise<ActionOutcome>;
}

/**
 * Steps of one action
 *
 * @typeParam P - Resolved parameters
 * @typeParam R - Operation result
 */
export interface ActionLifecycle<P, R> {
  actionType: ActionType;
  request: string;
  resource: string;
  resolve: (session: Session) => Result<P>;
  invoke: (params: P, session: Session) => Promise<Result<R>>;
  checks?: readonly Check<R>[];
  update?: (session: Session, params: P, result: R) => Session;
  /** Session to leave the chain in when the call or its checks fail */
  onFailure?: (session: Session, params: P) => Session;
}

/** Runs a sync capability call, capturing a throw as an operation failure */
export const callSync = <T>(fn: () => T): Result<T> => {
  try {
    return success(fn());
  } catch (error) {
    return fail('operation', describeError(error));
  }
};

/** Awaits an async capability call, capturing a rejection as an operation failure */
export const callAsync = async <T>(fn: () => Promise<T>): Promise<Result<T>> => {
  try {
    return success(await fn());
  } catch (error) {
    return fail('operation', describeError(error));
  }
};

/** Calls the sync or the async variant of an operation */
export const callInMode = <T>(async: boolean, syncFn: () => T, asyncFn: () => Promise<T>): Promise<Result<T>> =>
  async ? callAsync(asyncFn) : Promise.resolve(callSync(syncFn));

/**
 * Reports one request outcome to the harness
 */
export const reportOutcome = (
  ctx: ActionContext,
  session: Session,
  request: string,
  start: number,
  end: number,
  failed?: ActionFailure,
): void => {
  ctx.reporter.record({
    request,
    groups: ctx.groups,
    sessionId: session.id,
    userId: session.userId,
    start,
    end,
    status: failed ? 'KO' : 'OK',
    ...(failed ? { message: formatActionFailure(failed) } : {}),
  });
};

const reportFrom = (session: Session, report: () => void): void => {
  try {
    report();
  } catch (error) {
    throw new ChainInterruptedError(session, error);
  }
};

/**
 * Executes an action lifecycle against `session`
 *
 * @example
 * ```typescript
 * return runActionLifecycle(session, ctx, {
 *   actionType: 'txCommit',
 *   request: 'txCommit',
 *   resource: '',
 *   resolve: requireTransaction,
 *   invoke: async (transaction) => callSync(() => transaction.commit()),
 * });
 * ```
 */
export const runActionLifecycle = async <P, R>(
  session: Session,
  ctx: ActionContext,
  lifecycle: ActionLifecycle<P, R>,
): Promise<ActionOutcome> => {
  const { actionType, request, resource } = lifecycle;
  const describe = (reasons: readonly FailureReason[]): ActionFailure => ({ request, actionType, resource, reasons });

  const resolved = lifecycle.resolve(session);
  if (!resolved.success) {
    const now = ctx.clock();
    const failed = describe(resolved.errors);
    actionLog('session %s: %s rejected: %s', session.id, request, formatActionFailure(failed));
    reportFrom(session, () => reportOutcome(ctx, session, request, now, now, failed));
    return { status: 'fail', failure: failed, session };
  }
  const params = resolved.value;

  actionLog('session %s: before %s', session.id, request);
  const start = ctx.clock();
  const invoked = await lifecycle.invoke(params, session);
  const next = flatMapSuccess(invoked, (result) =>
    mapSuccess(runChecks(lifecycle.checks ?? [], result, session, ctx.checkPolicy), (checked) =>
      lifecycle.update ? lifecycle.update(checked, params, result) : checked,
    ),
  );
  const end = ctx.clock();

  if (!next.success) {
    const failed = describe(next.errors);
    actionLog('session %s: %s failed: %s', session.id, request, formatActionFailure(failed));
    const left = lifecycle.onFailure?.(session, params) ?? session;
    reportFrom(left, () => reportOutcome(ctx, session, request, start, end, failed));
    return { status: 'fail', failure: failed, session: left };
  }

  actionLog('session %s: %s succeeded', session.id, request);
  reportFrom(next.value, () => reportOutcome(ctx, session, request, start, end));
  return { status: 'continue', session: next.value };
};

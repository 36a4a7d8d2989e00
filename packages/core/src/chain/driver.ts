/**
 * Chain driver
 *
 * Runs chain elements in order, threading the session from each action into the next.
 * The first failure halts the chain. A scoped transaction is closed whether its body
 * completed, failed, was aborted or was interrupted by a thrown error, and the session
 * leaving the scope never holds the transaction.
 *
 * @module chain/driver
 */

import { type Action, type ActionOutcome, ChainInterruptedError, reportOutcome } from '../actions/action.js';
import { txBegin, txClose } from '../actions/transaction-actions.js';
import type { ActionFailure } from '../domain/result.js';
import type { Session } from '../session/session.js';
import type { ActionContext } from '../types.js';
import { chainLog } from '../utils/debug.js';
import type { ChainElement, TransactionScope } from './elements.js';

export type ChainOutcome =
  | { status: 'completed'; session: Session }
  | { status: 'failed'; session: Session; failures: ActionFailure[] };

const completed = (session: Session): ChainOutcome => ({ status: 'completed', session });

const failed = (session: Session, failures: ActionFailure[]): ChainOutcome => ({ status: 'failed', session, failures });

const actionFailure = (action: Action, kind: 'timeout' | 'aborted', message: string): ActionFailure => ({
  request: action.request,
  actionType: action.actionType,
  resource: action.resource,
  reasons: [{ kind, message }],
});

const EXPIRED = Symbol('expired');

/**
 * Executes one action, abandoning it after `ctx.requestTimeout` milliseconds
 *
 * An abandoned action reports a timeout; anything it reports afterwards is dropped.
 */
export const executeWithTimeout = async (action: Action, session: Session, ctx: ActionContext): Promise<ActionOutcome> => {
  const { requestTimeout } = ctx;
  if (requestTimeout === undefined) {
    return action.execute(session, ctx);
  }

  let open = true;
  const gated: ActionContext = {
    ...ctx,
    reporter: {
      record: (outcome) => {
        if (open) {
          ctx.reporter.record(outcome);
        }
      },
    },
  };

  const start = ctx.clock();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<typeof EXPIRED>((resolve) => {
    timer = setTimeout(() => {
      open = false;
      resolve(EXPIRED);
    }, requestTimeout);
  });

  let settled: ActionOutcome | typeof EXPIRED;
  try {
    settled = await Promise.race([action.execute(session, gated), expired]);
  } finally {
    clearTimeout(timer);
  }
  if (settled !== EXPIRED) {
    return settled;
  }

  const timedOut = actionFailure(action, 'timeout', `no result within ${requestTimeout} ms`);
  chainLog('session %s: %s timed out', session.id, action.request);
  reportOutcome(ctx, session, action.request, start, ctx.clock(), timedOut);
  return { status: 'fail', failure: timedOut, session };
};

const runAction = async (action: Action, session: Session, ctx: ActionContext): Promise<ChainOutcome> => {
  if (ctx.signal?.aborted) {
    chainLog('session %s: aborted before %s', session.id, action.request);
    return failed(session, [actionFailure(action, 'aborted', 'chain aborted')]);
  }
  const outcome = await executeWithTimeout(action, session, ctx);
  return outcome.status === 'continue' ? completed(outcome.session) : failed(outcome.session, [outcome.failure]);
};

const mergeClose = (body: ChainOutcome, closed: ActionOutcome): ChainOutcome => {
  const session = closed.session.withoutTransaction();
  const bodyFailures = body.status === 'failed' ? body.failures : [];
  const failures = closed.status === 'fail' ? [...bodyFailures, closed.failure] : bodyFailures;
  return failures.length > 0 ? failed(session, failures) : completed(session);
};

/**
 * Closes the transaction an interrupted scope body left behind
 *
 * Nothing is reported: the error being raised is usually the reporter's own.
 */
const closeInterrupted = (error: unknown, scopeSession: Session): ChainInterruptedError => {
  const latest = error instanceof ChainInterruptedError ? error.session : scopeSession;
  let raised = error instanceof ChainInterruptedError ? error.cause : error;
  const transaction = latest.transaction;
  if (transaction !== undefined && !transaction.closed) {
    chainLog('session %s: closing transaction of interrupted scope', latest.id);
    try {
      transaction.close();
    } catch (closeError) {
      raised = new AggregateError([raised, closeError], 'scope interrupted and its transaction failed to close');
    }
  }
  return new ChainInterruptedError(latest.withoutTransaction(), raised);
};

const runTransactionScope = async (scope: TransactionScope, session: Session, ctx: ActionContext): Promise<ChainOutcome> => {
  const scopeCtx: ActionContext = scope.name ? { ...ctx, groups: [...ctx.groups, scope.name] } : ctx;
  const ownsTransaction = session.transaction === undefined;

  let body: ChainOutcome;
  try {
    const begun = await runAction(txBegin(scope.options), session, scopeCtx);
    if (begun.status === 'failed') {
      return begun;
    }
    body = await runChain(scope.elements, begun.session, scopeCtx);
  } catch (error) {
    throw ownsTransaction ? closeInterrupted(error, session) : error;
  }
  if (!ownsTransaction) {
    return body;
  }
  // Close is not subject to abort.
  const closed = await executeWithTimeout(txClose(), body.session, scopeCtx);
  return mergeClose(body, closed);
};

const runElement = (element: ChainElement, session: Session, ctx: ActionContext): Promise<ChainOutcome> => {
  switch (element.kind) {
    case 'action':
      return runAction(element, session, ctx);
    case 'group':
      return runChain(element.elements, session, { ...ctx, groups: [...ctx.groups, element.name] });
    case 'transaction':
      return runTransactionScope(element, session, ctx);
  }
};

/**
 * Runs `elements` against `session`
 *
 * @throws {ChainInterruptedError} If a collaborator throws, e.g. the outcome reporter
 *
 * @example
 * ```typescript
 * const outcome = await runChain(chain(put<number, number>('C', 1, 2), get<number, number>('C', 1)), session, ctx);
 * if (outcome.status === 'failed') {
 *   console.log(outcome.failures.map(formatActionFailure));
 * }
 * ```
 */
export const runChain = async (
  elements: readonly ChainElement[],
  session: Session,
  ctx: ActionContext,
): Promise<ChainOutcome> => {
  let current = session;
  for (const element of elements) {
    let outcome: ChainOutcome;
    try {
      outcome = await runElement(element, current, ctx);
    } catch (error) {
      throw error instanceof ChainInterruptedError ? error : new ChainInterruptedError(current, error);
    }
    if (outcome.status === 'failed') {
      return outcome;
    }
    current = outcome.session;
  }
  return completed(current);
};

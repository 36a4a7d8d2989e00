/**
 * Check Pipeline
 *
 * Checks are pure functions of (operation result, session) that either pass, possibly
 * producing a session update, or fail with a description of what was found.
 *
 * @module checks/check
 */

import { failure, type FailureReason, type Result, success } from '../domain/result.js';
import type { Session } from '../session/session.js';
import type { CheckPolicy } from '../types.js';
import { describeError } from '../utils/error-handler.js';

/** Session mutation produced by a passing check */
export type SessionUpdate = (session: Session) => Session;

/**
 * Assertion or extraction over an operation result
 *
 * @typeParam R - Operation result type
 */
export interface Check<R> {
  readonly description: string;
  evaluate(result: R, session: Session): Result<SessionUpdate | undefined>;
}

const evaluateSafely = <R>(check: Check<R>, result: R, session: Session): Result<SessionUpdate | undefined> => {
  try {
    return check.evaluate(result, session);
  } catch (error) {
    return failure([{ kind: 'check', message: `${check.description}: ${describeError(error)}` }]);
  }
};

/**
 * Runs checks in declaration order and folds their session updates
 *
 * With `aggregate` every check is evaluated and all failures are returned; with
 * `failFast` evaluation stops at the first failure. When any check fails no update is
 * applied, so the caller's session stays as it was.
 *
 * @example
 * ```typescript
 * const checked = runChecks([entries<number, number>().count.is(1)], result, session, 'aggregate');
 * if (checked.success) {
 *   session = checked.value;
 * }
 * ```
 */
export const runChecks = <R>(
  checks: readonly Check<R>[],
  result: R,
  session: Session,
  policy: CheckPolicy,
): Result<Session> => {
  const updates: SessionUpdate[] = [];
  const errors: FailureReason[] = [];

  for (const check of checks) {
    const outcome = evaluateSafely(check, result, session);
    if (!outcome.success) {
      errors.push(...outcome.errors);
      if (policy === 'failFast') {
        break;
      }
      continue;
    }
    if (outcome.value) {
      updates.push(outcome.value);
    }
  }

  if (errors.length > 0) {
    return failure(errors);
  }
  return success(updates.reduce((current, update) => update(current), session));
};

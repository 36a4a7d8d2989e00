import { type ErrorHandler, type Session, withErrorHandlingSync } from '@cache-chain/core';
import { runnerLog } from './utils/debug.js';

/**
 * Closes a transaction and releases locks the session still holds after its chain
 * ended
 *
 * Every release is attempted even when an earlier one fails. Failures go to
 * `errorHandler`; whatever it throws is rethrown once all releases ran, several
 * errors as an `AggregateError`.
 */
export const releaseSessionResources = (session: Session, errorHandler: ErrorHandler): Session => {
  const errors: unknown[] = [];
  const attempt = (release: () => void, context: string): void => {
    try {
      withErrorHandlingSync(release, errorHandler, context);
    } catch (error) {
      errors.push(error);
    }
  };

  let released = session;

  const transaction = session.transaction;
  if (transaction !== undefined) {
    if (!transaction.closed) {
      runnerLog('session %s: closing abandoned transaction', session.id);
      attempt(() => transaction.close(), `transaction cleanup of session ${session.id}`);
    }
    released = released.withoutTransaction();
  }

  for (const [lockId, lock] of session.locks) {
    runnerLog('session %s: releasing abandoned lock %s', session.id, lockId);
    attempt(() => lock.release(), `lock cleanup of ${lockId} in session ${session.id}`);
    released = released.withoutLock(lockId);
  }

  if (errors.length > 0) {
    throw errors.length === 1 ? errors[0] : new AggregateError(errors, `cleanup of session ${session.id} failed`);
  }
  return released;
};

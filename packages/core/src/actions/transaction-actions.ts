/**
 * Transaction actions
 *
 * Begin, commit, rollback and close of the session's transaction. Close always
 * removes the transaction from the session, even when the close call fails, and a
 * close without a commit before it rolls back.
 *
 * @module actions/transaction-actions
 */

import { RESOLUTION_MESSAGES, TRANSACTION_ACTION, type TransactionActionType } from '../constants.js';
import { fail, flatMapSuccess, type Result, success } from '../domain/result.js';
import type { ClientHandle, TransactionHandle, TransactionOptions } from '../interfaces/index.js';
import { resolveClientParameters } from '../resolver/parameter-resolver.js';
import type { Session } from '../session/session.js';
import type { ActionContext } from '../types.js';
import { transactionLog } from '../utils/debug.js';
import { type Action, type ActionOutcome, callSync, runActionLifecycle } from './action.js';

const requireNoTransaction = (session: Session): Result<ClientHandle> =>
  flatMapSuccess(resolveClientParameters(session), ({ client, transaction }) =>
    transaction ? fail('resolution', RESOLUTION_MESSAGES.TRANSACTION_ACTIVE) : success(client),
  );

const requireTransaction = (session: Session): Result<TransactionHandle> =>
  flatMapSuccess(resolveClientParameters(session), ({ transaction }) =>
    transaction ? success(transaction) : fail('resolution', RESOLUTION_MESSAGES.NO_TRANSACTION),
  );

abstract class TransactionAction implements Action {
  readonly kind = 'action';
  readonly resource = '';
  abstract readonly actionType: TransactionActionType;

  constructor(protected readonly requestName?: string) {}

  get request(): string {
    return this.requestName ?? this.actionType;
  }

  abstract execute(session: Session, ctx: ActionContext): Promise<ActionOutcome>;
}

export class TransactionBeginAction extends TransactionAction {
  override readonly actionType = TRANSACTION_ACTION.BEGIN;

  constructor(
    readonly options: TransactionOptions = {},
    requestName?: string,
  ) {
    super(requestName);
  }

  as(requestName: string): TransactionBeginAction {
    return new TransactionBeginAction(this.options, requestName);
  }

  override execute(session: Session, ctx: ActionContext): Promise<ActionOutcome> {
    if (session.transaction && session.client && ctx.nestedTransactions === 'reuse') {
      transactionLog('session %s: reusing active transaction', session.id);
      return Promise.resolve({ status: 'continue', session });
    }
    return runActionLifecycle(session, ctx, {
      actionType: this.actionType,
      request: this.request,
      resource: this.resource,
      resolve: requireNoTransaction,
      invoke: async (client) => callSync(() => client.beginTransaction(this.options)),
      update: (current, _client, transaction) => {
        transactionLog('session %s: transaction started %o', session.id, this.options);
        return current.withTransaction(transaction);
      },
    });
  }
}

export class TransactionCommitAction extends TransactionAction {
  override readonly actionType = TRANSACTION_ACTION.COMMIT;

  as(requestName: string): TransactionCommitAction {
    return new TransactionCommitAction(requestName);
  }

  override execute(session: Session, ctx: ActionContext): Promise<ActionOutcome> {
    return runActionLifecycle(session, ctx, {
      actionType: this.actionType,
      request: this.request,
      resource: this.resource,
      resolve: requireTransaction,
      invoke: async (transaction) => callSync(() => transaction.commit()),
    });
  }
}

export class TransactionRollbackAction extends TransactionAction {
  override readonly actionType = TRANSACTION_ACTION.ROLLBACK;

  as(requestName: string): TransactionRollbackAction {
    return new TransactionRollbackAction(requestName);
  }

  override execute(session: Session, ctx: ActionContext): Promise<ActionOutcome> {
    return runActionLifecycle(session, ctx, {
      actionType: this.actionType,
      request: this.request,
      resource: this.resource,
      resolve: requireTransaction,
      invoke: async (transaction) => callSync(() => transaction.rollback()),
    });
  }
}

/**
 * Close of the session's transaction
 *
 * A session without a transaction continues unchanged and nothing is reported.
 */
export class TransactionCloseAction extends TransactionAction {
  override readonly actionType = TRANSACTION_ACTION.CLOSE;

  as(requestName: string): TransactionCloseAction {
    return new TransactionCloseAction(requestName);
  }

  override execute(session: Session, ctx: ActionContext): Promise<ActionOutcome> {
    if (session.client && !session.transaction) {
      return Promise.resolve({ status: 'continue', session });
    }
    return runActionLifecycle(session, ctx, {
      actionType: this.actionType,
      request: this.request,
      resource: this.resource,
      resolve: requireTransaction,
      invoke: async (transaction) => callSync(() => transaction.close()),
      update: (current) => {
        transactionLog('session %s: transaction closed', session.id);
        return current.withoutTransaction();
      },
      onFailure: (current) => current.withoutTransaction(),
    });
  }
}

/**
 * Begins a transaction and stores it in the session
 *
 * @example
 * ```typescript
 * chain(
 *   txBegin({ concurrency: 'PESSIMISTIC', isolation: 'REPEATABLE_READ' }),
 *   put<number, number>('accounts', 1, 100),
 *   commit(),
 *   txClose(),
 * );
 * ```
 */
export const txBegin = (options: TransactionOptions = {}): TransactionBeginAction => new TransactionBeginAction(options);

export const commit = (): TransactionCommitAction => new TransactionCommitAction();

export const rollback = (): TransactionRollbackAction => new TransactionRollbackAction();

export const txClose = (): TransactionCloseAction => new TransactionCloseAction();

/**
 * Explicit lock actions
 *
 * A lock is held in the session under `<cacheName>/<key>` until `unlock` releases it.
 * Taking a lock marks the session, so later cache actions can no longer run on the
 * async API.
 *
 * @example
 * ```typescript
 * chain(
 *   lock<number>('accounts', 1),
 *   get<number, number>('accounts', 1),
 *   unlock<number>('accounts', 1),
 * );
 * ```
 *
 * @module actions/lock-actions
 */

import type { CacheActionType } from '../constants.js';
import { RESOLUTION_MESSAGES } from '../constants.js';
import { fail, flatMapSuccess, mapSuccess, type Result, success } from '../domain/result.js';
import { type Expression, formatValue, resolveExpression } from '../expressions/expression.js';
import type { CacheHandle, LockHandle } from '../interfaces/index.js';
import { resolveCacheParameters } from '../resolver/parameter-resolver.js';
import type { Session } from '../session/session.js';
import type { ActionContext } from '../types.js';
import { type Action, type ActionOutcome, callSync, runActionLifecycle } from './action.js';

/** Session key a lock on `key` of `cacheName` is held under */
export const lockId = (cacheName: string, key: unknown): string => `${cacheName}/${formatValue(key)}`;

abstract class LockAction<K> implements Action {
  readonly kind = 'action';
  abstract readonly actionType: CacheActionType;

  constructor(
    readonly cacheName: string,
    readonly key: Expression<K>,
    protected readonly requestName?: string,
  ) {}

  get request(): string {
    return this.requestName ?? `${this.actionType} ${this.cacheName}`;
  }

  get resource(): string {
    return this.cacheName;
  }

  protected resolveLockTarget(session: Session): Result<{ cache: CacheHandle<K, unknown>; id: string; key: K }> {
    return flatMapSuccess(
      resolveCacheParameters<K, unknown>(session, { cacheName: this.cacheName, keepBinary: false, async: false }),
      ({ cache }) =>
        mapSuccess(resolveExpression(this.key, session), (key) => ({ cache, key, id: lockId(this.cacheName, key) })),
    );
  }

  abstract execute(session: Session, ctx: ActionContext): Promise<ActionOutcome>;
}

export class LockAcquireAction<K> extends LockAction<K> {
  override readonly actionType = 'lock';

  as(requestName: string): LockAcquireAction<K> {
    return new LockAcquireAction(this.cacheName, this.key, requestName);
  }

  override execute(session: Session, ctx: ActionContext): Promise<ActionOutcome> {
    return runActionLifecycle(session, ctx, {
      actionType: this.actionType,
      request: this.request,
      resource: this.cacheName,
      resolve: (current) => {
        const target = this.resolveLockTarget(current);
        if (target.success && current.transaction) {
          return fail('resolution', RESOLUTION_MESSAGES.LOCK_IN_TRANSACTION);
        }
        return target;
      },
      invoke: async ({ cache, key }) => callSync((): LockHandle => cache.lock(key)),
      update: (current, { id }, lock) => current.withExplicitLocksUsed().withLock(id, lock),
    });
  }
}

export class LockReleaseAction<K> extends LockAction<K> {
  override readonly actionType = 'unlock';

  as(requestName: string): LockReleaseAction<K> {
    return new LockReleaseAction(this.cacheName, this.key, requestName);
  }

  override execute(session: Session, ctx: ActionContext): Promise<ActionOutcome> {
    return runActionLifecycle(session, ctx, {
      actionType: this.actionType,
      request: this.request,
      resource: this.cacheName,
      resolve: (current) =>
        flatMapSuccess(this.resolveLockTarget(current), ({ id }) => {
          const lock = current.locks.get(id);
          return lock ? success({ id, lock }) : fail('resolution', `no lock held for '${id}'`);
        }),
      invoke: async ({ lock }) => callSync(() => lock.release()),
      update: (current, { id }) => current.withoutLock(id),
    });
  }
}

export const lock = <K>(cacheName: string, key: Expression<K>): LockAcquireAction<K> =>
  new LockAcquireAction(cacheName, key);

export const unlock = <K>(cacheName: string, key: Expression<K>): LockReleaseAction<K> =>
  new LockReleaseAction(cacheName, key);

/**
 * Cache actions
 *
 * Key-value operations against one named cache. Builders are immutable: every fluent
 * call returns a new action.
 *
 * @example
 * ```typescript
 * const key = numberKey('key');
 *
 * chain(
 *   put<number, number>('accounts', key, 100).as('open account'),
 *   get<number, number>('accounts', key).check(entries<number, number>().count.is(1)).async(),
 *   remove<number>('accounts', key),
 * );
 * ```
 *
 * @module actions/cache-actions
 */

import type { Check } from '../checks/check.js';
import type { CacheActionType } from '../constants.js';
import { flatMapSuccess, mapSuccess, type Result, success } from '../domain/result.js';
import { type Expression, resolveExpression } from '../expressions/expression.js';
import type { CacheHandle } from '../interfaces/index.js';
import { resolveCacheParameters } from '../resolver/parameter-resolver.js';
import type { Session } from '../session/session.js';
import type { ActionContext } from '../types.js';
import { type Action, type ActionOutcome, callInMode, callSync, runActionLifecycle } from './action.js';

/** Operation bound to its resolved keys and values */
export type CacheOperation<K, V, R> = (cache: CacheHandle<K, V>, async: boolean) => Promise<Result<R>>;

/** Static description of a cache action */
export interface CacheActionSpec<K, V, R> {
  actionType: CacheActionType;
  cacheName: string;
  requestName?: string;
  async?: boolean;
  keepBinary: boolean;
  checks: readonly Check<R>[];
  /** Resolves the action's expressions against the session */
  prepare: (session: Session) => Result<CacheOperation<K, V, R>>;
}

/**
 * Cache action
 *
 * @typeParam K - Key type
 * @typeParam V - Value type
 * @typeParam R - Operation result type checks run against
 */
export class CacheActionBuilder<K, V, R> implements Action {
  readonly kind = 'action';

  constructor(private readonly spec: CacheActionSpec<K, V, R>) {}

  get actionType(): CacheActionType {
    return this.spec.actionType;
  }

  get request(): string {
    return this.spec.requestName ?? `${this.spec.actionType} ${this.spec.cacheName}`;
  }

  get resource(): string {
    return this.spec.cacheName;
  }

  /** Request name outcomes are reported under */
  as(requestName: string): CacheActionBuilder<K, V, R> {
    return new CacheActionBuilder({ ...this.spec, requestName });
  }

  /** Uses the async API; fails at execution time inside a transaction or after explicit locks */
  async(enabled = true): CacheActionBuilder<K, V, R> {
    return new CacheActionBuilder({ ...this.spec, async: enabled });
  }

  keepBinary(enabled = true): CacheActionBuilder<K, V, R> {
    return new CacheActionBuilder({ ...this.spec, keepBinary: enabled });
  }

  /** Appends checks, evaluated in declaration order */
  check(...checks: Check<R>[]): CacheActionBuilder<K, V, R> {
    return new CacheActionBuilder({ ...this.spec, checks: [...this.spec.checks, ...checks] });
  }

  execute(session: Session, ctx: ActionContext): Promise<ActionOutcome> {
    const { spec } = this;
    return runActionLifecycle(session, ctx, {
      actionType: spec.actionType,
      request: this.request,
      resource: spec.cacheName,
      resolve: (current) =>
        flatMapSuccess(
          resolveCacheParameters<K, V>(current, {
            cacheName: spec.cacheName,
            keepBinary: spec.keepBinary,
            async: spec.async,
          }),
          (params) => mapSuccess(spec.prepare(current), (operation) => ({ params, operation })),
        ),
      invoke: async ({ params, operation }) => {
        const { cache, transaction } = params;
        const bound = transaction ? callSync(() => cache.withTransaction(transaction)) : success(cache);
        if (!bound.success) {
          return bound;
        }
        return operation(bound.value, params.async);
      },
      checks: spec.checks,
    });
  }
}

const cacheAction = <K, V, R>(
  actionType: CacheActionType,
  cacheName: string,
  prepare: CacheActionSpec<K, V, R>['prepare'],
): CacheActionBuilder<K, V, R> => new CacheActionBuilder({ actionType, cacheName, keepBinary: false, checks: [], prepare });

const resolvePair = <A, B>(first: Expression<A>, second: Expression<B>, session: Session): Result<[A, B]> =>
  flatMapSuccess(resolveExpression(first, session), (a) =>
    mapSuccess(resolveExpression(second, session), (b): [A, B] => [a, b]),
  );

export const put = <K, V>(cacheName: string, key: Expression<K>, value: Expression<V>): CacheActionBuilder<K, V, void> =>
  cacheAction('put', cacheName, (session) =>
    mapSuccess(resolvePair(key, value, session), ([k, v]) => (cache, async) =>
      callInMode(async, () => cache.put(k, v), () => cache.putAsync(k, v)),
    ),
  );

/**
 * Put of a key-value pair computed together
 *
 * @example
 * ```typescript
 * putEntry<number, number>('C', fromSession(() => success(entry(100, 101))));
 * ```
 */
export const putEntry = <K, V>(
  cacheName: string,
  pair: Expression<{ readonly key: K; readonly value: V }>,
): CacheActionBuilder<K, V, void> =>
  cacheAction('put', cacheName, (session) =>
    mapSuccess(resolveExpression(pair, session), ({ key, value }) => (cache, async) =>
      callInMode(async, () => cache.put(key, value), () => cache.putAsync(key, value)),
    ),
  );

export const putAll = <K, V>(cacheName: string, entries: Expression<ReadonlyMap<K, V>>): CacheActionBuilder<K, V, void> =>
  cacheAction('putAll', cacheName, (session) =>
    mapSuccess(resolveExpression(entries, session), (map) => (cache, async) =>
      callInMode(async, () => cache.putAll(map), () => cache.putAllAsync(map)),
    ),
  );

export const get = <K, V>(cacheName: string, key: Expression<K>): CacheActionBuilder<K, V, Map<K, V>> =>
  cacheAction('get', cacheName, (session) =>
    mapSuccess(resolveExpression(key, session), (k) => (cache, async) =>
      callInMode(async, () => cache.get(k), () => cache.getAsync(k)),
    ),
  );

export const getAll = <K, V>(cacheName: string, keys: Expression<readonly K[]>): CacheActionBuilder<K, V, Map<K, V>> =>
  cacheAction('getAll', cacheName, (session) =>
    mapSuccess(resolveExpression(keys, session), (ks) => (cache, async) =>
      callInMode(async, () => cache.getAll(ks), () => cache.getAllAsync(ks)),
    ),
  );

export const remove = <K>(cacheName: string, key: Expression<K>): CacheActionBuilder<K, unknown, void> =>
  cacheAction('remove', cacheName, (session) =>
    mapSuccess(resolveExpression(key, session), (k) => (cache, async) =>
      callInMode(async, () => cache.remove(k), () => cache.removeAsync(k)),
    ),
  );

export const removeAll = <K>(cacheName: string, keys: Expression<readonly K[]>): CacheActionBuilder<K, unknown, void> =>
  cacheAction('removeAll', cacheName, (session) =>
    mapSuccess(resolveExpression(keys, session), (ks) => (cache, async) =>
      callInMode(async, () => cache.removeAll(ks), () => cache.removeAllAsync(ks)),
    ),
  );

/** Stores the value; checks see the previous entry, empty when the key was absent */
export const getAndPut = <K, V>(
  cacheName: string,
  key: Expression<K>,
  value: Expression<V>,
): CacheActionBuilder<K, V, Map<K, V>> =>
  cacheAction('getAndPut', cacheName, (session) =>
    mapSuccess(resolvePair(key, value, session), ([k, v]) => (cache, async) =>
      callInMode(async, () => cache.getAndPut(k, v), () => cache.getAndPutAsync(k, v)),
    ),
  );

/** Removes the key; checks see the removed entry */
export const getAndRemove = <K, V>(cacheName: string, key: Expression<K>): CacheActionBuilder<K, V, Map<K, V>> =>
  cacheAction('getAndRemove', cacheName, (session) =>
    mapSuccess(resolveExpression(key, session), (k) => (cache, async) =>
      callInMode(async, () => cache.getAndRemove(k), () => cache.getAndRemoveAsync(k)),
    ),
  );

/**
 * Parameter Resolver
 *
 * Picks the capabilities an action runs with out of the session: the client, the
 * ambient transaction (if any) and the concrete cache view.
 *
 * Rules, in order:
 * 1. no client in the session fails with `no active client`
 * 2. async requested while a transaction is active or explicit locks were taken fails
 * 3. otherwise the cache is looked up by name, wrapped for keep-binary when asked,
 *    and paired with the active transaction
 *
 * @module resolver/parameter-resolver
 */

import { RESOLUTION_MESSAGES } from '../constants.js';
import { fail, type Result, success } from '../domain/result.js';
import type { CacheHandle, ClientHandle, TransactionHandle } from '../interfaces/index.js';
import type { Session } from '../session/session.js';
import { describeError } from '../utils/error-handler.js';

/** Parameters of actions that only need the client */
export interface ClientParameters {
  client: ClientHandle;
  /** Active transaction; absent means "run outside a transaction" */
  transaction: TransactionHandle | undefined;
}

/** Parameters of cache actions */
export interface CacheParameters<K, V> extends ClientParameters {
  cache: CacheHandle<K, V>;
  /** Effective operation mode */
  async: boolean;
}

/** What a cache action asks the resolver for */
export interface CacheRequest {
  cacheName: string;
  keepBinary: boolean;
  /**
   * Requested mode. Left unset, the action follows the client's mode, falling back
   * to sync inside a transaction or after explicit locks.
   */
  async?: boolean;
}

export const resolveClientParameters = (session: Session): Result<ClientParameters> => {
  const client = session.client;
  if (!client) {
    return fail('resolution', RESOLUTION_MESSAGES.NO_CLIENT);
  }
  return success({ client, transaction: session.transaction });
};

const isAsyncVetoed = (session: Session): boolean =>
  session.explicitLocksUsed === true || session.transaction !== undefined;

export const resolveCacheParameters = <K, V>(
  session: Session,
  request: CacheRequest,
): Result<CacheParameters<K, V>> => {
  const resolved = resolveClientParameters(session);
  if (!resolved.success) {
    return resolved;
  }
  const { client, transaction } = resolved.value;

  if (request.async === true && isAsyncVetoed(session)) {
    return fail('resolution', RESOLUTION_MESSAGES.ASYNC_CONFLICT);
  }
  const async = request.async ?? (client.mode === 'async' && !isAsyncVetoed(session));

  let cache: CacheHandle<K, V>;
  try {
    cache = client.cache<K, V>(request.cacheName);
    if (request.keepBinary) {
      cache = cache.withKeepBinary();
    }
  } catch (error) {
    return fail('resolution', `cache '${request.cacheName}' is not available: ${describeError(error)}`);
  }

  return success({ client, transaction, cache, async });
};

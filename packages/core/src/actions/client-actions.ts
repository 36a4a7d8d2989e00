/**
 * Client-level actions
 *
 * @module actions/client-actions
 */

import type { ClientActionType } from '../constants.js';
import type { CacheAtomicity, CacheConfiguration, CacheMode } from '../interfaces/index.js';
import { resolveClientParameters } from '../resolver/parameter-resolver.js';
import type { Session } from '../session/session.js';
import type { ActionContext } from '../types.js';
import { type Action, type ActionOutcome, callSync, runActionLifecycle } from './action.js';

/**
 * Creates a cache unless one with the same name exists
 *
 * @example
 * ```typescript
 * getOrCreateCache('accounts').backups(1).atomicity('TRANSACTIONAL').mode('PARTITIONED');
 * ```
 */
export class CacheCreationAction implements Action {
  readonly kind = 'action';
  readonly actionType: ClientActionType = 'getOrCreateCache';

  constructor(
    readonly cacheName: string,
    readonly config: CacheConfiguration = {},
    private readonly requestName?: string,
  ) {}

  get request(): string {
    return this.requestName ?? `${this.actionType} ${this.cacheName}`;
  }

  get resource(): string {
    return this.cacheName;
  }

  backups(backups: number): CacheCreationAction {
    return new CacheCreationAction(this.cacheName, { ...this.config, backups }, this.requestName);
  }

  atomicity(atomicity: CacheAtomicity): CacheCreationAction {
    return new CacheCreationAction(this.cacheName, { ...this.config, atomicity }, this.requestName);
  }

  mode(mode: CacheMode): CacheCreationAction {
    return new CacheCreationAction(this.cacheName, { ...this.config, mode }, this.requestName);
  }

  as(requestName: string): CacheCreationAction {
    return new CacheCreationAction(this.cacheName, this.config, requestName);
  }

  execute(session: Session, ctx: ActionContext): Promise<ActionOutcome> {
    return runActionLifecycle(session, ctx, {
      actionType: this.actionType,
      request: this.request,
      resource: this.cacheName,
      resolve: resolveClientParameters,
      invoke: async ({ client }) =>
        callSync(() => {
          client.getOrCreateCache(this.cacheName, this.config);
        }),
    });
  }
}

export const getOrCreateCache = (cacheName: string): CacheCreationAction => new CacheCreationAction(cacheName);

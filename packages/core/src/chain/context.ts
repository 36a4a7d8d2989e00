import { DEFAULTS } from '../constants.js';
import type { ActionContext, CheckPolicy, NestedTransactionPolicy, OutcomeReporter } from '../types.js';

export interface ActionContextOptions {
  reporter: OutcomeReporter;
  checkPolicy?: CheckPolicy;
  nestedTransactions?: NestedTransactionPolicy;
  clock?: () => number;
  requestTimeout?: number;
  signal?: AbortSignal;
}

/**
 * Builds the root context of a chain run, filling unset options with defaults
 *
 * @example
 * ```typescript
 * const ctx = createActionContext({ reporter, checkPolicy: 'failFast', requestTimeout: 5_000 });
 * await runChain(elements, session, ctx);
 * ```
 */
export const createActionContext = (options: ActionContextOptions): ActionContext => ({
  reporter: options.reporter,
  checkPolicy: options.checkPolicy ?? DEFAULTS.CHECK_POLICY,
  nestedTransactions: options.nestedTransactions ?? DEFAULTS.NESTED_TRANSACTIONS,
  groups: [],
  clock: options.clock ?? Date.now,
  ...(options.requestTimeout !== undefined ? { requestTimeout: options.requestTimeout } : {}),
  ...(options.signal ? { signal: options.signal } : {}),
});

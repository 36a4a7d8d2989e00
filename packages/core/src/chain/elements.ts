/**
 * Chain elements
 *
 * A chain is an ordered list of actions, named groups and scoped transactions.
 * Groups only prefix the group path of the outcomes inside them; a scoped transaction
 * begins a transaction, runs its body and always closes it.
 *
 * @example
 * ```typescript
 * const scenario = chain(
 *   getOrCreateCache('accounts').atomicity('TRANSACTIONAL'),
 *   group('writes', put<number, number>('accounts', 1, 100)),
 *   tx().concurrency('PESSIMISTIC').isolation('REPEATABLE_READ').run(
 *     get<number, number>('accounts', 1),
 *     commit(),
 *   ),
 * );
 * ```
 *
 * @module chain/elements
 */

import type { Action } from '../actions/action.js';
import type {
  TransactionConcurrency,
  TransactionIsolation,
  TransactionOptions,
} from '../interfaces/index.js';

/** Named sub-chain */
export interface GroupBlock {
  readonly kind: 'group';
  readonly name: string;
  readonly elements: readonly ChainElement[];
}

/** Sub-chain run inside a transaction that is closed on every exit path */
export class TransactionScope {
  readonly kind = 'transaction';

  constructor(
    readonly options: TransactionOptions,
    readonly elements: readonly ChainElement[],
    /** Group the scope's outcomes are reported under */
    readonly name?: string,
  ) {}

  as(name: string): TransactionScope {
    return new TransactionScope(this.options, this.elements, name);
  }
}

export type ChainElement = Action | GroupBlock | TransactionScope;

/** Element, or a list of them spliced in place */
export type ChainPart = ChainElement | readonly ChainElement[];

const isElementList = (part: ChainPart): part is readonly ChainElement[] => Array.isArray(part);

const flatten = (parts: readonly ChainPart[]): ChainElement[] =>
  parts.flatMap((part) => (isElementList(part) ? [...part] : [part]));

export const chain = (...parts: ChainPart[]): ChainElement[] => flatten(parts);

export const group = (name: string, ...parts: ChainPart[]): GroupBlock => ({
  kind: 'group',
  name,
  elements: flatten(parts),
});

/** Options of a scoped transaction, ending in `run` */
export class TransactionScopeBuilder {
  constructor(private readonly options: TransactionOptions = {}) {}

  concurrency(concurrency: TransactionConcurrency): TransactionScopeBuilder {
    return new TransactionScopeBuilder({ ...this.options, concurrency });
  }

  isolation(isolation: TransactionIsolation): TransactionScopeBuilder {
    return new TransactionScopeBuilder({ ...this.options, isolation });
  }

  timeout(timeout: number): TransactionScopeBuilder {
    return new TransactionScopeBuilder({ ...this.options, timeout });
  }

  run(...parts: ChainPart[]): TransactionScope {
    return new TransactionScope(this.options, flatten(parts));
  }
}

export const tx = (options: TransactionOptions = {}): TransactionScopeBuilder => new TransactionScopeBuilder(options);

import { type ChainElement, type ChainPart, chain } from '@cache-chain/core';

/**
 * Named chain run by every user of a scenario
 *
 * @example
 * ```typescript
 * const transfers = scenario('transfers')
 *   .exec(getOrCreateCache('accounts').atomicity('TRANSACTIONAL'))
 *   .exec(tx().run(put<number, number>('accounts', numberKey('account'), 100), commit()));
 * ```
 */
export class ScenarioBuilder {
  constructor(
    readonly name: string,
    readonly elements: readonly ChainElement[] = [],
  ) {}

  /** Returns a scenario with `parts` appended */
  exec(...parts: ChainPart[]): ScenarioBuilder {
    return new ScenarioBuilder(this.name, [...this.elements, ...chain(...parts)]);
  }
}

/**
 * @throws {Error} If name is empty or whitespace-only
 */
export const scenario = (name: string): ScenarioBuilder => {
  if (name.trim() === '') {
    throw new Error('Scenario name cannot be empty');
  }
  return new ScenarioBuilder(name);
};

/**
 * Runner Option Validation
 *
 * Rejects invalid options before any session starts.
 *
 * @module config/validation
 */

import type { RunnerOptions } from '../types.js';

const CHECK_POLICIES: readonly string[] = ['aggregate', 'failFast'];
const NESTED_TRANSACTION_POLICIES: readonly string[] = ['fail', 'reuse'];
const ERROR_STRATEGIES: readonly string[] = ['throw', 'log', 'ignore'];

/**
 * @throws {Error} If an option is out of range
 */
export const validateRunnerOptions = (options: RunnerOptions): void => {
  const { users, feeder, checkPolicy, nestedTransactions, requestTimeout, errorHandler } = options;

  if (users !== undefined && (!Number.isInteger(users) || users < 1)) {
    throw new Error(`Configuration error: 'users' must be a positive integer, got ${users}`);
  }
  if (requestTimeout !== undefined && (!Number.isFinite(requestTimeout) || requestTimeout <= 0)) {
    throw new Error(`Configuration error: 'requestTimeout' must be a positive number of ms, got ${requestTimeout}`);
  }
  if (Array.isArray(feeder) && feeder.length === 0) {
    throw new Error(`Configuration error: 'feeder' must hold at least one record`);
  }
  if (checkPolicy !== undefined && !CHECK_POLICIES.includes(checkPolicy)) {
    throw new Error(
      `Configuration error: 'checkPolicy' must be one of ${CHECK_POLICIES.join(', ')}, got '${checkPolicy}'`,
    );
  }
  if (nestedTransactions !== undefined && !NESTED_TRANSACTION_POLICIES.includes(nestedTransactions)) {
    throw new Error(
      `Configuration error: 'nestedTransactions' must be one of ${NESTED_TRANSACTION_POLICIES.join(', ')}, got '${nestedTransactions}'`,
    );
  }
  if (typeof errorHandler === 'string' && !ERROR_STRATEGIES.includes(errorHandler)) {
    throw new Error(
      `Configuration error: 'errorHandler' must be one of ${ERROR_STRATEGIES.join(', ')} or a function, got '${errorHandler}'`,
    );
  }
};

/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all chain logs
 * DEBUG=cache-chain:* npm test
 *
 * # Enable specific namespaces
 * DEBUG=cache-chain:tx npm test
 * DEBUG=cache-chain:action,cache-chain:chain npm test
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for single action executions
 */
export const actionLog: Debugger = debug('cache-chain:action');

/**
 * Debug logger for transaction lifecycle actions
 */
export const transactionLog: Debugger = debug('cache-chain:tx');

/**
 * Debug logger for the chain driver
 */
export const chainLog: Debugger = debug('cache-chain:chain');

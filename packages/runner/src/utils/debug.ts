/**
 * Debug logging for scenario runs
 *
 * @example
 * ```bash
 * DEBUG=cache-chain:runner npm test
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

export const runnerLog: Debugger = debug('cache-chain:runner');

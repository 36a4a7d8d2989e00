/**
 * Debug logging for the in-process grid
 *
 * @example
 * ```bash
 * DEBUG=memory-grid npm test
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

export const gridLog: Debugger = debug('memory-grid');

import type { ErrorStrategy } from '@cache-chain/core';

/** Default runner options */
export const RUNNER_DEFAULTS = {
  USERS: 1,
  ERROR_STRATEGY: 'log',
} as const satisfies { USERS: number; ERROR_STRATEGY: ErrorStrategy };

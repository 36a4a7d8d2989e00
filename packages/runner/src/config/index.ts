/**
 * Configuration Module - Re-exports
 *
 * @module config
 */

export { RUNNER_DEFAULTS } from './defaults.js';
export { validateRunnerOptions } from './validation.js';

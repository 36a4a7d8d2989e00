/** @cache-chain/runner - Runs scenarios of concurrent sessions over cache-chain chains */

export { releaseSessionResources } from './cleanup.js';
export { RUNNER_DEFAULTS, validateRunnerOptions } from './config/index.js';
export { runScenario } from './runner.js';
export { ScenarioBuilder, scenario } from './scenario.js';
export type { ClientSource, Feeder, RunnerOptions, ScenarioReport, SessionResult } from './types.js';

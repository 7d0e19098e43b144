/**
 * @queens/cli - Experiment driver and command line for the N-Queens estimator
 */

export { parseArgs, USAGE, type CliArgs } from './args.js';
export { readEnv, resolveConfig, toInputError, type EnvDefaults } from './config.js';
export { parseTrialCount, promptTrialCount, TRIAL_PROMPT } from './prompt.js';
export { runExperiment, type ExperimentDeps } from './experiment.js';
export { main, type MainIO } from './main.js';

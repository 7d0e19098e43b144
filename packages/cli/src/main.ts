/**
 * queens-mc: Monte Carlo cost estimate for one-shot randomized N-Queens descents
 */

import { pathToFileURL } from 'node:url';
import { consoleLogger, isErr, type InputError, type Logger, type Result } from '@queens/core';
import { USAGE, parseArgs } from './args.js';
import { resolveConfig } from './config.js';
import { promptTrialCount } from './prompt.js';
import { runExperiment, type ExperimentDeps } from './experiment.js';

export interface MainIO {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  /** Asked for the trial count when --trials is not given */
  readTrials: () => Promise<Result<number, InputError>>;
  deps?: Partial<Omit<ExperimentDeps, 'logger'>>;
}

const DEFAULT_IO: MainIO = {
  env: process.env,
  logger: consoleLogger,
  readTrials: () => promptTrialCount(),
};

/**
 * @returns process exit code
 */
export async function main(
  argv: readonly string[],
  io: Partial<MainIO> = {}
): Promise<number> {
  const { env, logger, readTrials, deps } = { ...DEFAULT_IO, ...io };

  const args = parseArgs(argv);
  if (isErr(args)) return fail(logger, args.error);

  if (args.value.help) {
    USAGE.forEach(line => logger.info(line));
    return 0;
  }

  let trials = args.value.trials;
  if (trials === undefined) {
    const answer = await readTrials();
    if (isErr(answer)) return fail(logger, answer.error);
    trials = answer.value;
  }

  const config = resolveConfig(args.value, trials, env);
  if (isErr(config)) return fail(logger, config.error);

  runExperiment(config.value, { ...deps, logger });
  return 0;
}

function fail(logger: Logger, error: InputError): number {
  logger.error(`[queens-mc] ${error.message}`);
  return 1;
}

// CLI entry point
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('[queens-mc] Unexpected failure:', error);
      process.exitCode = 1;
    });
}

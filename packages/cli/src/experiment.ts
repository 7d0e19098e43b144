import {
  ExperimentConfigSchema,
  consoleLogger,
  createSeededRandom,
  wallClockSeed,
  type ExperimentConfigInput,
  type Logger,
  type RandomFactory,
  type TrialResult,
} from '@queens/core';
import { TrialRunner, renderBoard } from '@queens/search';
import {
  formatHeader,
  formatSummary,
  formatTrialLine,
  summarizeExperiment,
  type ExperimentSummary,
} from '@queens/analysis';

export interface ExperimentDeps {
  logger: Logger;
  randomFactory: RandomFactory;
  /** Millisecond clock for timing */
  clock: () => number;
  /** Wall clock in epoch milliseconds, used for the default base seed */
  now: () => number;
}

const DEFAULT_DEPS: ExperimentDeps = {
  logger: consoleLogger,
  randomFactory: createSeededRandom,
  clock: () => performance.now(),
  now: Date.now,
};

/**
 * Run trials 1..T one after another and report on them.
 *
 * Throws a ZodError for an invalid configuration; the command line
 * validates before calling this.
 */
export function runExperiment(
  input: ExperimentConfigInput,
  deps: Partial<ExperimentDeps> = {}
): ExperimentSummary {
  const config = ExperimentConfigSchema.parse(input);
  const { logger, randomFactory, clock, now } = { ...DEFAULT_DEPS, ...deps };
  const baseSeed = config.baseSeed ?? wallClockSeed(now);

  if (!config.quiet) {
    formatHeader(config.boardSize).forEach(line => logger.info(line));
    logger.info(`Base seed: ${baseSeed}`);
    logger.info('');
  }

  const runner = new TrialRunner({
    boardSize: config.boardSize,
    baseSeed,
    randomFactory,
    clock,
    onResult: config.quiet ? undefined : (result) => reportTrial(logger, result, config.showBoard),
  });

  const results: TrialResult[] = [];
  const startedAt = clock();
  for (let trial = 1; trial <= config.trials; trial++) {
    results.push(runner.runTrial(trial));
  }
  const totalMs = clock() - startedAt;

  const summary = summarizeExperiment(results, { totalMs });
  formatSummary(summary, { listOperations: config.listOperations })
    .forEach(line => logger.info(line));

  return summary;
}

function reportTrial(logger: Logger, result: TrialResult, showBoard: boolean): void {
  logger.info(formatTrialLine(result));
  if (showBoard && result.solved) {
    renderBoard(result.placement).forEach(line => logger.info(`  ${line}`));
  }
}

import {
  DEFAULT_BOARD_SIZE,
  UNASSIGNED,
  createSeededRandom,
  deriveTrialSeed,
  wallClockSeed,
  type RandomFactory,
  type TrialResult,
} from '@queens/core';
import { createSearchContext } from './context.js';
import { attempt } from './descent.js';
import { estimateTreeSize } from './estimate.js';

export interface TrialRunnerConfig {
  boardSize: number;
  /** Seeds are derived from this; wall clock seconds when omitted */
  baseSeed?: number;
  randomFactory: RandomFactory;
  /** Millisecond clock used for the per-trial duration */
  clock: () => number;
  /** Called with every finished trial */
  onResult?: (result: TrialResult) => void;
}

const DEFAULT_CONFIG: TrialRunnerConfig = {
  boardSize: DEFAULT_BOARD_SIZE,
  randomFactory: createSeededRandom,
  clock: () => performance.now(),
};

/**
 * Runs single randomized descents, each with a fresh board, counter and
 * random source.
 */
export class TrialRunner {
  private config: TrialRunnerConfig;

  constructor(config: Partial<TrialRunnerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  runTrial(trialIndex: number): TrialResult {
    const { boardSize, randomFactory, clock } = this.config;
    const baseSeed = this.config.baseSeed ?? wallClockSeed();
    const seed = deriveTrialSeed(baseSeed, trialIndex);

    const context = createSearchContext(boardSize);
    const placement: number[] = new Array<number>(boardSize).fill(UNASSIGNED);
    const random = randomFactory(seed);

    const startedAt = clock();
    const solved = attempt(context, placement, 0, random);
    const durationMs = clock() - startedAt;

    // The failing row is left holding the last column it tested
    const committed = placement.map((column, row) =>
      row < context.selected.length ? column : UNASSIGNED
    );

    const result: TrialResult = {
      trial: trialIndex,
      seed,
      boardSize,
      solved,
      solutions: solved ? 1 : 0,
      operations: context.operations,
      placement: Object.freeze(committed),
      selected: Object.freeze([...context.selected]),
      promisingCounts: Object.freeze([...context.promisingCounts]),
      estimatedNodes: estimateTreeSize(context.promisingCounts),
      durationMs,
    };

    Object.freeze(result);
    this.config.onResult?.(result);
    return result;
  }
}

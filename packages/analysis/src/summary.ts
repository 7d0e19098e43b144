import type { TrialResult } from '@queens/core';
import { calculateStatistics, type Statistics } from './statistics.js';

/** Wall-clock timing of a whole experiment */
export interface ExperimentTiming {
  totalMs: number;
}

export interface ExperimentSummary {
  boardSize: number;
  trials: number;
  successes: number;
  successRate: number;
  /** Operation count of every trial, in trial order */
  operationCounts: number[];
  operations: Statistics;
  /** Knuth tree-size estimates across trials */
  estimatedNodes: Statistics;
  totalMs: number;
  averageMs: number;
}

/**
 * Aggregate finished trials. An empty run yields zeroed statistics.
 */
export function summarizeExperiment(
  results: readonly TrialResult[],
  timing: ExperimentTiming
): ExperimentSummary {
  const trials = results.length;
  const successes = results.filter(r => r.solved).length;
  const operationCounts = results.map(r => r.operations);

  return {
    boardSize: trials > 0 ? results[0].boardSize : 0,
    trials,
    successes,
    successRate: trials > 0 ? successes / trials : 0,
    operationCounts,
    operations: calculateStatistics(operationCounts),
    estimatedNodes: calculateStatistics(results.map(r => r.estimatedNodes)),
    totalMs: timing.totalMs,
    averageMs: trials > 0 ? timing.totalMs / trials : 0,
  };
}

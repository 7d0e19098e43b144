import type { TrialResult } from '@queens/core';
import type { ExperimentSummary } from './summary.js';

export interface ReportOptions {
  /** Print every trial's operation count in the statistics block */
  listOperations: boolean;
}

const DEFAULT_OPTIONS: ReportOptions = {
  listOperations: true,
};

export function formatHeader(boardSize: number): string[] {
  return [
    '=== Running Monte Carlo Simulation ===',
    `Solving ${boardSize}-Queens problem...`,
    '',
  ];
}

export function formatTrialLine(result: TrialResult): string {
  return `Trial ${result.trial}: Solutions: ${result.solutions} - Operations: ${result.operations}`;
}

export function formatSummary(
  summary: ExperimentSummary,
  options: Partial<ReportOptions> = {}
): string[] {
  const { listOperations } = { ...DEFAULT_OPTIONS, ...options };
  const ops = summary.operations;
  const lines: string[] = [];

  lines.push('', '=== Results ===');
  lines.push(`Total execution time: ${seconds(summary.totalMs)} seconds`);
  lines.push(`Average time per trial: ${seconds(summary.averageMs)} seconds`);

  lines.push('', 'Statistics:');
  if (listOperations) {
    lines.push(`Operations performed over ${summary.trials} trials:`);
    summary.operationCounts.forEach((count, i) => {
      lines.push(`Trial ${i + 1}: ${count} operations`);
    });
  }
  lines.push(`Minimum operations: ${ops.min}`);
  lines.push(`Maximum operations: ${ops.max}`);
  lines.push(`Average operations: ${ops.mean.toFixed(2)}`);
  lines.push(`Median operations: ${ops.median.toFixed(2)}`);
  lines.push(`Standard deviation: ${ops.stdDev.toFixed(2)}`);
  lines.push(
    `Solutions found: ${summary.successes} of ${summary.trials} (${(summary.successRate * 100).toFixed(1)}%)`
  );

  lines.push('', '=== Time Complexity Estimate ===');
  lines.push(`Based on ${summary.trials} trials for n=${summary.boardSize}`);
  lines.push(`Estimated backtracking tree size: ${Math.round(summary.estimatedNodes.mean)} nodes`);
  lines.push(`Estimate standard deviation: ${Math.round(summary.estimatedNodes.stdDev)} nodes`);

  return lines;
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(6);
}

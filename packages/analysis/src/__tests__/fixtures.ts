import type { TrialResult } from '@queens/core';

export function trialResult(overrides: Partial<TrialResult> = {}): TrialResult {
  return {
    trial: 1,
    seed: 1000,
    boardSize: 4,
    solved: false,
    solutions: 0,
    operations: 25,
    placement: [0, 2, -1, -1],
    selected: [0, 2],
    promisingCounts: [4, 2, 0],
    estimatedNodes: 13,
    durationMs: 0.1,
    ...overrides,
  };
}

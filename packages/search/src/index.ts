/**
 * @queens/search - Monte Carlo search over the N-Queens backtracking tree
 *
 * - isPromising: column and diagonal conflict check
 * - attempt: one-shot randomized descent
 * - TrialRunner: isolated, seeded trials
 * - estimateTreeSize: Knuth's tree-size estimate from one descent
 */

export { createSearchContext, type SearchContext } from './context.js';
export { isPromising } from './promising.js';
export { attempt } from './descent.js';
export { estimateTreeSize } from './estimate.js';
export { renderBoard } from './board.js';
export { TrialRunner, type TrialRunnerConfig } from './trial.js';

/**
 * Per-trial search state
 *
 * Replaces process-wide counters: every trial creates its own context and
 * passes it through the descent.
 */

export interface SearchContext {
  boardSize: number;
  /** Node visits plus constraint checks */
  operations: number;
  /** Column committed at each row, in descent order */
  selected: number[];
  /** Size of the promising-set at each visited row */
  promisingCounts: number[];
}

export function createSearchContext(boardSize: number): SearchContext {
  return {
    boardSize,
    operations: 0,
    selected: [],
    promisingCounts: [],
  };
}

export function countOperation(context: SearchContext): void {
  context.operations++;
}

import { pickIndex, type Placement, type RandomSource } from '@queens/core';
import { countOperation, type SearchContext } from './context.js';
import { isPromising } from './promising.js';

/**
 * One-shot randomized descent.
 *
 * At each row every column is tested, one promising column is drawn
 * uniformly at random and the descent moves on. A row with no promising
 * column ends the trial: the choice made at a shallower row is never
 * revisited. This samples a single root-to-leaf path of the pruned
 * backtracking tree; it is not a complete solver.
 *
 * Rows below `row` must already hold mutually consistent queens.
 *
 * @returns true when all rows were filled
 */
export function attempt(
  context: SearchContext,
  placement: Placement,
  row: number,
  random: RandomSource
): boolean {
  countOperation(context);

  if (row >= context.boardSize) {
    return true;
  }

  const promising: number[] = [];
  for (let column = 0; column < context.boardSize; column++) {
    placement[row] = column;
    if (isPromising(context, placement, row)) {
      promising.push(column);
    }
  }

  context.promisingCounts.push(promising.length);

  if (promising.length === 0) {
    return false;
  }

  const chosen = promising[pickIndex(random, promising.length)];
  placement[row] = chosen;
  context.selected.push(chosen);

  return attempt(context, placement, row + 1, random);
}

import type { Placement } from '@queens/core';
import { countOperation, type SearchContext } from './context.js';

/**
 * Whether the tentative queen at placement[row] is safe against rows 0..row-1.
 *
 * Counts one operation on entry and one per prior row compared; stops at
 * the first conflict.
 */
export function isPromising(
  context: SearchContext,
  placement: Placement,
  row: number
): boolean {
  countOperation(context);
  const column = placement[row];

  for (let i = 0; i < row; i++) {
    countOperation(context);

    if (placement[i] === column) {
      return false;
    }

    // Same diagonal: column distance equals row distance
    if (Math.abs(placement[i] - column) === Math.abs(i - row)) {
      return false;
    }
  }

  return true;
}

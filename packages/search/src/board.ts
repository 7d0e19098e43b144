import { UNASSIGNED } from '@queens/core';

/**
 * Text rendering of a placement, one line per row: `Q` marks the queen.
 */
export function renderBoard(placement: readonly number[]): string[] {
  const size = placement.length;
  return placement.map(column => {
    const cells: string[] = [];
    for (let c = 0; c < size; c++) {
      cells.push(column !== UNASSIGNED && column === c ? 'Q' : '.');
    }
    return cells.join(' ');
  });
}

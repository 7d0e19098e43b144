/**
 * Knuth's estimate of the pruned backtracking tree size.
 *
 * With m0, m1, ... the promising-set sizes met along one random descent,
 * 1 + m0 + m0*m1 + m0*m1*m2 + ... is an unbiased estimate of the number of
 * nodes a full backtracking search would visit. The sum stops at the first
 * row with no promising column.
 */
export function estimateTreeSize(promisingCounts: readonly number[]): number {
  let estimate = 1;
  let product = 1;

  for (const count of promisingCounts) {
    if (count === 0) break;
    product *= count;
    estimate += product;
  }

  return estimate;
}

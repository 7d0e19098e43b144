import { describe, it, expect, vi } from 'vitest';
import { UNASSIGNED, createSeededRandom, type TrialResult } from '@queens/core';
import { TrialRunner } from '../trial.js';
import { isPromising } from '../promising.js';
import { createSearchContext } from '../context.js';

const fixedClock = () => 0;

/** Worst case: every row visited, every candidate checked against every prior row */
function operationBound(n: number): number {
  let bound = 1;
  for (let row = 0; row < n; row++) {
    bound += 1 + n * (1 + row);
  }
  return bound;
}

function isValidSolution(placement: readonly number[]): boolean {
  const board = [...placement];
  return board.every((column, row) =>
    column !== UNASSIGNED && isPromising(createSearchContext(board.length), board, row)
  );
}

describe('TrialRunner', () => {
  it('derives the seed from the base seed and trial index', () => {
    const seeds: number[] = [];
    const runner = new TrialRunner({
      boardSize: 4,
      baseSeed: 7,
      clock: fixedClock,
      randomFactory: seed => {
        seeds.push(seed);
        return () => 0;
      },
    });

    runner.runTrial(1);
    runner.runTrial(3);
    expect(seeds).toEqual([1007, 3007]);
  });

  it('falls back to the wall clock for the base seed', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(5_000_000));
    try {
      const runner = new TrialRunner({ boardSize: 4, clock: fixedClock });
      expect(runner.runTrial(2).seed).toBe(5000 + 2000);
    } finally {
      vi.useRealTimers();
    }
  });

  it('reports a failed descent', () => {
    const runner = new TrialRunner({
      boardSize: 4,
      baseSeed: 0,
      clock: fixedClock,
      randomFactory: () => () => 0,
    });

    const result = runner.runTrial(1);
    expect(result).toMatchObject({
      trial: 1,
      seed: 1000,
      boardSize: 4,
      solved: false,
      solutions: 0,
      operations: 25,
      selected: [0, 2],
      promisingCounts: [4, 2, 0],
      estimatedNodes: 13,
    });
    // Scratch values of the failing row are not reported
    expect(result.placement).toEqual([0, 2, UNASSIGNED, UNASSIGNED]);
  });

  it('reports a solved descent with its duration', () => {
    const draws = [0.3, 0, 0, 0];
    const ticks = [10, 14.5];
    const runner = new TrialRunner({
      boardSize: 4,
      baseSeed: 0,
      clock: () => ticks.shift() ?? 0,
      randomFactory: () => () => draws.shift() ?? 0,
    });

    const result = runner.runTrial(1);
    expect(result.solved).toBe(true);
    expect(result.solutions).toBe(1);
    expect(result.placement).toEqual([1, 3, 0, 2]);
    expect(result.operations).toBe(40);
    expect(result.estimatedNodes).toBe(17);
    expect(result.durationMs).toBe(4.5);
  });

  it('hands every result to onResult', () => {
    const seen: TrialResult[] = [];
    const runner = new TrialRunner({
      boardSize: 2,
      baseSeed: 0,
      clock: fixedClock,
      onResult: r => seen.push(r),
    });

    const first = runner.runTrial(1);
    const second = runner.runTrial(2);
    expect(seen).toEqual([first, second]);
  });

  it('returns frozen results', () => {
    const result = new TrialRunner({ boardSize: 5, baseSeed: 1, clock: fixedClock }).runTrial(1);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.placement)).toBe(true);
  });

  it('does not carry state from one trial to the next', () => {
    const runner = new TrialRunner({ boardSize: 8, baseSeed: 99, clock: fixedClock });
    const before = runner.runTrial(4);
    for (let t = 1; t <= 20; t++) runner.runTrial(t);
    const after = runner.runTrial(4);
    expect(after).toEqual(before);

    const reseeded = new TrialRunner({ boardSize: 8, baseSeed: 12345, clock: fixedClock });
    reseeded.runTrial(4);
    expect(runner.runTrial(4)).toEqual(before);
  });

  it('never solves boards of size 2 or 3', () => {
    for (const boardSize of [2, 3]) {
      const runner = new TrialRunner({ boardSize, baseSeed: 17, clock: fixedClock });
      for (let t = 1; t <= 100; t++) {
        expect(runner.runTrial(t).solved).toBe(false);
      }
    }
  });

  it('keeps 12-queens costs within the cubic bound and finds some solutions', () => {
    const runner = new TrialRunner({
      boardSize: 12,
      baseSeed: 2024,
      clock: fixedClock,
      randomFactory: createSeededRandom,
    });
    const bound = operationBound(12);
    expect(bound).toBe(949);

    let solved = 0;
    for (let t = 1; t <= 1000; t++) {
      const result = runner.runTrial(t);
      expect(Number.isInteger(result.operations)).toBe(true);
      expect(result.operations).toBeGreaterThan(12);
      expect(result.operations).toBeLessThanOrEqual(bound);
      if (result.solved) {
        solved++;
        expect(isValidSolution(result.placement)).toBe(true);
      }
    }
    expect(solved).toBeGreaterThan(0);
  });
});

/**
 * Seedable random sources.
 *
 * Every trial owns its generator, so no stream is shared between trials.
 */

/** Uniform draw in [0, 1) */
export type RandomSource = () => number;

/** Builds a fresh source for a seed */
export type RandomFactory = (seed: number) => RandomSource;

/** Seeds are unsigned 32-bit values */
export const MAX_SEED = 0xffffffff;

/** Spacing between consecutive trial seeds */
export const TRIAL_SEED_STRIDE = 1000;

/**
 * mulberry32: small 32-bit generator, equal seeds give equal streams
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seed for one trial. Trials started within the same second still get
 * distinct streams; the sum wraps within the 32-bit seed range.
 */
export function deriveTrialSeed(baseSeed: number, trialIndex: number): number {
  return (baseSeed + trialIndex * TRIAL_SEED_STRIDE) >>> 0;
}

/** Wall clock in whole seconds */
export function wallClockSeed(now: () => number = Date.now): number {
  return Math.floor(now() / 1000);
}

/**
 * Uniform index in [0, size). size must be positive.
 */
export function pickIndex(random: RandomSource, size: number): number {
  const index = Math.floor(random() * size);
  // Guards against a source that returns exactly 1
  return Math.min(index, size - 1);
}

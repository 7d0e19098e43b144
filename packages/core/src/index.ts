/**
 * @queens/core - Shared primitives for the Monte Carlo N-Queens estimator
 *
 * - Types: board, configuration schema, trial results, logging
 * - Result: explicit success/failure values for boundary validation
 * - Random: seedable per-trial random sources
 */

export * from './types.js';
export * from './result.js';
export * from './random.js';

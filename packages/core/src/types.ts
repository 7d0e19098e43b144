/**
 * Core types for the Monte Carlo N-Queens estimator
 */

import { z } from 'zod';
import { MAX_SEED } from './random.js';

// =============================================================================
// Board
// =============================================================================

/** Marker for a row that holds no queen yet */
export const UNASSIGNED = -1;

/** The board size the estimator was built around */
export const DEFAULT_BOARD_SIZE = 12;

/**
 * placement[row] = column of the queen in that row, or UNASSIGNED
 */
export type Placement = number[];

// =============================================================================
// Experiment Configuration
// =============================================================================

export const ExperimentConfigSchema = z.object({
  boardSize: z.number().int().min(1).default(DEFAULT_BOARD_SIZE),
  trials: z.number().int().min(1),
  baseSeed: z.number().int().min(0).max(MAX_SEED).optional(), // Wall clock seconds when absent
  showBoard: z.boolean().default(false),
  listOperations: z.boolean().default(true),
  quiet: z.boolean().default(false),
});

export type ExperimentConfig = z.infer<typeof ExperimentConfigSchema>;
export type ExperimentConfigInput = z.input<typeof ExperimentConfigSchema>;

/** Trial count as typed at the prompt */
export const TrialCountSchema = z.coerce
  .number({ invalid_type_error: 'number of trials must be a number' })
  .int('number of trials must be a whole number')
  .min(1, 'number of trials must be at least 1');

// =============================================================================
// Trial Output
// =============================================================================

export interface TrialResult {
  readonly trial: number;          // 1-based
  readonly seed: number;
  readonly boardSize: number;
  readonly solved: boolean;
  readonly solutions: 0 | 1;       // A single descent finds at most one
  readonly operations: number;
  readonly placement: readonly number[];
  readonly selected: readonly number[];         // Column committed per row
  readonly promisingCounts: readonly number[];  // Promising-set size per visited row
  readonly estimatedNodes: number;
  readonly durationMs: number;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Rejected user input (trial count, flags, environment)
 */
export class InputError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'InputError';
    this.field = field;
  }
}

// =============================================================================
// Logging
// =============================================================================

export interface Logger {
  info(message: string): void;
  error(message: string, cause?: unknown): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  error: (message, cause) => {
    if (cause === undefined) {
      console.error(message);
    } else {
      console.error(message, cause);
    }
  },
};

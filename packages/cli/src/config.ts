import {
  ExperimentConfigSchema,
  InputError,
  err,
  flatMap,
  ok,
  type ExperimentConfig,
  type Result,
} from '@queens/core';
import type { ZodError } from 'zod';
import type { CliArgs } from './args.js';

/** Defaults read from the environment; flags override them */
export interface EnvDefaults {
  boardSize?: number;
  baseSeed?: number;
}

const ENV_KEYS = {
  boardSize: 'QUEENS_BOARD_SIZE',
  baseSeed: 'QUEENS_SEED',
} as const;

export function readEnv(env: NodeJS.ProcessEnv): Result<EnvDefaults, InputError> {
  const defaults: EnvDefaults = {};

  for (const field of ['boardSize', 'baseSeed'] as const) {
    const name = ENV_KEYS[field];
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;

    const value = Number(raw);
    if (!Number.isInteger(value)) {
      return err(new InputError(`${name} must be an integer, got "${raw}"`, field));
    }

    const checked = ExperimentConfigSchema.shape[field].safeParse(value);
    if (!checked.success) {
      return err(new InputError(`${name}: ${checked.error.issues[0].message}`, field));
    }
    defaults[field] = value;
  }

  return ok(defaults);
}

/**
 * Merge flags over environment defaults and validate the result.
 */
export function resolveConfig(
  args: CliArgs,
  trials: number,
  env: NodeJS.ProcessEnv = {}
): Result<ExperimentConfig, InputError> {
  return flatMap(readEnv(env), defaults => {
    const parsed = ExperimentConfigSchema.safeParse({
      boardSize: args.boardSize ?? defaults.boardSize,
      trials,
      baseSeed: args.baseSeed ?? defaults.baseSeed,
      showBoard: args.showBoard,
      listOperations: args.listOperations,
      quiet: args.quiet,
    });

    if (!parsed.success) {
      return err(toInputError(parsed.error));
    }
    return ok(parsed.data);
  });
}

export function toInputError(error: ZodError): InputError {
  const issue = error.issues[0];
  const field = issue.path.join('.');
  return new InputError(
    field === '' ? issue.message : `${field}: ${issue.message}`,
    field === '' ? undefined : field
  );
}

import { InputError, err, ok, type Result } from '@queens/core';

/** Options as given on the command line; validation happens in config.ts */
export interface CliArgs {
  trials?: number;
  boardSize?: number;
  baseSeed?: number;
  showBoard?: boolean;
  listOperations?: boolean;
  quiet?: boolean;
  help?: boolean;
}

export const USAGE = [
  'Usage: queens-mc [options]',
  '',
  'Estimates the cost of one-shot randomized descents on the N-Queens board.',
  '',
  'Options:',
  '  --trials <n>    number of trials (prompted for when omitted)',
  '  --size <n>      board size (default 12, env QUEENS_BOARD_SIZE)',
  '  --seed <n>      base seed (default wall clock seconds, env QUEENS_SEED)',
  '  --show-board    print the board of every solved trial',
  '  --list          list every trial\'s operation count (default)',
  '  --no-list       omit the per-trial operation list from the summary',
  '  --quiet         print the summary only',
  '  --help          show this message',
];

const VALUE_FLAGS: Record<string, 'trials' | 'boardSize' | 'baseSeed'> = {
  '--trials': 'trials',
  '--size': 'boardSize',
  '--seed': 'baseSeed',
};

export function parseArgs(argv: readonly string[]): Result<CliArgs, InputError> {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const key = VALUE_FLAGS[arg];

    if (key !== undefined) {
      const raw = argv[i + 1];
      if (raw === undefined || raw.startsWith('--')) {
        return err(new InputError(`${arg} expects a value`, key));
      }
      args[key] = Number(raw);
      i++;
    } else if (arg === '--show-board') {
      args.showBoard = true;
    } else if (arg === '--list') {
      args.listOperations = true;
    } else if (arg === '--no-list') {
      args.listOperations = false;
    } else if (arg === '--quiet') {
      args.quiet = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else {
      return err(new InputError(`unknown option: ${arg}`));
    }
  }

  return ok(args);
}

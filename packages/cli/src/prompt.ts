import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { InputError, TrialCountSchema, err, map, ok, type Result } from '@queens/core';

export const TRIAL_PROMPT = 'Enter number of Monte Carlo trials: ';

export function parseTrialCount(raw: string): Result<number, InputError> {
  const text = raw.trim();
  if (text === '') {
    return err(new InputError('number of trials is required', 'trials'));
  }

  const parsed = TrialCountSchema.safeParse(text);
  if (!parsed.success) {
    return err(new InputError(parsed.error.issues[0].message, 'trials'));
  }
  return ok(parsed.data);
}

/**
 * Ask for the trial count once; a bad answer is returned as an error, not retried.
 * Input that ends before a line arrives counts as no answer.
 */
export function promptTrialCount(
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Promise<Result<number, InputError>> {
  const rl = createInterface({ input, output, terminal: false });

  return new Promise(resolve => {
    rl.once('line', line => {
      // End the prompt line; piped input is not echoed
      resolve(map(parseTrialCount(line), trials => {
        output.write('\n');
        return trials;
      }));
      rl.close();
    });
    rl.once('close', () => {
      resolve(err(new InputError('number of trials is required', 'trials')));
    });
    output.write(TRIAL_PROMPT);
  });
}

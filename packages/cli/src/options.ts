/**
 * Command-line options of the runelock binary.
 */

import { z } from 'zod';
import { DomainInputError, err, formatIssues, ok, type Result } from '@runelock/core';

export const CliOptionsSchema = z.object({
  /** Path to a lock definition; the bundled lock when absent */
  lock: z.string().min(1).optional(),
  /** Default depth of `explain` */
  depth: z.coerce.number().int().positive().default(10),
  debug: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const USAGE = 'Usage: runelock [--lock <file>] [--depth <n>] [--debug]';

type Environment = Readonly<Record<string, string | undefined>>;

function invalid(message: string): Result<never, DomainInputError> {
  return err(new DomainInputError('invalid-options', message));
}

/**
 * Read options from `argv` (without the node and script entries) and the
 * environment. `RUNELOCK_DEBUG=1` turns on debug logging like `--debug`.
 */
export function parseOptions(argv: readonly string[], env: Environment = {}): Result<CliOptions, DomainInputError> {
  const raw: { lock?: string; depth?: string; debug?: boolean } = {};
  if (env.RUNELOCK_DEBUG === '1') {
    raw.debug = true;
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--debug') {
      raw.debug = true;
    } else if (arg === '--lock' || arg === '--depth') {
      const value = argv[i + 1];
      if (value === undefined) {
        return invalid(`Option ${arg} needs a value`);
      }
      if (arg === '--lock') {
        raw.lock = value;
      } else {
        raw.depth = value;
      }
      i++;
    } else {
      return invalid(`Unknown option: ${arg}`);
    }
  }

  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    return invalid(`Invalid options: ${formatIssues(parsed.error)}`);
  }
  return ok(parsed.data);
}

/**
 * runelock - interactive rune lock solver
 *
 * Usage:
 *   npx tsx packages/cli/src/main.ts [--lock <file>] [--depth <n>] [--debug]
 */

import { FactualSolver } from '@runelock/puzzle';
import { loadLock } from './lock-loader.js';
import { USAGE, parseOptions } from './options.js';
import { Session, runSession } from './session.js';

async function main(): Promise<void> {
  const options = parseOptions(process.argv.slice(2), process.env);
  if (!options.ok) {
    console.error(options.error.message);
    console.error(USAGE);
    process.exit(1);
  }

  const lock = loadLock(options.value.lock);
  if (!lock.ok) {
    console.error(lock.error.message);
    process.exit(1);
  }

  const solver = new FactualSolver(lock.value, {
    debug: options.value.debug,
    maxExplainDepth: options.value.depth,
  });
  await runSession(new Session(solver), process.stdin, process.stdout);
}

main().catch((error: unknown) => {
  console.error('[runelock] Fatal:', error);
  process.exit(1);
});

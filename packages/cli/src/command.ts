/**
 * Command language of the interactive session.
 *
 * One command per line: a verb (or its alias) followed by whitespace
 * separated integer arguments. Positions are 0..11, activations are
 * typed one-based.
 */

import {
  DomainInputError,
  activationFromHuman,
  err,
  flatMap,
  map,
  ok,
  positionFromNumber,
  type Activation,
  type Position,
  type Result,
} from '@runelock/core';

export type SolverCommand =
  | { type: 'assume'; position: Position; activation: Activation }
  | { type: 'view'; node: number }
  | { type: 'explain'; fact: number; depth: number | undefined }
  | { type: 'try-position'; position: Position }
  | { type: 'try-activation'; activation: Activation }
  | { type: 'dump' }
  | { type: 'tree' }
  | { type: 'help' }
  | { type: 'quit' };

export interface CommandSpec {
  names: readonly string[];
  usage: string;
  summary: string;
  /** Required arguments, then optional ones */
  arity: readonly [number, number];
  build(args: readonly number[]): Result<SolverCommand, DomainInputError>;
}

export const COMMANDS: readonly CommandSpec[] = [
  {
    names: ['assume', 'a'],
    usage: 'assume <position> <activation>',
    summary: 'assume an activation (#1..#12) on a position (0..11)',
    arity: [2, 0],
    build: ([position, activation]) =>
      flatMap(positionFromNumber(position), (p) =>
        map(activationFromHuman(activation), (a): SolverCommand => ({ type: 'assume', position: p, activation: a }))
      ),
  },
  {
    names: ['view', 'v'],
    usage: 'view <node>',
    summary: 'move to a node of the assumption tree',
    arity: [1, 0],
    build: ([node]) => ok({ type: 'view', node }),
  },
  {
    names: ['explain', 'e'],
    usage: 'explain <fact> [depth]',
    summary: 'show why a fact of the current node holds',
    arity: [1, 1],
    build: ([fact, depth]) => ok({ type: 'explain', fact, depth }),
  },
  {
    names: ['tryposition', 'tp'],
    usage: 'tryposition <position>',
    summary: 'assume every open activation on a position',
    arity: [1, 0],
    build: ([position]) =>
      map(positionFromNumber(position), (p): SolverCommand => ({ type: 'try-position', position: p })),
  },
  {
    names: ['tryactivation', 'ta'],
    usage: 'tryactivation <activation>',
    summary: 'assume an activation on every open position',
    arity: [1, 0],
    build: ([activation]) =>
      map(activationFromHuman(activation), (a): SolverCommand => ({ type: 'try-activation', activation: a })),
  },
  {
    names: ['dump', 'd'],
    usage: 'dump',
    summary: 'print the knowledge grid of the current node',
    arity: [0, 0],
    build: () => ok({ type: 'dump' }),
  },
  {
    names: ['tree', 't'],
    usage: 'tree',
    summary: 'print the assumption tree',
    arity: [0, 0],
    build: () => ok({ type: 'tree' }),
  },
  {
    names: ['help', 'h', '?'],
    usage: 'help',
    summary: 'list commands',
    arity: [0, 0],
    build: () => ok({ type: 'help' }),
  },
  {
    names: ['quit', 'q', 'exit'],
    usage: 'quit',
    summary: 'end the session',
    arity: [0, 0],
    build: () => ok({ type: 'quit' }),
  },
];

function malformed(message: string): Result<never, DomainInputError> {
  return err(new DomainInputError('malformed-command', message));
}

function parseInteger(text: string): number | undefined {
  return /^-?\d+$/.test(text) ? Number(text) : undefined;
}

export function parseCommand(line: string): Result<SolverCommand, DomainInputError> {
  const [verb, ...rest] = line.trim().split(/\s+/);
  const spec = COMMANDS.find((command) => command.names.includes(verb));
  if (spec === undefined) {
    return malformed(`Unknown command: ${verb}`);
  }

  const [required, optional] = spec.arity;
  if (rest.length < required) {
    return malformed(`Not enough arguments for '${spec.names[0]}': expected ${required}`);
  }
  if (rest.length > required + optional) {
    return malformed(`Too many arguments for '${spec.names[0]}': expected ${required + optional}`);
  }

  const args: number[] = [];
  for (const text of rest) {
    const value = parseInteger(text);
    if (value === undefined) {
      return malformed(`Argument '${text}' is not a number`);
    }
    args.push(value);
  }
  return spec.build(args);
}

export function helpText(): string {
  const width = Math.max(...COMMANDS.map((command) => command.usage.length));
  return COMMANDS.map((command) => {
    const aliases = command.names.slice(1).join(', ');
    return `  ${command.usage.padEnd(width)}  ${command.summary} (${aliases})`;
  }).join('\n');
}

/**
 * Interactive session - one command in, one block of text out.
 *
 * Bad input, unknown handles and contradictions are all reported as text;
 * only `quit` or the end of input ends a session.
 */

import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import {
  ActivationView,
  PositionView,
  describeAction,
  describeSolverError,
  formatExplanation,
  formatHandle,
  type AssumeOutcome,
  type FactualSolver,
  type NodeStatus,
  type View,
} from '@runelock/puzzle';
import { helpText, parseCommand, type SolverCommand } from './command.js';
import { renderGrid, renderState, renderTree } from './render.js';

export interface SessionReply {
  output: string;
  done: boolean;
}

const SEPARATOR = '==============================';

function statusWord(status: NodeStatus): string {
  return status.type === 'contradicted' ? `contradicted by ${formatHandle(status.fact)}` : status.type;
}

function describeOutcome(outcome: AssumeOutcome): string {
  return `(${outcome.node}) ${describeAction(outcome.action)}: ${statusWord(outcome.status)}`;
}

export class Session {
  private readonly solver: FactualSolver;

  constructor(solver: FactualSolver) {
    this.solver = solver;
  }

  /** What the session prints before the first command */
  greeting(): string {
    return [`Rune Lock: ${this.solver.lock.name}`, renderState(this.solver)].join('\n');
  }

  handle(line: string): SessionReply {
    if (line.trim() === '') {
      return { output: '', done: false };
    }
    const command = parseCommand(line);
    if (!command.ok) {
      return { output: `Didn't understand command: ${command.error.message}`, done: false };
    }
    if (command.value.type === 'quit') {
      return { output: '', done: true };
    }
    return { output: this.execute(command.value), done: false };
  }

  private execute(command: Exclude<SolverCommand, { type: 'quit' }>): string {
    switch (command.type) {
      case 'assume': {
        const outcome = this.solver.assume(command.activation, command.position);
        if (!outcome.ok) {
          return describeSolverError(outcome.error);
        }
        return [describeOutcome(outcome.value), renderState(this.solver)].join('\n');
      }
      case 'view': {
        const moved = this.solver.setCurrent(command.node);
        return moved.ok ? renderState(this.solver) : describeSolverError(moved.error);
      }
      case 'explain': {
        const lines = this.solver.explain(command.fact, command.depth);
        if (!lines.ok) {
          return lines.error.message;
        }
        return [
          `Explaining ${formatHandle(command.fact)} in node ${this.solver.current}`,
          formatExplanation(lines.value),
        ].join('\n');
      }
      case 'try-position':
        return this.tryAll(PositionView, command.position);
      case 'try-activation':
        return this.tryAll(ActivationView, command.activation);
      case 'dump':
        return renderGrid(this.solver.lock, this.solver.dump());
      case 'tree':
        return renderTree(this.solver);
      case 'help':
        return `Commands:\n${helpText()}`;
    }
  }

  private tryAll(view: View, line: number): string {
    const outcomes = this.solver.tryPossibilities(view, line);
    if (!outcomes.ok) {
      return describeSolverError(outcomes.error);
    }
    return [
      `Tried ${outcomes.value.length} candidates for ${view.describeLine(line)}`,
      ...outcomes.value.map(describeOutcome),
      renderState(this.solver),
    ].join('\n');
  }
}

/**
 * Feed lines from `input` to the session until `quit` or end of input.
 */
export async function runSession(session: Session, input: Readable, output: Writable): Promise<void> {
  output.write(`${session.greeting()}\n`);
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      const reply = session.handle(line);
      if (reply.done) break;
      if (reply.output !== '') {
        output.write(`${reply.output}\n${SEPARATOR}\n`);
      }
    }
  } finally {
    lines.close();
  }
}

/**
 * Plain-text views of the solver state.
 */

import {
  ALL_ACTIVATIONS,
  ALL_POSITIONS,
  RING_SIZE,
  describeRuleFailure,
  formatActivation,
  type Assignment,
  type Result,
  type RuleFailure,
  type RuneLock,
} from '@runelock/core';
import {
  describeAction,
  describeFact,
  describeStatus,
  formatHandle,
  type FactSnapshot,
  type FactualSolver,
  type SolverPeek,
} from '@runelock/puzzle';

const RING_CELL_WIDTH = 9;
const GRID_CELL_WIDTH = 4;

/**
 * Both rings, outer first: `<position>:<rune>=<activation>` per slot,
 * `.` where nothing is fixed.
 */
export function renderRings(lock: RuneLock, assignment: Assignment): string {
  const cell = (position: number): string => {
    const activation = assignment.activationAt(position);
    const shown = activation === undefined ? '.' : formatActivation(activation);
    return `${position}:${lock.runes[position]}=${shown}`.padEnd(RING_CELL_WIDTH);
  };
  const outer = ALL_POSITIONS.slice(0, RING_SIZE).map(cell).join('');
  const inner = ALL_POSITIONS.slice(RING_SIZE).map(cell).join('');
  return [`outer  ${outer}`.trimEnd(), `inner  ${inner}`.trimEnd()].join('\n');
}

export function renderTree(solver: FactualSolver): string {
  const lines: string[] = [];
  for (const entry of solver.tree.walk()) {
    const marker = entry.handle === solver.current ? '  <' : '';
    lines.push(
      `${'  '.repeat(entry.depth)}- (${entry.handle}) [${describeStatus(entry.data.status)}] ${describeAction(entry.data.action)}${marker}`
    );
  }
  return lines.join('\n');
}

function gridSymbol(db: FactSnapshot, position: number, activation: number): string {
  const fact = db.factAt(position, activation);
  if (fact === undefined) return '.';
  switch (fact.kind.type) {
    case 'must-be':
      return 'M';
    case 'cannot-be':
      return 'x';
    case 'contradiction':
      return '!';
  }
}

/**
 * Knowledge grid: one row per position, one column per activation.
 */
export function renderGrid(lock: RuneLock, db: FactSnapshot): string {
  const header = '   ' + ALL_ACTIVATIONS.map((a) => formatActivation(a).padStart(GRID_CELL_WIDTH)).join('');
  const rows = ALL_POSITIONS.map(
    (position) =>
      `${String(position).padStart(2)}${lock.runes[position]}` +
      ALL_ACTIVATIONS.map((a) => gridSymbol(db, position, a).padStart(GRID_CELL_WIDTH)).join('')
  );
  return [header, ...rows].join('\n');
}

export function renderValidation(validation: Result<void, RuleFailure>): string {
  return validation.ok ? 'Valid state.' : `Invalid assignment: ${describeRuleFailure(validation.error)}`;
}

export function renderCounts(peek: SolverPeek): string {
  const { mustBe, cannotBe, contradiction, unknown } = peek.counts;
  return `Facts: ${peek.factCount} logged; cells: ${mustBe} must-be, ${cannotBe} cannot-be, ${contradiction} contradicted, ${unknown} unknown`;
}

/** Everything shown after a command that changes the state */
export function renderState(solver: FactualSolver): string {
  const peek = solver.peek();
  const sections = [
    renderTree(solver),
    `Current node: ${peek.node} (${peek.status.type})`,
    renderRings(solver.lock, peek.assignment),
    renderValidation(peek.validation),
  ];
  if (peek.status.type === 'contradicted') {
    const fact = solver.dump().get(peek.status.fact);
    if (fact !== undefined) {
      sections.push(`Contradiction ${formatHandle(peek.status.fact)}: ${describeFact(fact)}`);
    }
  }
  sections.push(renderCounts(peek));
  return sections.join('\n');
}

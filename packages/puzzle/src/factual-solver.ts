/**
 * FactualSolver - search controller over the assumption tree.
 *
 * Each tree node owns its own FactDb. Assuming clones the database of the
 * current node, integrates a must-be fact justified only by the assumption,
 * and records the outcome as a new child. Contradicted and solved nodes are
 * terminal and accept no further assumptions.
 */

import {
  Assignment,
  InvariantViolationError,
  LookupError,
  describeAssignmentError,
  err,
  formatActivation,
  map,
  mapErr,
  ok,
  validateLock,
  type Activation,
  type Position,
  type Result,
  type RuleFailure,
  type RuneLock,
} from '@runelock/core';
import { AssumptionTree, ROOT, type NodeHandle } from './assumption-tree.js';
import { assumption, formatHandle, type FactHandle } from './fact.js';
import { FactDb, type FactCounts, type FactSnapshot } from './fact-db.js';
import { explainFact, type ExplanationLine } from './explainer.js';
import type { View } from './view.js';

export type SolverAction =
  | { type: 'root' }
  | { type: 'assume'; position: Position; activation: Activation };

export type NodeStatus =
  | { type: 'alive' }
  | { type: 'contradicted'; fact: FactHandle }
  | { type: 'solved' };

export interface SolverNode {
  readonly facts: FactSnapshot;
  readonly action: SolverAction;
  readonly status: NodeStatus;
}

export interface AssumeOutcome {
  node: NodeHandle;
  action: SolverAction;
  status: NodeStatus;
}

export type SolverError =
  | { type: 'terminal-node'; node: NodeHandle; status: NodeStatus }
  | { type: 'unknown-node'; error: LookupError };

export interface SolverPeek {
  node: NodeHandle;
  action: SolverAction;
  status: NodeStatus;
  assignment: Assignment;
  validation: Result<void, RuleFailure>;
  counts: FactCounts;
  factCount: number;
}

export interface SolverLogger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface SolverConfig {
  /** Log every assumption, outcome and cursor move */
  debug: boolean;
  /** Default depth for explanations */
  maxExplainDepth: number;
  logger: SolverLogger;
}

const DEFAULT_CONFIG: SolverConfig = {
  debug: false,
  maxExplainDepth: 10,
  logger: {
    debug: (message) => console.log(message),
    warn: (message) => console.warn(message),
  },
};

export function describeAction(action: SolverAction): string {
  return action.type === 'root'
    ? 'Root'
    : `Assume ${action.position} = ${formatActivation(action.activation)}`;
}

export function describeStatus(status: NodeStatus): string {
  switch (status.type) {
    case 'alive':
      return ' ';
    case 'contradicted':
      return `✘ (${formatHandle(status.fact)})`;
    case 'solved':
      return '✔';
  }
}

export function describeSolverError(error: SolverError): string {
  if (error.type === 'unknown-node') {
    return error.error.message;
  }
  return `Node ${error.node} is ${error.status.type}; move to a live node before assuming`;
}

export class FactualSolver {
  readonly lock: RuneLock;
  readonly tree: AssumptionTree<SolverNode>;
  private readonly config: SolverConfig;
  private cursor: NodeHandle;

  constructor(lock: RuneLock, config?: Partial<SolverConfig>) {
    this.lock = lock;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.tree = new AssumptionTree<SolverNode>({
      facts: new FactDb(),
      action: { type: 'root' },
      status: { type: 'alive' },
    });
    this.cursor = ROOT;
  }

  get current(): NodeHandle {
    return this.cursor;
  }

  get currentNode(): SolverNode {
    return this.tree.get(this.cursor);
  }

  /**
   * Assume `activation` on `position` below the current node and move there.
   */
  assume(activation: Activation, position: Position): Result<AssumeOutcome, SolverError> {
    const parent = this.currentNode;
    if (parent.status.type !== 'alive') {
      return err({ type: 'terminal-node', node: this.cursor, status: parent.status });
    }

    const facts = parent.facts.clone();
    const integration = facts.integrateAndConsolidate(assumption(position, activation), this.lock);
    const status: NodeStatus = integration.ok
      ? this.statusOf(facts)
      : { type: 'contradicted', fact: integration.error };
    const action: SolverAction = { type: 'assume', position, activation };

    const node = this.tree.insertChild(this.cursor, { facts, action, status });
    this.log(`${describeAction(action)} below node ${this.cursor} -> node ${node} [${status.type}]`);
    this.cursor = node;
    return ok({ node, action, status });
  }

  /**
   * Assume every open candidate of one line in turn, each as a sibling below
   * the current node. The cursor ends where it started.
   */
  tryPossibilities(view: View, line: number): Result<AssumeOutcome[], SolverError> {
    const start = this.cursor;
    const possibilities = [...this.currentNode.facts.possibilitiesFor(view, line)];
    this.log(`Trying ${possibilities.length} candidates for ${view.describeLine(line)}`);

    const outcomes: AssumeOutcome[] = [];
    for (const offset of possibilities) {
      const cell = view.cell(line, offset);
      const outcome = this.assume(cell.activation, cell.position);
      this.cursor = start;
      if (!outcome.ok) {
        return outcome;
      }
      outcomes.push(outcome.value);
    }
    return ok(outcomes);
  }

  getHandle(id: number): Result<NodeHandle, SolverError> {
    return mapErr(this.tree.getHandle(id), (error): SolverError => ({ type: 'unknown-node', error }));
  }

  /**
   * Move the cursor. Handles are plain numbers, so an id that names no node
   * is rejected and the cursor stays put.
   */
  setCurrent(handle: NodeHandle): Result<NodeHandle, SolverError> {
    return map(this.getHandle(handle), (checked) => {
      this.log(`Cursor ${this.cursor} -> ${checked}`);
      this.cursor = checked;
      return checked;
    });
  }

  peek(): SolverPeek {
    const node = this.currentNode;
    const assignment = this.fixedAssignment(node.facts);
    return {
      node: this.cursor,
      action: node.action,
      status: node.status,
      assignment,
      validation: validateLock(this.lock, assignment),
      counts: node.facts.counts(),
      factCount: node.facts.size,
    };
  }

  explain(handle: FactHandle, maxDepth: number = this.config.maxExplainDepth): Result<ExplanationLine[], LookupError> {
    return explainFact(this.currentNode.facts, this.lock, handle, maxDepth);
  }

  dump(): FactSnapshot {
    return this.currentNode.facts;
  }

  private statusOf(facts: FactSnapshot): NodeStatus {
    const assignment = this.fixedAssignment(facts);
    if (assignment.isComplete() && validateLock(this.lock, assignment).ok) {
      return { type: 'solved' };
    }
    return { type: 'alive' };
  }

  /**
   * Contradicted nodes may hold a half-merged grid; project only consistent ones.
   */
  private fixedAssignment(facts: FactSnapshot): Assignment {
    const fixed = facts.fixedAssignment();
    if (fixed.ok) {
      return fixed.value;
    }
    if (facts.contradictions().length > 0) {
      this.config.logger.warn(`[Solver] ${describeAssignmentError(fixed.error)}`);
      return Assignment.empty();
    }
    throw new InvariantViolationError(describeAssignmentError(fixed.error));
  }

  private log(message: string): void {
    if (this.config.debug) {
      this.config.logger.debug(`[Solver] ${message}`);
    }
  }
}

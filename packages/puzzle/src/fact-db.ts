/**
 * Fact Database - justification-tracking constraint propagation
 *
 * Holds at most one current fact per (position, activation) cell, plus an
 * append-only log of every fact ever created. Justifications point into the
 * log by handle, so replacing the fact of a cell never invalidates a chain.
 *
 * Cell lattice:
 *   unknown < { must-be, cannot-be } < contradiction
 * A contradiction is absorbing; must-be meeting cannot-be produces one.
 *
 * Every write goes through `integrateAndConsolidate`, which derives
 * consequences to a fixpoint:
 *   1. uniqueness per position (one activation per position)
 *   2. uniqueness per activation (one position per activation)
 *   3. rule propagation from every must-be fact
 * Each sub-pass collects its derivations first and integrates them
 * afterwards, so derivations of one sub-pass never see each other. The loop
 * repeats until a full round integrates nothing.
 */

import {
  ACTIVATION_COUNT,
  Assignment,
  LookupError,
  POSITION_COUNT,
  counterpartsOf,
  err,
  map,
  ok,
  validateRulePair,
  type Activation,
  type AssignmentError,
  type Position,
  type Result,
  type RuneLock,
} from '@runelock/core';
import {
  CANNOT_BE,
  MUST_BE,
  contradiction,
  isContradiction,
  type Fact,
  type FactHandle,
  type FactReason,
} from './fact.js';
import { ActivationView, PositionView, type Cell, type View } from './view.js';

export type ConsolidationResult = 'changes' | 'unchanged';

interface SingleFactIntegration {
  type: 'integrated' | 'unchanged';
  handle: FactHandle;
}

/** A must-be fact together with its cell */
export interface Given extends Cell {
  handle: FactHandle;
}

export interface FactCounts {
  mustBe: number;
  cannotBe: number;
  contradiction: number;
  unknown: number;
}

/**
 * Query side of a database. Snapshots handed out by the solver are typed
 * this way so a stored branch cannot be written to; `clone` yields a
 * separate writable copy.
 */
export interface FactSnapshot {
  readonly size: number;
  get(handle: FactHandle): Fact | undefined;
  lookupFact(handle: FactHandle): Result<Fact, LookupError>;
  handleAt(position: Position, activation: Activation): FactHandle | undefined;
  factAt(position: Position, activation: Activation): Fact | undefined;
  givens(): Given[];
  fixedAssignment(): Result<Assignment, AssignmentError>;
  possibilitiesFor(view: View, line: number): Generator<number>;
  contradictions(): FactHandle[];
  counts(): FactCounts;
  clone(): FactDb;
}

interface LineCell {
  cell: Cell;
  handle: FactHandle | undefined;
  fact: Fact | undefined;
}

export class FactDb implements FactSnapshot {
  readonly positionCount: number;
  readonly activationCount: number;
  private readonly facts: Fact[];
  private readonly lookup: (FactHandle | undefined)[];

  constructor(positionCount: number = POSITION_COUNT, activationCount: number = ACTIVATION_COUNT) {
    this.positionCount = positionCount;
    this.activationCount = activationCount;
    this.facts = [];
    this.lookup = new Array<FactHandle | undefined>(positionCount * activationCount).fill(undefined);
  }

  /**
   * Full copy. Facts are immutable, so the log entries themselves are shared.
   */
  clone(): FactDb {
    const copy = new FactDb(this.positionCount, this.activationCount);
    copy.facts.push(...this.facts);
    this.lookup.forEach((handle, index) => {
      copy.lookup[index] = handle;
    });
    return copy;
  }

  /** Number of facts ever created */
  get size(): number {
    return this.facts.length;
  }

  get(handle: FactHandle): Fact | undefined {
    return this.facts[handle];
  }

  lookupFact(handle: FactHandle): Result<Fact, LookupError> {
    const fact = this.get(handle);
    return fact === undefined ? err(new LookupError('fact', handle)) : ok(fact);
  }

  handleAt(position: Position, activation: Activation): FactHandle | undefined {
    return this.lookup[this.indexOf(position, activation)];
  }

  factAt(position: Position, activation: Activation): Fact | undefined {
    const handle = this.handleAt(position, activation);
    return handle === undefined ? undefined : this.facts[handle];
  }

  /**
   * Add a fact and derive everything that follows from it.
   *
   * Fails with the handle of the contradiction that was reached. The
   * contradiction stays in the database; the caller abandons the branch.
   */
  integrateAndConsolidate(fact: Fact, lock: RuneLock): Result<void, FactHandle> {
    const integration = this.integrateSingleFact(fact);
    if (this.isContradiction(integration.handle)) {
      return err(integration.handle);
    }
    if (integration.type === 'unchanged') {
      return ok(undefined);
    }
    return map(this.consolidate(lock), () => undefined);
  }

  /**
   * Run uniqueness and rule propagation until nothing new is integrated.
   * Calling it again on a consolidated database reports `unchanged`.
   */
  consolidate(lock: RuneLock): Result<ConsolidationResult, FactHandle> {
    const [existing] = this.contradictions();
    if (existing !== undefined) {
      return err(existing);
    }

    let overall: ConsolidationResult = 'unchanged';
    for (;;) {
      let changed = false;
      for (const pass of [
        () => this.consolidateLines(PositionView),
        () => this.consolidateLines(ActivationView),
        () => this.consolidateRules(lock),
      ]) {
        const result = pass();
        if (!result.ok) {
          return result;
        }
        if (result.value === 'changes') {
          changed = true;
        }
      }
      if (!changed) {
        return ok(overall);
      }
      overall = 'changes';
    }
  }

  /**
   * Merge one fact into its cell. No global reasoning happens here.
   */
  private integrateSingleFact(fact: Fact): SingleFactIntegration {
    const index = this.indexOf(fact.position, fact.activation);
    const existingHandle = this.lookup[index];

    if (existingHandle === undefined) {
      const handle = this.append(fact);
      this.lookup[index] = handle;
      return { type: 'integrated', handle };
    }

    const existing = this.facts[existingHandle];
    if (existing.kind.type === 'contradiction') {
      return { type: 'unchanged', handle: existingHandle };
    }
    if (fact.kind.type === 'contradiction') {
      const handle = this.append(fact);
      this.lookup[index] = handle;
      return { type: 'integrated', handle };
    }
    if (existing.kind.type === fact.kind.type) {
      return { type: 'unchanged', handle: existingHandle };
    }

    // must-be met cannot-be
    const incoming = this.append(fact);
    const collision = this.append({
      kind: contradiction('contradicting-requirements'),
      position: fact.position,
      activation: fact.activation,
      reasons: [
        { type: 'fact', handle: existingHandle },
        { type: 'fact', handle: incoming },
      ],
    });
    this.lookup[index] = collision;
    return { type: 'integrated', handle: collision };
  }

  /**
   * Uniqueness along every line of a view:
   * - a must-be rules out the rest of its line;
   * - a single undecided cell left over must be it;
   * - no undecided cell and no must-be means the line cannot be satisfied.
   */
  private consolidateLines(view: View): Result<ConsolidationResult, FactHandle> {
    const derived: Fact[] = [];

    for (let line = 0; line < view.lineCount; line++) {
      const cells = this.lineCells(view, line);

      // A second must-be on the line is ruled out here and collides.
      const mustBe = cells.find((c) => c.fact?.kind.type === 'must-be');
      if (mustBe !== undefined && mustBe.handle !== undefined) {
        const reasons: FactReason[] = [{ type: 'fact', handle: mustBe.handle }];
        for (const c of cells) {
          if (c === mustBe) continue;
          if (c.fact === undefined || c.fact.kind.type === 'must-be') {
            derived.push({ kind: CANNOT_BE, ...c.cell, reasons });
          }
        }
        continue;
      }

      const open = cells.filter((c) => c.fact === undefined);
      const ruledOut: FactReason[] = [];
      for (const c of cells) {
        if (c.handle !== undefined && c.fact?.kind.type === 'cannot-be') {
          ruledOut.push({ type: 'fact', handle: c.handle });
        }
      }

      if (open.length === 1) {
        derived.push({ kind: MUST_BE, ...open[0].cell, reasons: ruledOut });
      } else if (open.length === 0) {
        for (const c of cells) {
          derived.push({ kind: contradiction('no-options-left'), ...c.cell, reasons: ruledOut });
        }
      }
    }

    return this.integrateAll(derived);
  }

  /**
   * For every must-be, rule out the counterpart placements each rule forbids.
   *
   * Givens are read once at the start of the pass, so they include what the
   * uniqueness passes of this round produced.
   */
  private consolidateRules(lock: RuneLock): Result<ConsolidationResult, FactHandle> {
    const derived: Fact[] = [];

    for (const given of this.givens()) {
      lock.rules.forEach((rule, ruleIndex) => {
        for (const other of counterpartsOf(rule, given.activation)) {
          for (const position of this.candidatesFor(ActivationView, other)) {
            const verdict = validateRulePair(
              rule,
              lock.runes,
              [given.position, given.activation],
              [position, other]
            );
            if (verdict !== 'ok') {
              derived.push({
                kind: CANNOT_BE,
                position,
                activation: other,
                reasons: [
                  { type: 'fact', handle: given.handle },
                  { type: 'rule', index: ruleIndex },
                ],
              });
            }
          }
        }
      });
    }

    return this.integrateAll(derived);
  }

  private integrateAll(derived: readonly Fact[]): Result<ConsolidationResult, FactHandle> {
    let result: ConsolidationResult = 'unchanged';
    for (const fact of derived) {
      const integration = this.integrateSingleFact(fact);
      if (this.isContradiction(integration.handle)) {
        return err(integration.handle);
      }
      if (integration.type === 'integrated') {
        result = 'changes';
      }
    }
    return ok(result);
  }

  /** Every must-be fact, in grid order */
  givens(): Given[] {
    const givens: Given[] = [];
    for (let position = 0; position < this.positionCount; position++) {
      for (let activation = 0; activation < this.activationCount; activation++) {
        const handle = this.handleAt(position, activation);
        if (handle !== undefined && this.facts[handle].kind.type === 'must-be') {
          givens.push({ position, activation, handle });
        }
      }
    }
    return givens;
  }

  /**
   * Project the must-be facts into an assignment. An error here means
   * propagation let an activation be fixed twice.
   */
  fixedAssignment(): Result<Assignment, AssignmentError> {
    return Assignment.fromPairs(this.givens().map((g) => [g.position, g.activation] as const));
  }

  /**
   * Offsets along a line whose cell holds no fact yet.
   */
  *possibilitiesFor(view: View, line: number): Generator<number> {
    for (const c of this.lineCells(view, line)) {
      if (c.fact === undefined) {
        yield view.offsetOf(c.cell);
      }
    }
  }

  /** Offsets not ruled out: undecided or already must-be */
  private *candidatesFor(view: View, line: number): Generator<number> {
    for (const c of this.lineCells(view, line)) {
      if (c.fact === undefined || c.fact.kind.type === 'must-be') {
        yield view.offsetOf(c.cell);
      }
    }
  }

  /** Handles of contradictions currently held by cells, in grid order */
  contradictions(): FactHandle[] {
    const handles: FactHandle[] = [];
    for (const handle of this.lookup) {
      if (handle !== undefined && this.isContradiction(handle)) {
        handles.push(handle);
      }
    }
    return handles;
  }

  counts(): FactCounts {
    const counts: FactCounts = { mustBe: 0, cannotBe: 0, contradiction: 0, unknown: 0 };
    for (const handle of this.lookup) {
      if (handle === undefined) {
        counts.unknown++;
        continue;
      }
      switch (this.facts[handle].kind.type) {
        case 'must-be':
          counts.mustBe++;
          break;
        case 'cannot-be':
          counts.cannotBe++;
          break;
        case 'contradiction':
          counts.contradiction++;
          break;
      }
    }
    return counts;
  }

  private lineCells(view: View, line: number): LineCell[] {
    const cells: LineCell[] = [];
    for (let offset = 0; offset < view.lineLength; offset++) {
      const cell = view.cell(line, offset);
      const handle = this.handleAt(cell.position, cell.activation);
      cells.push({ cell, handle, fact: handle === undefined ? undefined : this.facts[handle] });
    }
    return cells;
  }

  private isContradiction(handle: FactHandle): boolean {
    const fact = this.facts[handle];
    return fact !== undefined && isContradiction(fact);
  }

  private append(fact: Fact): FactHandle {
    this.facts.push(fact);
    return this.facts.length - 1;
  }

  private indexOf(position: Position, activation: Activation): number {
    return position * this.activationCount + activation;
  }
}

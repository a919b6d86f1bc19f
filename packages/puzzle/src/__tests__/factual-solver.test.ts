import { describe, it, expect, vi } from 'vitest';
import { createLock, type Rune } from '@runelock/core';
import { FactualSolver, describeAction, describeStatus, describeSolverError } from '../factual-solver.js';
import { ROOT } from '../assumption-tree.js';
import { ActivationView } from '../view.js';
import { assumption } from '../fact.js';

const runes: Rune[] = ['Z', 'S', 'V', 'C', 'S', 'V', 'C', 'S', 'V', 'Z', 'S', 'V'];
const noRules = createLock('no rules', runes, []);

function quietLogger() {
  return { debug: vi.fn(), warn: vi.fn() };
}

describe('FactualSolver', () => {
  it('starts at an alive root with an empty database', () => {
    const solver = new FactualSolver(noRules, { logger: quietLogger() });
    const peek = solver.peek();

    expect(solver.current).toBe(ROOT);
    expect(peek.node).toBe(ROOT);
    expect(peek.action).toEqual({ type: 'root' });
    expect(peek.status).toEqual({ type: 'alive' });
    expect(peek.assignment.size).toBe(0);
    expect(peek.validation.ok).toBe(true);
    expect(peek.counts).toEqual({ mustBe: 0, cannotBe: 0, contradiction: 0, unknown: 144 });
    expect(peek.factCount).toBe(0);
  });

  it('records an assumption as a child and moves there', () => {
    const solver = new FactualSolver(noRules);
    const outcome = solver.assume(0, 0);

    expect(outcome).toEqual({
      ok: true,
      value: { node: 1, action: { type: 'assume', position: 0, activation: 0 }, status: { type: 'alive' } },
    });
    expect(solver.current).toBe(1);
    expect(solver.tree.childrenOf(ROOT)).toEqual([1]);
    expect(solver.dump().size).toBe(23);
    // the parent database is untouched
    expect(solver.tree.get(ROOT).facts.size).toBe(0);
  });

  it('marks a colliding assumption as contradicted and refuses to go on from it', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);
    const outcome = solver.assume(1, 0);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.node).toBe(2);
    expect(outcome.value.status).toEqual({ type: 'contradicted', fact: 24 });

    const refused = solver.assume(5, 5);
    expect(refused).toEqual({
      ok: false,
      error: { type: 'terminal-node', node: 2, status: { type: 'contradicted', fact: 24 } },
    });
    expect(solver.tree.size).toBe(3);
    if (!refused.ok) {
      expect(describeSolverError(refused.error)).toBe(
        'Node 2 is contradicted; move to a live node before assuming'
      );
    }
  });

  it('reports a solved node once every slot is fixed', () => {
    const solver = new FactualSolver(noRules);
    for (let i = 0; i < 10; i++) {
      const outcome = solver.assume(i, i);
      expect(outcome.ok && outcome.value.status.type).toBe('alive');
    }
    // the last pair follows from uniqueness
    const last = solver.assume(10, 10);
    expect(last.ok && last.value.status).toEqual({ type: 'solved' });

    const peek = solver.peek();
    expect(peek.assignment.isComplete()).toBe(true);
    expect(peek.assignment.positionOf(11)).toBe(11);
    expect(solver.assume(0, 1).ok).toBe(false);
  });

  it('fans out over the open cells of a line and returns to the start', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);
    const fanned = solver.tryPossibilities(ActivationView, 1);

    expect(fanned.ok).toBe(true);
    if (!fanned.ok) return;
    expect(fanned.value.map((o) => o.action)).toEqual(
      [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11].map((position) => ({ type: 'assume', position, activation: 1 }))
    );
    expect(fanned.value.every((o) => o.status.type === 'alive')).toBe(true);
    expect(solver.current).toBe(1);
    expect(solver.tree.childrenOf(1)).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
  });

  it('moves the cursor to known nodes only', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);

    expect(solver.setCurrent(0)).toEqual({ ok: true, value: 0 });
    expect(solver.current).toBe(ROOT);

    const missing = solver.setCurrent(7);
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(describeSolverError(missing.error)).toBe('Node 7 does not exist');
    }
    expect(solver.current).toBe(ROOT);
  });

  it('keeps working after a rejected cursor move', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);

    expect(solver.setCurrent(99).ok).toBe(false);
    expect(solver.setCurrent(-1).ok).toBe(false);
    expect(solver.setCurrent(0.5).ok).toBe(false);
    expect(solver.current).toBe(1);
    expect(solver.peek().factCount).toBe(23);
    expect(solver.assume(1, 1).ok).toBe(true);
    expect(solver.current).toBe(2);
  });

  it('hands out snapshots whose copies do not reach the stored branch', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);

    const copy = solver.dump().clone();
    expect(copy.integrateAndConsolidate(assumption(1, 0), noRules)).toEqual({ ok: false, error: 24 });
    expect(copy.size).toBe(25);
    expect(solver.dump().size).toBe(23);
    expect(solver.dump().contradictions()).toEqual([]);
    expect(solver.peek().status).toEqual({ type: 'alive' });
  });

  it('explains facts of the current node up to the configured depth', () => {
    const solver = new FactualSolver(noRules, { maxExplainDepth: 0 });
    solver.assume(0, 0);

    const shallow = solver.explain(5);
    expect(shallow.ok && shallow.value).toEqual([
      { depth: 0, text: 'F5: #6 cannot be on slot 0 [depth limit]' },
    ]);
    const deep = solver.explain(5, 5);
    expect(deep.ok && deep.value.length).toBe(3);
    expect(solver.explain(500).ok).toBe(false);
  });

  it('logs through the injected logger only in debug mode', () => {
    const quiet = quietLogger();
    new FactualSolver(noRules, { logger: quiet }).assume(0, 0);
    expect(quiet.debug).not.toHaveBeenCalled();

    const loud = quietLogger();
    new FactualSolver(noRules, { debug: true, logger: loud }).assume(0, 0);
    expect(loud.debug).toHaveBeenCalledWith('[Solver] Assume 0 = #1 below node 0 -> node 1 [alive]');
  });
});

describe('describing nodes', () => {
  it('formats actions and statuses', () => {
    expect(describeAction({ type: 'root' })).toBe('Root');
    expect(describeAction({ type: 'assume', position: 4, activation: 2 })).toBe('Assume 4 = #3');
    expect(describeStatus({ type: 'alive' })).toBe(' ');
    expect(describeStatus({ type: 'contradicted', fact: 24 })).toBe('✘ (F24)');
    expect(describeStatus({ type: 'solved' })).toBe('✔');
  });
});

import { describe, it, expect } from 'vitest';
import { Assignment, createLock, validateLock, type Placement, type Rune } from '@runelock/core';
import { FactualSolver } from '@runelock/puzzle';
import { renderCounts, renderGrid, renderRings, renderState, renderTree, renderValidation } from '../render.js';

const runes: Rune[] = ['Z', 'S', 'V', 'C', 'S', 'V', 'C', 'S', 'V', 'Z', 'S', 'V'];
const noRules = createLock('no rules', runes, []);

function assignmentOf(...pairs: Placement[]): Assignment {
  const assignment = Assignment.fromPairs(pairs);
  if (!assignment.ok) throw new Error('test pairs collide');
  return assignment.value;
}

describe('renderRings', () => {
  it('shows every slot with its rune', () => {
    expect(renderRings(noRules, Assignment.empty()).split('\n')).toEqual([
      'outer  0:Z=.    1:S=.    2:V=.    3:C=.    4:S=.    5:V=.',
      'inner  6:C=.    7:S=.    8:V=.    9:Z=.    10:S=.   11:V=.',
    ]);
  });

  it('shows fixed activations one-based', () => {
    const assignment = assignmentOf([0, 0], [11, 11]);
    expect(renderRings(noRules, assignment).split('\n')).toEqual([
      'outer  0:Z=#1   1:S=.    2:V=.    3:C=.    4:S=.    5:V=.',
      'inner  6:C=.    7:S=.    8:V=.    9:Z=.    10:S=.   11:V=#12',
    ]);
  });
});

describe('renderTree', () => {
  it('indents children and marks the cursor', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);
    solver.assume(1, 0);
    solver.setCurrent(1);

    expect(renderTree(solver).split('\n')).toEqual([
      '- (0) [ ] Root',
      '  - (1) [ ] Assume 0 = #1  <',
      '    - (2) [✘ (F24)] Assume 0 = #2',
    ]);
  });
});

describe('renderGrid', () => {
  it('prints one row per position and one column per activation', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);
    const lines = renderGrid(noRules, solver.dump()).split('\n');

    expect(lines).toHaveLength(13);
    expect(lines[0]).toBe('     #1  #2  #3  #4  #5  #6  #7  #8  #9 #10 #11 #12');
    expect(lines[1]).toBe(' 0Z' + '   M' + '   x'.repeat(11));
    expect(lines[2]).toBe(' 1S' + '   x' + '   .'.repeat(11));
    expect(lines[12]).toBe('11V' + '   x' + '   .'.repeat(11));
  });

  it('marks contradicted cells', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);
    solver.assume(1, 0);
    const lines = renderGrid(noRules, solver.dump()).split('\n');

    expect(lines[1]).toBe(' 0Z' + '   M' + '   !' + '   x'.repeat(10));
  });
});

describe('renderValidation', () => {
  it('reports a valid state', () => {
    expect(renderValidation(validateLock(noRules, Assignment.empty()))).toBe('Valid state.');
  });

  it('names the first failing rule', () => {
    const lock = createLock('same ring', runes, [{ kind: 'same-ring', first: 0, second: 1 }]);
    const assignment = assignmentOf([0, 0], [6, 1]);
    expect(renderValidation(validateLock(lock, assignment))).toBe(
      'Invalid assignment: Rule 0 was violated: #1 & #2 share a ring'
    );
  });
});

describe('renderState', () => {
  it('combines tree, rings, validation and counts', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);

    expect(renderCounts(solver.peek())).toBe(
      'Facts: 23 logged; cells: 1 must-be, 22 cannot-be, 0 contradicted, 121 unknown'
    );
    expect(renderState(solver).split('\n')).toEqual([
      '- (0) [ ] Root',
      '  - (1) [ ] Assume 0 = #1  <',
      'Current node: 1 (alive)',
      'outer  0:Z=#1   1:S=.    2:V=.    3:C=.    4:S=.    5:V=.',
      'inner  6:C=.    7:S=.    8:V=.    9:Z=.    10:S=.   11:V=.',
      'Valid state.',
      'Facts: 23 logged; cells: 1 must-be, 22 cannot-be, 0 contradicted, 121 unknown',
    ]);
  });

  it('names the contradiction of a dead node', () => {
    const solver = new FactualSolver(noRules);
    solver.assume(0, 0);
    solver.assume(1, 0);

    const lines = renderState(solver).split('\n');
    expect(lines[3]).toBe('Current node: 2 (contradicted)');
    expect(lines[7]).toBe('Contradiction F24: #2 has contradicting requirements on slot 0');
    expect(lines[8]).toBe('Facts: 25 logged; cells: 1 must-be, 21 cannot-be, 1 contradicted, 121 unknown');
  });
});

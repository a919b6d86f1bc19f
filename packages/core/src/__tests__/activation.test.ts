import { describe, it, expect } from 'vitest';
import {
  activationFromHuman,
  activationFromIndex,
  formatActivation,
  nextActivation,
  previousActivation,
} from '../activation.js';
import { DomainInputError, InvariantViolationError, LookupError } from '../errors.js';

describe('activations', () => {
  it('converts the one-based numbering users type', () => {
    expect(activationFromHuman(1)).toEqual({ ok: true, value: 0 });
    expect(activationFromHuman(12)).toEqual({ ok: true, value: 11 });
    expect(activationFromIndex(11)).toEqual({ ok: true, value: 11 });
  });

  it('rejects activations outside #1..#12', () => {
    const result = activationFromHuman(13);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DomainInputError);
      expect(result.error.reason).toBe('activation-out-of-range');
    }
    expect(activationFromIndex(-1).ok).toBe(false);
    expect(activationFromHuman(1.5).ok).toBe(false);
  });

  it('steps to neighbours without wrapping', () => {
    expect(nextActivation(3)).toBe(4);
    expect(nextActivation(11)).toBeUndefined();
    expect(previousActivation(3)).toBe(2);
    expect(previousActivation(0)).toBeUndefined();
  });

  it('formats one-based', () => {
    expect(formatActivation(0)).toBe('#1');
    expect(formatActivation(11)).toBe('#12');
  });
});

describe('errors', () => {
  it('names what a lookup missed', () => {
    expect(new LookupError('fact', 4).message).toBe('Unknown fact F4');
    expect(new LookupError('tree-node', 9).message).toBe('Node 9 does not exist');
    expect(new LookupError('fact', 4).name).toBe('LookupError');
  });

  it('prefixes invariant violations', () => {
    expect(new InvariantViolationError('duplicate activation').message).toBe(
      'Invariant violated: duplicate activation'
    );
  });
});

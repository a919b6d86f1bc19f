/**
 * Facts - what is known about one (position, activation) cell, and why.
 */

import { formatActivation, type Activation, type Position } from '@runelock/core';

/** Index into a FactDb's append-only log. */
export type FactHandle = number;

export type ContradictionCause = 'contradicting-requirements' | 'no-options-left';

export type FactKind =
  | { type: 'must-be' }
  | { type: 'cannot-be' }
  | { type: 'contradiction'; cause: ContradictionCause };

/** Justification for a fact */
export type FactReason =
  | { type: 'fact'; handle: FactHandle }
  | { type: 'rule'; index: number }
  | { type: 'assumption' };

export interface Fact {
  readonly kind: FactKind;
  readonly position: Position;
  readonly activation: Activation;
  readonly reasons: readonly FactReason[];
}

export const MUST_BE: FactKind = { type: 'must-be' };
export const CANNOT_BE: FactKind = { type: 'cannot-be' };

export function contradiction(cause: ContradictionCause): FactKind {
  return { type: 'contradiction', cause };
}

export function isContradiction(fact: Fact): boolean {
  return fact.kind.type === 'contradiction';
}

export function assumption(position: Position, activation: Activation): Fact {
  return { kind: MUST_BE, position, activation, reasons: [{ type: 'assumption' }] };
}

export function formatHandle(handle: FactHandle): string {
  return `F${handle}`;
}

function formatPositions(positions: readonly Position[]): string {
  return positions.length === 1 ? `slot ${positions[0]}` : `slots ${positions.join(', ')}`;
}

/**
 * Describe facts that differ only in position as one statement.
 */
export function describeFacts(
  kind: FactKind,
  activation: Activation,
  positions: readonly Position[]
): string {
  const a = formatActivation(activation);
  const where = formatPositions(positions);
  switch (kind.type) {
    case 'must-be':
      return `${a} must be on ${where}`;
    case 'cannot-be':
      return `${a} cannot be on ${where}`;
    case 'contradiction':
      return kind.cause === 'contradicting-requirements'
        ? `${a} has contradicting requirements on ${where}`
        : `${a} has no options left on ${where}`;
  }
}

export function describeFact(fact: Fact): string {
  return describeFacts(fact.kind, fact.activation, [fact.position]);
}

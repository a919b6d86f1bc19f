/**
 * Positions - the twelve rune slots of the lock
 *
 * Positions 0..5 run around the outer ring, 6..11 around the inner ring.
 * Position p of the inner ring sits directly below position p - 6 of the outer
 * ring. Every relation here is a pure predicate on two indexes.
 */

import { DomainInputError } from './errors.js';
import { err, ok, type Result } from './result.js';

export type Position = number;

export const POSITION_COUNT = 12;
export const RING_SIZE = 6;

export type Ring = 'outer' | 'inner';

/**
 * Weight of each position. Both slots of the vertical sector outweigh the
 * side sectors, which holds as long as the rings are equally spaced.
 */
export const POSITION_WEIGHTS: readonly number[] = [
  // outer
  7, 5, 2, 0, 2, 5,
  // inner
  6, 4, 3, 1, 3, 4,
];
export const MAX_WEIGHT = 7;
export const MIN_WEIGHT = 0;

export const ALL_POSITIONS: readonly Position[] = Array.from(
  { length: POSITION_COUNT },
  (_, i) => i
);

export function isPosition(n: number): n is Position {
  return Number.isInteger(n) && n >= 0 && n < POSITION_COUNT;
}

export function positionFromNumber(n: number): Result<Position, DomainInputError> {
  if (!isPosition(n)) {
    return err(
      new DomainInputError(
        'position-out-of-range',
        `Position ${n} is out of range (expected 0..${POSITION_COUNT - 1})`
      )
    );
  }
  return ok(n);
}

export function ringOf(p: Position): Ring {
  return p < RING_SIZE ? 'outer' : 'inner';
}

export function weightOf(p: Position): number {
  return POSITION_WEIGHTS[p];
}

/** Clockwise steps from `from` to `to`, counted on a single ring (0..5). */
function stepsAfter(from: Position, to: Position): number {
  return (POSITION_COUNT + to - from) % RING_SIZE;
}

/**
 * `to` is one or two steps clockwise after `from`. Ring membership is ignored.
 */
export function isCloseSuccessor(from: Position, to: Position): boolean {
  const distance = stepsAfter(from, to);
  return distance > 0 && distance <= 2;
}

/** The point-symmetric partner of `p` on its own ring. */
export function oppositeOf(p: Position): Position {
  const onRing = (p + 3) % RING_SIZE;
  return ringOf(p) === 'outer' ? onRing : onRing + RING_SIZE;
}

export function onSameRing(a: Position, b: Position): boolean {
  return ringOf(a) === ringOf(b);
}

/** Mirrored across the centre, on either ring. */
export function areMirrored(a: Position, b: Position): boolean {
  return a % RING_SIZE === (b + 3) % RING_SIZE;
}

export function areOpposite(a: Position, b: Position): boolean {
  return onSameRing(a, b) && areMirrored(a, b);
}

export function increasesWeight(a: Position, b: Position): boolean {
  return weightOf(a) < weightOf(b);
}

/**
 * Neighbours on the same ring, or the slot directly above / below across rings.
 */
export function areLinked(a: Position, b: Position): boolean {
  if (onSameRing(a, b)) {
    return (a + 1) % RING_SIZE === b % RING_SIZE || (b + 1) % RING_SIZE === a % RING_SIZE;
  }
  return (a + RING_SIZE) % POSITION_COUNT === b;
}

export function formatPosition(p: Position): string {
  return String(p);
}

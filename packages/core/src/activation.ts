/**
 * Activations - the twelve items placed into positions. Stored zero-based,
 * shown one-based as `#n`.
 */

import { DomainInputError } from './errors.js';
import { err, ok, type Result } from './result.js';

export type Activation = number;

export const ACTIVATION_COUNT = 12;

export const ALL_ACTIVATIONS: readonly Activation[] = Array.from(
  { length: ACTIVATION_COUNT },
  (_, i) => i
);

export function isActivation(n: number): n is Activation {
  return Number.isInteger(n) && n >= 0 && n < ACTIVATION_COUNT;
}

export function activationFromIndex(zeroBased: number): Result<Activation, DomainInputError> {
  if (!isActivation(zeroBased)) {
    return err(
      new DomainInputError(
        'activation-out-of-range',
        `Activation #${zeroBased + 1} is out of range (expected #1..#${ACTIVATION_COUNT})`
      )
    );
  }
  return ok(zeroBased);
}

/** Accepts the one-based numbering users see. */
export function activationFromHuman(oneBased: number): Result<Activation, DomainInputError> {
  return activationFromIndex(oneBased - 1);
}

export function nextActivation(a: Activation): Activation | undefined {
  const next = a + 1;
  return isActivation(next) ? next : undefined;
}

export function previousActivation(a: Activation): Activation | undefined {
  const previous = a - 1;
  return isActivation(previous) ? previous : undefined;
}

export function formatActivation(a: Activation): string {
  return `#${a + 1}`;
}

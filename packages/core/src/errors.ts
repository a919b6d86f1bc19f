/**
 * Error classes for the three non-contradiction failure families.
 *
 * Contradictions are not errors: they are facts, reported through Result values.
 */

export type DomainInputReason =
  | 'position-out-of-range'
  | 'activation-out-of-range'
  | 'malformed-command'
  | 'invalid-lock-definition'
  | 'invalid-options';

/**
 * Rejected user or file input. Raised before anything reaches the solver.
 */
export class DomainInputError extends Error {
  readonly reason: DomainInputReason;

  constructor(reason: DomainInputReason, message: string) {
    super(message);
    this.name = 'DomainInputError';
    this.reason = reason;
  }
}

export type LookupTarget = 'fact' | 'tree-node';

/**
 * A handle or id that does not name anything.
 */
export class LookupError extends Error {
  readonly target: LookupTarget;
  readonly id: number;

  constructor(target: LookupTarget, id: number) {
    super(target === 'fact' ? `Unknown fact F${id}` : `Node ${id} does not exist`);
    this.name = 'LookupError';
    this.target = target;
    this.id = id;
  }
}

/**
 * A broken internal contract. Seeing one means the propagation logic has a bug.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

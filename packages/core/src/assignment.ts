/**
 * Assignment - a partial one-to-one map between positions and activations.
 *
 * Two inverse lookup arrays are kept in sync so both directions are O(1).
 */

import { ACTIVATION_COUNT, formatActivation, type Activation } from './activation.js';
import { POSITION_COUNT, type Position } from './position.js';
import { err, ok, type Result } from './result.js';

export type AssignmentError =
  | {
      type: 'activation-assigned-twice';
      activation: Activation;
      positions: [Position, Position];
    }
  | {
      type: 'position-assigned-twice';
      position: Position;
      activations: [Activation, Activation];
    };

export function describeAssignmentError(error: AssignmentError): string {
  switch (error.type) {
    case 'activation-assigned-twice':
      return `Activation ${formatActivation(error.activation)} was assigned twice to ${error.positions[0]} and ${error.positions[1]}`;
    case 'position-assigned-twice':
      return `Position ${error.position} was assigned twice to ${formatActivation(error.activations[0])} and ${formatActivation(error.activations[1])}`;
  }
}

export type Placement = readonly [Position, Activation];

export class Assignment {
  private readonly activationAtPosition: (Activation | undefined)[];
  private readonly positionOfActivation: (Position | undefined)[];

  private constructor(
    activationAtPosition: (Activation | undefined)[],
    positionOfActivation: (Position | undefined)[]
  ) {
    this.activationAtPosition = activationAtPosition;
    this.positionOfActivation = positionOfActivation;
  }

  static empty(): Assignment {
    return new Assignment(
      new Array<Activation | undefined>(POSITION_COUNT).fill(undefined),
      new Array<Position | undefined>(ACTIVATION_COUNT).fill(undefined)
    );
  }

  /**
   * Build from placements. Unlike `assign`, a clash is an error rather than an eviction.
   */
  static fromPairs(pairs: Iterable<Placement>): Result<Assignment, AssignmentError> {
    const assignment = Assignment.empty();
    for (const [position, activation] of pairs) {
      const existingPosition = assignment.positionOf(activation);
      if (existingPosition !== undefined) {
        return err({
          type: 'activation-assigned-twice',
          activation,
          positions: [position, existingPosition],
        });
      }
      const existingActivation = assignment.activationAt(position);
      if (existingActivation !== undefined) {
        return err({
          type: 'position-assigned-twice',
          position,
          activations: [activation, existingActivation],
        });
      }
      assignment.assign(position, activation);
    }
    return ok(assignment);
  }

  /**
   * Build from one optional activation per position, in position order.
   */
  static fromSlots(slots: readonly (Activation | undefined)[]): Result<Assignment, AssignmentError> {
    const pairs: Placement[] = [];
    slots.forEach((activation, position) => {
      if (activation !== undefined) {
        pairs.push([position, activation]);
      }
    });
    return Assignment.fromPairs(pairs);
  }

  positionOf(activation: Activation): Position | undefined {
    return this.positionOfActivation[activation];
  }

  activationAt(position: Position): Activation | undefined {
    return this.activationAtPosition[position];
  }

  contains(activation: Activation): boolean {
    return this.positionOfActivation[activation] !== undefined;
  }

  isOccupied(position: Position): boolean {
    return this.activationAtPosition[position] !== undefined;
  }

  /**
   * Place an activation, evicting whatever previously shared its position or
   * activation. Only meant for throwaway probes.
   */
  assign(position: Position, activation: Activation): void {
    const oldPosition = this.positionOfActivation[activation];
    if (oldPosition !== undefined) {
      this.activationAtPosition[oldPosition] = undefined;
    }
    const oldActivation = this.activationAtPosition[position];
    if (oldActivation !== undefined) {
      this.positionOfActivation[oldActivation] = undefined;
    }
    this.positionOfActivation[activation] = position;
    this.activationAtPosition[position] = activation;
  }

  get size(): number {
    return this.activationAtPosition.filter((a) => a !== undefined).length;
  }

  isComplete(): boolean {
    return this.size === POSITION_COUNT;
  }

  pairs(): Placement[] {
    const pairs: Placement[] = [];
    this.activationAtPosition.forEach((activation, position) => {
      if (activation !== undefined) {
        pairs.push([position, activation]);
      }
    });
    return pairs;
  }

  slots(): (Activation | undefined)[] {
    return [...this.activationAtPosition];
  }

  clone(): Assignment {
    return new Assignment([...this.activationAtPosition], [...this.positionOfActivation]);
  }
}

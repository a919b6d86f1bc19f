/**
 * Views - the row/column duality of the fact grid.
 *
 * A line is either one position with all activations (position view) or one
 * activation with all positions (activation view). Uniqueness reasoning is
 * written once against this interface.
 */

import {
  ACTIVATION_COUNT,
  POSITION_COUNT,
  formatActivation,
  formatPosition,
  type Activation,
  type Position,
} from '@runelock/core';

export interface Cell {
  position: Position;
  activation: Activation;
}

export interface View {
  readonly name: 'position' | 'activation';
  /** Number of lines in this view */
  readonly lineCount: number;
  /** Number of cells on each line */
  readonly lineLength: number;
  /** The cell at `offset` on line `line` */
  cell(line: number, offset: number): Cell;
  /** Which line of this view a cell lies on */
  lineOf(cell: Cell): number;
  /** Where along its line a cell lies */
  offsetOf(cell: Cell): number;
  describeLine(line: number): string;
}

export const PositionView: View = {
  name: 'position',
  lineCount: POSITION_COUNT,
  lineLength: ACTIVATION_COUNT,
  cell: (line, offset) => ({ position: line, activation: offset }),
  lineOf: (cell) => cell.position,
  offsetOf: (cell) => cell.activation,
  describeLine: (line) => `slot ${formatPosition(line)}`,
};

export const ActivationView: View = {
  name: 'activation',
  lineCount: ACTIVATION_COUNT,
  lineLength: POSITION_COUNT,
  cell: (line, offset) => ({ position: offset, activation: line }),
  lineOf: (cell) => cell.activation,
  offsetOf: (cell) => cell.position,
  describeLine: (line) => formatActivation(line),
};

export const VIEWS: readonly View[] = [PositionView, ActivationView];

import { describe, it, expect } from 'vitest';
import { ActivationView, PositionView, VIEWS } from '../view.js';

describe('views', () => {
  it('maps lines and offsets onto cells', () => {
    expect(PositionView.cell(3, 5)).toEqual({ position: 3, activation: 5 });
    expect(ActivationView.cell(3, 5)).toEqual({ position: 5, activation: 3 });
  });

  it('inverts cell() through lineOf and offsetOf', () => {
    for (const view of VIEWS) {
      for (let line = 0; line < view.lineCount; line++) {
        for (let offset = 0; offset < view.lineLength; offset++) {
          const cell = view.cell(line, offset);
          expect(view.lineOf(cell)).toBe(line);
          expect(view.offsetOf(cell)).toBe(offset);
        }
      }
    }
  });

  it('describes lines the way the prompt shows them', () => {
    expect(PositionView.describeLine(4)).toBe('slot 4');
    expect(ActivationView.describeLine(4)).toBe('#5');
  });
});

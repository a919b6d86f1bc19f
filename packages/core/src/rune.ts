import { z } from 'zod';

export const RuneSchema = z.enum(['Z', 'V', 'S', 'C']);

/** Label carried by a position. Fixed when the lock is defined. */
export type Rune = z.infer<typeof RuneSchema>;

export const RUNES: readonly Rune[] = RuneSchema.options;

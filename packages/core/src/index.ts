/**
 * @runelock/core - Lock primitives
 *
 * - Positions and their geometric relations
 * - Activations and runes
 * - Assignments, rules and locks
 * - Result type and error classes shared by every package
 */

export * from './result.js';
export * from './errors.js';
export * from './position.js';
export * from './activation.js';
export * from './rune.js';
export * from './assignment.js';
export * from './rule.js';
export * from './lock.js';
export * from './lock-definition.js';

/**
 * Rules - binary constraints of a lock
 *
 * Most rules relate the positions of two activations through one of the
 * position relations. The `rune-follows` rule relates runes instead: whatever
 * sits on a `first` rune must be followed, activation-wise, by something on a
 * `second` rune.
 *
 * Rules never change once a lock is defined and are cited by their index.
 */

import {
  formatActivation,
  nextActivation,
  previousActivation,
  type Activation,
} from './activation.js';
import { Assignment, type Placement } from './assignment.js';
import {
  ALL_POSITIONS,
  areLinked,
  areMirrored,
  areOpposite,
  increasesWeight,
  isCloseSuccessor,
  onSameRing,
  type Position,
} from './position.js';
import type { Rune } from './rune.js';

export const ACTIVATION_RULE_KINDS = [
  'close-successor',
  'opposite',
  'mirrored',
  'different-runes',
  'same-ring',
  'increasing-weight',
  'linked',
] as const;

export type ActivationRuleKind = (typeof ACTIVATION_RULE_KINDS)[number];

export interface ActivationRule {
  kind: ActivationRuleKind;
  first: Activation;
  second: Activation;
}

export interface RuneFollowsRule {
  kind: 'rune-follows';
  first: Rune;
  second: Rune;
}

export type Rule = ActivationRule | RuneFollowsRule;

/**
 * `violated`: the placed activations break the rule.
 * `unfulfillable`: nothing is broken yet, but no free position can satisfy it.
 */
export type RuleVerdict = 'ok' | 'violated' | 'unfulfillable';

/**
 * Whether the relation of `kind` holds with `first` on `p` and `second` on `q`.
 */
export function relationHolds(
  kind: ActivationRuleKind,
  runes: readonly Rune[],
  p: Position,
  q: Position
): boolean {
  switch (kind) {
    case 'close-successor':
      return isCloseSuccessor(p, q);
    case 'opposite':
      return areOpposite(p, q);
    case 'mirrored':
      return areMirrored(p, q);
    case 'different-runes':
      return runes[p] !== runes[q];
    case 'same-ring':
      return onSameRing(p, q);
    case 'increasing-weight':
      return increasesWeight(p, q);
    case 'linked':
      return areLinked(p, q);
  }
}

function validateActivationRule(
  rule: ActivationRule,
  runes: readonly Rune[],
  assignment: Assignment
): RuleVerdict {
  const p = assignment.positionOf(rule.first);
  const q = assignment.positionOf(rule.second);
  const free = ALL_POSITIONS.filter((position) => !assignment.isOccupied(position));

  if (p !== undefined && q !== undefined) {
    return relationHolds(rule.kind, runes, p, q) ? 'ok' : 'violated';
  }
  if (p !== undefined) {
    return free.some((r) => relationHolds(rule.kind, runes, p, r)) ? 'ok' : 'unfulfillable';
  }
  if (q !== undefined) {
    return free.some((r) => relationHolds(rule.kind, runes, r, q)) ? 'ok' : 'unfulfillable';
  }
  return 'ok';
}

function validateRuneFollows(
  rule: RuneFollowsRule,
  runes: readonly Rune[],
  assignment: Assignment
): RuleVerdict {
  for (const position of ALL_POSITIONS) {
    if (runes[position] !== rule.first) continue;

    const activation = assignment.activationAt(position);
    if (activation === undefined) continue;

    const next = nextActivation(activation);
    if (next === undefined) {
      return 'unfulfillable';
    }
    const nextPosition = assignment.positionOf(next);
    if (nextPosition !== undefined && runes[nextPosition] !== rule.second) {
      return 'violated';
    }
  }
  return 'ok';
}

/**
 * Check a rule against a possibly partial assignment.
 */
export function validateRule(
  rule: Rule,
  runes: readonly Rune[],
  assignment: Assignment
): RuleVerdict {
  if (rule.kind === 'rune-follows') {
    return validateRuneFollows(rule, runes, assignment);
  }
  return validateActivationRule(rule, runes, assignment);
}

/**
 * Check a rule against exactly two placements, without touching real state.
 * Two placements that clash on a position or activation count as violated.
 */
export function validateRulePair(
  rule: Rule,
  runes: readonly Rune[],
  a: Placement,
  b: Placement
): RuleVerdict {
  const probe = Assignment.fromPairs([a, b]);
  if (!probe.ok) {
    return 'violated';
  }
  return validateRule(rule, runes, probe.value);
}

/**
 * Activations whose placement a rule constrains once `activation` is fixed.
 */
export function counterpartsOf(rule: Rule, activation: Activation): Activation[] {
  if (rule.kind === 'rune-follows') {
    return [previousActivation(activation), nextActivation(activation)].filter(
      (a): a is Activation => a !== undefined
    );
  }
  const counterparts: Activation[] = [];
  if (rule.first === activation) counterparts.push(rule.second);
  if (rule.second === activation) counterparts.push(rule.first);
  return counterparts;
}

export function describeRule(rule: Rule): string {
  if (rule.kind === 'rune-follows') {
    return `${rule.second} immediately follows ${rule.first}`;
  }
  const first = formatActivation(rule.first);
  const second = formatActivation(rule.second);
  switch (rule.kind) {
    case 'close-successor':
      return `${second} lies one or two steps after ${first}`;
    case 'opposite':
      return `${first} & ${second} are opposite on one ring`;
    case 'mirrored':
      return `${first} & ${second} are mirrored`;
    case 'different-runes':
      return `${first} & ${second} are on different runes`;
    case 'same-ring':
      return `${first} & ${second} share a ring`;
    case 'increasing-weight':
      return `${second} outweighs ${first}`;
    case 'linked':
      return `${first} & ${second} are linked`;
  }
}

/**
 * RuneLock - one puzzle instance: a rune per position and an ordered rule list.
 */

import type { Assignment } from './assignment.js';
import { InvariantViolationError } from './errors.js';
import { POSITION_COUNT } from './position.js';
import { err, ok, type Result } from './result.js';
import type { Rune } from './rune.js';
import { describeRule, validateRule, type Rule, type RuleVerdict } from './rule.js';

export interface RuneLock {
  readonly name: string;
  readonly runes: readonly Rune[];
  readonly rules: readonly Rule[];
}

export interface RuleFailure {
  ruleIndex: number;
  rule: Rule;
  verdict: Exclude<RuleVerdict, 'ok'>;
}

export function createLock(name: string, runes: readonly Rune[], rules: readonly Rule[]): RuneLock {
  if (runes.length !== POSITION_COUNT) {
    throw new InvariantViolationError(
      `a lock needs ${POSITION_COUNT} runes, got ${runes.length}`
    );
  }
  return Object.freeze({
    name,
    runes: Object.freeze([...runes]),
    rules: Object.freeze([...rules]),
  });
}

/**
 * Every rule the assignment breaks or can no longer satisfy, in rule order.
 */
export function lockFailures(lock: RuneLock, assignment: Assignment): RuleFailure[] {
  const failures: RuleFailure[] = [];
  lock.rules.forEach((rule, ruleIndex) => {
    const verdict = validateRule(rule, lock.runes, assignment);
    if (verdict !== 'ok') {
      failures.push({ ruleIndex, rule, verdict });
    }
  });
  return failures;
}

export function validateLock(lock: RuneLock, assignment: Assignment): Result<void, RuleFailure> {
  const [first] = lockFailures(lock, assignment);
  return first === undefined ? ok(undefined) : err(first);
}

export function describeRuleFailure(failure: RuleFailure): string {
  const what = failure.verdict === 'violated' ? 'was violated' : 'is not fulfillable';
  return `Rule ${failure.ruleIndex} ${what}: ${describeRule(failure.rule)}`;
}

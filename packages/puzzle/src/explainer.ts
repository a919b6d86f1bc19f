/**
 * Explainer - renders the justification chain behind a fact.
 *
 * Uniqueness deductions cite one fact per sibling cell, so fact reasons that
 * agree on kind, activation and their own reasons are collapsed into one line
 * listing the positions. Reasons only point at earlier log entries, which
 * keeps the walk finite; the depth bound keeps it short.
 */

import { LookupError, describeRule, err, ok, type Result, type RuneLock } from '@runelock/core';
import { describeFacts, describeFact, formatHandle, type Fact, type FactHandle, type FactReason } from './fact.js';
import type { FactSnapshot } from './fact-db.js';

export interface ExplanationLine {
  depth: number;
  text: string;
}

interface FactGroup {
  handles: FactHandle[];
  fact: Fact;
  positions: number[];
}

const DEPTH_LIMIT_MARK = ' [depth limit]';

function groupKey(fact: Fact): string {
  return JSON.stringify([fact.kind, fact.activation, fact.reasons]);
}

function groupFactReasons(db: FactSnapshot, reasons: readonly FactReason[]): FactGroup[] {
  const groups = new Map<string, FactGroup>();
  for (const reason of reasons) {
    if (reason.type !== 'fact') continue;
    const fact = db.get(reason.handle);
    if (fact === undefined) continue;
    const key = groupKey(fact);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, { handles: [reason.handle], fact, positions: [fact.position] });
    } else {
      group.handles.push(reason.handle);
      group.positions.push(fact.position);
    }
  }
  return [...groups.values()];
}

class Explainer {
  readonly lines: ExplanationLine[] = [];

  constructor(
    private readonly db: FactSnapshot,
    private readonly lock: RuneLock,
    private readonly maxDepth: number
  ) {}

  explainReasons(reasons: readonly FactReason[], depth: number): void {
    for (const reason of reasons) {
      if (reason.type === 'rule') {
        const rule = this.lock.rules[reason.index];
        const text = rule === undefined ? 'unknown rule' : describeRule(rule);
        this.lines.push({ depth, text: `Rule ${reason.index}: '${text}'` });
      } else if (reason.type === 'assumption') {
        this.lines.push({ depth, text: 'Fact assumed' });
      } else if (this.db.get(reason.handle) === undefined) {
        this.lines.push({ depth, text: `Unknown fact ${formatHandle(reason.handle)}` });
      }
    }

    for (const group of groupFactReasons(this.db, reasons)) {
      const label = `${group.handles.map(formatHandle).join(', ')}: ${describeFacts(
        group.fact.kind,
        group.fact.activation,
        group.positions
      )}`;
      if (group.fact.reasons.length > 0 && depth >= this.maxDepth) {
        this.lines.push({ depth, text: label + DEPTH_LIMIT_MARK });
        continue;
      }
      this.lines.push({ depth, text: label });
      this.explainReasons(group.fact.reasons, depth + 1);
    }
  }
}

/**
 * Explain a fact of `db` down to at most `maxDepth` levels of reasons.
 */
export function explainFact(
  db: FactSnapshot,
  lock: RuneLock,
  handle: FactHandle,
  maxDepth: number
): Result<ExplanationLine[], LookupError> {
  const fact = db.get(handle);
  if (fact === undefined) {
    return err(new LookupError('fact', handle));
  }

  const explainer = new Explainer(db, lock, maxDepth);
  const head = `${formatHandle(handle)}: ${describeFact(fact)}`;
  if (fact.reasons.length > 0 && maxDepth < 1) {
    explainer.lines.push({ depth: 0, text: head + DEPTH_LIMIT_MARK });
  } else {
    explainer.lines.push({ depth: 0, text: head });
    explainer.explainReasons(fact.reasons, 1);
  }
  return ok(explainer.lines);
}

export function formatExplanation(lines: readonly ExplanationLine[]): string {
  return lines
    .map((line) => (line.depth === 0 ? line.text : `${'    '.repeat(line.depth - 1)} -> ${line.text}`))
    .join('\n');
}

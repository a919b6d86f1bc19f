/**
 * Lock definitions - the JSON form of a RuneLock.
 *
 * Activations are written one-based, as players count them.
 */

import { z } from 'zod';
import { ACTIVATION_COUNT } from './activation.js';
import { DomainInputError } from './errors.js';
import { createLock, type RuneLock } from './lock.js';
import { POSITION_COUNT } from './position.js';
import { err, ok, type Result } from './result.js';
import { RuneSchema } from './rune.js';
import { ACTIVATION_RULE_KINDS, type Rule } from './rule.js';

const HumanActivationSchema = z.number().int().min(1).max(ACTIVATION_COUNT);

export const ActivationRuleDefinitionSchema = z.object({
  kind: z.enum(ACTIVATION_RULE_KINDS),
  first: HumanActivationSchema,
  second: HumanActivationSchema,
});

export const RuneFollowsRuleDefinitionSchema = z.object({
  kind: z.literal('rune-follows'),
  first: RuneSchema,
  second: RuneSchema,
});

export const RuleDefinitionSchema = z.union([
  ActivationRuleDefinitionSchema,
  RuneFollowsRuleDefinitionSchema,
]);

export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>;

export const RuneLockDefinitionSchema = z
  .object({
    name: z.string().min(1),
    runes: z.array(RuneSchema).length(POSITION_COUNT),
    rules: z.array(RuleDefinitionSchema),
  })
  .superRefine((definition, ctx) => {
    definition.rules.forEach((rule, index) => {
      if (rule.kind !== 'rune-follows' && rule.first === rule.second) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index],
          message: 'a rule must relate two different activations',
        });
      }
    });
  });

export type RuneLockDefinition = z.infer<typeof RuneLockDefinitionSchema>;

function ruleFromDefinition(definition: RuleDefinition): Rule {
  if (definition.kind === 'rune-follows') {
    return { kind: 'rune-follows', first: definition.first, second: definition.second };
  }
  return { kind: definition.kind, first: definition.first - 1, second: definition.second - 1 };
}

export function lockFromDefinition(definition: RuneLockDefinition): RuneLock {
  return createLock(definition.name, definition.runes, definition.rules.map(ruleFromDefinition));
}

/** `path: message` per issue, joined for a single error line */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an untrusted document (parsed JSON) and build the lock it describes.
 */
export function parseLockDefinition(input: unknown): Result<RuneLock, DomainInputError> {
  const parsed = RuneLockDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      new DomainInputError(
        'invalid-lock-definition',
        `Invalid lock definition: ${formatIssues(parsed.error)}`
      )
    );
  }
  return ok(lockFromDefinition(parsed.data));
}

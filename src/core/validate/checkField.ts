import { checkEnum, checkLength, checkMax, checkMin, checkRegex, isEmptyValue } from '../checks/builtins.js';
import { compileExpression } from '../checks/expression.js';
import type { CheckerRegistry } from '../checks/registry.js';
import { UnsafeEvalDisabledError } from '../errors.js';
import type { FieldIndex } from '../index/fieldIndex.js';
import type { CheckRule, FieldValue } from '../rules/schema.js';

/** What a single-field check needs from its validator. */
export interface CheckContext {
  readonly index: FieldIndex;
  readonly registry: CheckerRegistry;
  readonly allowSubs: boolean;
}

/** Criterion keys, in evaluation order. */
export const CRITERIA = ['min', 'max', 'regex', 'length', 'enum', 'plugin', 'sub'] as const;

export type Criterion = (typeof CRITERIA)[number];

function checkCriterion(
  ctx: CheckContext,
  field: string,
  criterion: Criterion,
  value: FieldValue,
  rule: CheckRule,
): boolean {
  switch (criterion) {
    case 'min':
      return rule.min === undefined || checkMin(value, rule.min);
    case 'max':
      return rule.max === undefined || checkMax(value, rule.max);
    case 'regex':
      return rule.regex === undefined || checkRegex(value, rule.regex);
    case 'length':
      return rule.length === undefined || checkLength(value, rule.length);
    case 'enum':
      return rule.enum === undefined || checkEnum(value, rule.enum);
    case 'plugin':
      return rule.plugin === undefined || ctx.registry.resolve(rule.plugin).check(value, rule);
    case 'sub':
      if (rule.sub === undefined) return true;
      if (!ctx.allowSubs) throw new UnsafeEvalDisabledError(field);
      return compileExpression(rule.sub)(value);
  }
}

/**
 * Check one value against a field's rule.
 *
 * Without an explicit rule the field's bucket decides whether it is required;
 * with one, the rule's `type` does (unset counts as optional). Missing or empty
 * values fail required fields and pass optional ones before any criterion runs.
 * Otherwise every criterion present must hold; the first failure stops the check.
 *
 * Throws `PluginResolutionError`, `UnsafeEvalDisabledError` and
 * `InvalidPatternError`, which are configuration faults rather than failed checks.
 */
export function checkField(
  ctx: CheckContext,
  field: string,
  value: FieldValue,
  explicitRule?: CheckRule,
): boolean {
  const rule = explicitRule ?? ctx.index.ruleFor(field);
  if (rule === undefined) {
    return true;
  }

  const required =
    explicitRule !== undefined ? explicitRule.type === 'required' : ctx.index.isRequired(field);

  if (isEmptyValue(value)) {
    return !required;
  }

  return CRITERIA.every((criterion) => checkCriterion(ctx, field, criterion, value, rule));
}

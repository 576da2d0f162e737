import { isEmptyValue, stringValue } from '../checks/builtins.js';
import type { CheckRule, FieldRule, FieldValues } from '../rules/schema.js';
import { checkField } from './checkField.js';
import type { CheckContext } from './checkField.js';

/** Failing field name -> configured message. Empty when the form is valid. */
export type FormErrors = Record<string, string>;

/** How a field's rule resolved against the rest of the form. */
export type EffectiveRule =
  | { readonly kind: 'skip' }
  | { readonly kind: 'missing-dependency'; readonly dependsOn: string }
  | { readonly kind: 'rule'; readonly rule: CheckRule };

/**
 * Resolve the rule a field is checked with, given the other values of its form.
 * A `depends_on` field needs a non-empty value for the field it depends on;
 * the matching `case` entry, keyed by that value, replaces the rule.
 * The resolved rule keeps its own `type`; an unset type means optional.
 */
export function resolveEffectiveRule(rule: FieldRule | undefined, values: FieldValues): EffectiveRule {
  if (rule === undefined || isTruthyFlag(rule.no_validate)) {
    return { kind: 'skip' };
  }

  if (rule.depends_on !== undefined) {
    const dependedValue = ownValue(values, rule.depends_on);
    if (isEmptyValue(dependedValue)) {
      return { kind: 'missing-dependency', dependsOn: rule.depends_on };
    }
    const override = rule.case !== undefined ? ownValue(rule.case, stringValue(dependedValue)) : undefined;
    if (override !== undefined) {
      return { kind: 'rule', rule: withType(override) };
    }
  }

  return { kind: 'rule', rule: withType(rule) };
}

function withType(rule: CheckRule): CheckRule {
  return { ...rule, type: rule.type ?? 'optional' };
}

function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

function isTruthyFlag(flag: boolean | number | undefined): boolean {
  return flag !== undefined && flag !== false && flag !== 0;
}

/**
 * Validate every field registered under `section`, in section order.
 * Failed checks are collected with the field's message; configuration faults
 * thrown by a check propagate.
 */
export function validateForm(ctx: CheckContext, section: string, values: FieldValues): FormErrors {
  const errors: FormErrors = {};

  for (const field of ctx.index.fieldNames(section)) {
    const resolved = resolveEffectiveRule(ctx.index.ruleFor(field), values);
    switch (resolved.kind) {
      case 'skip':
        break;
      case 'missing-dependency':
        errors[field] = ctx.index.message(field);
        break;
      case 'rule':
        if (!checkField(ctx, field, ownValue(values, field), resolved.rule)) {
          errors[field] = ctx.index.message(field);
        }
        break;
    }
  }

  return errors;
}

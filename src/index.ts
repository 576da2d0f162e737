export type {
  CheckRule,
  FieldRule,
  FieldType,
  FieldValue,
  FieldValues,
  OverrideRule,
  RuleSet,
  Section,
} from './core/rules/schema.js';
export type { LoadResult } from './core/rules/load.js';
export type { FieldNamesOptions } from './core/index/fieldIndex.js';
export type { FormErrors, EffectiveRule } from './core/validate/validateForm.js';
export type { FieldPlugin } from './core/checks/registry.js';
export type { CompiledExpression } from './core/checks/expression.js';
export type {
  ValidationReport,
  FieldError,
  ReportMetadata,
  OutputFormat,
} from './core/report/reportTypes.js';

export {
  FieldValidatorError,
  ConfigNotFoundError,
  ConfigParseError,
  PluginResolutionError,
  UnsafeEvalDisabledError,
  ExpressionSyntaxError,
  InvalidPatternError,
  isFatalValidationError,
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';
export { CheckerRegistry } from './core/checks/registry.js';
export { createDefaultRegistry, emailPlugin, urlPlugin, phonePlugin } from './core/checks/plugins.js';
export { compileExpression } from './core/checks/expression.js';
export { FieldIndex } from './core/index/fieldIndex.js';
export { loadRuleSetFile, parseRuleSet, parseRuleSetYaml } from './core/rules/load.js';
export { resolveEffectiveRule } from './core/validate/validateForm.js';

import { CheckerRegistry } from './core/checks/registry.js';
import type { FieldPlugin } from './core/checks/registry.js';
import { createDefaultRegistry } from './core/checks/plugins.js';
import { FieldIndex } from './core/index/fieldIndex.js';
import type { FieldNamesOptions } from './core/index/fieldIndex.js';
import { loadRuleSetFile, parseRuleSet, parseRuleSetYaml } from './core/rules/load.js';
import type { LoadResult } from './core/rules/load.js';
import type { CheckRule, FieldRule, FieldValue, FieldValues, RuleSet } from './core/rules/schema.js';
import { checkField } from './core/validate/checkField.js';
import type { CheckContext } from './core/validate/checkField.js';
import { validateForm } from './core/validate/validateForm.js';
import type { FormErrors } from './core/validate/validateForm.js';

/** Options for creating a validator. */
export interface ValidatorOptions {
  /** Enable the `sub` expression criterion. Off by default. */
  readonly allowSubs?: boolean | undefined;
  /**
   * Plugin checkers. A registry is used as given; a record is registered on
   * top of the default plugins.
   */
  readonly plugins?: CheckerRegistry | Readonly<Record<string, FieldPlugin>> | undefined;
}

function buildRegistry(plugins: ValidatorOptions['plugins']): CheckerRegistry {
  if (plugins instanceof CheckerRegistry) {
    return plugins;
  }
  const registry = createDefaultRegistry();
  for (const [name, plugin] of Object.entries(plugins ?? {})) {
    registry.register(name, plugin);
  }
  return registry;
}

/**
 * Validator for forms described by a YAML rule set.
 *
 * ```ts
 * const result = openValidator('rules.yml');
 * if (!result.ok) throw result.error;
 * const errors = result.value.validate('step1', { name: 'Jane Example', age: 30 });
 * ```
 */
export class RuleValidator {
  readonly ruleSet: RuleSet;
  private readonly ctx: CheckContext;

  constructor(ruleSet: RuleSet, options: ValidatorOptions = {}) {
    this.ruleSet = ruleSet;
    this.ctx = {
      index: FieldIndex.fromRuleSet(ruleSet),
      registry: buildRegistry(options.plugins),
      allowSubs: options.allowSubs === true,
    };
  }

  /** Load a rule file, throwing `ConfigNotFoundError` or `ConfigParseError` on failure. */
  static fromFile(filePath: string, options: ValidatorOptions = {}): RuleValidator {
    const result = openValidator(filePath, options);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /** Check one value. See `checkField` for the rules. */
  check(field: string, value: FieldValue, rule?: CheckRule): boolean {
    return checkField(this.ctx, field, value, rule);
  }

  /** Check several values of the same field. */
  checkMany(field: string, values: readonly FieldValue[]): boolean[] {
    return values.map((value) => this.check(field, value));
  }

  /** Validate a whole section. Returns failing field -> message. */
  validate(section: string, values: FieldValues): FormErrors {
    return validateForm(this.ctx, section, values);
  }

  fieldNames(section?: string, options?: FieldNamesOptions): string[] {
    return this.ctx.index.fieldNames(section, options);
  }

  sections(): string[] {
    return this.ctx.index.sections();
  }

  message(field: string): string {
    return this.ctx.index.message(field);
  }

  ruleFor(field: string): FieldRule | undefined {
    return this.ctx.index.ruleFor(field);
  }

  isRequired(field: string): boolean {
    return this.ctx.index.isRequired(field);
  }

  isOptional(field: string): boolean {
    return this.ctx.index.isOptional(field);
  }

  /** Make an optional field required. */
  promote(field: string): void {
    this.ctx.index.promote(field);
  }

  /** Make a required field optional. */
  demote(field: string): void {
    this.ctx.index.demote(field);
  }
}

/**
 * Create a validator from a YAML rule file.
 * The error of a failed load is returned in the result.
 */
export function openValidator(
  filePath: string,
  options: ValidatorOptions = {},
): LoadResult<RuleValidator> {
  const loaded = loadRuleSetFile(filePath);
  return loaded.ok ? { ok: true, value: new RuleValidator(loaded.value, options) } : loaded;
}

/**
 * Create a validator from YAML text or an already parsed document.
 * A parsed document may use Maps to keep integer-like names in order.
 */
export function createValidator(
  source: string | object,
  options: ValidatorOptions = {},
): LoadResult<RuleValidator> {
  const loaded = typeof source === 'string' ? parseRuleSetYaml(source) : parseRuleSet(source);
  return loaded.ok ? { ok: true, value: new RuleValidator(loaded.value, options) } : loaded;
}

import type { FieldRule, FieldType, RuleSet } from '../rules/schema.js';

/** Options for `FieldIndex.fieldNames`. */
export interface FieldNamesOptions {
  readonly exclude?: readonly string[] | undefined;
}

/**
 * Required/optional classification of every field in a rule set, plus the
 * ordered field names of each section.
 *
 * A field name lives in at most one of the two buckets. Moving a field with
 * `promote`/`demote` is the only mutation after construction.
 */
export class FieldIndex {
  private readonly required = new Map<string, FieldRule>();
  private readonly optional = new Map<string, FieldRule>();
  private readonly sectionFields = new Map<string, string[]>();

  /**
   * Build the index from a rule set, walking sections and fields in document order.
   * A `required` definition anywhere wins over optional ones; among optional
   * definitions of the same name the first one is kept.
   */
  static fromRuleSet(ruleSet: RuleSet): FieldIndex {
    const index = new FieldIndex();

    for (const [section, fields] of ruleSet) {
      const names: string[] = index.sectionFields.get(section) ?? [];
      for (const [field, rule] of fields) {
        if (rule.type === 'required') {
          index.required.set(field, rule);
          index.optional.delete(field);
        } else if (!index.required.has(field) && !index.optional.has(field)) {
          index.optional.set(field, rule);
        }
        names.push(field);
      }
      index.sectionFields.set(section, names);
    }

    return index;
  }

  /** Rule for a field, looked up in the required bucket first. */
  ruleFor(field: string): FieldRule | undefined {
    return this.required.get(field) ?? this.optional.get(field);
  }

  /** Bucket a field is in, or `undefined` for unknown fields. */
  classify(field: string): FieldType | undefined {
    if (this.required.has(field)) return 'required';
    if (this.optional.has(field)) return 'optional';
    return undefined;
  }

  isRequired(field: string): boolean {
    return this.required.has(field);
  }

  isOptional(field: string): boolean {
    return this.optional.has(field);
  }

  /** Section names in document order. */
  sections(): string[] {
    return [...this.sectionFields.keys()];
  }

  /**
   * Field names of one section, or of all sections when `section` is omitted.
   * With `exclude`, duplicates collapse to their first occurrence and the
   * excluded names are removed.
   */
  fieldNames(section?: string, options: FieldNamesOptions = {}): string[] {
    const names =
      section !== undefined
        ? [...(this.sectionFields.get(section) ?? [])]
        : [...this.sectionFields.values()].flat();

    if (options.exclude === undefined) {
      return names;
    }

    const excluded = new Set(options.exclude);
    return [...new Set(names)].filter((name) => !excluded.has(name));
  }

  /** Configured failure message of a field, or the empty string. */
  message(field: string): string {
    return this.ruleFor(field)?.message ?? '';
  }

  /** Move a field from required to optional. No-op for fields that are not required. */
  demote(field: string): void {
    const rule = this.required.get(field);
    if (rule === undefined) return;
    this.required.delete(field);
    this.optional.set(field, rule);
  }

  /** Move a field from optional to required. No-op for fields that are not optional. */
  promote(field: string): void {
    const rule = this.optional.get(field);
    if (rule === undefined) return;
    this.optional.delete(field);
    this.required.set(field, rule);
  }
}

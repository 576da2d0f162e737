import { z } from 'zod/v4';

const NUMERIC_STRING = /^\s*[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?\s*$/;

/** A numeric bound; YAML may hand quoted numbers over as strings. */
const boundSchema = z.union([
  z.number(),
  z.string().regex(NUMERIC_STRING, 'expected a number').transform(Number),
]);

/** A regex pattern that must compile as a JavaScript RegExp. */
const patternSchema = z.string().refine(
  (pattern) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'invalid regular expression' },
);

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * A mapping as a Map with string keys, in source order. YAML mappings arrive
 * as Maps; documents built in code may use plain objects instead.
 */
function toKeyedMap(value: unknown): unknown {
  if (value instanceof Map) {
    return new Map([...value].map(([key, entry]): [string, unknown] => [String(key), entry]));
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return new Map(Object.entries(value));
  }
  return value;
}

/** Rule bodies are plain objects all the way down. */
function toPlainObjects(value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(
      [...value].map(([key, entry]): [string, unknown] => [String(key), toPlainObjects(entry)]),
    );
  }
  if (Array.isArray(value)) {
    return value.map(toPlainObjects);
  }
  return value;
}

/**
 * Criteria shared by field rules and by `case` overrides.
 * Unknown keys are kept so that rule contents survive ingestion unchanged.
 */
const criteriaShape = {
  /** Only `"required"` makes a field required; any other value means optional. */
  type: z.union([scalarSchema, z.null()]).optional(),
  min: boundSchema.optional(),
  max: boundSchema.optional(),
  regex: patternSchema.optional(),
  length: z.union([z.string(), z.number()]).optional(),
  enum: z.array(scalarSchema).optional(),
  message: z.string().optional(),
  plugin: z.string().optional(),
  sub: z.string().optional(),
  no_validate: z.union([z.boolean(), z.number()]).optional(),
};

/** Zod schema for a `case` override rule. */
export const overrideRuleSchema = z.looseObject(criteriaShape);

const fieldRuleObjectSchema = z.looseObject({
  ...criteriaShape,
  depends_on: z.string().optional(),
  case: z.record(z.string(), overrideRuleSchema).optional(),
});

/** Parsed type for a field rule. */
export type FieldRule = z.infer<typeof fieldRuleObjectSchema>;

/** Zod schema for a field rule. A bare `field:` entry (YAML null) becomes an empty rule. */
export const fieldRuleSchema = z
  .preprocess(toPlainObjects, fieldRuleObjectSchema.nullable())
  .transform((rule): FieldRule => rule ?? {});

/** Zod schema for one section: field name -> rule, in document order. An empty section may be null. */
export const sectionSchema = z.preprocess(
  (section) => (section === null ? new Map() : toKeyedMap(section)),
  z.map(z.string(), fieldRuleSchema),
);

/**
 * Zod schema for the full rule document.
 * Top-level keys are section names, values map field names to rules.
 * Both levels are Maps so that names such as `"10"` keep their document order.
 */
export const ruleSetSchema = z.preprocess(toKeyedMap, z.map(z.string(), sectionSchema));

/** Parsed type for a `case` override rule. */
export type OverrideRule = z.infer<typeof overrideRuleSchema>;

/** Parsed type for a section. */
export type Section = z.infer<typeof sectionSchema>;

/** Parsed type for the full rule document. */
export type RuleSet = z.infer<typeof ruleSetSchema>;

/** The rule consulted by a single-value check: a field rule or a `case` override. */
export type CheckRule = OverrideRule | FieldRule;

/** Bucket a field is in. */
export type FieldType = 'required' | 'optional';

/** A candidate value for a field. Values are never coerced. */
export type FieldValue = string | number | boolean | null | undefined;

/** Candidate values for one form, keyed by field name. */
export type FieldValues = Readonly<Record<string, FieldValue>>;

import { existsSync, readFileSync } from 'node:fs';
import { parseAllDocuments } from 'yaml';
import { z } from 'zod/v4';
import { ConfigNotFoundError, ConfigParseError } from '../errors.js';
import { ruleSetSchema } from './schema.js';
import type { RuleSet } from './schema.js';

/** Result of loading a rule document. Failures are returned, not thrown. */
export type LoadResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ConfigNotFoundError | ConfigParseError };

/**
 * Validate an already parsed document against the rule-set schema.
 * Mappings may be Maps or plain objects; a plain object orders integer-like
 * keys first, so pass Maps where such names must keep their order.
 * An empty document (`undefined` or `null`) is an empty rule set.
 */
export function parseRuleSet(document: unknown): LoadResult<RuleSet> {
  if (document === undefined || document === null) {
    return { ok: true, value: new Map() };
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    return {
      ok: false,
      error: new ConfigParseError('expected a mapping of section names at the document root'),
    };
  }

  const parsed = ruleSetSchema.safeParse(document);
  if (!parsed.success) {
    return {
      ok: false,
      error: new ConfigParseError(z.prettifyError(parsed.error), { cause: parsed.error }),
    };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Parse YAML text into a rule set. Only the first document of a
 * multi-document stream is used. Mappings are read as Maps, which keeps
 * section and field names in document order.
 */
export function parseRuleSetYaml(text: string): LoadResult<RuleSet> {
  const first = parseAllDocuments(text)[0];
  if (first === undefined) {
    return parseRuleSet(undefined);
  }

  const [syntaxError] = first.errors;
  if (syntaxError !== undefined) {
    return { ok: false, error: new ConfigParseError(syntaxError.message, { cause: syntaxError }) };
  }

  let document: unknown;
  try {
    document = first.toJS({ mapAsMap: true });
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new ConfigParseError(detail, { cause: error }) };
  }
  return parseRuleSet(document);
}

/**
 * Read and parse a YAML rule file.
 * Returns a `ConfigNotFoundError` ("file does not exist") for a missing path
 * and a `ConfigParseError` for anything that is not a rule document.
 */
export function loadRuleSetFile(filePath: string): LoadResult<RuleSet> {
  if (!existsSync(filePath)) {
    return { ok: false, error: new ConfigNotFoundError(filePath) };
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new ConfigParseError(detail, { cause: error }) };
  }
  return parseRuleSetYaml(content);
}

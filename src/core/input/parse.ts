import { readFileSync } from 'node:fs';
import { z } from 'zod/v4';
import type { FieldValues } from '../rules/schema.js';

/**
 * Zod schema for a file of candidate values: a flat JSON object of
 * field name -> scalar. Values are taken as they are, without coercion.
 */
export const fieldValuesSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.null()]),
);

/**
 * Parse and validate a JSON file of field values.
 * Throws on unreadable files, malformed JSON or non-scalar values.
 */
export function parseFieldValuesFile(filePath: string): FieldValues {
  const content = readFileSync(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);
  return fieldValuesSchema.parse(raw);
}

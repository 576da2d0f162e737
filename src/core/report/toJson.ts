import type { ValidationReport } from './reportTypes.js';

/**
 * Serialize a ValidationReport to a deterministic JSON string.
 * Object keys are sorted; the order of `errors` follows the section.
 */
export function toJson(report: ValidationReport, pretty: boolean): string {
  const sorted = sortKeysDeep(report);
  return pretty
    ? JSON.stringify(sorted, null, 2)
    : JSON.stringify(sorted);
}

/** Recursively sort object keys for deterministic output. */
function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort();
    const sorted: Record<string, unknown> = {};
    for (const key of keys) {
      sorted[key] = sortKeysDeep(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

import type { FormErrors } from '../validate/validateForm.js';
import type { FieldError, ValidationReport } from './reportTypes.js';

/** Inputs for assembling a report from a `validate` result. */
export interface BuildReportOptions {
  readonly section: string;
  readonly rulesPath: string;
  readonly fieldNames: readonly string[];
  readonly errors: FormErrors;
  readonly noTimestamp?: boolean | undefined;
}

/**
 * Turn a field -> message map into a report. Errors are listed in the
 * section's field order, each field once.
 */
export function buildReport(options: BuildReportOptions): ValidationReport {
  const seen = new Set<string>();
  const errors: FieldError[] = [];
  for (const field of options.fieldNames) {
    if (seen.has(field) || !Object.hasOwn(options.errors, field)) {
      continue;
    }
    seen.add(field);
    errors.push({ field, message: options.errors[field] ?? '' });
  }

  return {
    section: options.section,
    valid: errors.length === 0,
    errors,
    metadata: {
      rulesPath: options.rulesPath,
      timestamp: options.noTimestamp === true ? null : new Date().toISOString(),
      fieldCount: new Set(options.fieldNames).size,
      errorCount: errors.length,
    },
  };
}

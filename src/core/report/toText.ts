import type { ValidationReport } from './reportTypes.js';

/**
 * Format a ValidationReport as human-readable text.
 */
export function toText(report: ValidationReport): string {
  const lines: string[] = [];

  lines.push(`=== Validation: ${report.section} ===`);
  lines.push('');

  if (report.metadata.timestamp !== null) {
    lines.push(`Timestamp: ${report.metadata.timestamp}`);
  }
  lines.push(`Rules:     ${report.metadata.rulesPath}`);
  lines.push(`Fields:    ${String(report.metadata.fieldCount)}`);
  lines.push(`Errors:    ${String(report.metadata.errorCount)}`);
  lines.push('');

  if (report.errors.length > 0) {
    lines.push('--- Errors ---');
    for (const e of report.errors) {
      lines.push(e.message !== '' ? `  ${e.field}: ${e.message}` : `  ${e.field}`);
    }
  } else {
    lines.push('All fields valid.');
  }

  lines.push('');
  return lines.join('\n');
}

/** One failing field of a validated form. */
export interface FieldError {
  readonly field: string;
  readonly message: string;
}

/** Output format options. */
export type OutputFormat = 'json' | 'text';

/** Metadata about the validation run. */
export interface ReportMetadata {
  readonly rulesPath: string;
  readonly timestamp: string | null;
  readonly fieldCount: number;
  readonly errorCount: number;
}

/** The complete result of validating one section. */
export interface ValidationReport {
  readonly section: string;
  readonly valid: boolean;
  readonly errors: readonly FieldError[];
  readonly metadata: ReportMetadata;
}

/** Machine-readable codes carried by every engine error. */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'PLUGIN_RESOLUTION'
  | 'UNSAFE_EVAL_DISABLED'
  | 'EXPRESSION_SYNTAX'
  | 'INVALID_PATTERN';

/** Base class for all errors raised by the validation engine. */
export class FieldValidatorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The rule file does not exist. */
export class ConfigNotFoundError extends FieldValidatorError {
  readonly path: string;

  constructor(path: string) {
    super('CONFIG_NOT_FOUND', 'file does not exist');
    this.path = path;
  }
}

/**
 * The rule file exists but is not a well-formed section -> field -> rule document.
 * `detail` holds the YAML or schema diagnostic.
 */
export class ConfigParseError extends FieldValidatorError {
  readonly detail: string;

  constructor(detail: string, options?: { cause?: unknown }) {
    super('CONFIG_PARSE_ERROR', `failed to classify rule document: ${detail}`, options);
    this.detail = detail;
  }
}

/** A `plugin` criterion names a checker that is not registered or has no `check` entry point. */
export class PluginResolutionError extends FieldValidatorError {
  readonly plugin: string;

  constructor(plugin: string, reason: string) {
    super('PLUGIN_RESOLUTION', `Can't check with plugin "${plugin}": ${reason}`);
    this.plugin = plugin;
  }
}

/** A `sub` criterion was reached on a validator created without `allowSubs`. */
export class UnsafeEvalDisabledError extends FieldValidatorError {
  readonly field: string;

  constructor(field: string) {
    super(
      'UNSAFE_EVAL_DISABLED',
      `Can't use expression check on field "${field}" unless allowSubs is enabled`,
    );
    this.field = field;
  }
}

/** A `sub` expression could not be parsed. */
export class ExpressionSyntaxError extends FieldValidatorError {
  readonly source: string;
  readonly position: number;

  constructor(source: string, position: number, reason: string) {
    super('EXPRESSION_SYNTAX', `Invalid expression at ${String(position)}: ${reason} in "${source}"`);
    this.source = source;
    this.position = position;
  }
}

/** A `regex` criterion that does not compile, met in a rule that bypassed rule-file loading. */
export class InvalidPatternError extends FieldValidatorError {
  readonly pattern: string;

  constructor(pattern: string, options?: { cause?: unknown }) {
    super('INVALID_PATTERN', `Invalid regular expression "${pattern}"`, options);
    this.pattern = pattern;
  }
}

/** Whether an error must abort validation instead of counting as a failed field. */
export function isFatalValidationError(error: unknown): error is FieldValidatorError {
  return (
    error instanceof PluginResolutionError ||
    error instanceof UnsafeEvalDisabledError ||
    error instanceof ExpressionSyntaxError ||
    error instanceof InvalidPatternError
  );
}

import { InvalidPatternError } from '../errors.js';
import type { FieldValue } from '../rules/schema.js';
import { BoundedCache } from './cache.js';

/** A built-in criterion predicate: candidate value and the criterion's bound. */
export type BuiltinCheck<B> = (value: FieldValue, bound: B) => boolean;

/** String form of a candidate; missing values are the empty string. */
export function stringValue(value: FieldValue): string {
  return value === undefined || value === null ? '' : String(value);
}

/** Whether a candidate is missing or the empty string. */
export function isEmptyValue(value: FieldValue): boolean {
  return stringValue(value) === '';
}

function numericValue(value: FieldValue): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return Number.NaN;
}

/** Numeric value is at least `bound`. Non-numeric values fail. */
export const checkMin: BuiltinCheck<number> = (value, bound) => {
  const n = numericValue(value);
  return Number.isFinite(n) && n >= bound;
};

/** Numeric value is at most `bound`. Non-numeric values fail. */
export const checkMax: BuiltinCheck<number> = (value, bound) => {
  const n = numericValue(value);
  return Number.isFinite(n) && n <= bound;
};

/** Compiled patterns kept across checks. */
export const REGEX_CACHE_CAPACITY = 256;

const regexCache = new BoundedCache<string, RegExp>(REGEX_CACHE_CAPACITY);

function compilePattern(pattern: string): RegExp {
  const cached = regexCache.get(pattern);
  if (cached !== undefined) return cached;

  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (error: unknown) {
    throw new InvalidPatternError(pattern, { cause: error });
  }
  regexCache.set(pattern, re);
  return re;
}

/**
 * Unanchored pattern match against the value's string form.
 * Throws `InvalidPatternError` when the pattern does not compile.
 */
export const checkRegex: BuiltinCheck<string> = (value, pattern) =>
  compilePattern(pattern).test(stringValue(value));

const LENGTH_RANGE = /\s*(\d+)?\s*,\s*(\d+)?/;

/**
 * Length bound. `"min,max"` is an inclusive range where either side may be
 * blank; a bound without a comma is an exclusive minimum.
 */
export const checkLength: BuiltinCheck<string | number> = (value, bound) => {
  const length = stringValue(value).length;
  const text = String(bound);

  if (!text.includes(',')) {
    return length > Number(text);
  }

  const match = LENGTH_RANGE.exec(text);
  const min = match?.[1];
  const max = match?.[2];
  if (min !== undefined && length < Number(min)) {
    return false;
  }
  if (max !== undefined && length > Number(max)) {
    return false;
  }
  return true;
};

/** Value equals one of the allowed literals, compared as strings. */
export const checkEnum: BuiltinCheck<readonly (string | number | boolean)[]> = (value, allowed) => {
  const candidate = stringValue(value);
  return allowed.some((item) => String(item) === candidate);
};

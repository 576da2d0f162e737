import { describe, it, expect } from 'vitest';
import {
  checkEnum,
  checkLength,
  checkMax,
  checkMin,
  checkRegex,
  isEmptyValue,
  stringValue,
} from '../../src/core/checks/builtins.js';
import { InvalidPatternError, isFatalValidationError } from '../../src/core/errors.js';

describe('checkLength', () => {
  it('treats "min,max" as an inclusive range', () => {
    expect(checkLength('a'.repeat(7), '8,122')).toBe(false);
    expect(checkLength('a'.repeat(8), '8,122')).toBe(true);
    expect(checkLength('a'.repeat(122), '8,122')).toBe(true);
    expect(checkLength('a'.repeat(123), '8,122')).toBe(false);
  });

  it('leaves the upper side open for "min,"', () => {
    expect(checkLength('a'.repeat(9), '10,')).toBe(false);
    expect(checkLength('a'.repeat(10), '10,')).toBe(true);
    expect(checkLength('a'.repeat(500), '10,')).toBe(true);
  });

  it('leaves the lower side open for ",max"', () => {
    expect(checkLength('', ',3')).toBe(true);
    expect(checkLength('abc', ',3')).toBe(true);
    expect(checkLength('abcd', ',3')).toBe(false);
  });

  it('tolerates whitespace around the comma', () => {
    expect(checkLength('abcd', ' 2 , 4 ')).toBe(true);
    expect(checkLength('abcde', ' 2 , 4 ')).toBe(false);
  });

  it('treats a bound without comma as an exclusive minimum', () => {
    expect(checkLength('a'.repeat(8), '8')).toBe(false);
    expect(checkLength('a'.repeat(9), '8')).toBe(true);
    expect(checkLength('a'.repeat(8), 8)).toBe(false);
    expect(checkLength('a'.repeat(9), 8)).toBe(true);
  });

  it('measures numbers by their string form', () => {
    expect(checkLength(12345, '5,5')).toBe(true);
    expect(checkLength(1234, '5,5')).toBe(false);
  });
});

describe('checkMin / checkMax', () => {
  it('compares numbers inclusively', () => {
    expect(checkMin(17, 18)).toBe(false);
    expect(checkMin(18, 18)).toBe(true);
    expect(checkMax(65, 65)).toBe(true);
    expect(checkMax(66, 65)).toBe(false);
  });

  it('reads numeric strings', () => {
    expect(checkMin('20', 18)).toBe(true);
    expect(checkMax('20.5', 20)).toBe(false);
  });

  it('fails values that are not numbers', () => {
    expect(checkMin('abc', 0)).toBe(false);
    expect(checkMax('abc', 100)).toBe(false);
    expect(checkMin(true, 0)).toBe(false);
    expect(checkMin('   ', 0)).toBe(false);
  });
});

describe('checkRegex', () => {
  it('matches anywhere in the value', () => {
    expect(checkRegex('abc123def', '\\d+')).toBe(true);
    expect(checkRegex('abcdef', '\\d+')).toBe(false);
  });

  it('honours anchors in the pattern', () => {
    expect(checkRegex('64569', '^\\d{4,5}$')).toBe(true);
    expect(checkRegex('645690', '^\\d{4,5}$')).toBe(false);
  });

  it('matches numbers by their string form', () => {
    expect(checkRegex(64569, '^\\d{4,5}$')).toBe(true);
  });
});

describe('checkEnum', () => {
  const salutations = ['Herr', 'Frau', 'Firma'];

  it('accepts listed values', () => {
    expect(checkEnum('Herr', salutations)).toBe(true);
    expect(checkEnum('Firma', salutations)).toBe(true);
  });

  it('rejects values not in the list', () => {
    expect(checkEnum('Chef', salutations)).toBe(false);
    expect(checkEnum('herr', salutations)).toBe(false);
  });

  it('compares by string value', () => {
    expect(checkEnum(1, ['1', '2'])).toBe(true);
    expect(checkEnum('2', [1, 2])).toBe(true);
  });
});

describe('empty values', () => {
  it('treats undefined, null and "" as empty', () => {
    expect(isEmptyValue(undefined)).toBe(true);
    expect(isEmptyValue(null)).toBe(true);
    expect(isEmptyValue('')).toBe(true);
  });

  it('does not treat 0 or false as empty', () => {
    expect(isEmptyValue(0)).toBe(false);
    expect(isEmptyValue(false)).toBe(false);
    expect(isEmptyValue(' ')).toBe(false);
  });

  it('stringifies values', () => {
    expect(stringValue(undefined)).toBe('');
    expect(stringValue(42)).toBe('42');
    expect(stringValue(false)).toBe('false');
  });
});

describe('checkRegex with a pattern that does not compile', () => {
  it('throws a typed configuration error', () => {
    let thrown: unknown;
    try {
      checkRegex('x', '(');
    } catch (error: unknown) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(InvalidPatternError);
    expect(isFatalValidationError(thrown)).toBe(true);
    if (!(thrown instanceof InvalidPatternError)) return;
    expect(thrown.code).toBe('INVALID_PATTERN');
    expect(thrown.pattern).toBe('(');
    expect(thrown.message).toBe('Invalid regular expression "("');
    expect(thrown.cause).toBeInstanceOf(SyntaxError);
  });
});

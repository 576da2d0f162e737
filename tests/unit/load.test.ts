import { describe, it, expect } from 'vitest';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadRuleSetFile, parseRuleSet, parseRuleSetYaml } from '../../src/core/rules/load.js';
import { ConfigNotFoundError, ConfigParseError } from '../../src/core/errors.js';

const FIXTURES_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '../fixtures/rules');

describe('loadRuleSetFile', () => {
  it('parses a valid rule file', () => {
    const result = loadRuleSetFile(resolve(FIXTURES_DIR, 'basic.yml'));
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect([...result.value.keys()]).toEqual(['step1', 'step2']);
    const step1 = result.value.get('step1');
    expect([...(step1?.keys() ?? [])]).toEqual(['name', 'password', 'plz', 'word', 'age']);
    expect(step1?.get('name')).toEqual({
      type: 'required',
      length: '8,122',
      message: 'Please enter your full name',
    });
    expect(step1?.get('password')?.length).toBe('10,');
    expect(step1?.get('plz')?.regex).toBe('^\\d{4,5}$');
    expect(step1?.get('word')?.enum).toEqual(['Herr', 'Frau', 'Firma']);
    expect(result.value.get('step2')?.get('nickname')?.length).toBe(8);
  });

  it('fails with "file does not exist" for a missing path', () => {
    const result = loadRuleSetFile(resolve(FIXTURES_DIR, 'does-not-exist.yml'));
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toBeInstanceOf(ConfigNotFoundError);
    expect(result.error.message).toBe('file does not exist');
    expect(result.error.code).toBe('CONFIG_NOT_FOUND');
  });

  it('fails with a classification error for malformed YAML', () => {
    const result = loadRuleSetFile(resolve(FIXTURES_DIR, 'malformed.yml'));
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toBeInstanceOf(ConfigParseError);
    expect(result.error.message).toMatch(/^failed to classify rule document: /);
    expect(result.error.code).toBe('CONFIG_PARSE_ERROR');
  });

  it('rejects a document whose root is not a mapping', () => {
    const result = loadRuleSetFile(resolve(FIXTURES_DIR, 'list-root.yml'));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'failed to classify rule document: expected a mapping of section names at the document root',
    );
  });

  it('rejects rules that do not fit the schema', () => {
    const result = loadRuleSetFile(resolve(FIXTURES_DIR, 'invalid-rule.yml'));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigParseError);
    expect(result.error.message).toMatch(/^failed to classify rule document: /);
  });

  it('treats a file without documents as an empty rule set', () => {
    const result = loadRuleSetFile(resolve(FIXTURES_DIR, 'empty.yml'));
    expect(result).toEqual({ ok: true, value: new Map() });
  });

  it('turns bare field entries into empty rules', () => {
    const result = loadRuleSetFile(resolve(FIXTURES_DIR, 'conflict.yml'));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.get('second')?.get('empty')).toEqual({});
  });
});

describe('parseRuleSetYaml', () => {
  it('uses only the first document of a stream', () => {
    const result = parseRuleSetYaml('a:\n  f:\n    type: required\n---\nb:\n  g: {}\n');
    expect(result).toEqual({ ok: true, value: new Map([['a', new Map([['f', { type: 'required' }]])]]) });
  });

  it('accepts quoted numeric bounds', () => {
    const result = parseRuleSetYaml('s:\n  age:\n    min: "18"\n    max: \'65\'\n');
    expect(result).toEqual({ ok: true, value: new Map([['s', new Map([['age', { min: 18, max: 65 }]])]]) });
  });

  it('rejects a regex that does not compile', () => {
    const result = parseRuleSetYaml('s:\n  f:\n    regex: "("\n');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toContain('invalid regular expression');
  });

  it('accepts any type value, including a bare one', () => {
    const result = parseRuleSetYaml('s:\n  f:\n    type: mandatory\n  g:\n    type:\n');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.get('s')?.get('f')).toEqual({ type: 'mandatory' });
    expect(result.value.get('s')?.get('g')).toEqual({ type: null });
  });

  it('reads numeric case keys as strings', () => {
    const result = parseRuleSetYaml('s:\n  f:\n    depends_on: n\n    case:\n      2:\n        max: 5\n');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.get('s')?.get('f')?.case).toEqual({ '2': { max: 5 } });
  });

  it('keeps unknown rule keys', () => {
    const result = parseRuleSetYaml('s:\n  f:\n    widget: select\n');
    expect(result).toEqual({ ok: true, value: new Map([['s', new Map([['f', { widget: 'select' }]])]]) });
  });

  it('treats an empty section as having no fields', () => {
    expect(parseRuleSetYaml('s:\n')).toEqual({ ok: true, value: new Map([['s', new Map()]]) });
  });
});

describe('parseRuleSet', () => {
  it('accepts an already parsed document', () => {
    expect(parseRuleSet({ s: { f: { type: 'optional' } } })).toEqual({
      ok: true,
      value: new Map([['s', new Map([['f', { type: 'optional' }]])]]),
    });
  });

  it('keeps the order of a document built from Maps', () => {
    const result = parseRuleSet(new Map([['s', new Map<string, unknown>([['b', null], ['10', {}], ['2', {}]])]]));
    if (!result.ok) throw result.error;
    expect([...(result.value.get('s')?.keys() ?? [])]).toEqual(['b', '10', '2']);
  });

  it('rejects scalars', () => {
    const result = parseRuleSet('just text');
    expect(result.ok).toBe(false);
  });

  it('treats null as an empty rule set', () => {
    expect(parseRuleSet(null)).toEqual({ ok: true, value: new Map() });
  });
});

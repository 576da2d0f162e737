import { ExpressionSyntaxError } from '../errors.js';
import type { FieldValue } from '../rules/schema.js';
import { stringValue } from './builtins.js';
import { BoundedCache } from './cache.js';

/**
 * Restricted predicate language for the `sub` criterion.
 *
 *   expr    := or
 *   or      := and ('||' and)*
 *   and     := unary ('&&' unary)*
 *   unary   := '!' unary | compare
 *   compare := primary (('==' | '!=' | '<' | '<=' | '>' | '>=') primary
 *                      | ('=~' | '!~') REGEX)?
 *   primary := NUMBER | STRING | 'true' | 'false' | 'value' | '$_'
 *            | 'length' '(' expr ')' | '(' expr ')'
 *
 * Expressions see only the candidate value. There is no property access,
 * no assignment and no way to reach host code.
 */

type Scalar = string | number | boolean;

type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=';

type Token =
  | { tag: 'Num'; value: number; pos: number }
  | { tag: 'Str'; value: string; pos: number }
  | { tag: 'Ident'; name: string; pos: number }
  | { tag: 'Op'; op: CompareOp | '=~' | '!~' | '&&' | '||' | '!'; pos: number }
  | { tag: 'Regex'; re: RegExp; pos: number }
  | { tag: 'LParen'; pos: number }
  | { tag: 'RParen'; pos: number };

type Expr =
  | { kind: 'literal'; value: Scalar }
  | { kind: 'value' }
  | { kind: 'length'; arg: Expr }
  | { kind: 'not'; operand: Expr }
  | { kind: 'logical'; op: '&&' | '||'; left: Expr; right: Expr }
  | { kind: 'compare'; op: CompareOp; left: Expr; right: Expr }
  | { kind: 'match'; negate: boolean; subject: Expr; re: RegExp };

/** A compiled `sub` expression. */
export type CompiledExpression = (value: FieldValue) => boolean;

const OPERATORS = ['==', '!=', '<=', '>=', '=~', '!~', '&&', '||', '<', '>', '!'] as const;

function tokenize(src: string): Token[] {
  const toks: Token[] = [];
  let i = 0;

  while (i < src.length) {
    const c = src.charAt(i);

    if (/\s/.test(c)) { i++; continue; }
    if (c === '(') { toks.push({ tag: 'LParen', pos: i }); i++; continue; }
    if (c === ')') { toks.push({ tag: 'RParen', pos: i }); i++; continue; }

    if (c === '"' || c === "'") {
      const start = i;
      i++;
      let s = '';
      let closed = false;
      while (i < src.length) {
        const d = src.charAt(i);
        if (d === c) { i++; closed = true; break; }
        if (d === '\\' && i + 1 < src.length) {
          const e = src.charAt(i + 1);
          s += e === 'n' ? '\n' : e === 't' ? '\t' : e;
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) throw new ExpressionSyntaxError(src, start, 'unterminated string');
      toks.push({ tag: 'Str', value: s, pos: start });
      continue;
    }

    const num = /^\d+(\.\d+)?/.exec(src.slice(i))?.[0];
    if (num !== undefined) {
      toks.push({ tag: 'Num', value: Number(num), pos: i });
      i += num.length;
      continue;
    }

    const ident = /^(\$_|[A-Za-z_][A-Za-z0-9_]*)/.exec(src.slice(i))?.[0];
    if (ident !== undefined) {
      toks.push({ tag: 'Ident', name: ident, pos: i });
      i += ident.length;
      continue;
    }

    const op = OPERATORS.find((candidate) => src.startsWith(candidate, i));
    if (op === undefined) throw new ExpressionSyntaxError(src, i, `unexpected character '${c}'`);
    toks.push({ tag: 'Op', op, pos: i });
    i += op.length;

    if (op === '=~' || op === '!~') {
      while (i < src.length && /\s/.test(src.charAt(i))) i++;
      const start = i;
      if (src.charAt(i) !== '/') throw new ExpressionSyntaxError(src, i, 'expected /pattern/ after match operator');
      i++;
      let pattern = '';
      let closed = false;
      while (i < src.length) {
        const d = src.charAt(i);
        if (d === '/') { i++; closed = true; break; }
        if (d === '\\' && i + 1 < src.length) {
          pattern += d + src.charAt(i + 1);
          i += 2;
          continue;
        }
        pattern += d;
        i++;
      }
      if (!closed) throw new ExpressionSyntaxError(src, start, 'unterminated regex');
      const flags = /^[a-z]*/.exec(src.slice(i))?.[0] ?? '';
      i += flags.length;
      let re: RegExp;
      try {
        re = new RegExp(pattern, flags.replace(/g|y/g, ''));
      } catch (error: unknown) {
        throw new ExpressionSyntaxError(src, start, error instanceof Error ? error.message : 'invalid regex');
      }
      toks.push({ tag: 'Regex', re, pos: start });
    }
  }

  return toks;
}

function parse(src: string, toks: Token[]): Expr {
  let i = 0;

  const peek = (): Token | undefined => toks[i];
  const fail = (reason: string): never => {
    throw new ExpressionSyntaxError(src, peek()?.pos ?? src.length, reason);
  };
  const isOp = (t: Token | undefined, op: string): boolean => t?.tag === 'Op' && t.op === op;

  function parseOr(): Expr {
    let left = parseAnd();
    while (isOp(peek(), '||')) {
      i++;
      left = { kind: 'logical', op: '||', left, right: parseAnd() };
    }
    return left;
  }

  function parseAnd(): Expr {
    let left = parseUnary();
    while (isOp(peek(), '&&')) {
      i++;
      left = { kind: 'logical', op: '&&', left, right: parseUnary() };
    }
    return left;
  }

  function parseUnary(): Expr {
    if (isOp(peek(), '!')) {
      i++;
      return { kind: 'not', operand: parseUnary() };
    }
    return parseCompare();
  }

  function parseCompare(): Expr {
    const left = parsePrimary();
    const t = peek();
    if (t?.tag !== 'Op') return left;

    if (t.op === '=~' || t.op === '!~') {
      i++;
      const r = peek();
      if (r?.tag !== 'Regex') return fail('expected regex');
      i++;
      return { kind: 'match', negate: t.op === '!~', subject: left, re: r.re };
    }
    if (t.op === '==' || t.op === '!=' || t.op === '<' || t.op === '<=' || t.op === '>' || t.op === '>=') {
      i++;
      return { kind: 'compare', op: t.op, left, right: parsePrimary() };
    }
    return left;
  }

  function parsePrimary(): Expr {
    const t = peek();
    if (t === undefined) return fail('unexpected end of expression');

    switch (t.tag) {
      case 'Num':
        i++;
        return { kind: 'literal', value: t.value };
      case 'Str':
        i++;
        return { kind: 'literal', value: t.value };
      case 'LParen': {
        i++;
        const inner = parseOr();
        if (peek()?.tag !== 'RParen') return fail("missing ')'");
        i++;
        return inner;
      }
      case 'Ident':
        i++;
        if (t.name === 'value' || t.name === '$_') return { kind: 'value' };
        if (t.name === 'true') return { kind: 'literal', value: true };
        if (t.name === 'false') return { kind: 'literal', value: false };
        if (t.name === 'length') {
          if (peek()?.tag !== 'LParen') return fail("expected '(' after length");
          i++;
          const arg = parseOr();
          if (peek()?.tag !== 'RParen') return fail("missing ')'");
          i++;
          return { kind: 'length', arg };
        }
        i--;
        return fail(`unknown identifier '${t.name}'`);
      default:
        return fail('unexpected token');
    }
  }

  const expr = parseOr();
  if (i < toks.length) fail('unexpected trailing input');
  return expr;
}

const NUMERIC = /^\s*[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?\s*$/;

function asNumber(v: Scalar): number {
  if (typeof v === 'number') return v;
  if (typeof v === 'string' && NUMERIC.test(v)) return Number(v);
  return Number.NaN;
}

function truthy(v: Scalar): boolean {
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v !== 0;
  return v !== '' && v !== '0';
}

function compare(op: CompareOp, a: Scalar, b: Scalar): boolean {
  const x = asNumber(a);
  const y = asNumber(b);
  const order = Number.isFinite(x) && Number.isFinite(y)
    ? Math.sign(x - y)
    : String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;

  switch (op) {
    case '==': return order === 0;
    case '!=': return order !== 0;
    case '<': return order < 0;
    case '<=': return order <= 0;
    case '>': return order > 0;
    case '>=': return order >= 0;
  }
}

function evaluate(expr: Expr, candidate: string | number | boolean): Scalar {
  switch (expr.kind) {
    case 'literal': return expr.value;
    case 'value': return candidate;
    case 'length': return String(evaluate(expr.arg, candidate)).length;
    case 'not': return !truthy(evaluate(expr.operand, candidate));
    case 'logical': {
      const left = truthy(evaluate(expr.left, candidate));
      if (expr.op === '&&') return left && truthy(evaluate(expr.right, candidate));
      return left || truthy(evaluate(expr.right, candidate));
    }
    case 'compare':
      return compare(expr.op, evaluate(expr.left, candidate), evaluate(expr.right, candidate));
    case 'match': {
      const matched = expr.re.test(String(evaluate(expr.subject, candidate)));
      return expr.negate ? !matched : matched;
    }
  }
}

/** Compiled expressions kept across checks. */
export const EXPRESSION_CACHE_CAPACITY = 256;

const compiled = new BoundedCache<string, CompiledExpression>(EXPRESSION_CACHE_CAPACITY);

/**
 * Compile a `sub` expression. Throws `ExpressionSyntaxError` on invalid input.
 * Compiled expressions are cached by source text, least recently used first out.
 */
export function compileExpression(source: string): CompiledExpression {
  const cached = compiled.get(source);
  if (cached !== undefined) return cached;

  const ast = parse(source, tokenize(source));
  const fn: CompiledExpression = (value) => {
    const candidate = value === undefined || value === null ? stringValue(value) : value;
    return truthy(evaluate(ast, candidate));
  };
  compiled.set(source, fn);
  return fn;
}

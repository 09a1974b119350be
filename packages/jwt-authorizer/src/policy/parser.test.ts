import { describe, it, expect } from 'vitest';
import { parse, MAX_NESTING_DEPTH } from './parser.js';
import type { Expr } from './ast.js';

/** Renders an expression fully parenthesized, to assert on structure */
const show = (expr: Expr): string => {
  switch (expr.kind) {
    case 'literal':
      return JSON.stringify(expr.value);
    case 'identifier':
      return expr.name;
    case 'list':
      return `[${expr.elements.map(show).join(', ')}]`;
    case 'map':
      return `{${expr.entries.map(({ key, value }) => `${show(key)}: ${show(value)}`).join(', ')}}`;
    case 'select':
      return `${show(expr.operand)}.${expr.field}`;
    case 'index':
      return `${show(expr.operand)}[${show(expr.index)}]`;
    case 'unary':
      return `(${expr.operator}${show(expr.operand)})`;
    case 'binary':
      return `(${show(expr.left)} ${expr.operator} ${show(expr.right)})`;
    case 'conditional':
      return `(${show(expr.test)} ? ${show(expr.consequent)} : ${show(expr.alternate)})`;
    case 'call': {
      const args = expr.args.map(show).join(', ');
      return expr.target === undefined
        ? `${expr.name}(${args})`
        : `${show(expr.target)}.${expr.name}(${args})`;
    }
    case 'has':
      return `has(${show(expr.operand)}.${expr.field})`;
    case 'comprehension':
      return `${show(expr.range)}.${expr.macro}(${expr.variable}, ${show(expr.body)})`;
  }
};

describe('parse', () => {
  describe('given operators of different precedence', () => {
    it.each([
      ['a || b && c', '(a || (b && c))'],
      ['a && b || c', '((a && b) || c)'],
      ['a == b && c != d', '((a == b) && (c != d))'],
      ['1 + 2 * 3', '(1 + (2 * 3))'],
      ['1 - 2 - 3', '((1 - 2) - 3)'],
      ['-a.b', '(-a.b)'],
      ['!!a', '(!(!a))'],
      ['a < b == true', '((a < b) == true)'],
      ['"x" in a && b', '(("x" in a) && b)'],
      ['a ? b : c ? d : e', '(a ? b : (c ? d : e))'],
      ['a || b ? c : d', '((a || b) ? c : d)'],
      ['(a || b) && c', '((a || b) && c)'],
    ])('parses %s', (source, expected) => {
      expect(show(parse(source))).toBe(expected);
    });
  });

  describe('given member access', () => {
    it('parses selection, indexing and method calls', () => {
      expect(show(parse('claims.groups[0].startsWith("adm")'))).toBe(
        'claims.groups[0].startsWith("adm")'
      );
    });

    it('parses list and map literals with trailing commas', () => {
      expect(show(parse('[1, "a",] == {"k": [true],}'))).toBe('([1, "a"] == {"k": [true]})');
    });
  });

  describe('given macros', () => {
    it('parses has() over a selection', () => {
      const expr = parse('has(claims.email)');

      expect(expr).toMatchObject({ kind: 'has', field: 'email', operand: { kind: 'identifier', name: 'claims' } });
    });

    it('parses comprehensions with a loop variable', () => {
      expect(show(parse('claims.roles.exists(r, r == "admin")'))).toBe(
        'claims.roles.exists(r, (r == "admin"))'
      );
    });

    it('rejects has() without a selection', () => {
      expect(() => parse('has(claims)')).toThrow('has() expects a single field selection');
    });

    it('rejects a comprehension whose first argument is not a name', () => {
      expect(() => parse('claims.roles.all("r", true)')).toThrow(
        'The first argument of all() must be a variable name'
      );
    });
  });

  describe('given malformed input', () => {
    it.each([
      ['a &&', 'Unexpected end of expression (at offset 4)'],
      ['(a', "Expected ')' but found end of expression (at offset 2)"],
      ['a b', "Unexpected 'b' (at offset 2)"],
      ['a ? b', "Expected ':' but found end of expression (at offset 5)"],
      ['claims.', 'Expected a field name but found end of expression (at offset 7)'],
      ['', 'Unexpected end of expression (at offset 0)'],
    ])('rejects %j', (source, message) => {
      expect(() => parse(source)).toThrow(message);
    });
  });

  describe('given deeply nested input', () => {
    it('accepts nesting up to the limit', () => {
      const depth = MAX_NESTING_DEPTH - 2;
      const source = `${'('.repeat(depth)}true${')'.repeat(depth)}`;

      expect(parse(source)).toMatchObject({ kind: 'literal', value: true });
    });

    it('rejects nesting beyond the limit', () => {
      const source = `${'('.repeat(MAX_NESTING_DEPTH + 1)}true${')'.repeat(MAX_NESTING_DEPTH + 1)}`;

      expect(() => parse(source)).toThrow(`nested more than ${String(MAX_NESTING_DEPTH)} levels deep`);
    });
  });
});

import type { BinaryOperator, ComprehensionMacro, Expr } from './ast.js';
import type { LexToken, Punctuator } from './lexer.js';
import { tokenize } from './lexer.js';
import { PolicySyntaxError } from './errors.js';

/** Maximum nesting of sub-expressions, bounding recursion during evaluation */
export const MAX_NESTING_DEPTH = 64;

const RELATION_OPERATORS: readonly BinaryOperator[] = ['==', '!=', '<', '<=', '>', '>=', 'in'];

const COMPREHENSION_MACROS: readonly ComprehensionMacro[] = [
  'all',
  'exists',
  'exists_one',
  'filter',
  'map',
];

const isComprehensionMacro = (name: string): name is ComprehensionMacro =>
  COMPREHENSION_MACROS.some((macro) => macro === name);

const describeToken = (token: LexToken): string => {
  switch (token.kind) {
    case 'eof':
      return 'end of expression';
    case 'identifier':
      return `'${token.name}'`;
    case 'punctuator':
      return `'${token.value}'`;
    case 'number':
      return `number ${String(token.value)}`;
    case 'string':
      return 'string literal';
  }
};

/**
 * Parses a policy expression into an AST.
 *
 * Grammar, lowest precedence first:
 *
 *     expr     = or ["?" or ":" expr]
 *     or       = and {"||" and}
 *     and      = relation {"&&" relation}
 *     relation = addition {("==" | "!=" | "<" | "<=" | ">" | ">=" | "in") addition}
 *     addition = product {("+" | "-") product}
 *     product  = unary {("*" | "/" | "%") unary}
 *     unary    = ("!" | "-") unary | member
 *     member   = primary {"." IDENT ["(" args ")"] | "[" expr "]"}
 *     primary  = literal | IDENT ["(" args ")"] | "(" expr ")" | "[" list "]" | "{" map "}"
 *
 * @param source - The expression text
 * @throws PolicySyntaxError when the expression is not well formed
 */
export const parse = (source: string): Expr => {
  const tokens = tokenize(source);
  let cursor = 0;
  let depth = 0;

  const peek = (): LexToken => tokens[cursor] ?? { kind: 'eof', position: source.length };

  const advance = (): LexToken => {
    const token = peek();
    if (token.kind !== 'eof') {
      cursor++;
    }
    return token;
  };

  const isPunctuator = (value: Punctuator): boolean => {
    const token = peek();
    return token.kind === 'punctuator' && token.value === value;
  };

  const matchPunctuator = (value: Punctuator): boolean => {
    if (isPunctuator(value)) {
      cursor++;
      return true;
    }
    return false;
  };

  const expectPunctuator = (value: Punctuator): void => {
    if (!matchPunctuator(value)) {
      const token = peek();
      throw new PolicySyntaxError(
        `Expected '${value}' but found ${describeToken(token)}`,
        token.position
      );
    }
  };

  const expectIdentifier = (): { readonly name: string; readonly position: number } => {
    const token = advance();
    if (token.kind !== 'identifier') {
      throw new PolicySyntaxError(
        `Expected a field name but found ${describeToken(token)}`,
        token.position
      );
    }
    return token;
  };

  const nested = <T>(position: number, parseInner: () => T): T => {
    depth++;
    if (depth > MAX_NESTING_DEPTH) {
      throw new PolicySyntaxError(
        `Expression is nested more than ${String(MAX_NESTING_DEPTH)} levels deep`,
        position
      );
    }
    try {
      return parseInner();
    } finally {
      depth--;
    }
  };

  const parseArguments = (close: Punctuator): Expr[] => {
    const args: Expr[] = [];
    if (matchPunctuator(close)) {
      return args;
    }
    do {
      if (isPunctuator(close)) {
        break;
      }
      args.push(parseExpression());
    } while (matchPunctuator(','));
    expectPunctuator(close);
    return args;
  };

  const buildMethodCall = (target: Expr, name: string, args: Expr[], position: number): Expr => {
    if (isComprehensionMacro(name) && args.length === 2) {
      const [variable, body] = args;
      if (variable?.kind !== 'identifier' || body === undefined) {
        throw new PolicySyntaxError(
          `The first argument of ${name}() must be a variable name`,
          variable?.position ?? position
        );
      }
      return {
        kind: 'comprehension',
        macro: name,
        range: target,
        variable: variable.name,
        body,
        position,
      };
    }
    return { kind: 'call', name, target, args, position };
  };

  const buildGlobalCall = (name: string, args: Expr[], position: number): Expr => {
    if (name === 'has') {
      const [argument] = args;
      if (args.length !== 1 || argument?.kind !== 'select') {
        throw new PolicySyntaxError(
          'has() expects a single field selection, e.g. has(claims.email)',
          position
        );
      }
      return { kind: 'has', operand: argument.operand, field: argument.field, position };
    }
    return { kind: 'call', name, target: undefined, args, position };
  };

  const parsePrimary = (): Expr => {
    const token = advance();

    switch (token.kind) {
      case 'number':
      case 'string':
        return { kind: 'literal', value: token.value, position: token.position };

      case 'identifier': {
        switch (token.name) {
          case 'true':
            return { kind: 'literal', value: true, position: token.position };
          case 'false':
            return { kind: 'literal', value: false, position: token.position };
          case 'null':
            return { kind: 'literal', value: null, position: token.position };
          case 'in':
            throw new PolicySyntaxError("Unexpected 'in'", token.position);
        }
        if (matchPunctuator('(')) {
          return buildGlobalCall(token.name, parseArguments(')'), token.position);
        }
        return { kind: 'identifier', name: token.name, position: token.position };
      }

      case 'punctuator': {
        if (token.value === '(') {
          const inner = parseExpression();
          expectPunctuator(')');
          return inner;
        }
        if (token.value === '[') {
          return { kind: 'list', elements: parseArguments(']'), position: token.position };
        }
        if (token.value === '{') {
          const entries: { key: Expr; value: Expr }[] = [];
          if (!matchPunctuator('}')) {
            do {
              if (isPunctuator('}')) {
                break;
              }
              const key = parseExpression();
              expectPunctuator(':');
              entries.push({ key, value: parseExpression() });
            } while (matchPunctuator(','));
            expectPunctuator('}');
          }
          return { kind: 'map', entries, position: token.position };
        }
        throw new PolicySyntaxError(`Unexpected ${describeToken(token)}`, token.position);
      }

      case 'eof':
        throw new PolicySyntaxError('Unexpected end of expression', token.position);
    }
  };

  const parseMember = (): Expr => {
    let expr = parsePrimary();

    for (;;) {
      const token = peek();
      if (matchPunctuator('.')) {
        const field = expectIdentifier();
        if (matchPunctuator('(')) {
          expr = buildMethodCall(expr, field.name, parseArguments(')'), field.position);
        } else {
          expr = { kind: 'select', operand: expr, field: field.name, position: field.position };
        }
      } else if (matchPunctuator('[')) {
        const index = parseExpression();
        expectPunctuator(']');
        expr = { kind: 'index', operand: expr, index, position: token.position };
      } else {
        return expr;
      }
    }
  };

  const parseUnary = (): Expr => {
    const token = peek();
    if (matchPunctuator('!')) {
      return nested(token.position, () => ({
        kind: 'unary',
        operator: '!',
        operand: parseUnary(),
        position: token.position,
      }));
    }
    if (matchPunctuator('-')) {
      return nested(token.position, () => ({
        kind: 'unary',
        operator: '-',
        operand: parseUnary(),
        position: token.position,
      }));
    }
    return parseMember();
  };

  const parseBinaryLevel = (
    operators: readonly BinaryOperator[],
    parseOperand: () => Expr
  ): (() => Expr) => {
    const matchOperator = (): BinaryOperator | undefined => {
      const token = peek();
      if (token.kind === 'punctuator') {
        return operators.find((operator) => operator === token.value);
      }
      if (token.kind === 'identifier' && token.name === 'in' && operators.includes('in')) {
        return 'in';
      }
      return undefined;
    };

    return () => {
      let left = parseOperand();
      for (;;) {
        const token = peek();
        const operator = matchOperator();
        if (operator === undefined) {
          return left;
        }
        cursor++;
        const right = parseOperand();
        left = { kind: 'binary', operator, left, right, position: token.position };
      }
    };
  };

  const parseProduct = parseBinaryLevel(['*', '/', '%'], parseUnary);
  const parseAddition = parseBinaryLevel(['+', '-'], parseProduct);
  const parseRelation = parseBinaryLevel(RELATION_OPERATORS, parseAddition);
  const parseAnd = parseBinaryLevel(['&&'], parseRelation);
  const parseOr = parseBinaryLevel(['||'], parseAnd);

  function parseExpression(): Expr {
    const start = peek();
    return nested(start.position, () => {
      const test = parseOr();
      if (!matchPunctuator('?')) {
        return test;
      }
      const consequent = parseOr();
      expectPunctuator(':');
      const alternate = parseExpression();
      return { kind: 'conditional', test, consequent, alternate, position: start.position };
    });
  }

  const expr = parseExpression();
  const trailing = peek();
  if (trailing.kind !== 'eof') {
    throw new PolicySyntaxError(`Unexpected ${describeToken(trailing)}`, trailing.position);
  }
  return expr;
};

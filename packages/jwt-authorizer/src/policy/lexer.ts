import { PolicySyntaxError } from './errors.js';

export type Punctuator =
  | '('
  | ')'
  | '['
  | ']'
  | '{'
  | '}'
  | '.'
  | ','
  | '?'
  | ':'
  | '!'
  | '-'
  | '+'
  | '*'
  | '/'
  | '%'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '&&'
  | '||';

export type LexToken =
  | { readonly kind: 'number'; readonly value: number; readonly position: number }
  | { readonly kind: 'string'; readonly value: string; readonly position: number }
  | { readonly kind: 'identifier'; readonly name: string; readonly position: number }
  | { readonly kind: 'punctuator'; readonly value: Punctuator; readonly position: number }
  | { readonly kind: 'eof'; readonly position: number };

const TWO_CHAR_PUNCTUATORS: readonly Punctuator[] = ['==', '!=', '<=', '>=', '&&', '||'];
const ONE_CHAR_PUNCTUATORS: readonly Punctuator[] = [
  '(',
  ')',
  '[',
  ']',
  '{',
  '}',
  '.',
  ',',
  '?',
  ':',
  '!',
  '-',
  '+',
  '*',
  '/',
  '%',
  '<',
  '>',
];

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  '"': '"',
  "'": "'",
  '`': '`',
  '?': '?',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

const HEX_ESCAPE_LENGTHS: Readonly<Record<string, number>> = { x: 2, u: 4, U: 8 };

const isDigit = (char: string | undefined): boolean =>
  char !== undefined && char >= '0' && char <= '9';

const isHexDigit = (char: string | undefined): boolean =>
  char !== undefined && /^[0-9a-fA-F]$/.test(char);

const isIdentifierStart = (char: string | undefined): boolean =>
  char !== undefined && /^[A-Za-z_]$/.test(char);

const isIdentifierPart = (char: string | undefined): boolean =>
  char !== undefined && /^[A-Za-z0-9_]$/.test(char);

const isWhitespace = (char: string | undefined): boolean =>
  char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\f';

/**
 * Splits a policy expression into tokens.
 *
 * @param source - The expression text
 * @returns The tokens, terminated by an `eof` token
 * @throws PolicySyntaxError on characters or literals that cannot be tokenized
 */
export const tokenize = (source: string): readonly LexToken[] => {
  const tokens: LexToken[] = [];
  let index = 0;

  const readNumber = (start: number): LexToken => {
    if (source[index] === '0' && (source[index + 1] === 'x' || source[index + 1] === 'X')) {
      index += 2;
      const digitsStart = index;
      while (isHexDigit(source[index])) {
        index++;
      }
      if (index === digitsStart) {
        throw new PolicySyntaxError('Invalid hexadecimal literal', start);
      }
      const value = Number.parseInt(source.slice(digitsStart, index), 16);
      if (source[index] === 'u' || source[index] === 'U') {
        index++;
      }
      return { kind: 'number', value, position: start };
    }

    while (isDigit(source[index])) {
      index++;
    }
    if (source[index] === '.' && isDigit(source[index + 1])) {
      index++;
      while (isDigit(source[index])) {
        index++;
      }
    }
    if (source[index] === 'e' || source[index] === 'E') {
      const exponentStart = index;
      index++;
      if (source[index] === '+' || source[index] === '-') {
        index++;
      }
      if (!isDigit(source[index])) {
        throw new PolicySyntaxError('Invalid exponent in number literal', exponentStart);
      }
      while (isDigit(source[index])) {
        index++;
      }
    }
    const value = Number(source.slice(start, index));
    if (source[index] === 'u' || source[index] === 'U') {
      index++;
    }
    if (isIdentifierPart(source[index])) {
      throw new PolicySyntaxError('Invalid number literal', start);
    }
    return { kind: 'number', value, position: start };
  };

  const readEscape = (escapeStart: number): string => {
    const char = source[index];
    if (char === undefined) {
      throw new PolicySyntaxError('Unterminated escape sequence', escapeStart);
    }

    const simple = SIMPLE_ESCAPES[char];
    if (simple !== undefined) {
      index++;
      return simple;
    }

    const hexLength = HEX_ESCAPE_LENGTHS[char];
    if (hexLength !== undefined) {
      const digits = source.slice(index + 1, index + 1 + hexLength);
      if (digits.length !== hexLength || ![...digits].every((d) => isHexDigit(d))) {
        throw new PolicySyntaxError(`Invalid \\${char} escape sequence`, escapeStart);
      }
      index += 1 + hexLength;
      const codePoint = Number.parseInt(digits, 16);
      if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
        throw new PolicySyntaxError('Invalid code point in escape sequence', escapeStart);
      }
      return String.fromCodePoint(codePoint);
    }

    const octal = source.slice(index, index + 3);
    if (/^[0-3][0-7][0-7]$/.test(octal)) {
      index += 3;
      return String.fromCodePoint(Number.parseInt(octal, 8));
    }

    throw new PolicySyntaxError(`Unknown escape sequence '\\${char}'`, escapeStart);
  };

  const readString = (start: number, raw: boolean): LexToken => {
    const quote = source[index];
    index++;
    let value = '';

    for (;;) {
      const char = source[index];
      if (char === undefined || char === '\n' || char === '\r') {
        throw new PolicySyntaxError('Unterminated string literal', start);
      }
      if (char === quote) {
        index++;
        return { kind: 'string', value, position: start };
      }
      if (char === '\\' && !raw) {
        const escapeStart = index;
        index++;
        value += readEscape(escapeStart);
        continue;
      }
      value += char;
      index++;
    }
  };

  while (index < source.length) {
    const char = source[index];
    const start = index;

    if (isWhitespace(char)) {
      index++;
      continue;
    }

    if (char === '/' && source[index + 1] === '/') {
      while (index < source.length && source[index] !== '\n') {
        index++;
      }
      continue;
    }

    if (isDigit(char)) {
      tokens.push(readNumber(start));
      continue;
    }

    if ((char === 'r' || char === 'R') && (source[index + 1] === '"' || source[index + 1] === "'")) {
      index++;
      tokens.push(readString(start, true));
      continue;
    }

    if (char === '"' || char === "'") {
      tokens.push(readString(start, false));
      continue;
    }

    if (isIdentifierStart(char)) {
      while (isIdentifierPart(source[index])) {
        index++;
      }
      tokens.push({ kind: 'identifier', name: source.slice(start, index), position: start });
      continue;
    }

    const pair = source.slice(index, index + 2);
    const twoChar = TWO_CHAR_PUNCTUATORS.find((p) => p === pair);
    if (twoChar !== undefined) {
      index += 2;
      tokens.push({ kind: 'punctuator', value: twoChar, position: start });
      continue;
    }

    const oneChar = ONE_CHAR_PUNCTUATORS.find((p) => p === char);
    if (oneChar !== undefined) {
      index++;
      tokens.push({ kind: 'punctuator', value: oneChar, position: start });
      continue;
    }

    throw new PolicySyntaxError(`Unexpected character '${char ?? ''}'`, start);
  }

  tokens.push({ kind: 'eof', position: source.length });
  return tokens;
};

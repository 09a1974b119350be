import type { PolicyValue } from './types.js';

export type BinaryOperator =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'in'
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type UnaryOperator = '!' | '-';

/** Macros that bind a loop variable over a list (or the keys of a map) */
export type ComprehensionMacro = 'all' | 'exists' | 'exists_one' | 'filter' | 'map';

export type Expr =
  | { readonly kind: 'literal'; readonly value: PolicyValue; readonly position: number }
  | { readonly kind: 'identifier'; readonly name: string; readonly position: number }
  | { readonly kind: 'list'; readonly elements: readonly Expr[]; readonly position: number }
  | {
      readonly kind: 'map';
      readonly entries: readonly { readonly key: Expr; readonly value: Expr }[];
      readonly position: number;
    }
  | {
      readonly kind: 'select';
      readonly operand: Expr;
      readonly field: string;
      readonly position: number;
    }
  | { readonly kind: 'index'; readonly operand: Expr; readonly index: Expr; readonly position: number }
  | {
      readonly kind: 'unary';
      readonly operator: UnaryOperator;
      readonly operand: Expr;
      readonly position: number;
    }
  | {
      readonly kind: 'binary';
      readonly operator: BinaryOperator;
      readonly left: Expr;
      readonly right: Expr;
      readonly position: number;
    }
  | {
      readonly kind: 'conditional';
      readonly test: Expr;
      readonly consequent: Expr;
      readonly alternate: Expr;
      readonly position: number;
    }
  | {
      readonly kind: 'call';
      readonly name: string;
      /** Receiver for method-style calls (`s.startsWith(p)`) */
      readonly target: Expr | undefined;
      readonly args: readonly Expr[];
      readonly position: number;
    }
  | { readonly kind: 'has'; readonly operand: Expr; readonly field: string; readonly position: number }
  | {
      readonly kind: 'comprehension';
      readonly macro: ComprehensionMacro;
      readonly range: Expr;
      readonly variable: string;
      readonly body: Expr;
      readonly position: number;
    };

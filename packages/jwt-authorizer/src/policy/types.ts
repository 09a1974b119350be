import type { Result } from 'neverthrow';

/**
 * Values the policy language operates on. Token headers and claims are
 * converted into this shape before evaluation.
 */
export type PolicyValue = null | boolean | number | string | PolicyList | PolicyMap;

export type PolicyList = readonly PolicyValue[];

export interface PolicyMap {
  readonly [key: string]: PolicyValue;
}

/**
 * Variables bound when a policy is evaluated.
 */
export interface PolicyInput {
  readonly header: unknown;
  readonly claims: unknown;
}

/**
 * Error raised while compiling or evaluating a policy expression.
 */
export interface PolicyError {
  readonly code: 'SYNTAX_ERROR' | 'EVALUATION_ERROR' | 'NON_BOOLEAN_RESULT';
  readonly message: string;
  /** Offset in the expression source, for syntax errors */
  readonly position?: number;
}

/**
 * A compiled policy expression.
 */
export interface PolicyProgram {
  /** The source expression */
  readonly expression: string;
  /**
   * Evaluates the program. Returns the boolean result, or an error when the
   * evaluation fails or does not produce a boolean.
   */
  readonly evaluate: (input: PolicyInput) => Result<boolean, PolicyError>;
}

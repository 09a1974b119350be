import { err, ok, type Result } from 'neverthrow';
import type { Expr } from './ast.js';
import { check } from './checker.js';
import { PolicySyntaxError } from './errors.js';
import { evaluate, type Bindings } from './evaluator.js';
import { parse } from './parser.js';
import type { PolicyError, PolicyInput, PolicyProgram, PolicyValue } from './types.js';
import { kindOf, toPolicyValue } from './values.js';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const parseChecked = (expression: string): Result<Expr, PolicyError> => {
  try {
    const tree = parse(expression);
    check(tree);
    return ok(tree);
  } catch (error) {
    if (error instanceof PolicySyntaxError) {
      return err({ code: 'SYNTAX_ERROR', message: error.message, position: error.position });
    }
    return err({ code: 'SYNTAX_ERROR', message: errorMessage(error) });
  }
};

/**
 * Binds the input and evaluates. Conversion of the input happens inside the
 * guard too, since claims nested deeply enough exhaust the stack.
 */
const evaluateSafely = (tree: Expr, input: PolicyInput): Result<PolicyValue, PolicyError> => {
  try {
    const bindings: Bindings = new Map([
      ['header', toPolicyValue(input.header)],
      ['claims', toPolicyValue(input.claims)],
    ]);
    return ok(evaluate(tree, bindings));
  } catch (error) {
    return err({ code: 'EVALUATION_ERROR', message: errorMessage(error) });
  }
};

const runProgram = (tree: Expr, input: PolicyInput): Result<boolean, PolicyError> =>
  evaluateSafely(tree, input).andThen(
    (result): Result<boolean, PolicyError> =>
      typeof result === 'boolean'
        ? ok(result)
        : err({
            code: 'NON_BOOLEAN_RESULT',
            message: `Policy must evaluate to a bool but produced ${kindOf(result)}`,
          })
  );

/**
 * Compiles a policy expression into a reusable program.
 *
 * Parsing and name resolution happen once here; `evaluate` only walks the
 * checked tree. The program binds `header` and `claims` for each evaluation.
 *
 * @example
 * ```typescript
 * const program = compilePolicy('claims.sub != "" && claims.email_verified == true');
 * if (program.isOk()) {
 *   program.value.evaluate({ header, claims }); // Ok(true) | Ok(false) | Err(...)
 * }
 * ```
 */
export const compilePolicy = (expression: string): Result<PolicyProgram, PolicyError> =>
  parseChecked(expression).map((tree) => ({
    expression,
    evaluate: (input: PolicyInput) => runProgram(tree, input),
  }));

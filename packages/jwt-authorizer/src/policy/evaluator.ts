import type { BinaryOperator, ComprehensionMacro, Expr } from './ast.js';
import { PolicyEvaluationError } from './errors.js';
import type { PolicyList, PolicyValue } from './types.js';
import { regexMatches } from './regex.js';
import { createMap, getField, hasField, isList, isMap, kindOf, valuesEqual } from './values.js';

export type Bindings = ReadonlyMap<string, PolicyValue>;

const fail = (message: string): never => {
  throw new PolicyEvaluationError(message);
};

const expectBool = (value: PolicyValue, context: string): boolean =>
  typeof value === 'boolean' ? value : fail(`${context} expects a bool but got ${kindOf(value)}`);

const expectNumber = (value: PolicyValue, context: string): number =>
  typeof value === 'number' ? value : fail(`${context} expects a number but got ${kindOf(value)}`);

const expectString = (value: PolicyValue, context: string): string =>
  typeof value === 'string' ? value : fail(`${context} expects a string but got ${kindOf(value)}`);

type Outcome =
  | { readonly ok: true; readonly value: PolicyValue }
  | { readonly ok: false; readonly error: unknown };

const attempt = (run: () => PolicyValue): Outcome => {
  try {
    return { ok: true, value: run() };
  } catch (error) {
    return { ok: false, error };
  }
};

const ordered = <T extends number | string | boolean>(
  operator: BinaryOperator,
  left: T,
  right: T
): boolean => {
  switch (operator) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    default:
      return left >= right;
  }
};

const compareOrdered = (operator: BinaryOperator, left: PolicyValue, right: PolicyValue): boolean => {
  if (typeof left === 'number' && typeof right === 'number') {
    return ordered(operator, left, right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return ordered(operator, left, right);
  }
  if (typeof left === 'boolean' && typeof right === 'boolean') {
    return ordered(operator, left, right);
  }
  return fail(`Cannot compare ${kindOf(left)} ${operator} ${kindOf(right)}`);
};

const membership = (element: PolicyValue, container: PolicyValue): boolean => {
  if (isList(container)) {
    return container.some((candidate) => valuesEqual(element, candidate));
  }
  if (isMap(container)) {
    return typeof element === 'string' && hasField(container, element);
  }
  if (typeof container === 'string') {
    return container.includes(expectString(element, "'in' on a string"));
  }
  return fail(`'in' expects a list, map or string but got ${kindOf(container)}`);
};

const arithmetic = (operator: BinaryOperator, left: PolicyValue, right: PolicyValue): PolicyValue => {
  if (operator === '+') {
    if (typeof left === 'string' && typeof right === 'string') {
      return left + right;
    }
    if (isList(left) && isList(right)) {
      return [...left, ...right];
    }
  }

  const a = expectNumber(left, `'${operator}'`);
  const b = expectNumber(right, `'${operator}'`);
  switch (operator) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      return b === 0 ? fail('Division by zero') : a / b;
    case '%':
      return b === 0 ? fail('Modulus by zero') : a % b;
    default:
      return fail(`Unknown operator '${operator}'`);
  }
};

const sizeOf = (value: PolicyValue): number => {
  if (typeof value === 'string') {
    return [...value].length;
  }
  if (isList(value)) {
    return value.length;
  }
  if (isMap(value)) {
    return Object.keys(value).length;
  }
  return fail(`size() expects a string, list or map but got ${kindOf(value)}`);
};

const patternMatches = (pattern: string, subject: string): boolean => {
  try {
    return regexMatches(pattern, subject);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(`Invalid regular expression: ${reason}`);
  }
};

const callFunction = (name: string, target: PolicyValue | undefined, args: PolicyList): PolicyValue => {
  const [first] = args;

  if (name === 'size') {
    const subject = target ?? first;
    return subject === undefined ? fail('size() expects an argument') : sizeOf(subject);
  }

  if (target === undefined || first === undefined) {
    return fail(`'${name}' expects a receiver and an argument`);
  }
  const subject = expectString(target, `${name}()`);
  const argument = expectString(first, `${name}()`);

  switch (name) {
    case 'startsWith':
      return subject.startsWith(argument);
    case 'endsWith':
      return subject.endsWith(argument);
    case 'contains':
      return subject.includes(argument);
    case 'matches':
      return patternMatches(argument, subject);
    default:
      return fail(`Unknown function '${name}'`);
  }
};

const indexInto = (container: PolicyValue, index: PolicyValue): PolicyValue => {
  if (isList(container)) {
    const position = expectNumber(index, 'List index');
    const element = Number.isInteger(position) ? container[position] : undefined;
    return element === undefined
      ? fail(`Index ${String(position)} is out of range for a list of size ${String(container.length)}`)
      : element;
  }
  if (isMap(container)) {
    const key = expectString(index, 'Map index');
    const value = getField(container, key);
    return value === undefined ? fail(`No such key: ${key}`) : value;
  }
  return fail(`Cannot index into ${kindOf(container)}`);
};

const rangeOf = (value: PolicyValue, macro: ComprehensionMacro): PolicyList => {
  if (isList(value)) {
    return value;
  }
  if (isMap(value)) {
    return Object.keys(value);
  }
  return fail(`${macro}() expects a list or map but got ${kindOf(value)}`);
};

/**
 * Evaluates a checked expression.
 *
 * `&&`, `||`, `all()` and `exists()` tolerate an error on one branch when the
 * remaining branches already decide the result.
 *
 * @throws PolicyEvaluationError on type mismatches, missing fields and other runtime failures
 */
export const evaluate = (expr: Expr, bindings: Bindings): PolicyValue => {
  switch (expr.kind) {
    case 'literal':
      return expr.value;

    case 'identifier': {
      const value = bindings.get(expr.name);
      return value === undefined ? fail(`Undeclared reference '${expr.name}'`) : value;
    }

    case 'list':
      return expr.elements.map((element) => evaluate(element, bindings));

    case 'map': {
      const seen = new Set<string>();
      return createMap(
        expr.entries.map(({ key, value }): [string, PolicyValue] => {
          const name = expectString(evaluate(key, bindings), 'Map literal key');
          if (seen.has(name)) {
            fail(`Duplicate key '${name}' in map literal`);
          }
          seen.add(name);
          return [name, evaluate(value, bindings)];
        })
      );
    }

    case 'select': {
      const operand = evaluate(expr.operand, bindings);
      if (!isMap(operand)) {
        return fail(`Cannot select field '${expr.field}' from ${kindOf(operand)}`);
      }
      const value = getField(operand, expr.field);
      return value === undefined ? fail(`No such key: ${expr.field}`) : value;
    }

    case 'index':
      return indexInto(evaluate(expr.operand, bindings), evaluate(expr.index, bindings));

    case 'has': {
      const operand = resolvePath(expr.operand, bindings);
      return operand !== undefined && isMap(operand) && hasField(operand, expr.field);
    }

    case 'unary': {
      const operand = evaluate(expr.operand, bindings);
      return expr.operator === '!'
        ? !expectBool(operand, "'!'")
        : -expectNumber(operand, "unary '-'");
    }

    case 'binary':
      return evaluateBinary(expr.operator, expr.left, expr.right, bindings);

    case 'conditional':
      return expectBool(evaluate(expr.test, bindings), 'Conditional')
        ? evaluate(expr.consequent, bindings)
        : evaluate(expr.alternate, bindings);

    case 'call': {
      const target = expr.target === undefined ? undefined : evaluate(expr.target, bindings);
      const args = expr.args.map((arg) => evaluate(arg, bindings));
      return callFunction(expr.name, target, args);
    }

    case 'comprehension':
      return evaluateComprehension(expr, bindings);
  }
};

/**
 * Like evaluate, but a field missing anywhere along a selection path yields
 * undefined instead of an error.
 */
const resolvePath = (expr: Expr, bindings: Bindings): PolicyValue | undefined => {
  if (expr.kind !== 'select') {
    return evaluate(expr, bindings);
  }
  const operand = resolvePath(expr.operand, bindings);
  if (operand === undefined || !isMap(operand)) {
    return undefined;
  }
  return getField(operand, expr.field);
};

/**
 * Combines outcomes for a logical operator. `decisive` is the value that
 * settles the result on its own (`false` for and, `true` for or).
 */
const combineLogical = (outcomes: readonly Outcome[], decisive: boolean, context: string): boolean => {
  let firstError: unknown;
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      firstError ??= outcome.error;
      continue;
    }
    if (typeof outcome.value !== 'boolean') {
      firstError ??= new PolicyEvaluationError(
        `${context} expects a bool but got ${kindOf(outcome.value)}`
      );
      continue;
    }
    if (outcome.value === decisive) {
      return decisive;
    }
  }
  if (firstError !== undefined) {
    throw firstError;
  }
  return !decisive;
};

const evaluateBinary = (
  operator: BinaryOperator,
  leftExpr: Expr,
  rightExpr: Expr,
  bindings: Bindings
): PolicyValue => {
  if (operator === '&&' || operator === '||') {
    const decisive = operator === '||';
    const left = attempt(() => evaluate(leftExpr, bindings));
    if (left.ok && left.value === decisive) {
      return decisive;
    }
    const right = attempt(() => evaluate(rightExpr, bindings));
    return combineLogical([left, right], decisive, `'${operator}'`);
  }

  const left = evaluate(leftExpr, bindings);
  const right = evaluate(rightExpr, bindings);

  switch (operator) {
    case '==':
      return valuesEqual(left, right);
    case '!=':
      return !valuesEqual(left, right);
    case '<':
    case '<=':
    case '>':
    case '>=':
      return compareOrdered(operator, left, right);
    case 'in':
      return membership(left, right);
    default:
      return arithmetic(operator, left, right);
  }
};

const evaluateComprehension = (
  expr: Extract<Expr, { kind: 'comprehension' }>,
  bindings: Bindings
): PolicyValue => {
  const range = rangeOf(evaluate(expr.range, bindings), expr.macro);
  const bodyFor = (element: PolicyValue): PolicyValue =>
    evaluate(expr.body, new Map(bindings).set(expr.variable, element));
  const context = `${expr.macro}()`;

  switch (expr.macro) {
    case 'all':
      return combineLogical(
        range.map((element) => attempt(() => bodyFor(element))),
        false,
        context
      );
    case 'exists':
      return combineLogical(
        range.map((element) => attempt(() => bodyFor(element))),
        true,
        context
      );
    case 'exists_one':
      return (
        range.filter((element) => expectBool(bodyFor(element), context)).length === 1
      );
    case 'filter':
      return range.filter((element) => expectBool(bodyFor(element), context));
    case 'map':
      return range.map((element) => bodyFor(element));
  }
};

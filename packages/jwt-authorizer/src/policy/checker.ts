import type { Expr } from './ast.js';
import { PolicySyntaxError } from './errors.js';
import { compileRegex } from './regex.js';

/** Variables bound at the top level of every policy */
export const ROOT_VARIABLES: readonly string[] = ['header', 'claims'];

interface FunctionSignature {
  /** Arity when called as `name(x, ...)`, if allowed */
  readonly global?: number;
  /** Arity when called as `x.name(...)`, if allowed */
  readonly method?: number;
}

const FUNCTIONS: Readonly<Record<string, FunctionSignature>> = {
  size: { global: 1, method: 0 },
  startsWith: { method: 1 },
  endsWith: { method: 1 },
  contains: { method: 1 },
  matches: { method: 1 },
};

const lookupFunction = (name: string): FunctionSignature | undefined =>
  Object.hasOwn(FUNCTIONS, name) ? FUNCTIONS[name] : undefined;

const checkPattern = (pattern: string, position: number): void => {
  try {
    compileRegex(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PolicySyntaxError(`Invalid regular expression: ${reason}`, position);
  }
};

/**
 * Resolves names and function calls against what the evaluator provides.
 *
 * @throws PolicySyntaxError on unknown identifiers, unknown functions, a wrong
 * number of arguments, or a literal `matches` pattern that does not compile
 */
export const check = (expr: Expr): void => {
  const visit = (node: Expr, scope: readonly string[]): void => {
    switch (node.kind) {
      case 'literal':
        return;

      case 'identifier':
        if (!scope.includes(node.name)) {
          throw new PolicySyntaxError(`Undeclared reference '${node.name}'`, node.position);
        }
        return;

      case 'list':
        node.elements.forEach((element) => visit(element, scope));
        return;

      case 'map':
        node.entries.forEach(({ key, value }) => {
          visit(key, scope);
          visit(value, scope);
        });
        return;

      case 'select':
      case 'has':
        visit(node.operand, scope);
        return;

      case 'index':
        visit(node.operand, scope);
        visit(node.index, scope);
        return;

      case 'unary':
        visit(node.operand, scope);
        return;

      case 'binary':
        visit(node.left, scope);
        visit(node.right, scope);
        return;

      case 'conditional':
        visit(node.test, scope);
        visit(node.consequent, scope);
        visit(node.alternate, scope);
        return;

      case 'comprehension':
        visit(node.range, scope);
        visit(node.body, [...scope, node.variable]);
        return;

      case 'call': {
        const signature = lookupFunction(node.name);
        if (signature === undefined) {
          throw new PolicySyntaxError(`Unknown function '${node.name}'`, node.position);
        }
        const style = node.target === undefined ? 'global' : 'method';
        const arity = signature[style];
        if (arity === undefined) {
          const usage = style === 'global' ? `x.${node.name}(...)` : `${node.name}(...)`;
          throw new PolicySyntaxError(
            `'${node.name}' must be called as ${usage}`,
            node.position
          );
        }
        if (node.args.length !== arity) {
          throw new PolicySyntaxError(
            `'${node.name}' expects ${String(arity)} argument(s) but got ${String(node.args.length)}`,
            node.position
          );
        }
        if (node.target !== undefined) {
          visit(node.target, scope);
        }
        node.args.forEach((arg) => visit(arg, scope));

        const [pattern] = node.args;
        if (node.name === 'matches' && pattern?.kind === 'literal' && typeof pattern.value === 'string') {
          checkPattern(pattern.value, pattern.position);
        }
        return;
      }
    }
  };

  visit(expr, ROOT_VARIABLES);
};

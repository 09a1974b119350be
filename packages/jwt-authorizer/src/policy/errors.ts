/**
 * Thrown by the lexer, parser and checker. Reported as a compile failure.
 */
export class PolicySyntaxError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} (at offset ${String(position)})`);
    this.name = 'PolicySyntaxError';
    this.position = position;
  }
}

/**
 * Thrown by the evaluator. Reported as a policy rejection.
 */
export class PolicyEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyEvaluationError';
  }
}

import { Operator } from "../ast";

export class BuildError extends Error {}

export class MissingResultError extends BuildError {
  constructor(public readonly fnName: string) {
    super(`function ${fnName} does not end with an expression`);
  }
}

export class UnsupportedOperatorError extends BuildError {
  constructor(public readonly operator: Operator) {
    super(`no lowering for operator ${String(operator)}`);
  }
}

export class UnsupportedExpressionError extends BuildError {
  constructor(public readonly exprTag: string) {
    super(`${exprTag} expressions have no register representation`);
  }
}

export class BreakOutsideLoopError extends BuildError {
  constructor() {
    super("break outside of a loop");
  }
}

export class DuplicateFunctionError extends BuildError {
  constructor(public readonly fnName: string) {
    super(`function ${fnName} is already defined`);
  }
}

export class UnknownFunctionError extends BuildError {
  constructor(public readonly fnName: string) {
    super(`call to undefined function ${fnName}`);
  }
}

export class ArityMismatchError extends BuildError {
  constructor(
    public readonly fnName: string,
    public readonly expected: number,
    public readonly received: number
  ) {
    super(`${fnName} takes ${expected} arguments, called with ${received}`);
  }
}

export class RegisterOverflowError extends BuildError {
  constructor(public readonly capacity: number) {
    super(`scope needs more than ${capacity} registers`);
  }
}

export class NoParentScopeError extends BuildError {
  constructor() {
    super("cannot pop the top-level scope");
  }
}

export class BuilderReusedError extends BuildError {
  constructor() {
    super("an IRBuilder builds a single program");
  }
}

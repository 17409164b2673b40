/** base class of every error thrown by this library */
export class LpError extends Error {
  override name = "LpError";
}

/** a variable with the same name is already part of the model */
export class DuplicateVariableError extends LpError {
  override name = "DuplicateVariableError";
  constructor(readonly variable: string) {
    super(`variable '${variable}' exists`);
  }
}

/** the bounds of a variable describe an empty or undefined interval */
export class InvalidBoundsError extends LpError {
  override name = "InvalidBoundsError";
  constructor(
    readonly variable: string,
    readonly min: number,
    readonly max: number,
  ) {
    super(`invalid bounds [${min}, ${max}] for variable '${variable}'`);
  }
}

/** an expression refers to a variable that this model never declared */
export class UnknownVariableError extends LpError {
  override name = "UnknownVariableError";
  constructor(readonly variable: string) {
    super(`variable '${variable}' is not declared in this model`);
  }
}

/** a coefficient or constant of a constraint or objective is NaN or infinite */
export class NonFiniteNumberError extends LpError {
  override name = "NonFiniteNumberError";
  constructor(readonly value: number, readonly where: string) {
    super(`${where} must be finite, got ${value}`);
  }
}

/** results were requested before the model was solved */
export class NotSolvedError extends LpError {
  override name = "NotSolvedError";
  constructor() {
    super("model has not been solved yet");
  }
}

/** the model was changed after it was solved */
export class ModelFrozenError extends LpError {
  override name = "ModelFrozenError";
  constructor(readonly operation: string, readonly state: string) {
    super(`cannot ${operation}: model is already ${state}`);
  }
}

/** outcome of a solve that did not produce an optimal solution */
export type SolverErrorStatus = "infeasible" | "unbounded" | "error";

/** the solver failed or reported that no optimum exists */
export class SolverError extends LpError {
  override name = "SolverError";
  constructor(
    readonly status: SolverErrorStatus,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** a template expression or constraint could not be parsed */
export class ExpressionSyntaxError extends LpError {
  override name = "ExpressionSyntaxError";
}

/** model options or environment configuration are invalid */
export class ConfigurationError extends LpError {
  override name = "ConfigurationError";
}

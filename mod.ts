import type { Logger } from "pino";
import { type LogLevel, parseModelConfig } from "./config.ts";
import {
  DuplicateVariableError,
  ExpressionSyntaxError,
  InvalidBoundsError,
  ModelFrozenError,
  NonFiniteNumberError,
  NotSolvedError,
  SolverError,
  UnknownVariableError,
} from "./errors.ts";
import {
  evaluate,
  exp,
  type Expression,
  format,
  isRelation,
  isTemplate,
  parseConstraint,
  parseExpression,
  type Relation,
  sub,
  type Term,
  type Variable,
} from "./expression.ts";
import { defaultLogger } from "./logger.ts";
import {
  type CoeffVar,
  javascriptLpSolver,
  type LpSolver,
  type SolverProblem,
  type SolverSolution,
} from "./solver.ts";

export * from "./errors.ts";
export {
  add,
  addMul,
  div,
  evaluate,
  exp,
  format,
  mul,
  neg,
  sub,
  sum,
} from "./expression.ts";
export type { Expression, Relation, Term, Variable } from "./expression.ts";
export { javascriptLpSolver, toLpsModel } from "./solver.ts";
export type {
  CoeffVar,
  LpSolver,
  SolverProblem,
  SolverSolution,
} from "./solver.ts";
export { createLogger } from "./logger.ts";
export type { CreateLoggerOptions } from "./logger.ts";
export type { LogLevel } from "./config.ts";

/** options for declaring a {@link Variable} */
export interface VariableOptions {
  /** lower bound, defaults to 0 */
  min?: number;
  /** upper bound, defaults to `Infinity` */
  max?: number;
}

/** `expression relation bound`, with every constant moved into `bound` */
export interface Constraint {
  readonly index: number;
  /** linear part, its constant is always 0 */
  readonly expression: Expression;
  readonly relation: Relation;
  readonly bound: number;
}

export type Direction = "maximize" | "minimize";

export interface Objective {
  readonly expression: Expression;
  readonly direction: Direction;
}

/**
 * `building` until the first solve, then one of the terminal states.
 * Terminal models reject every change.
 */
export type ModelState =
  | "building"
  | "optimal"
  | "infeasible"
  | "unbounded"
  | "failed";

export interface OptimalSolution {
  readonly status: "optimal";
  /** variable name -> value */
  readonly values: ReadonlyMap<string, number>;
  /** value of the objective, including its constant */
  readonly objective: number;
}

export interface NonOptimalSolution {
  readonly status: "infeasible" | "unbounded";
  /** always empty */
  readonly values: ReadonlyMap<string, number>;
}

/** result of {@link Model.solve} */
export type Solution = OptimalSolution | NonOptimalSolution;

export interface ModelOptions {
  /** name used in log records, defaults to `model-<n>` */
  name?: string;
  /** log every modeling and solving step at debug level */
  verbose?: boolean;
  /** level of this model's logger, overrides the parent's */
  logLevel?: LogLevel;
  /** parent logger, defaults to a shared pino logger on stdout */
  logger?: Logger;
  /** LP engine, defaults to {@link javascriptLpSolver} */
  solver?: LpSolver;
}

/**
 * Linear program definition.
 *
 * ```ts
 * const model = createModel();
 * const blue = model.variable("BluePaint", { max: 860 });
 * const black = model.variable("BlackPaint", { max: 1000 });
 * model.constraint`${blue} / 40 + ${black} / 30 <= 40`;
 * const solution = model.maximize`10 * ${blue} + 15 * ${black}`;
 * ```
 */
export interface Model {
  readonly name: string;
  readonly state: ModelState;
  /** declared variables, in declaration order */
  readonly variableList: readonly Variable[];
  /** added constraints, in insertion order */
  readonly constraintList: readonly Constraint[];
  readonly currentObjective: Objective | undefined;

  /**
   * Declares a continuous variable and returns it.
   *
   * ```ts
   * // 0 <= a
   * const a = model.variable("a");
   * // -5 <= b <= 5
   * const b = model.variable("b", { min: -5, max: 5 });
   * // free
   * const c = model.variable("c", { min: -Infinity });
   * ```
   */
  variable(name: string, options?: VariableOptions): Variable;
  /**
   * Declares `prefix[0]` to `prefix[count - 1]` with the same bounds. Either
   * all of them are declared or none.
   */
  variables(
    prefix: string,
    count: number,
    options?: VariableOptions,
  ): Variable[];

  /**
   * Adds a constraint written as a template string and returns it.
   *
   * ```ts
   * model.constraint`${a} + 4 >= (${b} - 1) / 2`;
   * ```
   */
  constraint(strings: TemplateStringsArray, ...values: Term[]): Constraint;
  /**
   * Adds a constraint and returns it.
   *
   * ```ts
   * model.constraint(add(a, 4), ">=", exp`(${b} - 1) / 2`);
   * ```
   */
  constraint(left: Term, relation: Relation, right: Term): Constraint;

  /** sets the objective, replacing the previous one */
  objective(expression: Term, direction: Direction): Objective;

  /**
   * Solves the model once. Later calls return the same solution, or throw
   * the same {@link SolverError} if the solver failed.
   */
  solve(): Solution;

  /** sets a template string as objective to maximize, then solves */
  maximize(strings: TemplateStringsArray, ...values: Term[]): Solution;
  /** sets the objective to maximize, then solves */
  maximize(objective: Term): Solution;
  /** sets a template string as objective to minimize, then solves */
  minimize(strings: TemplateStringsArray, ...values: Term[]): Solution;
  /** sets the objective to minimize, then solves */
  minimize(objective: Term): Solution;

  /**
   * Optimal value of a variable, as precise as the solver returns it. The
   * default {@link javascriptLpSolver} rounds to 8 decimal places.
   */
  value(variable: Variable): number;
  /** optimal value of the objective, computed from the variable values */
  objectiveValue(): number;
}

let modelCount = 0;

/** creates an empty, independent {@link Model} */
export function createModel(options: ModelOptions = {}): Model {
  const config = parseModelConfig({
    name: options.name,
    verbose: options.verbose,
    logLevel: options.logLevel,
  });
  const solver = options.solver ?? javascriptLpSolver();
  const name = config.name ?? `model-${++modelCount}`;
  const level = config.verbose ? "debug" : config.logLevel;
  const log = (options.logger ?? defaultLogger()).child(
    { model: name },
    level === undefined ? undefined : { level },
  );

  const variables = new Map<string, Variable>();
  const constraints: Constraint[] = [];
  let objective: Objective | undefined;
  let state: ModelState = "building";
  let solution: Solution | undefined;
  let failure: SolverError | undefined;

  function assertBuilding(operation: string): void {
    if (state !== "building") throw new ModelFrozenError(operation, state);
  }

  function assertDeclared(expression: Expression): void {
    for (const variable of expression.coefficients.keys()) {
      if (variables.get(variable.name) !== variable) {
        throw new UnknownVariableError(variable.name);
      }
    }
  }

  function assertFinite(expression: Expression, target: string): void {
    for (const [variable, coefficient] of expression.coefficients) {
      if (!Number.isFinite(coefficient)) {
        throw new NonFiniteNumberError(
          coefficient,
          `coefficient of '${variable.name}' in the ${target}`,
        );
      }
    }
    if (!Number.isFinite(expression.constant)) {
      throw new NonFiniteNumberError(
        expression.constant,
        `constant of the ${target}`,
      );
    }
  }

  function checkBounds(variable: string, min: number, max: number): void {
    if (
      Number.isNaN(min) || Number.isNaN(max) ||
      min === Infinity || max === -Infinity || min > max
    ) {
      throw new InvalidBoundsError(variable, min, max);
    }
  }

  function declare(variableName: string, min: number, max: number): Variable {
    const declared: Variable = {
      kind: "variable",
      name: variableName,
      min,
      max,
      index: variables.size,
    };
    variables.set(variableName, Object.freeze(declared));
    log.debug({ variable: variableName, min, max }, "variable declared");
    return declared;
  }

  function templateValue(value: Term | Relation): Term {
    if (typeof value === "string") {
      throw new ExpressionSyntaxError(
        `relation '${value}' cannot be interpolated into a template`,
      );
    }
    return value;
  }

  function addConstraint(
    first: TemplateStringsArray | Term,
    ...rest: Array<Term | Relation>
  ): Constraint {
    assertBuilding("add a constraint");
    let left: Expression;
    let relation: Relation;
    let right: Expression;
    if (isTemplate(first)) {
      [left, relation, right] = parseConstraint(first, rest.map(templateValue));
    } else {
      const [op, other] = rest;
      if (
        rest.length !== 2 || !isRelation(op) || typeof other === "string"
      ) {
        throw new ExpressionSyntaxError(
          `expected one of '<=', '==', '>=' but got '${String(op)}'`,
        );
      }
      left = exp(first);
      relation = op;
      right = exp(other);
    }

    const difference = sub(left, right);
    assertDeclared(difference);
    assertFinite(difference, "constraint");
    const constraint: Constraint = {
      index: constraints.length,
      expression: sub(difference, difference.constant),
      relation,
      bound: 0 - difference.constant,
    };
    constraints.push(Object.freeze(constraint));
    log.debug(
      {
        constraint: `${
          format(constraint.expression)
        } ${relation} ${constraint.bound}`,
      },
      "constraint added",
    );
    return constraint;
  }

  function setObjective(term: Term, direction: Direction): Objective {
    assertBuilding("set the objective");
    const expression = exp(term);
    assertDeclared(expression);
    assertFinite(expression, "objective");
    const next: Objective = { expression, direction };
    objective = Object.freeze(next);
    log.debug({ objective: format(expression), direction }, "objective set");
    return next;
  }

  function terms(expression: Expression): CoeffVar[] {
    const result: CoeffVar[] = [];
    for (const [variable, factor] of expression.coefficients) {
      if (factor !== 0) result.push({ index: variable.index, factor });
    }
    return result;
  }

  function serialize(goal: Objective): SolverProblem {
    return {
      direction: goal.direction === "maximize" ? "max" : "min",
      variables: [...variables.values()].map(({ name, min, max }) => ({
        name,
        min,
        max,
      })),
      objective: terms(goal.expression),
      rows: constraints.map(({ expression, relation, bound }) => ({
        terms: terms(expression),
        relation,
        rhs: bound,
      })),
    };
  }

  function fail(error: SolverError): never {
    failure = error;
    state = "failed";
    log.error({ err: error }, "solver failed");
    throw error;
  }

  function solve(): Solution {
    if (failure !== undefined) throw failure;
    if (solution !== undefined) return solution;

    // without an objective the model is a feasibility problem
    const goal: Objective = objective ??
      { expression: exp(0), direction: "minimize" };
    const problem = serialize(goal);
    log.debug({
      solver: solver.name,
      variables: problem.variables.length,
      constraints: problem.rows.length,
      direction: goal.direction,
    }, "solving model");

    const started = performance.now();
    let answer: SolverSolution;
    try {
      answer = solver.solve(problem);
    } catch (err) {
      fail(
        err instanceof SolverError ? err : new SolverError(
          "error",
          `solver '${solver.name}' failed: ${
            err instanceof Error ? err.message : String(err)
          }`,
          { cause: err },
        ),
      );
    }
    const durationMs = performance.now() - started;

    const declared = [...variables.values()];
    const { status, values: raw } = answer;
    let result: Solution;
    if (status === "optimal") {
      if (raw.length !== declared.length) {
        fail(
          new SolverError(
            "error",
            `solver '${solver.name}' returned ${raw.length} values ` +
              `for ${declared.length} variables`,
          ),
        );
      }
      const values = new Map<string, number>();
      declared.forEach((variable, i) => values.set(variable.name, raw[i]));
      result = {
        status,
        values,
        objective: evaluate(goal.expression, (v) => values.get(v.name) ?? 0),
      };
    } else {
      result = { status, values: new Map<string, number>() };
    }

    solution = Object.freeze(result);
    state = result.status;
    log.debug({
      status: result.status,
      objective: result.status === "optimal" ? result.objective : undefined,
      durationMs,
    }, "model solved");
    if (result.status !== "optimal") {
      log.warn({ status: result.status }, "model has no optimal solution");
    }
    return solution;
  }

  function optimize(
    direction: Direction,
    first: TemplateStringsArray | Term,
    values: Term[],
  ): Solution {
    setObjective(
      isTemplate(first) ? parseExpression(first, values) : exp(first),
      direction,
    );
    return solve();
  }

  function solved(): OptimalSolution {
    if (failure !== undefined) throw failure;
    if (solution === undefined) throw new NotSolvedError();
    if (solution.status !== "optimal") {
      throw new SolverError(
        solution.status,
        `model '${name}' is ${solution.status}`,
      );
    }
    return solution;
  }

  return {
    name,
    get state() {
      return state;
    },
    get variableList() {
      return [...variables.values()];
    },
    get constraintList() {
      return [...constraints];
    },
    get currentObjective() {
      return objective;
    },
    variable(variableName, variableOptions = {}) {
      assertBuilding("declare a variable");
      const { min = 0, max = Infinity } = variableOptions;
      if (variables.has(variableName)) {
        throw new DuplicateVariableError(variableName);
      }
      checkBounds(variableName, min, max);
      return declare(variableName, min, max);
    },
    variables(prefix, count, variableOptions = {}) {
      assertBuilding("declare variables");
      if (!Number.isInteger(count) || count < 0) {
        throw new RangeError(
          `count must be a non-negative integer, got ${count}`,
        );
      }
      const { min = 0, max = Infinity } = variableOptions;
      const names = Array.from({ length: count }, (_, i) => `${prefix}[${i}]`);
      const duplicate = names.find((n) => variables.has(n));
      if (duplicate !== undefined) throw new DuplicateVariableError(duplicate);
      checkBounds(`${prefix}[]`, min, max);
      return names.map((n) => declare(n, min, max));
    },
    constraint: addConstraint,
    objective: setObjective,
    solve,
    maximize(first: TemplateStringsArray | Term, ...values: Term[]) {
      return optimize("maximize", first, values);
    },
    minimize(first: TemplateStringsArray | Term, ...values: Term[]) {
      return optimize("minimize", first, values);
    },
    value(variable) {
      const { values } = solved();
      const value = values.get(variable.name);
      if (value === undefined || variables.get(variable.name) !== variable) {
        throw new UnknownVariableError(variable.name);
      }
      return value;
    },
    objectiveValue() {
      return solved().objective;
    },
  };
}

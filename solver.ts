import Solver, { type Model as LpsModel } from "javascript-lp-solver";
import { z } from "zod";
import { SolverError } from "./errors.ts";
import type { Relation } from "./expression.ts";

/** `factor * variables[index]` */
export interface CoeffVar {
  index: number;
  factor: number;
}

/** canonical form of a model, as handed to an {@link LpSolver} */
export interface SolverProblem {
  direction: "min" | "max";
  /** declaration order, referenced by {@link CoeffVar.index} */
  variables: Array<{ name: string; min: number; max: number }>;
  /** linear part of the objective; the constant is kept by the model */
  objective: CoeffVar[];
  /** `sum(terms) relation rhs` */
  rows: Array<{ terms: CoeffVar[]; relation: Relation; rhs: number }>;
}

/** answer of an {@link LpSolver} */
export interface SolverSolution {
  status: "optimal" | "unbounded" | "infeasible";
  /** one value per variable when optimal, otherwise empty */
  values: number[];
}

/**
 * External LP engine. Must solve synchronously, once per call, and throw
 * when it cannot produce an answer.
 */
export interface LpSolver {
  readonly name: string;
  solve(problem: SolverProblem): SolverSolution;
}

const OBJECTIVE = "objective";
const EPSILON = 1e-9;

const RawSolution = z.object({
  feasible: z.boolean(),
  bounded: z.boolean().optional(),
}).catchall(z.unknown());

const ColumnValue = z.number().finite();

/**
 * Engine columns of one variable. The engine only knows columns `>= 0`, so
 * `x = offset + sum(sign * column)`: a finite lower bound shifts the column
 * to start at 0, a variable without one is split into `p - n`.
 */
interface Columns {
  offset: number;
  parts: Array<{ column: string; sign: 1 | -1 }>;
}

// user names never reach the engine, so they cannot clash with the
// `feasible`, `result` and `bounded` keys of its answer
function columns(min: number, index: number): Columns {
  if (Number.isFinite(min)) {
    return { offset: min, parts: [{ column: `x${index}`, sign: 1 }] };
  }
  return {
    offset: 0,
    parts: [
      { column: `p${index}`, sign: 1 },
      { column: `n${index}`, sign: -1 },
    ],
  };
}

function holds(relation: Relation, lhs: number, rhs: number): boolean {
  switch (relation) {
    case "<=":
      return lhs <= rhs + EPSILON;
    case ">=":
      return lhs >= rhs - EPSILON;
    case "==":
      return Math.abs(lhs - rhs) <= EPSILON;
  }
}

function bound(
  relation: Relation,
  rhs: number,
): LpsModel["constraints"][string] {
  switch (relation) {
    case "<=":
      return { max: rhs };
    case ">=":
      return { min: rhs };
    case "==":
      return { equal: rhs };
  }
}

/**
 * Translates the canonical form into the model format of javascript-lp-solver.
 * Upper bounds become rows `ub<i>`, constraints become rows `r<k>`.
 */
export function toLpsModel(problem: SolverProblem): LpsModel {
  const variables: LpsModel["variables"] = {};
  const constraints: LpsModel["constraints"] = {};
  const layout = problem.variables.map(({ min }, i) => columns(min, i));

  problem.variables.forEach(({ max }, i) => {
    const { offset, parts } = layout[i];
    for (const { column } of parts) variables[column] = { [OBJECTIVE]: 0 };
    if (Number.isFinite(max)) {
      constraints[`ub${i}`] = { max: max - offset };
      for (const { column, sign } of parts) variables[column][`ub${i}`] = sign;
    }
  });

  for (const { index, factor } of problem.objective) {
    for (const { column, sign } of layout[index].parts) {
      variables[column][OBJECTIVE] = sign * factor;
    }
  }

  problem.rows.forEach(({ terms, relation, rhs }, r) => {
    if (terms.length === 0) return;
    let shifted = rhs;
    for (const { index, factor } of terms) {
      const { offset, parts } = layout[index];
      shifted -= factor * offset;
      for (const { column, sign } of parts) {
        variables[column][`r${r}`] = sign * factor;
      }
    }
    constraints[`r${r}`] = bound(relation, shifted);
  });

  return {
    optimize: OBJECTIVE,
    opType: problem.direction,
    constraints,
    variables,
  };
}

/**
 * {@link LpSolver} backed by the simplex engine of `javascript-lp-solver`.
 *
 * The engine rounds every column to 8 decimal places, so values are only
 * exact to about `1e-8` (`x <= 1/3` comes back as `0.33333333`).
 */
export function javascriptLpSolver(): LpSolver {
  return {
    name: "javascript-lp-solver",
    solve(problem) {
      // rows without variables never reach the engine
      const contradiction = problem.rows.some(({ terms, relation, rhs }) =>
        terms.length === 0 && !holds(relation, 0, rhs)
      );
      if (contradiction) return { status: "infeasible", values: [] };

      const parsed = RawSolution.safeParse(Solver.Solve(toLpsModel(problem)));
      if (!parsed.success) {
        throw new SolverError(
          "error",
          `malformed answer from javascript-lp-solver: ${parsed.error.message}`,
        );
      }
      const answer = parsed.data;
      if (answer.bounded === false) return { status: "unbounded", values: [] };
      if (!answer.feasible) return { status: "infeasible", values: [] };

      const values = problem.variables.map(({ name, min }, i) => {
        const { offset, parts } = columns(min, i);
        let total = offset;
        for (const { column, sign } of parts) {
          // the engine leaves out columns that are zero
          const value = ColumnValue.safeParse(answer[column] ?? 0);
          if (!value.success) {
            throw new SolverError(
              "error",
              `numerical failure: no finite value for variable '${name}'`,
            );
          }
          total += sign * value.data;
        }
        return total;
      });
      return { status: "optimal", values };
    },
  };
}

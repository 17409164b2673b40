declare module "javascript-lp-solver" {
  export interface Model {
    optimize: string;
    opType: "max" | "min";
    constraints: Record<string, { min?: number; max?: number; equal?: number }>;
    variables: Record<string, Record<string, number>>;
    ints?: Record<string, 1>;
    unrestricted?: Record<string, 1>;
  }

  export interface Solution {
    feasible: boolean;
    result: number;
    bounded: boolean;
    isIntegral?: boolean;
    [variableName: string]: number | boolean | undefined;
  }

  export interface Solver {
    Solve(
      model: Model,
      precision?: number,
      full?: boolean,
      validate?: boolean,
    ): Solution;
  }

  const solver: Solver;
  export default solver;
}

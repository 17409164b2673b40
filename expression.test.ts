import { describe, expect, it } from "vitest";
import {
  add,
  createModel,
  div,
  evaluate,
  exp,
  ExpressionSyntaxError,
  format,
  mul,
  neg,
  sub,
  sum,
} from "./mod.ts";

function variables() {
  const model = createModel({ name: "expressions" });
  return { a: model.variable("a"), b: model.variable("b") };
}

describe("exp", () => {
  it("wraps numbers, variables and expressions", () => {
    const { a } = variables();
    expect(exp(3).constant).toBe(3);
    expect(exp(3).coefficients.size).toBe(0);
    expect([...exp(a).coefficients]).toEqual([[a, 1]]);
    const e = exp`${a} + 1`;
    expect(exp(e)).toBe(e);
  });

  it("parses products, quotients and sums", () => {
    const { a, b } = variables();
    const e = exp`2 * ${a} - ${b} / 4 + 1`;
    expect(e.coefficients.get(a)).toBe(2);
    expect(e.coefficients.get(b)).toBe(-0.25);
    expect(e.constant).toBe(1);
  });

  it("parses unary minus and parentheses", () => {
    const { a } = variables();
    const e = exp`-(${a} - 3) * 2`;
    expect(e.coefficients.get(a)).toBe(-2);
    expect(e.constant).toBe(6);
  });

  it("folds constant sub-expressions", () => {
    const { a, b } = variables();
    const e = exp`${a} + 3 - (${b} / (-5.5 / 2))`;
    expect(e.coefficients.get(a)).toBe(1);
    expect(e.coefficients.get(b)).toBeCloseTo(1 / 2.75, 12);
    expect(e.constant).toBe(3);
  });

  it("accepts interpolated numbers and expressions", () => {
    const { a, b } = variables();
    const inner = exp`${a} + ${b}`;
    const e = exp`${0.5} * ${inner} - 1e1`;
    expect(e.coefficients.get(a)).toBe(0.5);
    expect(e.coefficients.get(b)).toBe(0.5);
    expect(e.constant).toBe(-10);
  });

  it("rejects products of two expressions", () => {
    const { a, b } = variables();
    expect(() => exp`${a} * ${b}`).toThrow(ExpressionSyntaxError);
    expect(() => exp`${a} * ${b}`).toThrow("cannot multiply two expressions");
  });

  it("rejects division by expressions and by zero", () => {
    const { a, b } = variables();
    expect(() => exp`${a} / ${b}`).toThrow("cannot divide by an expression");
    expect(() => exp`${a} / 0`).toThrow("division by zero");
    expect(() => div(a, 0)).toThrow(ExpressionSyntaxError);
  });

  it("reports the position of unexpected characters", () => {
    const { a } = variables();
    expect(() => exp`${a} $ 2`).toThrow(
      "unexpected character '$' at index 2 in 'a $ 2'",
    );
  });

  it("reports unbalanced parentheses", () => {
    const { a } = variables();
    expect(() => exp`(${a} + 1`).toThrow(
      "expected ')' at index 6 in '(a + 1'",
    );
  });

  it("rejects relations inside an expression", () => {
    const { a } = variables();
    expect(() => exp`${a} <= 1`).toThrow("unexpected '<='");
  });
});

describe("arithmetic", () => {
  it("combines terms without mutating the inputs", () => {
    const { a, b } = variables();
    const left = exp(a);
    const result = add(left, mul(3, b));
    expect(left.coefficients.size).toBe(1);
    expect(result.coefficients.get(a)).toBe(1);
    expect(result.coefficients.get(b)).toBe(3);
  });

  it("subtracts and negates", () => {
    const { a, b } = variables();
    const e = sub(neg(a), exp`${b} - 4`);
    expect(e.coefficients.get(a)).toBe(-1);
    expect(e.coefficients.get(b)).toBe(-1);
    expect(e.constant).toBe(4);
  });

  it("sums any number of terms", () => {
    const { a, b } = variables();
    const e = sum(a, b, a, 2);
    expect(e.coefficients.get(a)).toBe(2);
    expect(e.coefficients.get(b)).toBe(1);
    expect(e.constant).toBe(2);
    expect(sum().coefficients.size).toBe(0);
  });

  it("evaluates an expression for an assignment", () => {
    const { a, b } = variables();
    const values = new Map([[a, 3], [b, -1]]);
    expect(evaluate(exp`2 * ${a} + ${b} + 1`, (v) => values.get(v) ?? 0))
      .toBe(6);
  });
});

describe("format", () => {
  it("renders coefficients and constants", () => {
    const { a, b } = variables();
    expect(format(exp`10 * ${a} + 15 * ${b}`)).toBe("10 * a + 15 * b");
    expect(format(sub(a, exp`2 * ${b} + 3`))).toBe("a - 2 * b - 3");
    expect(format(neg(a))).toBe("-a");
    expect(format(exp(0))).toBe("0");
  });

  it("leaves out cancelled variables", () => {
    const { a, b } = variables();
    expect(format(exp`${a} - ${a} + ${b}`)).toBe("b");
  });
});

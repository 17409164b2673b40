import { ExpressionSyntaxError } from "./errors.ts";

/** continuous decision variable, created by {@link Model.variable} */
export interface Variable {
  readonly kind: "variable";
  /** name of the variable, unique within its model */
  readonly name: string;
  /** lower bound, may be `-Infinity` */
  readonly min: number;
  /** upper bound, may be `Infinity` */
  readonly max: number;
  /** position in the model's declaration order */
  readonly index: number;
}

/** affine linear expression `a * x + b * y + c` */
export interface Expression {
  readonly kind: "expression";
  /** variable -> coefficient */
  readonly coefficients: ReadonlyMap<Variable, number>;
  /** constant offset */
  readonly constant: number;
}

/** anything that can stand where an expression is expected */
export type Term = number | Variable | Expression;

/** comparison between the two sides of a constraint */
export type Relation = "<=" | "==" | ">=";

export const RELATIONS: readonly Relation[] = ["<=", "==", ">="];

/** whether a value is the strings array of a tagged template call */
export function isTemplate(value: unknown): value is TemplateStringsArray {
  return Array.isArray(value) && "raw" in value;
}

export function isRelation(value: unknown): value is Relation {
  return RELATIONS.some((relation) => relation === value);
}

function expression(
  coefficients: ReadonlyMap<Variable, number>,
  constant: number,
): Expression {
  const value: Expression = { kind: "expression", coefficients, constant };
  return Object.freeze(value);
}

/**
 * Constructs an {@link Expression} from a template string.
 *
 * ```ts
 * const a = model.variable("a");
 * const b = model.variable("b");
 * const expression = exp`${a} + 3 - (${b} / (-5.5 / 2))`;
 * const other = exp`7 * ${expression} - 2`;
 * ```
 */
export function exp(
  strings: TemplateStringsArray,
  ...values: Term[]
): Expression;
/**
 * Converts a number, a {@link Variable}, or an {@link Expression} to an
 * {@link Expression}.
 */
export function exp(term: Term): Expression;
export function exp(
  first: Term | TemplateStringsArray,
  ...values: Term[]
): Expression {
  if (typeof first === "number") {
    return expression(new Map(), first);
  }
  if (isTemplate(first)) {
    return parseExpression(first, values);
  }
  if (first.kind === "variable") {
    return expression(new Map([[first, 1]]), 0);
  }
  return first;
}

/** a + b */
export function add(left: Term, right: Term): Expression {
  return addMul(left, 1, right);
}
/** a - b */
export function sub(left: Term, right: Term): Expression {
  return addMul(left, -1, right);
}
/** -a */
export function neg(term: Term): Expression {
  return addMul(0, -1, term);
}
/** const * a */
export function mul(factor: number, term: Term): Expression {
  return addMul(0, factor, term);
}
/** a / const */
export function div(term: Term, divisor: number): Expression {
  if (divisor === 0) throw new ExpressionSyntaxError("division by zero");
  return addMul(0, 1 / divisor, term);
}
/** a + b + c + ... */
export function sum(...terms: Term[]): Expression {
  return terms.reduce<Expression>((acc, term) => add(acc, term), exp(0));
}

/** a + (const * b) */
export function addMul(left: Term, factor: number, right: Term): Expression {
  const base = exp(left);
  const other = exp(right);
  const coefficients = new Map(base.coefficients);
  for (const [variable, coefficient] of other.coefficients) {
    coefficients.set(
      variable,
      (coefficients.get(variable) ?? 0) + factor * coefficient,
    );
  }
  return expression(coefficients, base.constant + factor * other.constant);
}

/** computes the value of an expression for a given variable assignment */
export function evaluate(
  term: Term,
  valueOf: (variable: Variable) => number,
): number {
  const { coefficients, constant } = exp(term);
  let total = constant;
  for (const [variable, coefficient] of coefficients) {
    total += coefficient * valueOf(variable);
  }
  return total;
}

/**
 * Renders an expression for humans, e.g. `10 * BluePaint + 15 * BlackPaint`.
 * Zero coefficients are left out.
 */
export function format(term: Term): string {
  const { coefficients, constant } = exp(term);
  const parts: Array<{ negative: boolean; text: string }> = [];
  for (const [variable, coefficient] of coefficients) {
    if (coefficient === 0) continue;
    const magnitude = Math.abs(coefficient);
    parts.push({
      negative: coefficient < 0,
      text: magnitude === 1 ? variable.name : `${magnitude} * ${variable.name}`,
    });
  }
  if (constant !== 0 || parts.length === 0) {
    parts.push({ negative: constant < 0, text: String(Math.abs(constant)) });
  }
  return parts.map(({ negative, text }, i) => {
    if (i === 0) return negative ? `-${text}` : text;
    return negative ? ` - ${text}` : ` + ${text}`;
  }).join("");
}

// === TEMPLATE PARSING ===

type Token =
  | { kind: "num"; value: number; at: number }
  | { kind: "exp"; value: Expression; at: number }
  | { kind: "op"; value: "+" | "-" | "*" | "/"; at: number }
  | { kind: "paren"; value: "(" | ")"; at: number }
  | { kind: "rel"; value: Relation; at: number };

type Value = number | Expression;

const TOKEN =
  /(\d+(?:\.\d*)?(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?)|(<=|>=|==)|([-+*/])|([()])/y;

function describe(value: Term): string {
  if (typeof value === "number") return String(value);
  if (value.kind === "variable") return value.name;
  return `(${format(value)})`;
}

function tokenize(
  strings: TemplateStringsArray,
  values: Term[],
): { tokens: Token[]; source: string } {
  if (strings.length !== values.length + 1) {
    throw new ExpressionSyntaxError("malformed template");
  }
  const tokens: Token[] = [];
  let source = "";
  strings.forEach((piece, i) => {
    let pos = 0;
    while (pos < piece.length) {
      if (/\s/.test(piece[pos])) {
        pos++;
        continue;
      }
      TOKEN.lastIndex = pos;
      const match = TOKEN.exec(piece);
      const at = source.length + pos;
      if (match === null) {
        throw new ExpressionSyntaxError(
          `unexpected character '${piece[pos]}' at index ${at} in '${
            source + piece + values.slice(i).map(describe).join("")
          }'`,
        );
      }
      const [text, num, rel, op, paren] = match;
      if (num !== undefined) {
        tokens.push({ kind: "num", value: Number(num), at });
      } else if (rel !== undefined && isRelation(rel)) {
        tokens.push({ kind: "rel", value: rel, at });
      } else if (op === "+" || op === "-" || op === "*" || op === "/") {
        tokens.push({ kind: "op", value: op, at });
      } else if (paren === "(" || paren === ")") {
        tokens.push({ kind: "paren", value: paren, at });
      }
      pos += text.length;
    }
    source += piece;
    if (i < values.length) {
      const value = values[i];
      const at = source.length;
      tokens.push(
        typeof value === "number"
          ? { kind: "num", value, at }
          : { kind: "exp", value: exp(value), at },
      );
      source += describe(value);
    }
  });
  return { tokens, source };
}

function text(token: Token): string {
  if (token.kind === "exp") return `(${format(token.value)})`;
  return String(token.value);
}

/** parses a template such as ``exp`2 * ${a} - ${b} / 3` `` */
export function parseExpression(
  strings: TemplateStringsArray,
  values: Term[],
): Expression {
  return parse(strings, values, { type: "expression" });
}

/** parses a template such as `` `${a} + 4 >= (${b} - 1) / 2` `` */
export function parseConstraint(
  strings: TemplateStringsArray,
  values: Term[],
): [Expression, Relation, Expression] {
  return parse(strings, values, { type: "constraint" });
}

function parse(
  strings: TemplateStringsArray,
  values: Term[],
  options: { type: "expression" },
): Expression;
function parse(
  strings: TemplateStringsArray,
  values: Term[],
  options: { type: "constraint" },
): [Expression, Relation, Expression];
function parse(
  strings: TemplateStringsArray,
  values: Term[],
  options: { type: "expression" | "constraint" },
): Expression | [Expression, Relation, Expression] {
  const { tokens, source } = tokenize(strings, values);
  let cursor = 0;

  function peek(): Token | undefined {
    return tokens[cursor];
  }
  function next(): Token | undefined {
    const token = tokens[cursor];
    if (token !== undefined) cursor++;
    return token;
  }
  function fail(message: string, token: Token | undefined): never {
    const at = token?.at ?? source.length;
    throw new ExpressionSyntaxError(
      `${message} at index ${at} in '${source}'`,
    );
  }

  // primary := number | term | '(' sum ')'
  function primary(): Value {
    const token = next();
    if (token === undefined) fail("unexpected end of input", token);
    if (token.kind === "num" || token.kind === "exp") return token.value;
    if (token.kind === "paren" && token.value === "(") {
      const inner = sum();
      const closing = next();
      if (closing?.kind !== "paren" || closing.value !== ")") {
        fail("expected ')'", closing);
      }
      return inner;
    }
    fail(`unexpected '${text(token)}'`, token);
  }
  // unary := ('+' | '-') unary | primary
  function unary(): Value {
    const token = peek();
    if (token?.kind === "op" && (token.value === "-" || token.value === "+")) {
      next();
      const operand = unary();
      if (token.value === "+") return operand;
      return typeof operand === "number" ? -operand : neg(operand);
    }
    return primary();
  }
  // product := unary (('*' | '/') unary)*
  function product(): Value {
    let left = unary();
    for (let token = peek(); token?.kind === "op"; token = peek()) {
      if (token.value !== "*" && token.value !== "/") break;
      next();
      const right = unary();
      if (token.value === "*") {
        if (typeof left === "number" && typeof right === "number") {
          left = left * right;
        } else if (typeof left === "number") {
          left = mul(left, right);
        } else if (typeof right === "number") {
          left = mul(right, left);
        } else {
          fail("cannot multiply two expressions", token);
        }
      } else {
        if (typeof right !== "number") {
          fail("cannot divide by an expression", token);
        }
        if (right === 0) fail("division by zero", token);
        left = typeof left === "number" ? left / right : div(left, right);
      }
    }
    return left;
  }
  // sum := product (('+' | '-') product)*
  function sum(): Value {
    let left = product();
    for (let token = peek(); token?.kind === "op"; token = peek()) {
      if (token.value !== "+" && token.value !== "-") break;
      next();
      const right = product();
      if (typeof left === "number" && typeof right === "number") {
        left = token.value === "+" ? left + right : left - right;
      } else {
        left = token.value === "+" ? add(left, right) : sub(left, right);
      }
    }
    return left;
  }
  function relation(): Relation {
    const token = next();
    if (token?.kind !== "rel") {
      fail("expected one of '<=', '==', '>='", token);
    }
    return token.value;
  }
  function end(): void {
    const token = peek();
    if (token !== undefined) fail(`unexpected '${text(token)}'`, token);
  }

  const left = sum();
  if (options.type === "expression") {
    end();
    return exp(left);
  }
  const cmp = relation();
  const right = sum();
  end();
  return [exp(left), cmp, exp(right)];
}

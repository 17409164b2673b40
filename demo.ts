import { createLogger, createModel, exp, sum } from "./mod.ts";

const logger = createLogger({ level: "info" });

// paint production: blue sells for 10, black for 15, both share 40 machine
// hours, a can of blue takes 1/40 h and a can of black 1/30 h
const paint = createModel({ name: "paint", logger });
const blue = paint.variable("BluePaint", { max: 860 });
const black = paint.variable("BlackPaint", { max: 1000 });
paint.constraint`${blue} / 40 + ${black} / 30 <= 40`;
const solution = paint.maximize(exp`10 * ${blue} + 15 * ${black}`);
logger.info({
  status: solution.status,
  BluePaint: paint.value(blue),
  BlackPaint: paint.value(black),
  revenue: paint.objectiveValue(),
}, "paint production");

// the same model with the two paints declared as a vector
const vector = createModel({ name: "paint-vector", logger });
const hours = [1 / 40, 1 / 30];
const prices = [10, 15];
const cans = vector.variables("paint", 2);
vector.constraint(cans[0], "<=", 860);
vector.constraint(cans[1], "<=", 1000);
vector.constraint(
  sum(...cans.map((can, i) => exp`${hours[i]} * ${can}`)),
  "<=",
  40,
);
vector.maximize(sum(...cans.map((can, i) => exp`${prices[i]} * ${can}`)));
logger.info({
  cans: cans.map((can) => vector.value(can)),
  revenue: vector.objectiveValue(),
}, "paint production (vector)");

import { describe, expect, it } from "vitest";
import { MathEvaluator } from "./MathEvaluator.js";
import { ExpressionError } from "../errors.js";

const ns = (entries: Record<string, unknown[]>) => new Map(Object.entries(entries));

describe("MathEvaluator", () => {
  const evaluator = new MathEvaluator({ cacheSize: 16 });

  it("compares columns element-wise", () => {
    const scope = ns({ a: [1, 1, 3, 5], b: [5, 1, 2, 5] });

    expect(evaluator.evaluate("a > 3", scope)).toEqual([false, false, false, true]);
    expect(evaluator.evaluate("a == b", scope)).toEqual([false, true, false, true]);
    expect(evaluator.evaluate("a < 3 and b > 1", scope)).toEqual([true, false, false, false]);
    expect(evaluator.evaluate("not (a > 3)", scope)).toEqual([true, true, true, false]);
  });

  it("supports arithmetic and math functions", () => {
    const scope = ns({ c: [4.5, 6.2, 0.5, -3.5] });

    expect(evaluator.evaluate("abs(c) > 4", scope)).toEqual([true, true, false, false]);
    expect(evaluator.evaluate("c * 2", scope)).toEqual([9, 12.4, 1, -7]);
  });

  it("returns scalars unchanged", () => {
    expect(evaluator.evaluate("1 > 0", new Map())).toBe(true);
  });

  it("keeps assignments inside the expression scope", () => {
    const scope = ns({ a: [1, 2] });

    evaluator.evaluate("z = 3", scope);

    expect([...scope.keys()]).toEqual(["a"]);
  });

  it("wraps parse errors with the expression text", () => {
    let error: unknown;
    try {
      evaluator.evaluate("a >", ns({ a: [1] }));
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ExpressionError);
    expect(error).toMatchObject({ expression: "a >" });
    expect(error).toHaveProperty("cause");
  });

  it("wraps evaluation errors", () => {
    expect(() => evaluator.evaluate("missing > 3", new Map())).toThrow(ExpressionError);
    expect(() => evaluator.symbols("(")).toThrow(ExpressionError);
  });

  it("lists symbols with and without callees and constants", () => {
    expect(evaluator.symbols("sqrt(a) > pi and b < 2")).toEqual(["a", "b", "pi", "sqrt"]);
    expect(evaluator.variableNames("sqrt(a) > pi and b < 2")).toEqual(["a", "b"]);
  });

  it("passes missing cells as NaN", () => {
    const scope = ns({ a: [1, null, 5, undefined] });

    expect(evaluator.evaluate("a > 3", scope)).toEqual([false, false, true, false]);
    expect(evaluator.evaluate("a == 1", scope)).toEqual([true, false, false, false]);
    expect(scope.get("a")).toEqual([1, null, 5, undefined]);
  });

  it.each(["(a > 1) & (a < 5)", "(a > 1) | (a < 5)", "~(a > 1)", "((a > 1) & (a < 5))"])(
    "rejects %s with a pointer to the logical operators",
    (expression) => {
      expect(() => evaluator.evaluate(expression, ns({ a: [1, 3] }))).toThrow(
        `Cannot evaluate expression "${expression}": '&', '|' and '~' are bitwise operators; combine conditions with 'and', 'or' and 'not'`,
      );
    },
  );

  it("still evaluates bitwise operators inside a comparison", () => {
    expect(evaluator.evaluate("(a & 1) == 1", ns({ a: [1, 2, 3] }))).toEqual([true, false, true]);
  });

  it("works with the cache disabled", () => {
    const uncached = new MathEvaluator({ cacheSize: 0 });

    expect(uncached.evaluate("a >= 2", ns({ a: [1, 2] }))).toEqual([false, true]);
    expect(uncached.evaluate("a >= 2", ns({ a: [3] }))).toEqual([true]);
  });
});

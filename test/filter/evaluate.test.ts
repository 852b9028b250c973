import { describe, expect, it, vi } from "vitest";
import { resolveBackend } from "../../src/backends/resolve.js";
import { MathEvaluator } from "../../src/core/MathEvaluator.js";
import { InvalidResultTypeError, ResultLengthMismatchError } from "../../src/errors.js";
import { always, and, call, expr, not, or, xor } from "../../src/filter/ast.js";
import { resolveMask, toMask } from "../../src/filter/evaluate.js";
import type { Column } from "../../src/spi/types.js";
import { sampleRows, sampleTable } from "../fixtures.js";

const evaluator = new MathEvaluator({ cacheSize: 8 });
const flags = (...values: number[]) => values.map((v) => v === 1);

describe("toMask", () => {
  it("broadcasts a boolean scalar", () => {
    expect(toMask(false, 3, "test")).toEqual([false, false, false]);
  });

  it("copies a boolean array of the right length", () => {
    const input = [true, false];
    const out = toMask(input, 2, "test");

    expect(out).toEqual([true, false]);
    expect(out).not.toBe(input);
  });

  it("rejects arrays of the wrong length before checking their contents", () => {
    expect(() => toMask([1, 2, 3], 2, "test")).toThrow(ResultLengthMismatchError);
  });

  it("rejects non-boolean values", () => {
    expect(() => toMask([true, 0], 2, "test")).toThrow(InvalidResultTypeError);
    expect(() => toMask(7, 2, "test")).toThrow("test must produce a boolean mask, got number");
    expect(() => toMask(undefined, 2, "test")).toThrow(InvalidResultTypeError);
  });
});

describe("resolveMask", () => {
  const view = () => resolveBackend(sampleRows());

  it("reduces n-ary combinators from left to right", () => {
    const a = call((x: Column) => flags(1, 1, 0, 0).map((v, i) => v && x[i] !== undefined), ["a"]);
    const b = expr("b > c");
    const c = expr("a == 5");

    expect(resolveMask(and(a, b, c), view(), evaluator)).toEqual(flags(0, 0, 0, 0));
    expect(resolveMask(or(a, b, c), view(), evaluator)).toEqual(flags(1, 1, 1, 1));
    // parity: [1,1,0,0] ^ [1,0,1,1] ^ [0,0,0,1]
    expect(resolveMask(xor(a, b, c), view(), evaluator)).toEqual(flags(0, 1, 1, 0));
  });

  it("treats single-child combinators as their child", () => {
    const leaf = expr("a > 1");

    expect(resolveMask(and(leaf), view(), evaluator)).toEqual(flags(0, 0, 1, 1));
    expect(resolveMask(xor(leaf), view(), evaluator)).toEqual(flags(0, 0, 1, 1));
  });

  it("inverts with NOT and fills ALL", () => {
    expect(resolveMask(not(expr("a > 1")), view(), evaluator)).toEqual(flags(1, 1, 0, 0));
    expect(resolveMask(always(), resolveBackend(sampleTable()), evaluator)).toEqual(flags(1, 1, 1, 1));
  });

  it("evaluates a shared subtree independently against different tables", () => {
    const shared = expr("c > 0");
    const tree = or(and(shared, expr("a == 1")), not(shared));
    const other = [{ a: 1, c: -1 }, { a: 2, c: 2 }];

    expect(resolveMask(tree, view(), evaluator)).toEqual(flags(1, 1, 0, 1));
    expect(resolveMask(tree, resolveBackend(other), evaluator)).toEqual(flags(1, 0));
  });

  it("does not call the evaluator for an empty table", () => {
    const evaluate = vi.fn(() => []);
    const symbols = vi.fn(() => []);

    const out = resolveMask(expr("a > 1"), resolveBackend([]), {
      evaluate,
      symbols,
      variableNames: () => [],
    });

    expect(out).toEqual([]);
    expect(evaluate).not.toHaveBeenCalled();
    expect(symbols).not.toHaveBeenCalled();
  });

  it("names the failing leaf in result errors", () => {
    expect(() => resolveMask(expr("a * 2"), view(), evaluator)).toThrow(
      'Expression "a * 2" must produce a boolean mask, got an array containing number',
    );
  });
});

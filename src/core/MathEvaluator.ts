import { all, create } from "mathjs";
import type { MathNode } from "mathjs";
import { getConfig } from "../config.js";
import { ExpressionError } from "../errors.js";
import type { Column, ExpressionEvaluator, Namespace } from "../spi/types.js";
import { getLog } from "../utils/logger.js";
import { type CompiledExpression, type ExpressionCache, makeCache } from "./Cache.js";

const log = getLog("MathEvaluator");

// Names mathjs resolves to constants rather than to scope variables
const CONSTANTS = new Set([
  "e", "E", "pi", "PI", "tau", "phi", "i",
  "Infinity", "NaN", "LN2", "LN10", "LOG2E", "LOG10E", "SQRT1_2", "SQRT2",
]);

// `&`, `|` and `~` parse to these; on boolean arrays they yield 0/1 numbers
const BITWISE = new Set(["bitAnd", "bitOr", "bitNot"]);

/** Missing cells (null or undefined) become NaN, which compares false. */
function fillMissing(values: Column): Column {
  return values.some((v) => v === null || v === undefined)
    ? values.map((v) => v ?? Number.NaN)
    : values;
}

export interface MathEvaluatorOptions {
  /** Compiled expressions to keep; defaults to the configured size, 0 disables. */
  cacheSize?: number | undefined;
}

/**
 * ExpressionEvaluator backed by mathjs. Comparison, arithmetic, logical
 * and math functions apply element-wise to the column arrays in the
 * namespace.
 *
 * Conditions combine with the words `and`, `or`, `xor` and `not`:
 * `not (a > 3) and b > c`. The symbols `&`, `|` and `~` are bitwise
 * operators in mathjs, and an expression whose outermost operator is one
 * of them fails with an ExpressionError naming the logical form.
 *
 * Missing cells (null or undefined) are passed to mathjs as NaN, so `<`,
 * `>` and `==` on them are false.
 */
export class MathEvaluator implements ExpressionEvaluator {
  private readonly math = create(all, {});
  private readonly cache: ExpressionCache | undefined;

  constructor(options: MathEvaluatorOptions = {}) {
    this.cache = makeCache(options.cacheSize ?? getConfig().expressionCacheSize);
  }

  evaluate(expression: string, namespace: Namespace): unknown {
    const compiled = this.compile(expression);
    if (compiled.bitwise) {
      throw new ExpressionError(
        expression,
        new Error("'&', '|' and '~' are bitwise operators; combine conditions with 'and', 'or' and 'not'"),
      );
    }
    // Fresh scope per call: assignments inside an expression never reach the caller
    const scope = new Map<string, unknown>();
    for (const [name, values] of namespace) scope.set(name, fillMissing(values));
    let result: unknown;
    try {
      result = compiled.code.evaluate(scope);
    } catch (e) {
      throw new ExpressionError(expression, e);
    }
    return this.math.isMatrix(result) ? result.toArray() : result;
  }

  symbols(expression: string): string[] {
    return [...this.compile(expression).symbols];
  }

  variableNames(expression: string): string[] {
    return [...this.compile(expression).variables];
  }

  private compile(expression: string): CompiledExpression {
    const hit = this.cache?.get(expression);
    if (hit !== undefined) return hit;

    let node: MathNode;
    let compiled: CompiledExpression;
    try {
      node = this.math.parse(expression);
      compiled = {
        code: node.compile(),
        symbols: this.collectSymbols(node, true),
        variables: this.collectSymbols(node, false),
        bitwise: this.isBitwise(node),
      };
    } catch (e) {
      throw new ExpressionError(expression, e);
    }

    log.debugFormat("compiled expression %j", expression);
    this.cache?.set(expression, compiled);
    return compiled;
  }

  private isBitwise(node: MathNode): boolean {
    const { isOperatorNode, isParenthesisNode } = this.math;
    let outer = node;
    while (isParenthesisNode(outer)) outer = outer.content;
    return isOperatorNode(outer) && BITWISE.has(outer.fn);
  }

  private collectSymbols(node: MathNode, includeCallees: boolean): string[] {
    const { isFunctionNode, isSymbolNode } = this.math;
    const names = new Set<string>();
    node.traverse((child, _path, parent) => {
      if (!isSymbolNode(child)) return;
      if (!includeCallees) {
        if (parent !== null && isFunctionNode(parent) && parent.fn === child) return;
        if (CONSTANTS.has(child.name)) return;
      }
      names.add(child.name);
    });
    return [...names].sort();
  }
}

let shared: MathEvaluator | undefined;

/** Evaluator used when a call does not supply one. */
export function defaultEvaluator(): MathEvaluator {
  shared ??= new MathEvaluator();
  return shared;
}

import { LRUCache } from "lru-cache";
import type { EvalFunction } from "mathjs";

export interface CompiledExpression {
  readonly code: EvalFunction;
  /** Every identifier in the expression, callees included. */
  readonly symbols: readonly string[];
  /** Identifiers that are neither function callees nor engine constants. */
  readonly variables: readonly string[];
  /** Outermost operator is `&`, `|` or `~`. */
  readonly bitwise: boolean;
}

export type ExpressionCache = LRUCache<string, CompiledExpression>;

/** Compiled expressions keyed by their source text; undefined when max is 0. */
export function makeCache(max: number): ExpressionCache | undefined {
  if (max <= 0) return undefined;
  return new LRUCache<string, CompiledExpression>({
    max,
    allowStale: false,
  });
}

import { type Tabular, resolveBackend } from "../backends/resolve.js";
import { InvalidArgumentError, describeValue } from "../errors.js";
import { type ColumnFunction, type PredicateNode, always, and, not, or, xor } from "../filter/ast.js";
import { resolveMask } from "../filter/evaluate.js";
import { formatNode, nodeKey, nodesEqual } from "../filter/identity.js";
import { type QueryJson, parseCondition, parseQueryJson, toQueryJson } from "../filter/validate.js";
import type { EvaluationOptions, Mask, Row } from "../spi/types.js";
import type { DataFrame } from "../tables/DataFrame.js";
import type { Table } from "../tables/Table.js";
import { getLog } from "../utils/logger.js";
import { defaultEvaluator } from "./MathEvaluator.js";

const log = getLog("Query");

/** `[fn, column, ...columns]`: fn receives the named columns positionally. */
export type CallableCondition = readonly [ColumnFunction, string, ...string[]];

export type Condition = string | CallableCondition | Query;

function toNode(condition: Condition): PredicateNode {
  if (condition instanceof Query) return condition.root;
  return parseCondition(condition);
}

function requireQuery(other: unknown, operation: string): Query {
  if (!(other instanceof Query)) {
    throw new InvalidArgumentError(`${operation}() expects a Query, got ${describeValue(other)}`);
  }
  return other;
}

/**
 * Immutable predicate over the rows of a table.
 *
 * A Query is built from string expressions (evaluated column-wise by the
 * expression engine) and `[fn, ...columns]` tuples, and combined with
 * `and`, `or`, `xor` and `not`. Nothing about a table is resolved until
 * `mask`, `filter` or `count` is called, so one query can be applied to
 * any number of tables of any supported shape.
 *
 * @example
 * const q = new Query("a > 3").not().and(new Query("b > c"));
 * q.count(rows);   // rows with a <= 3 and b > c
 */
// Non-writable, like the frozen nodes it points to
function defineRoot(query: Query, node: PredicateNode): void {
  Object.defineProperty(query, "root", { value: node, enumerable: true, writable: false });
}

export class Query {
  declare readonly root: PredicateNode;
  private keyCache: string | undefined;

  /**
   * No conditions: matches every row. Several conditions: all must hold.
   * Throws InvalidArgumentError for anything that is not a string, a
   * callable tuple or a Query.
   */
  constructor(...conditions: Condition[]) {
    const nodes = conditions.map(toNode);
    const [first] = nodes;
    if (first === undefined) defineRoot(this, always());
    else if (nodes.length === 1) defineRoot(this, first);
    else defineRoot(this, and(...nodes));
  }

  /** Wraps an existing tree without re-validating it. */
  static fromNode(node: PredicateNode): Query {
    const q: Query = Object.create(Query.prototype);
    defineRoot(q, node);
    return q;
  }

  static fromJSON(input: unknown): Query {
    return Query.fromNode(parseQueryJson(input));
  }

  and(other: Query): Query {
    return Query.fromNode(and(this.root, requireQuery(other, "and").root));
  }

  or(other: Query): Query {
    return Query.fromNode(or(this.root, requireQuery(other, "or").root));
  }

  xor(other: Query): Query {
    return Query.fromNode(xor(this.root, requireQuery(other, "xor").root));
  }

  not(): Query {
    return Query.fromNode(not(this.root));
  }

  mask(table: Tabular, options: EvaluationOptions = {}): Mask {
    const view = resolveBackend(table);
    return resolveMask(this.root, view, options.evaluator ?? defaultEvaluator());
  }

  /** Values of one column for the rows that match. */
  filter(table: Tabular, column: string, options?: EvaluationOptions): unknown[];
  filter<R extends Row>(table: readonly R[], options?: EvaluationOptions): R[];
  filter(table: Table, options?: EvaluationOptions): Table;
  filter(table: DataFrame, options?: EvaluationOptions): DataFrame;
  filter(table: Tabular, options?: EvaluationOptions): Tabular;
  filter(
    table: Tabular,
    columnOrOptions?: string | EvaluationOptions,
    maybeOptions: EvaluationOptions = {},
  ): Tabular | unknown[] {
    const options = typeof columnOrOptions === "object" ? columnOrOptions : maybeOptions;
    const view = resolveBackend(table);
    const mask = resolveMask(this.root, view, options.evaluator ?? defaultEvaluator());
    if (typeof columnOrOptions === "string") {
      // An empty table has nothing to select, so the column is not looked up
      if (mask.length === 0) return [];
      return view.getColumn(columnOrOptions).filter((_, i) => mask[i] === true);
    }
    const selected = view.selectRows(mask);
    if (log.isDebug()) {
      log.debug("filtered table", {
        query: this.toString(),
        backend: view.kind,
        rows: mask.length,
        selected: countTrue(mask),
      });
    }
    return selected;
  }

  /** Positions of the matching rows, ascending. */
  where(table: Tabular, options?: EvaluationOptions): number[] {
    const positions: number[] = [];
    this.mask(table, options).forEach((hit, i) => {
      if (hit) positions.push(i);
    });
    return positions;
  }

  count(table: Tabular, options?: EvaluationOptions): number {
    return countTrue(this.mask(table, options));
  }

  /** Structural equality; semantically equivalent trees of different shape are not equal. */
  equals(other: unknown): boolean {
    return other instanceof Query && nodesEqual(this.root, other.root);
  }

  /** Stable key that agrees with equals(), for use in Maps and Sets. */
  hashKey(): string {
    this.keyCache ??= nodeKey(this.root);
    return this.keyCache;
  }

  /**
   * Column names the query refers to, sorted. Expressions are parsed here
   * (with the default evaluator unless one is given); functions and
   * engine constants are not listed.
   */
  variableNames(options: EvaluationOptions = {}): string[] {
    const evaluator = options.evaluator ?? defaultEvaluator();
    const names = new Set<string>();
    const visit = (node: PredicateNode): void => {
      switch (node.type) {
        case "ALL":
          return;
        case "EXPR":
          for (const name of evaluator.variableNames(node.expression)) names.add(name);
          return;
        case "CALL":
          for (const name of node.columns) names.add(name);
          return;
        case "NOT":
          visit(node.node);
          return;
        case "AND":
        case "OR":
        case "XOR":
          node.nodes.forEach(visit);
          return;
      }
    };
    visit(this.root);
    return [...names].sort();
  }

  toJSON(): QueryJson {
    return toQueryJson(this.root);
  }

  toString(): string {
    return formatNode(this.root);
  }
}

function countTrue(mask: Mask): number {
  let n = 0;
  for (const v of mask) if (v) n++;
  return n;
}

/** `new Query(...conditions).mask(table)` */
export function mask(table: Tabular, ...conditions: Condition[]): Mask {
  return new Query(...conditions).mask(table);
}

/** `new Query(...conditions).filter(table)` */
export function filter<R extends Row>(table: readonly R[], ...conditions: Condition[]): R[];
export function filter(table: Table, ...conditions: Condition[]): Table;
export function filter(table: DataFrame, ...conditions: Condition[]): DataFrame;
export function filter(table: Tabular, ...conditions: Condition[]): Tabular;
export function filter(table: Tabular, ...conditions: Condition[]): Tabular {
  return new Query(...conditions).filter(table);
}

/** `new Query(...conditions).count(table)` */
export function count(table: Tabular, ...conditions: Condition[]): number {
  return new Query(...conditions).count(table);
}

import type { TableView } from "../backends/resolve.js";
import {
  InvalidArgumentError,
  InvalidResultTypeError,
  ResultLengthMismatchError,
  describeValue,
} from "../errors.js";
import type { ExpressionEvaluator, Mask } from "../spi/types.js";
import type { PredicateNode } from "./ast.js";
import { formatNode } from "./identity.js";

type Reducer = (a: boolean, b: boolean) => boolean;

const REDUCERS: Record<"AND" | "OR" | "XOR", Reducer> = {
  AND: (a, b) => a && b,
  OR:  (a, b) => a || b,
  XOR: (a, b) => a !== b,
};

/**
 * Checks a leaf result against the table and returns it as a fresh mask.
 * A boolean scalar applies to every row.
 */
export function toMask(result: unknown, rows: number, source: string): Mask {
  if (typeof result === "boolean") return new Array<boolean>(rows).fill(result);
  if (!Array.isArray(result)) {
    throw new InvalidResultTypeError(source, describeValue(result));
  }
  if (result.length !== rows) {
    throw new ResultLengthMismatchError(source, rows, result.length);
  }
  const mask: Mask = [];
  for (const value of result) {
    if (typeof value !== "boolean") {
      throw new InvalidResultTypeError(source, `an array containing ${describeValue(value)}`);
    }
    mask.push(value);
  }
  return mask;
}

/**
 * Evaluates a predicate tree against one table. Leaves are resolved through
 * the table view (columns) and the evaluator (expressions); combinators fold
 * their children's masks element-wise from left to right.
 */
export function resolveMask(
  node: PredicateNode,
  table: TableView,
  evaluator: ExpressionEvaluator,
): Mask {
  const rows = table.rowCount();
  if (rows === 0) return [];

  const walk = (n: PredicateNode): Mask => {
    switch (n.type) {
      case "ALL":
        return new Array<boolean>(rows).fill(true);
      case "EXPR": {
        // Only columns the expression mentions are read
        const namespace = new Map(
          evaluator
            .symbols(n.expression)
            .filter((name) => table.hasColumn(name))
            .map((name) => [name, table.getColumn(name)] as const),
        );
        const result = evaluator.evaluate(n.expression, namespace);
        return toMask(result, rows, `Expression "${n.expression}"`);
      }
      case "CALL": {
        const args = n.columns.map((name) => table.getColumn(name));
        const result: unknown = Reflect.apply(n.fn, undefined, args);
        return toMask(result, rows, `Callable ${formatNode(n)}`);
      }
      case "NOT":
        return walk(n.node).map((v) => !v);
      case "AND":
      case "OR":
      case "XOR": {
        const reduce = REDUCERS[n.type];
        const [first, ...rest] = n.nodes.map(walk);
        if (first === undefined) throw new InvalidArgumentError(`${n.type} has no operands`);
        return rest.reduce((acc, mask) => acc.map((v, i) => reduce(v, mask[i] === true)), first);
      }
    }
  };

  return walk(node);
}

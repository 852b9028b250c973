import type { ColumnFunction, PredicateNode } from "./ast.js";

// Functions have no structural identity; each gets a number the first time it is keyed
const functionIds = new WeakMap<ColumnFunction, number>();
let nextFunctionId = 1;

function functionId(fn: ColumnFunction): number {
  let id = functionIds.get(fn);
  if (id === undefined) {
    id = nextFunctionId++;
    functionIds.set(fn, id);
  }
  return id;
}

/** Same tags, same leaf contents (functions by reference), same child order. */
export function nodesEqual(a: PredicateNode, b: PredicateNode): boolean {
  if (a === b) return true;
  switch (a.type) {
    case "ALL":
      return b.type === "ALL";
    case "EXPR":
      return b.type === "EXPR" && a.expression === b.expression;
    case "CALL":
      return (
        b.type === "CALL" &&
        a.fn === b.fn &&
        a.columns.length === b.columns.length &&
        a.columns.every((c, i) => c === b.columns[i])
      );
    case "NOT":
      return b.type === "NOT" && nodesEqual(a.node, b.node);
    case "AND":
    case "OR":
    case "XOR":
      return (
        b.type === a.type &&
        "nodes" in b &&
        a.nodes.length === b.nodes.length &&
        a.nodes.every((child, i) => {
          const other = b.nodes[i];
          return other !== undefined && nodesEqual(child, other);
        })
      );
  }
}

/**
 * Canonical string for a tree. Two trees get the same key exactly when
 * nodesEqual holds, so keys can stand in for queries in Maps and Sets.
 */
export function nodeKey(node: PredicateNode): string {
  switch (node.type) {
    case "ALL":
      return "ALL";
    case "EXPR":
      return `EXPR${JSON.stringify(node.expression)}`;
    case "CALL":
      return `CALL#${functionId(node.fn)}${JSON.stringify(node.columns)}`;
    case "NOT":
      return `NOT(${nodeKey(node.node)})`;
    case "AND":
    case "OR":
    case "XOR":
      return `${node.type}(${node.nodes.map(nodeKey).join(",")})`;
  }
}

const SYMBOLS = { AND: " & ", OR: " | ", XOR: " ^ " } as const;

/** Readable rendering, e.g. `(~(a > 3) & (b > c))`. */
export function formatNode(node: PredicateNode, nested = false): string {
  switch (node.type) {
    case "ALL":
      return "<all>";
    case "EXPR":
      return nested ? `(${node.expression})` : node.expression;
    case "CALL":
      return `${node.fn.name || "<fn>"}(${node.columns.join(", ")})`;
    case "NOT":
      return `~${formatNode(node.node, true)}`;
    case "AND":
    case "OR":
    case "XOR":
      return `(${node.nodes.map((child) => formatNode(child, true)).join(SYMBOLS[node.type])})`;
  }
}

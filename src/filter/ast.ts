import { InvalidArgumentError } from "../errors.js";

/**
 * Function applied to whole columns, one argument per named column.
 * Declared with `never[]` parameters so that functions over any concrete
 * column type are accepted; it is invoked through Reflect.apply.
 */
export type ColumnFunction = (...columns: never[]) => unknown;

export type Combinator = "AND" | "OR" | "XOR";

export type PredicateNode =
  | { readonly type: "ALL" }
  | { readonly type: "EXPR"; readonly expression: string }
  | { readonly type: "CALL"; readonly fn: ColumnFunction; readonly columns: readonly string[] }
  | { readonly type: Combinator; readonly nodes: readonly PredicateNode[] }
  | { readonly type: "NOT"; readonly node: PredicateNode };

export type NodeOf<K extends PredicateNode["type"]> = Extract<PredicateNode, { type: K }>;

const ALL: NodeOf<"ALL"> = Object.freeze({ type: "ALL" });

export const always = (): PredicateNode => ALL;

/** Expression text is kept verbatim; nothing is parsed until evaluation. */
export const expr = (expression: string): PredicateNode =>
  Object.freeze({ type: "EXPR", expression });

export function call(fn: ColumnFunction, columns: readonly string[]): PredicateNode {
  if (typeof fn !== "function") {
    throw new InvalidArgumentError("Callable condition needs a function");
  }
  if (columns.length === 0) {
    throw new InvalidArgumentError("Callable condition needs at least one column name");
  }
  for (const c of columns) {
    if (typeof c !== "string" || c === "") {
      throw new InvalidArgumentError(`Invalid column name: ${JSON.stringify(c)}`);
    }
  }
  // fn.length is 0 for rest parameters, which take any number of columns
  if (fn.length > 0 && fn.length !== columns.length) {
    throw new InvalidArgumentError(
      `Function ${fn.name || "<anonymous>"} takes ${fn.length} arguments but ${columns.length} columns were given`,
    );
  }
  return Object.freeze({ type: "CALL", fn, columns: Object.freeze([...columns]) });
}

function combine(type: Combinator, nodes: readonly PredicateNode[]): PredicateNode {
  if (nodes.length === 0) {
    throw new InvalidArgumentError(`${type} needs at least one operand`);
  }
  return Object.freeze({ type, nodes: Object.freeze([...nodes]) });
}

export const and = (...nodes: PredicateNode[]): PredicateNode => combine("AND", nodes);
export const or  = (...nodes: PredicateNode[]): PredicateNode => combine("OR", nodes);
export const xor = (...nodes: PredicateNode[]): PredicateNode => combine("XOR", nodes);
export const not = (node: PredicateNode): PredicateNode => Object.freeze({ type: "NOT", node });


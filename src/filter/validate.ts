import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";
import { type ColumnFunction, type PredicateNode, always, and, call, expr, not, or, xor } from "./ast.js";

/** Serializable form of a tree without callable leaves. */
export type QueryJson =
  | { type: "ALL" }
  | { type: "EXPR"; expression: string }
  | { type: "AND" | "OR" | "XOR"; nodes: QueryJson[] }
  | { type: "NOT"; node: QueryJson };

const ColumnNameSchema = z.string().min(1, "column names must be non-empty strings");

const ColumnFunctionSchema = z.custom<ColumnFunction>(
  (v) => typeof v === "function",
  { message: "the first element must be a function" },
);

const CallableConditionSchema = z
  .tuple([ColumnFunctionSchema, ColumnNameSchema])
  .rest(ColumnNameSchema);

const ConditionSchema = z.union([z.string(), CallableConditionSchema], {
  errorMap: () => ({
    message: "expected an expression string or a [function, column, ...columns] tuple",
  }),
});

const NodeSchema: z.ZodType<QueryJson> = z.lazy(() => z.union([
  z.object({ type: z.literal("ALL") }),
  z.object({ type: z.literal("EXPR"), expression: z.string() }),
  z.object({ type: z.enum(["AND", "OR", "XOR"]), nodes: z.array(NodeSchema).min(1) }),
  z.object({ type: z.literal("NOT"), node: NodeSchema }),
]));

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Turns one constructor argument (string or callable tuple) into a leaf. */
export function parseCondition(input: unknown): PredicateNode {
  const parsed = ConditionSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Not a valid query condition: ${describeIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  const condition = parsed.data;
  if (typeof condition === "string") return expr(condition);
  const [fn, ...columns] = condition;
  return call(fn, columns);
}

function fromJson(json: QueryJson): PredicateNode {
  switch (json.type) {
    case "ALL":
      return always();
    case "EXPR":
      return expr(json.expression);
    case "NOT":
      return not(fromJson(json.node));
    case "AND":
      return and(...json.nodes.map(fromJson));
    case "OR":
      return or(...json.nodes.map(fromJson));
    case "XOR":
      return xor(...json.nodes.map(fromJson));
  }
}

export function parseQueryJson(input: unknown): PredicateNode {
  const parsed = NodeSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Not a valid query tree: ${describeIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return fromJson(parsed.data);
}

export function toQueryJson(node: PredicateNode): QueryJson {
  switch (node.type) {
    case "ALL":
      return { type: "ALL" };
    case "EXPR":
      return { type: "EXPR", expression: node.expression };
    case "CALL":
      throw new InvalidArgumentError("Queries with callable conditions cannot be serialized");
    case "NOT":
      return { type: "NOT", node: toQueryJson(node.node) };
    case "AND":
    case "OR":
    case "XOR":
      return { type: node.type, nodes: node.nodes.map(toQueryJson) };
  }
}

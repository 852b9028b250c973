export { Query, count, filter, mask } from "./core/Query.js";
export type { CallableCondition, Condition } from "./core/Query.js";
export { QueryMaker } from "./core/QueryMaker.js";
export type { RangeBounds, Tolerance } from "./core/QueryMaker.js";
export { MathEvaluator, defaultEvaluator } from "./core/MathEvaluator.js";
export type { MathEvaluatorOptions } from "./core/MathEvaluator.js";

export { always, and, call, expr, not, or, xor } from "./filter/ast.js";
export type { ColumnFunction, Combinator, PredicateNode } from "./filter/ast.js";
export { resolveMask } from "./filter/evaluate.js";
export type { QueryJson } from "./filter/validate.js";

export { Table } from "./tables/Table.js";
export type { ColumnSource } from "./tables/Table.js";
export { DataFrame } from "./tables/DataFrame.js";
export type { DataFrameOptions, Label } from "./tables/DataFrame.js";

export { recordsBackend } from "./backends/records.js";
export type { RecordArray } from "./backends/records.js";
export { tableBackend } from "./backends/table.js";
export { frameBackend } from "./backends/frame.js";
export { resolveBackend } from "./backends/resolve.js";
export type { TableView, Tabular } from "./backends/resolve.js";

export type {
  BackendKind,
  Column,
  EvaluationOptions,
  ExpressionEvaluator,
  Mask,
  Namespace,
  Row,
  TableBackend,
} from "./spi/types.js";

export { getConfig, loadConfig } from "./config.js";
export type { QueryConfig } from "./config.js";

export {
  ColumnNotFoundError,
  ExpressionError,
  InvalidArgumentError,
  InvalidResultTypeError,
  QueryError,
  ResultLengthMismatchError,
  UnsupportedTableTypeError,
} from "./errors.js";

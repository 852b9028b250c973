// src/spi/types.ts

// ---------- Core value types ----------
/** One column of a table, in row order. */
export type Column = readonly unknown[];

/** One boolean per table row, true where the predicate holds. */
export type Mask = boolean[];

export type Row = Record<string, unknown>;

/** Column names mapped to their values, as handed to the expression evaluator. */
export type Namespace = ReadonlyMap<string, Column>;

// ---------- Backend adapter ----------
export type BackendKind = "records" | "table" | "frame";

/**
 * Column access and row selection for one tabular container shape.
 * Implementations never mutate the table they are given.
 */
export interface TableBackend<T> {
  readonly kind: BackendKind;
  matches(table: unknown): table is T;
  columnNames(table: T): string[];
  hasColumn(table: T, name: string): boolean;
  /** Throws ColumnNotFoundError when the column is absent. */
  getColumn(table: T, name: string): Column;
  /** New table of the same shape with the rows where mask[i] is true, in order. */
  selectRows(table: T, mask: Mask): T;
  rowCount(table: T): number;
}

// ---------- Expression evaluator ----------
/**
 * Vectorized expression engine. `evaluate` runs an expression over whole
 * columns and returns whatever the engine produced (a mask for comparisons).
 * Failures are reported as ExpressionError.
 */
export interface ExpressionEvaluator {
  evaluate(expression: string, namespace: Namespace): unknown;
  /** Every identifier the expression mentions, functions included. */
  symbols(expression: string): string[];
  /** Identifiers that name variables: no function callees, no engine constants. */
  variableNames(expression: string): string[];
}

export interface EvaluationOptions {
  evaluator?: ExpressionEvaluator | undefined;
}

import type { Column } from "../spi/types.js";
import { Query } from "./Query.js";

export interface RangeBounds {
  min?: number | undefined;
  max?: number | undefined;
  /** Defaults to true. */
  minInclusive?: boolean | undefined;
  /** Defaults to false. */
  maxInclusive?: boolean | undefined;
}

export interface Tolerance {
  rtol?: number | undefined;
  atol?: number | undefined;
}

const strings = (values: Column, test: (s: string) => boolean) =>
  values.map((v) => typeof v === "string" && test(v));

const numbers = (values: Column, test: (n: number) => boolean) =>
  values.map((v) => typeof v === "number" && test(v));

export function equals(column: string, value: unknown): Query {
  const isEqual = (values: Column) => values.map((v) => v === value);
  return new Query([isEqual, column]);
}

export function notEquals(column: string, value: unknown): Query {
  const isNotEqual = (values: Column) => values.map((v) => v !== value);
  return new Query([isNotEqual, column]);
}

export function contains(column: string, substring: string): Query {
  const containsText = (values: Column) => strings(values, (s) => s.includes(substring));
  return new Query([containsText, column]);
}

export function startsWith(column: string, prefix: string): Query {
  const hasPrefix = (values: Column) => strings(values, (s) => s.startsWith(prefix));
  return new Query([hasPrefix, column]);
}

export function endsWith(column: string, suffix: string): Query {
  const hasSuffix = (values: Column) => strings(values, (s) => s.endsWith(suffix));
  return new Query([hasSuffix, column]);
}

/** Membership by SameValueZero, so NaN matches NaN. */
export function isIn(column: string, values: Iterable<unknown>): Query {
  const members = new Set(values);
  const isMember = (cells: Column) => cells.map((v) => members.has(v));
  return new Query([isMember, column]);
}

/** Numeric range; a missing bound is open-ended. Non-numeric cells never match. */
export function inRange(column: string, bounds: RangeBounds): Query {
  const { min, max, minInclusive = true, maxInclusive = false } = bounds;
  const inBounds = (values: Column) =>
    numbers(values, (n) =>
      (min === undefined || (minInclusive ? n >= min : n > min)) &&
      (max === undefined || (maxInclusive ? n <= max : n < max)),
    );
  return new Query([inBounds, column]);
}

function isNotANumber(values: Column) {
  return numbers(values, Number.isNaN);
}

function isNumber(values: Column) {
  return numbers(values, (n) => !Number.isNaN(n));
}

function isFiniteNumber(values: Column) {
  return numbers(values, Number.isFinite);
}

function isSameValue(left: Column, right: Column) {
  return left.map((v, i) => v === right[i]);
}

export function isNaN(column: string): Query {
  return new Query([isNotANumber, column]);
}

/** Numeric cells other than NaN. */
export function isNotNaN(column: string): Query {
  return new Query([isNumber, column]);
}

export function isFinite(column: string): Query {
  return new Query([isFiniteNumber, column]);
}

/**
 * |x - other| <= atol + rtol * |other|, where `other` is a number or the
 * name of a second column compared row by row.
 */
export function isClose(column: string, other: number | string, tolerance: Tolerance = {}): Query {
  const { rtol = 1e-5, atol = 1e-8 } = tolerance;
  const near = (x: number, y: number) => Math.abs(x - y) <= atol + rtol * Math.abs(y);
  if (typeof other === "number") {
    const target = other;
    const isNear = (values: Column) => numbers(values, (n) => near(n, target));
    return new Query([isNear, column]);
  }
  const isNearColumn = (left: Column, right: Column) =>
    left.map((x, i) => {
      const y = right[i];
      return typeof x === "number" && typeof y === "number" && near(x, y);
    });
  return new Query([isNearColumn, column, other]);
}

/** Rows where two columns hold the same value (strict equality). */
export function equalColumns(left: string, right: string): Query {
  return new Query([isSameValue, left, right]);
}

/**
 * Reduces each row's values over `columns` and compares the result with
 * `value`, e.g. `reduceCompare(["a", "b"], (v) => Math.max(...v), (m, x) => m > x, 1)`.
 * Rows with a non-numeric cell in any of the columns never match.
 */
export function reduceCompare(
  columns: readonly [string, ...string[]],
  reduce: (values: number[]) => number,
  compare: (reduced: number, value: number) => boolean,
  value: number,
): Query {
  const reduceRows = (...cols: Column[]) =>
    (cols[0] ?? []).map((_, i) => {
      const row: number[] = [];
      for (const col of cols) {
        const cell = col[i];
        if (typeof cell !== "number") return false;
        row.push(cell);
      }
      return compare(reduce(row), value);
    });
  const [first, ...rest] = columns;
  return new Query([reduceRows, first, ...rest]);
}

/**
 * Ready-made queries. Factories without arguments beyond column names
 * (isNaN, isNotNaN, isFinite, equalColumns) share one function per kind, so
 * their queries compare equal. The others close over their arguments, and
 * two calls with the same arguments give queries that are not `equals`.
 */
export const QueryMaker = {
  equals,
  notEquals,
  contains,
  startsWith,
  endsWith,
  isIn,
  inRange,
  isNaN,
  isNotNaN,
  isFinite,
  isClose,
  equalColumns,
  reduceCompare,
};

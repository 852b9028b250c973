import { ColumnNotFoundError, InvalidArgumentError } from "../errors.js";
import type { Column, Mask, Row } from "../spi/types.js";
import { type ColumnSource, isColumnMap } from "./Table.js";

export type Label = string | number;

export interface DataFrameOptions {
  /** Row labels; defaults to 0..n-1. */
  index?: readonly Label[] | undefined;
  /** Column order; defaults to the order of the source. */
  columns?: readonly string[] | undefined;
}

/**
 * Column-labelled frame with a row index. Selecting rows keeps the
 * index labels of the rows that survive.
 */
export class DataFrame {
  readonly kind = "frame" as const;
  readonly index: readonly Label[];
  readonly columns: readonly string[];
  private readonly values: ReadonlyMap<string, Column>;

  constructor(data: ColumnSource, options: DataFrameOptions = {}) {
    const source = new Map<string, Column>(isColumnMap(data) ? data : Object.entries(data));
    const columns = options.columns ?? [...source.keys()];
    const duplicate = columns.find((label, i) => columns.indexOf(label) !== i);
    if (duplicate !== undefined) {
      throw new InvalidArgumentError(`Duplicate column label '${duplicate}'`);
    }
    const values = new Map<string, Column>();
    let length: number | undefined;

    for (const label of columns) {
      const column = source.get(label);
      if (column === undefined) throw new ColumnNotFoundError(label);
      if (!Array.isArray(column)) {
        throw new InvalidArgumentError(`Column '${label}' must be an array`);
      }
      if (length !== undefined && column.length !== length) {
        throw new InvalidArgumentError(
          `Column '${label}' has ${column.length} rows, expected ${length}`,
        );
      }
      length = column.length;
      values.set(label, Object.freeze([...column]));
    }

    const rows = length ?? options.index?.length ?? 0;
    const index = options.index ?? Array.from({ length: rows }, (_, i) => i);
    if (index.length !== rows) {
      throw new InvalidArgumentError(`Index has ${index.length} labels, frame has ${rows} rows`);
    }

    this.values = values;
    this.columns = Object.freeze([...columns]);
    this.index = Object.freeze([...index]);
  }

  static fromRecords(records: readonly Row[], options: DataFrameOptions = {}): DataFrame {
    const labels = new Set<string>(options.columns);
    for (const record of records) {
      for (const key of Object.keys(record)) labels.add(key);
    }
    const data = new Map<string, Column>(
      [...labels].map((label) => [label, records.map((record) => record[label] ?? null)]),
    );
    return new DataFrame(data, { index: options.index, columns: options.columns ?? [...labels] });
  }

  get length(): number {
    return this.index.length;
  }

  get shape(): [rows: number, columns: number] {
    return [this.index.length, this.columns.length];
  }

  has(label: string): boolean {
    return this.values.has(label);
  }

  get(label: string): Column {
    const column = this.values.get(label);
    if (column === undefined) throw new ColumnNotFoundError(label);
    return column;
  }

  /** Boolean-mask row selection. */
  loc(mask: Mask): DataFrame {
    if (mask.length !== this.length) {
      throw new InvalidArgumentError(`Mask has ${mask.length} entries, frame has ${this.length} rows`);
    }
    const keep = (_: unknown, i: number) => mask[i] === true;
    const data = new Map<string, Column>();
    for (const label of this.columns) data.set(label, this.get(label).filter(keep));
    return new DataFrame(data, { index: this.index.filter(keep), columns: this.columns });
  }

  toRecords(): Row[] {
    return this.index.map((_, i) => {
      const record: Row = {};
      for (const label of this.columns) record[label] = this.get(label)[i];
      return record;
    });
  }
}

import { ColumnNotFoundError, InvalidArgumentError } from "../errors.js";
import type { Column, Mask, Row } from "../spi/types.js";

export type ColumnSource = Readonly<Record<string, Column>> | ReadonlyMap<string, Column>;

export function isColumnMap(source: ColumnSource): source is ReadonlyMap<string, Column> {
  return source instanceof Map;
}

/**
 * Labelled table: named columns of equal length, kept in insertion order,
 * plus free-form metadata that travels with every derived table.
 */
export class Table {
  readonly kind = "table" as const;
  readonly length: number;
  readonly meta: Readonly<Record<string, unknown>>;
  private readonly data: ReadonlyMap<string, Column>;

  constructor(columns: ColumnSource, meta: Readonly<Record<string, unknown>> = {}) {
    const entries = isColumnMap(columns) ? [...columns] : Object.entries(columns);
    const data = new Map<string, Column>();
    let length: number | undefined;

    for (const [name, values] of entries) {
      if (!Array.isArray(values)) {
        throw new InvalidArgumentError(`Column '${name}' must be an array`);
      }
      if (length !== undefined && values.length !== length) {
        throw new InvalidArgumentError(
          `Column '${name}' has ${values.length} rows, expected ${length}`,
        );
      }
      length = values.length;
      data.set(name, Object.freeze([...values]));
    }

    this.data = data;
    this.length = length ?? 0;
    this.meta = Object.freeze({ ...meta });
  }

  /** Build a table from row objects; the column set is the union of their keys. */
  static fromRows(rows: readonly Row[], meta?: Readonly<Record<string, unknown>>): Table {
    const names: string[] = [];
    const seen = new Set<string>();
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          seen.add(key);
          names.push(key);
        }
      }
    }
    const columns = new Map<string, Column>(
      names.map((name) => [name, rows.map((row) => row[name] ?? null)]),
    );
    return new Table(columns, meta);
  }

  get columnNames(): string[] {
    return [...this.data.keys()];
  }

  has(name: string): boolean {
    return this.data.has(name);
  }

  column(name: string): Column {
    const values = this.data.get(name);
    if (values === undefined) throw new ColumnNotFoundError(name);
    return values;
  }

  /** Rows where mask[i] is true, same columns and metadata. */
  where(mask: Mask): Table {
    if (mask.length !== this.length) {
      throw new InvalidArgumentError(`Mask has ${mask.length} entries, table has ${this.length} rows`);
    }
    const columns = new Map<string, Column>();
    for (const [name, values] of this.data) {
      columns.set(name, values.filter((_, i) => mask[i] === true));
    }
    return new Table(columns, this.meta);
  }

  toRows(): Row[] {
    const rows: Row[] = [];
    for (let i = 0; i < this.length; i++) {
      const row: Row = {};
      for (const [name, values] of this.data) row[name] = values[i];
      rows.push(row);
    }
    return rows;
  }
}

import { ColumnNotFoundError, InvalidArgumentError } from "../errors.js";
import type { Column, Mask, Row, TableBackend } from "../spi/types.js";

/** Plain array of row objects, addressed by field name. */
export type RecordArray = readonly Row[];

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkMask(mask: Mask, rows: number) {
  if (mask.length !== rows) {
    throw new InvalidArgumentError(`Mask has ${mask.length} entries, table has ${rows} rows`);
  }
}

export const recordsBackend: TableBackend<RecordArray> = {
  kind: "records",

  matches(table: unknown): table is RecordArray {
    return Array.isArray(table) && table.every(isRow);
  },

  // Union of every row's own keys, in first-seen order
  columnNames(table) {
    const names = new Set<string>();
    for (const row of table) {
      for (const key of Object.keys(row)) names.add(key);
    }
    return [...names];
  },

  hasColumn(table, name) {
    return table.some((row) => Object.hasOwn(row, name));
  },

  getColumn(table, name) {
    if (!this.hasColumn(table, name)) throw new ColumnNotFoundError(name);
    const column: Column = table.map((row) => (Object.hasOwn(row, name) ? row[name] : null));
    return column;
  },

  selectRows(table, mask) {
    checkMask(mask, table.length);
    return table.filter((_, i) => mask[i] === true);
  },

  rowCount(table) {
    return table.length;
  },
};

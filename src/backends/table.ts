import { Table } from "../tables/Table.js";
import type { TableBackend } from "../spi/types.js";

export const tableBackend: TableBackend<Table> = {
  kind: "table",
  matches: (table: unknown): table is Table => table instanceof Table,
  columnNames: (table) => table.columnNames,
  hasColumn: (table, name) => table.has(name),
  getColumn: (table, name) => table.column(name),
  selectRows: (table, mask) => table.where(mask),
  rowCount: (table) => table.length,
};

import { DataFrame } from "../tables/DataFrame.js";
import type { TableBackend } from "../spi/types.js";

export const frameBackend: TableBackend<DataFrame> = {
  kind: "frame",
  matches: (table: unknown): table is DataFrame => table instanceof DataFrame,
  columnNames: (table) => [...table.columns],
  hasColumn: (table, name) => table.has(name),
  getColumn: (table, name) => table.get(name),
  selectRows: (table, mask) => table.loc(mask),
  rowCount: (table) => table.length,
};

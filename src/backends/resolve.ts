import { UnsupportedTableTypeError, describeValue } from "../errors.js";
import type { DataFrame } from "../tables/DataFrame.js";
import type { Table } from "../tables/Table.js";
import type { BackendKind, Column, Mask, TableBackend } from "../spi/types.js";
import { getLog } from "../utils/logger.js";
import { frameBackend } from "./frame.js";
import { type RecordArray, recordsBackend } from "./records.js";
import { tableBackend } from "./table.js";

const log = getLog("resolveBackend");

/** Every container shape a query can run against. */
export type Tabular = RecordArray | Table | DataFrame;

/** A table bound to the backend that understands it. */
export interface TableView {
  readonly kind: BackendKind;
  rowCount(): number;
  columnNames(): string[];
  hasColumn(name: string): boolean;
  getColumn(name: string): Column;
  selectRows(mask: Mask): Tabular;
}

function bind<T extends Tabular>(backend: TableBackend<T>, table: T): TableView {
  log.debugFormat("resolved %s backend (%d rows)", backend.kind, backend.rowCount(table));
  return {
    kind: backend.kind,
    rowCount: () => backend.rowCount(table),
    columnNames: () => backend.columnNames(table),
    hasColumn: (name) => backend.hasColumn(table, name),
    getColumn: (name) => backend.getColumn(table, name),
    selectRows: (mask) => backend.selectRows(table, mask),
  };
}

/** Tries records, then Table, then DataFrame; the first shape test that passes wins. */
export function resolveBackend(table: unknown): TableView {
  if (recordsBackend.matches(table)) return bind(recordsBackend, table);
  if (tableBackend.matches(table)) return bind(tableBackend, table);
  if (frameBackend.matches(table)) return bind(frameBackend, table);
  throw new UnsupportedTableTypeError(describeValue(table));
}


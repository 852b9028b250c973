import { describe, expect, it } from "vitest";
import { resolveBackend } from "../../src/backends/resolve.js";
import { ColumnNotFoundError, InvalidArgumentError, UnsupportedTableTypeError } from "../../src/errors.js";
import { DataFrame } from "../../src/tables/DataFrame.js";
import { Table } from "../../src/tables/Table.js";
import { sampleFrame, sampleRows, sampleTable } from "../fixtures.js";

describe("resolveBackend", () => {
  it.each([
    ["records", sampleRows()],
    ["table", sampleTable()],
    ["frame", sampleFrame()],
  ])("binds %s containers", (kind, table) => {
    const view = resolveBackend(table);

    expect(view.kind).toBe(kind);
    expect(view.rowCount()).toBe(4);
    expect(view.columnNames()).toEqual(["a", "b", "c"]);
    expect(view.hasColumn("b")).toBe(true);
    expect(view.hasColumn("d")).toBe(false);
    expect(view.getColumn("b")).toEqual([5, 1, 2, 5]);
    expect(() => view.getColumn("d")).toThrow(ColumnNotFoundError);
    expect(() => view.selectRows([true])).toThrow(InvalidArgumentError);
  });

  it("treats an empty array as an empty record array", () => {
    const view = resolveBackend([]);

    expect(view.kind).toBe("records");
    expect(view.rowCount()).toBe(0);
    expect(view.columnNames()).toEqual([]);
  });

  it.each([
    ["null", null, "null"],
    ["a number", 3, "number"],
    ["a column object", { a: [1, 2] }, "Object"],
    ["an array of scalars", [1, 2], "array(2)"],
    ["a map", new Map([["a", [1]]]), "Map"],
  ])("rejects %s", (_label, table, received) => {
    let error: unknown;
    try {
      resolveBackend(table);
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(UnsupportedTableTypeError);
    expect(error).toMatchObject({ received, message: `Unsupported table type: ${received}` });
  });
});

describe("records backend", () => {
  it("unions the keys of every row and fills gaps with null", () => {
    const view = resolveBackend([{ a: 1 }, { b: 2 }, { a: 3, c: undefined }]);

    expect(view.columnNames()).toEqual(["a", "b", "c"]);
    expect(view.getColumn("a")).toEqual([1, null, 3]);
    expect(view.getColumn("c")).toEqual([null, null, undefined]);
  });

  it("does not read inherited properties as columns", () => {
    const view = resolveBackend([{ a: 1 }]);

    expect(view.hasColumn("toString")).toBe(false);
    expect(() => view.getColumn("constructor")).toThrow(ColumnNotFoundError);
  });

  it("selects rows without copying them", () => {
    const rows = sampleRows();
    const selected = resolveBackend(rows).selectRows([false, true, false, true]);

    expect(selected).toEqual([rows[1], rows[3]]);
    expect(Array.isArray(selected) && selected[0]).toBe(rows[1]);
  });
});

describe("container backends", () => {
  it("keep table metadata on selection", () => {
    const selected = resolveBackend(sampleTable()).selectRows([true, false, false, true]);

    expect(selected).toBeInstanceOf(Table);
    expect(selected instanceof Table && selected.toRows()).toEqual([
      { a: 1, b: 5, c: 4.5 },
      { a: 5, b: 5, c: -3.5 },
    ]);
    expect(selected instanceof Table && selected.meta).toEqual({ source: "fixture" });
  });

  it("keep frame index labels on selection", () => {
    const selected = resolveBackend(sampleFrame()).selectRows([false, true, true, false]);

    expect(selected).toBeInstanceOf(DataFrame);
    expect(selected instanceof DataFrame && selected.index).toEqual(["x", "y"]);
  });
});

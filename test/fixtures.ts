import { DataFrame } from "../src/tables/DataFrame.js";
import { Table } from "../src/tables/Table.js";

export type Sample = { a: number; b: number; c: number };

/** Four rows used throughout the suite. */
export function sampleRows(): Sample[] {
  return [
    { a: 1, b: 5, c: 4.5 },
    { a: 1, b: 1, c: 6.2 },
    { a: 3, b: 2, c: 0.5 },
    { a: 5, b: 5, c: -3.5 },
  ];
}

export function sampleTable(): Table {
  return new Table(
    { a: [1, 1, 3, 5], b: [5, 1, 2, 5], c: [4.5, 6.2, 0.5, -3.5] },
    { source: "fixture" },
  );
}

export function sampleFrame(): DataFrame {
  return new DataFrame(
    { a: [1, 1, 3, 5], b: [5, 1, 2, 5], c: [4.5, 6.2, 0.5, -3.5] },
    { index: ["w", "x", "y", "z"] },
  );
}

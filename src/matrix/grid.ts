/**
 * Rectangular two-dimensional grids, stored row-major as `T[][]`.
 * Ragged input is rejected with `InvalidArgumentError`.
 */

import { sameValue } from "../core/compare";
import { IndexOutOfRangeError, InvalidArgumentError } from "../core/errors";
import { bounded, NonNegativeInt } from "../core/validate";
import type { Cell, Grid } from "../types";

export interface Dimensions {
  rows: number;
  columns: number;
}

export function dimensions<T>(grid: Grid<T>): Dimensions {
  const rows = grid.length;
  const columns = rows === 0 ? 0 : grid[0].length;
  const ragged = grid.findIndex((r) => r.length !== columns);
  if (ragged !== -1) {
    throw new InvalidArgumentError(`Row ${ragged} has ${grid[ragged].length} columns, expected ${columns}.`, "grid", { row: ragged });
  }
  return { rows, columns };
}

export function createGrid<T>(rows: number, columns: number, init: (row: number, column: number) => T): Grid<T> {
  bounded(NonNegativeInt, rows, "rows");
  bounded(NonNegativeInt, columns, "columns");
  return Array.from({ length: rows }, (_, r) => Array.from({ length: columns }, (_, c) => init(r, c)));
}

/** Visits every cell in row-major order. */
export function forEachCell<T>(grid: Grid<T>, f: (value: T, row: number, column: number) => void): void {
  dimensions(grid);
  grid.forEach((r, i) => r.forEach((v, j) => f(v, i, j)));
}

export function mapGrid<T, R>(grid: Grid<T>, f: (value: T, row: number, column: number) => R): Grid<R> {
  dimensions(grid);
  return grid.map((r, i) => r.map((v, j) => f(v, i, j)));
}

export function transpose<T>(grid: Grid<T>): Grid<T> {
  const { rows, columns } = dimensions(grid);
  return createGrid(columns, rows, (r, c) => grid[c][r]);
}

export function flattenGrid<T>(grid: Grid<T>): T[] {
  dimensions(grid);
  return grid.flat();
}

export function deepCopyGrid<T>(grid: Grid<T>): Grid<T> {
  dimensions(grid);
  return structuredClone(grid);
}

export function allEqualGrid<T>(grid: Grid<T>): boolean {
  const { rows, columns } = dimensions(grid);
  if (rows === 0 || columns === 0) throw new InvalidArgumentError("Grid is empty.", "grid");
  const first = grid[0][0];
  return grid.every((r) => r.every((v) => sameValue(v, first)));
}

export function countInGrid<T>(grid: Grid<T>, item: T): number {
  let n = 0;
  forEachCell(grid, (v) => {
    if (sameValue(v, item)) n++;
  });
  return n;
}

/** Overwrites every cell in place. */
export function fillGrid<T>(grid: Grid<T>, value: T): void {
  dimensions(grid);
  for (const r of grid) r.fill(value);
}

export function findFirstCell<T>(grid: Grid<T>, pred: (value: T) => boolean): Cell | undefined {
  dimensions(grid);
  for (let i = 0; i < grid.length; i++) {
    const j = grid[i].findIndex(pred);
    if (j !== -1) return [i, j];
  }
  return undefined;
}

export const gridContains = <T>(grid: Grid<T>, item: T): boolean => countInGrid(grid, item) > 0;

export function row<T>(grid: Grid<T>, index: number): T[] {
  const { rows } = dimensions(grid);
  if (!Number.isInteger(index) || index < 0 || index >= rows) {
    throw new IndexOutOfRangeError(`Row ${index} is outside [0, ${rows - 1}].`, "row", { index, rows });
  }
  return [...grid[index]];
}

export function column<T>(grid: Grid<T>, index: number): T[] {
  const { columns } = dimensions(grid);
  if (!Number.isInteger(index) || index < 0 || index >= columns) {
    throw new IndexOutOfRangeError(`Column ${index} is outside [0, ${columns - 1}].`, "column", { index, columns });
  }
  return grid.map((r) => r[index]);
}

/** `rows x columns` in, `columns x rows` out; the first row becomes the last column. */
export function rotateClockwise<T>(grid: Grid<T>): Grid<T> {
  const { rows, columns } = dimensions(grid);
  return createGrid(columns, rows, (r, c) => grid[rows - 1 - c][r]);
}

/** The first row becomes the first column, read bottom to top. */
export function rotateCounterClockwise<T>(grid: Grid<T>): Grid<T> {
  const { rows, columns } = dimensions(grid);
  return createGrid(columns, rows, (r, c) => grid[c][columns - 1 - r]);
}

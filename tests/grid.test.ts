import { describe, it, expect } from 'vitest';
import * as grid from '../src/matrix/grid';
import { IndexOutOfRangeError, InvalidArgumentError, OutOfRangeValueError } from '../src/core/errors';

const g = [
  [1, 2, 3],
  [4, 5, 6],
];

describe('shape', () => {
  it('reports dimensions', () => {
    expect(grid.dimensions(g)).toEqual({ rows: 2, columns: 3 });
    expect(grid.dimensions([])).toEqual({ rows: 0, columns: 0 });
  });

  it('rejects ragged rows', () => {
    expect(() => grid.dimensions([[1], [2, 3]])).toThrow(InvalidArgumentError);
    expect(() => grid.transpose([[1], [2, 3]])).toThrow('Row 1 has 2 columns, expected 1.');
  });

  it('creates from an initializer', () => {
    expect(grid.createGrid(2, 2, (r, c) => r * 2 + c)).toEqual([
      [0, 1],
      [2, 3],
    ]);
    expect(() => grid.createGrid(-1, 2, () => 0)).toThrow(OutOfRangeValueError);
  });
});

describe('reshaping', () => {
  it('transposes', () => {
    expect(grid.transpose(g)).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
    expect(grid.transpose([])).toEqual([]);
  });

  it('rotates clockwise and back', () => {
    expect(grid.rotateClockwise(g)).toEqual([
      [4, 1],
      [5, 2],
      [6, 3],
    ]);
    expect(grid.rotateCounterClockwise(g)).toEqual([
      [3, 6],
      [2, 5],
      [1, 4],
    ]);
    expect(grid.rotateCounterClockwise(grid.rotateClockwise(g))).toEqual(g);
  });

  it('four quarter turns restore the grid', () => {
    let r = g;
    for (let i = 0; i < 4; i++) r = grid.rotateClockwise(r);
    expect(r).toEqual(g);
  });

  it('flattens row-major', () => {
    expect(grid.flattenGrid(g)).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe('access', () => {
  it('rows and columns are copies', () => {
    const r = grid.row(g, 1);
    r[0] = 99;
    expect(r).toEqual([99, 5, 6]);
    expect(g[1][0]).toBe(4);
    expect(grid.column(g, 2)).toEqual([3, 6]);
  });

  it('rejects out-of-range rows and columns', () => {
    expect(() => grid.row(g, 2)).toThrow(IndexOutOfRangeError);
    expect(() => grid.column(g, 3)).toThrow('Column 3 is outside [0, 2].');
  });

  it('finds the first matching cell', () => {
    expect(grid.findFirstCell(g, (v) => v > 4)).toEqual([1, 1]);
    expect(grid.findFirstCell(g, (v) => v > 9)).toBeUndefined();
  });
});

describe('content', () => {
  it('counts and contains', () => {
    const h = [
      [1, 1],
      [2, 1],
    ];
    expect(grid.countInGrid(h, 1)).toBe(3);
    expect(grid.gridContains(h, 2)).toBe(true);
    expect(grid.gridContains(h, 3)).toBe(false);
  });

  it('allEqualGrid', () => {
    expect(grid.allEqualGrid([[7, 7], [7, 7]])).toBe(true);
    expect(grid.allEqualGrid(g)).toBe(false);
    expect(() => grid.allEqualGrid([])).toThrow(InvalidArgumentError);
  });

  it('maps with coordinates and visits in row-major order', () => {
    expect(grid.mapGrid(g, (v, r, c) => `${r}${c}:${v}`)[1]).toEqual(['10:4', '11:5', '12:6']);
    const seen: number[] = [];
    grid.forEachCell(g, (v) => seen.push(v));
    expect(seen).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('fills in place and deep-copies', () => {
    const h = grid.deepCopyGrid(g);
    grid.fillGrid(h, 0);
    expect(h).toEqual([
      [0, 0, 0],
      [0, 0, 0],
    ]);
    expect(g[0]).toEqual([1, 2, 3]);
  });
});

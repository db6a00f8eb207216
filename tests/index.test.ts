import { describe, it, expect } from 'vitest';
import * as arraykit from '../src/index';

describe('public surface', () => {
  it('exports generic helpers flat and under a namespace', () => {
    expect(arraykit.chunk([1, 2, 3], 2)).toEqual([[1, 2], [3]]);
    expect(arraykit.generic.rotateLeft([1, 2, 3], 1)).toEqual([2, 3, 1]);
  });

  it('exports typed groups as namespaces', () => {
    expect(arraykit.stats.median([3, 1, 2])).toBe(2);
    expect(arraykit.booleans.countTrue([true, false])).toBe(1);
    expect(arraykit.guids.isGuid('00000000-0000-0000-0000-000000000000')).toBe(true);
    expect(arraykit.DayOfWeek.Friday).toBe(5);
  });

  it('exposes errors through attempt', () => {
    const r = arraykit.attempt(() => arraykit.slice([1, 2, 3], 2, 1));
    expect(arraykit.isErr(r) && r.code).toBe('invalid_argument');
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import {
  mean,
  median,
  percentile,
  variance,
  standardDeviation,
  skewness,
  kurtosis,
  range,
  normalize,
  standardize,
  correlation,
  findOutliers,
  movingAverage,
  roundAll,
  allFinite,
  removeNonFinite,
  cumulativeSum,
  diff,
  localMaxima,
  localMinima,
} from '../src/numeric/stats';
import { configure, resetConfig } from '../src/core/config';
import { InvalidArgumentError, LengthMismatchError, OutOfRangeValueError } from '../src/core/errors';

const spread = [2, 4, 4, 4, 5, 5, 7, 9];

describe('central tendency', () => {
  it('mean and median', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it('median stays finite near the top of the double range', () => {
    expect(median([Number.MAX_VALUE, Number.MAX_VALUE])).toBe(Number.MAX_VALUE);
  });

  it('rejects empty input', () => {
    expect(() => mean([])).toThrow(InvalidArgumentError);
    expect(() => median([])).toThrow('Array is empty.');
  });
});

describe('percentile', () => {
  it('interpolates between neighbours', () => {
    expect(percentile([1, 2, 3, 4, 5], 50)).toBe(3);
    expect(percentile([1, 2, 3, 4], 50)).toBe(2.5);
    expect(percentile([5, 1, 4, 2, 3], 0)).toBe(1);
    expect(percentile([5, 1, 4, 2, 3], 100)).toBe(5);
  });

  it('agrees with median at p = 50', () => {
    expect(percentile([9, 2, 7, 4, 5], 50)).toBe(median([9, 2, 7, 4, 5]));
    expect(percentile([9, 2, 7, 4], 50)).toBeCloseTo(median([9, 2, 7, 4]), 12);
  });

  it('bounds p to [0, 100]', () => {
    expect(() => percentile([1, 2], 101)).toThrow(OutOfRangeValueError);
    expect(() => percentile([1, 2], -1)).toThrow('Percentile must be between 0 and 100.');
  });
});

describe('dispersion and shape', () => {
  it('population variance and standard deviation', () => {
    expect(variance(spread)).toBe(4);
    expect(standardDeviation(spread)).toBe(2);
  });

  it('skewness and kurtosis', () => {
    expect(skewness([1, 2, 3])).toBeCloseTo(0, 12);
    expect(kurtosis([1, 2, 3])).toBeCloseTo(-1.5, 12);
  });

  it('returns 0 for constant data', () => {
    expect(skewness([5, 5, 5])).toBe(0);
    expect(kurtosis([5, 5, 5])).toBe(0);
  });

  it('range', () => {
    expect(range([3, 9, 1])).toBe(8);
  });

  it('range and normalize scan arrays too long to spread into arguments', () => {
    const xs = Array.from({ length: 300_000 }, (_, i) => i);
    expect(range(xs)).toBe(299_999);
    const scaled = normalize(xs);
    expect(scaled).toHaveLength(300_000);
    expect(scaled[0]).toBe(0);
    expect(scaled[299_999]).toBe(1);
  });
});

describe('scaling', () => {
  it('normalize maps into [0, 1]', () => {
    expect(normalize([2, 4, 6])).toEqual([0, 0.5, 1]);
    expect(normalize([3, 3])).toEqual([0, 0]);
  });

  it('standardize produces z-scores', () => {
    expect(standardize(spread)[0]).toBe(-1.5);
    expect(standardize([1, 1])).toEqual([0, 0]);
  });
});

describe('correlation', () => {
  it('is 1 for a perfect linear relation', () => {
    expect(correlation([1, 2, 3], [2, 4, 6])).toBe(1);
  });

  it('is 0 when one side is constant', () => {
    expect(correlation([1, 2, 3], [5, 5, 5])).toBe(0);
  });

  it('requires equal lengths', () => {
    expect(() => correlation([1, 2], [1])).toThrow(LengthMismatchError);
  });
});

describe('findOutliers', () => {
  afterEach(() => resetConfig());

  it('uses 1.5 x IQR by default', () => {
    expect(findOutliers([1, 2, 3, 4, 100])).toEqual([100]);
  });

  it('takes an explicit factor', () => {
    expect(findOutliers([1, 2, 3, 4, 100], 100)).toEqual([]);
  });

  it('falls back to the configured factor', () => {
    configure({ outlierFactor: 50 });
    expect(findOutliers([1, 2, 3, 4, 100])).toEqual([]);
  });
});

describe('movingAverage', () => {
  it('averages a centred window clipped at the edges', () => {
    expect(movingAverage([1, 2, 3, 4, 5], 3)).toEqual([1.5, 2, 3, 4, 4.5]);
    expect(movingAverage([1, 2, 3], 1)).toEqual([1, 2, 3]);
  });

  it('rejects windows outside 1..n', () => {
    expect(() => movingAverage([1, 2, 3], 0)).toThrow(OutOfRangeValueError);
    expect(() => movingAverage([1, 2, 3], 4)).toThrow('Window must be between 1 and 3.');
  });
});

describe('roundAll', () => {
  it('rounds half to even', () => {
    expect(roundAll([2.5, 3.5, -2.5, 0.5], 0)).toEqual([2, 4, -2, 0]);
    expect(roundAll([1.005, 1.015], 2)).toEqual([1, 1.02]);
  });

  it('passes non-finite values through', () => {
    expect(roundAll([Infinity, NaN], 1)).toEqual([Infinity, NaN]);
  });

  it('rejects negative decimals', () => {
    expect(() => roundAll([1], -1)).toThrow(OutOfRangeValueError);
  });
});

describe('sequence helpers', () => {
  it('finite checks', () => {
    expect(allFinite([1, 2])).toBe(true);
    expect(allFinite([1, NaN])).toBe(false);
    expect(removeNonFinite([1, NaN, Infinity, 2, -Infinity])).toEqual([1, 2]);
  });

  it('cumulative sums and differences', () => {
    expect(cumulativeSum([1, 2, 3])).toEqual([1, 3, 6]);
    expect(diff([1, 4, 9])).toEqual([3, 5]);
    expect(diff([1])).toEqual([]);
  });

  it('local extrema by index', () => {
    expect(localMaxima([1, 3, 2, 5, 4])).toEqual([1, 3]);
    expect(localMinima([1, 3, 2, 5, 4])).toEqual([2]);
  });
});

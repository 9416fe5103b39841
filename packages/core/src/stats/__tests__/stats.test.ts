import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { max, mean, median, min, stdev } from '../stats.js';

describe('stats', () => {
  it('median takes the middle value or averages the two middle values', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([7])).toBe(7);
  });

  it('mean averages the values', () => {
    expect(mean([1, 2, 3, 6])).toBe(3);
  });

  it('stdev uses the sample (n - 1) denominator', () => {
    expect(stdev([1, 1.5, 2])).toBe(0.5);
    expect(stdev([2, 4])).toBeCloseTo(Math.SQRT2, 12);
  });

  it('min and max scan arrays too long to spread into arguments', () => {
    const values = Array.from({ length: 300_000 }, (_, index) => index % 1000);
    values[123_456] = -5;
    expect(min(values)).toBe(-5);
    expect(max(values)).toBe(999);
  });

  it('rejects inputs that are too short', () => {
    expect(() => min([])).toThrow('min() requires a non-empty array');
    expect(() => max([])).toThrow('max() requires a non-empty array');
    expect(() => mean([])).toThrow('mean() requires a non-empty array');
    expect(() => median([])).toThrow('median() requires a non-empty array');
    expect(() => stdev([1])).toThrow('stdev() requires at least two values');
  });

  it('median stays within the sample range', () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: -1e6, max: 1e6, noNaN: true }), {
          minLength: 1,
          maxLength: 50,
        }),
        (values) => {
          const m = median(values);
          expect(m).toBeGreaterThanOrEqual(Math.min(...values));
          expect(m).toBeLessThanOrEqual(Math.max(...values));
        }
      )
    );
  });

  it('stdev of identical values is zero', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -1000, max: 1000 }),
        fc.integer({ min: 2, max: 20 }),
        (value, count) => {
          expect(stdev(new Array<number>(count).fill(value))).toBe(0);
        }
      )
    );
  });
});

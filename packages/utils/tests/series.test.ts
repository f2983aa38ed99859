import { describe, it, expect } from '@jest/globals';
import {
  InsufficientOverlapError,
  InvalidConfigurationError,
  PriceSeries,
  SeriesMisalignmentError
} from '@quantbench/types';
import {
  alignOnIntersection,
  alignWithMinimumOverlap,
  assertAligned,
  assertPriceSeries,
  equityToReturns,
  logReturns,
  returnsToEquity,
  simpleReturns
} from '../src/series';

function series(closes: number[], timestamps = closes.map((_, i) => i + 1)): PriceSeries {
  return {
    symbol: 'TEST',
    bars: closes.map((close, i) => ({ timestamp: timestamps[i], open: close, high: close, low: close, close, volume: 0 }))
  };
}

describe('series', () => {
  describe('returns', () => {
    it('should start simple returns at the second bar', () => {
      const returns = simpleReturns(series([100, 110, 99]));

      expect(returns.kind).toBe('simple');
      expect(returns.timestamps).toEqual([2, 3]);
      expect(returns.values[0]).toBeCloseTo(0.1, 12);
      expect(returns.values[1]).toBeCloseTo(-0.1, 12);
    });

    it('should compute log returns', () => {
      const returns = logReturns(series([100, 200]));
      expect(returns.kind).toBe('log');
      expect(returns.values).toEqual([Math.log(2)]);
    });

    it('should report zero returns after equity reaches zero', () => {
      const returns = equityToReturns({ baseValue: 100, ruinedAt: 2, timestamps: [1, 2, 3], values: [100, 0, 0] });
      expect(returns.values).toEqual([-1, 0]);
    });
  });

  describe('returnsToEquity', () => {
    it('should compound from the origin bar and floor at zero', () => {
      const curve = returnsToEquity({ timestamps: [1, 2, 3], values: [0.1, -2, 0.5] }, 100, 0);

      expect(curve.timestamps).toEqual([0, 1, 2, 3]);
      expect(curve.values[1]).toBeCloseTo(110, 10);
      expect(curve.values.slice(2)).toEqual([0, 0]);
      expect(curve.ruinedAt).toBe(2);
    });

    it('should require the origin to precede the first return', () => {
      expect(() => returnsToEquity({ timestamps: [1, 2], values: [0.1, 0.1] }, 100, 1))
        .toThrow(SeriesMisalignmentError);
    });

    it('should reject a non-positive base value', () => {
      expect(() => returnsToEquity({ timestamps: [1], values: [0.1] }, 0, 0)).toThrow(InvalidConfigurationError);
    });
  });

  describe('validation', () => {
    it('should reject repeated timestamps', () => {
      expect(() => assertPriceSeries(series([100, 101], [5, 5]))).toThrow(SeriesMisalignmentError);
    });

    it('should reject non-positive closes', () => {
      expect(() => assertPriceSeries(series([100, 0]))).toThrow(InvalidConfigurationError);
    });

    it('should locate the first mismatched timestamp', () => {
      try {
        assertAligned([1, 2, 3], [1, 2, 4]);
        throw new Error('expected misalignment');
      } catch (error) {
        expect(error).toBeInstanceOf(SeriesMisalignmentError);
        if (error instanceof SeriesMisalignmentError) {
          expect([error.reason, error.index, error.expected, error.actual]).toEqual(['timestamp', 2, 3, 4]);
        }
      }
    });

    it('should reject arrays of different length', () => {
      expect(() => assertAligned([1, 2], [1])).toThrow(SeriesMisalignmentError);
    });
  });

  describe('alignment', () => {
    const a = { timestamps: [1, 2, 3, 5], values: [10, 20, 30, 50] };
    const b = { timestamps: [2, 3, 4, 5], values: [0.2, 0.3, 0.4, 0.5] };

    it('should keep only shared timestamps', () => {
      expect(alignOnIntersection([a, b])).toEqual({
        timestamps: [2, 3, 5],
        columns: [[20, 30, 50], [0.2, 0.3, 0.5]]
      });
    });

    it('should return nothing for disjoint series', () => {
      const c = { timestamps: [7, 8], values: [1, 1] };
      expect(alignOnIntersection([a, c]).timestamps).toEqual([]);
    });

    it('should enforce a minimum overlap', () => {
      expect(() => alignWithMinimumOverlap([a, b], 4, 'pair')).toThrow(InsufficientOverlapError);
      expect(alignWithMinimumOverlap([a, b], 3, 'pair').timestamps).toEqual([2, 3, 5]);
    });
  });
});

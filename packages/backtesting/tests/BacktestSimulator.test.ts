import { describe, it, expect } from '@jest/globals';
import {
  InsufficientHistoryError,
  InvalidConfigurationError,
  PositionSeries,
  SeriesMisalignmentError
} from '@quantbench/types';
import { equityToReturns, timestampsOf } from '@quantbench/utils';
import { generatePositions } from '@quantbench/strategy';
import { DAY_MS, priceSeriesFromCloses, randomWalkPrices } from '@quantbench/testing';
import { simulate } from '../src/BacktestSimulator';
import { maxDrawdown } from '../src/PerformanceMetrics';

function constantPositions(timestamps: number[], weight: number): PositionSeries {
  return {
    strategy: 'fixed',
    warmupIndex: 0,
    timestamps,
    values: timestamps.map(() => weight)
  };
}

describe('BacktestSimulator', () => {
  describe('compounding', () => {
    it('should reproduce the four-bar buy and hold scenario', () => {
      const prices = priceSeriesFromCloses([100, 102, 101, 105]);
      const positions = generatePositions(prices, { kind: 'buy_and_hold', params: {} });
      const curve = simulate(prices, positions, 100);

      expect(positions.values).toEqual([1, 1, 1, 1]);
      expect(curve.values[0]).toBe(100);
      expect(curve.values[1]).toBeCloseTo(102, 10);
      expect(curve.values[2]).toBeCloseTo(101, 10);
      expect(curve.values[3]).toBeCloseTo(105, 10);
      expect(maxDrawdown(curve.values)).toBeCloseTo(101 / 102 - 1, 10);
      expect(curve.ruinedAt).toBeNull();
    });

    it('should equal the cumulative product of one plus each simple return when fully invested', () => {
      const prices = randomWalkPrices(250, { seed: 'compounding', stdDev: 0.02 });
      const curve = simulate(prices, constantPositions(timestampsOf(prices), 1), 1);

      let expected = 1;
      for (let t = 1; t < prices.bars.length; t++) {
        expected *= 1 + (prices.bars[t].close / prices.bars[t - 1].close - 1);
        expect(curve.values[t]).toBe(expected);
      }
    });

    it('should apply the previous bar position to the current bar return', () => {
      const prices = priceSeriesFromCloses([100, 110, 121]);
      const positions: PositionSeries = {
        strategy: 'fixed',
        warmupIndex: 0,
        timestamps: timestampsOf(prices),
        values: [0, 1, 0]
      };
      const curve = simulate(prices, positions, 100);

      // Flat over the first move, long over the second
      expect(curve.values[1]).toBe(100);
      expect(curve.values[2]).toBeCloseTo(110, 10);
    });

    it('should keep equity constant while positions are flat', () => {
      const prices = priceSeriesFromCloses([100, 90, 120, 80]);
      const curve = simulate(prices, constantPositions(timestampsOf(prices), 0), 50);

      expect(curve.values).toEqual([50, 50, 50, 50]);
    });
  });

  describe('ruin', () => {
    it('should floor equity at zero and stop compounding', () => {
      const prices = priceSeriesFromCloses([100, 200, 300, 150]);
      const timestamps = timestampsOf(prices);
      const curve = simulate(prices, constantPositions(timestamps, -1), 100);

      expect(curve.values).toEqual([100, 0, 0, 0]);
      expect(curve.ruinedAt).toBe(timestamps[1]);
      expect(equityToReturns(curve).values).toEqual([-1, 0, 0]);
      expect(maxDrawdown(curve.values)).toBe(-1);
    });
  });

  describe('validation', () => {
    it('should reject positions on different timestamps', () => {
      const prices = priceSeriesFromCloses([100, 101, 102]);
      const shifted = timestampsOf(prices).map(ts => ts + DAY_MS);

      expect(() => simulate(prices, constantPositions(shifted, 1), 100)).toThrow(SeriesMisalignmentError);
    });

    it('should report the length mismatch when positions are shorter than prices', () => {
      const prices = priceSeriesFromCloses([100, 101, 102]);
      const positions = constantPositions(timestampsOf(prices).slice(0, 2), 1);

      try {
        simulate(prices, positions, 100);
        throw new Error('expected simulate to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(SeriesMisalignmentError);
        if (error instanceof SeriesMisalignmentError) {
          expect(error.reason).toBe('length');
          expect(error.expected).toBe(3);
          expect(error.actual).toBe(2);
        }
      }
    });

    it('should reject a non-positive base value', () => {
      const prices = priceSeriesFromCloses([100, 101]);
      expect(() => simulate(prices, constantPositions(timestampsOf(prices), 1), 0)).toThrow(InvalidConfigurationError);
    });

    it('should reject an empty price series', () => {
      const prices = priceSeriesFromCloses([]);
      expect(() => simulate(prices, constantPositions([], 1), 100)).toThrow(InsufficientHistoryError);
    });
  });
});

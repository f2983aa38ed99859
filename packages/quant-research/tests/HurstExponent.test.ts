import { describe, it, expect } from '@jest/globals';
import { InsufficientHistoryError, InvalidConfigurationError } from '@quantbench/types';
import { randomReturns } from '@quantbench/testing';
import {
  DEFAULT_HURST_CONFIG,
  defaultWindowSizes,
  differencingAdvice,
  estimateHurst,
  interpretHurst,
  rescaledRange
} from '../src/analytics/HurstExponent';

describe('HurstExponent', () => {
  it('should use powers of two up to a quarter of the sample', () => {
    expect(defaultWindowSizes(100, 8)).toEqual([8, 16]);
    expect(defaultWindowSizes(4096, 8)).toEqual([8, 16, 32, 64, 128, 256, 512, 1024]);
  });

  it('should refuse samples below the minimum length', () => {
    expect(() => estimateHurst(randomReturns(99, { seed: 'short' }))).toThrow(InsufficientHistoryError);
  });

  it('should treat a sample too short for two default windows as insufficient history', () => {
    const config = { ...DEFAULT_HURST_CONFIG, minLength: 30 };
    const estimate = () => estimateHurst(randomReturns(40, { seed: 'hurst-short-windows' }), config);

    expect(estimate).toThrow(InsufficientHistoryError);
    expect(estimate).toThrow('Hurst exponent: requires 64 observations, 40 available');
  });

  it('should report a degenerate 0.5 for a flat series', () => {
    const result = estimateHurst(new Array<number>(200).fill(0.001));

    expect(result.hurst).toBe(0.5);
    expect(result.degenerate).toBe(true);
    expect(result.interpretation).toBe('random_walk');
  });

  it('should place independent returns near the random-walk band', () => {
    const result = estimateHurst(randomReturns(4096, { seed: 'hurst-iid' }));

    expect(result.degenerate).toBe(false);
    expect(result.points).toHaveLength(8);
    expect(result.hurst).toBeGreaterThan(0.35);
    expect(result.hurst).toBeLessThan(0.75);
    expect(result.rSquared).toBeGreaterThan(0.8);
  });

  it('should find strong persistence in an integrated series', () => {
    const increments = randomReturns(2048, { seed: 'hurst-walk' });
    const levels: number[] = [];
    let level = 0;
    for (const step of increments) {
      level += step;
      levels.push(level);
    }
    const result = estimateHurst(levels);

    expect(result.hurst).toBeGreaterThan(0.8);
    expect(result.interpretation).toBe('trending');
    expect(result.differencing.suggestedOrder).toBe('fractional');
  });

  it('should honour explicit window sizes', () => {
    const returns = randomReturns(200, { seed: 'hurst-explicit' });
    const result = estimateHurst(returns, { ...DEFAULT_HURST_CONFIG, windowSizes: [10, 20, 40, 10] });

    expect(result.points.map(p => p.windowSize)).toEqual([10, 20, 40]);
    expect(result.points[0].chunks).toBe(20);
  });

  it('should need two usable window sizes', () => {
    const returns = randomReturns(200, { seed: 'hurst-sizes' });
    expect(() => estimateHurst(returns, { ...DEFAULT_HURST_CONFIG, windowSizes: [8, 500] }))
      .toThrow(InvalidConfigurationError);
  });

  it('should compute R/S on one chunk by hand', () => {
    // mean 0; cumulative deviations 1, 0, 1, 0 give range 1; population std 1
    const point = rescaledRange([1, -1, 1, -1], 4);
    expect(point).toEqual({ windowSize: 4, chunks: 1, rescaledRange: 1 });
  });

  it('should map estimates onto the configured bands', () => {
    const bands = DEFAULT_HURST_CONFIG.bands;
    expect(interpretHurst(0.6, bands)).toBe('trending');
    expect(interpretHurst(0.5, bands)).toBe('random_walk');
    expect(interpretHurst(0.55, bands)).toBe('random_walk');
    expect(interpretHurst(0.4, bands)).toBe('mean_reverting');
  });

  it('should recommend a differencing order per band', () => {
    expect(differencingAdvice('trending')).toEqual({
      suggestedOrder: 'fractional',
      recommendation: 'Series is persistent; consider fractional differencing with d < 1'
    });
    expect(differencingAdvice('mean_reverting').suggestedOrder).toBe('none');
    expect(differencingAdvice('random_walk').suggestedOrder).toBe('first');
  });
});

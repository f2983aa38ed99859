import { describe, it, expect } from '@jest/globals';
import * as ss from 'simple-statistics';
import { RegimeConfig } from '@quantbench/config';
import { InsufficientHistoryError, RegimeLabel } from '@quantbench/types';
import { randomReturns, returnSeriesFrom } from '@quantbench/testing';
import { DEFAULT_REGIME_CONFIG, detectRegimes, smoothLabels } from '../src/analysis/RegimeDetector';

const { BULL, BEAR, SIDEWAYS, HIGH_VOLATILITY } = RegimeLabel;

// Four five-bar blocks: steady gains, steady losses, flat, violent chop
const FOUR_REGIMES = [
  0.01, 0.01, 0.01, 0.01, 0.01,
  -0.01, -0.01, -0.01, -0.01, -0.01,
  0, 0, 0, 0, 0,
  0.05, -0.05, 0.05, -0.05, 0.05
];

const BLOCK_CONFIG: RegimeConfig = {
  window: 5,
  step: 5,
  trendThreshold: 0.001,
  volatility: { mode: 'absolute', threshold: 0.02 },
  minPersistence: 1
};

describe('RegimeDetector', () => {
  it('should label each window from its mean and volatility', () => {
    const series = returnSeriesFrom(FOUR_REGIMES);
    const { windows, summary } = detectRegimes(series, BLOCK_CONFIG);

    expect(windows.map(w => w.label)).toEqual([BULL, BEAR, SIDEWAYS, HIGH_VOLATILITY]);
    expect(windows.map(w => [w.start, w.end])).toEqual([[0, 5], [5, 10], [10, 15], [15, 20]]);
    expect(windows[1].startTimestamp).toBe(series.timestamps[5]);
    expect(windows[1].endTimestamp).toBe(series.timestamps[9]);
    expect(summary.counts[BULL]).toBe(1);
    expect(summary.shares[HIGH_VOLATILITY]).toBe(0.25);
    expect(summary.current).toBe(HIGH_VOLATILITY);
    expect(summary.volatilityThreshold).toBe(0.02);
  });

  it('should slide windows by the configured step', () => {
    const { windows } = detectRegimes(returnSeriesFrom(FOUR_REGIMES), { ...BLOCK_CONFIG, step: 1 });
    expect(windows).toHaveLength(16);
  });

  it('should derive a relative threshold from the median window volatility', () => {
    const series = returnSeriesFrom(randomReturns(300, { seed: 'regimes', stdDev: 0.01 }));
    const { windows, summary } = detectRegimes(series, {
      ...DEFAULT_REGIME_CONFIG,
      window: 20,
      volatility: { mode: 'relative', multiplier: 1.2 }
    });

    expect(summary.volatilityThreshold).toBeCloseTo(1.2 * ss.median(windows.map(w => w.volatility)), 15);
    for (const window of windows) {
      expect(window.label === HIGH_VOLATILITY).toBe(window.volatility > summary.volatilityThreshold);
    }
  });

  it('should smooth labels only when persistence is configured', () => {
    const { windows } = detectRegimes(returnSeriesFrom(FOUR_REGIMES), { ...BLOCK_CONFIG, minPersistence: 2 });

    expect(windows.map(w => w.rawLabel)).toEqual([BULL, BEAR, SIDEWAYS, HIGH_VOLATILITY]);
    expect(windows.map(w => w.label)).toEqual([BULL, BULL, BULL, BULL]);
  });

  it('should switch only after a label persists', () => {
    expect(smoothLabels([BULL, BULL, BEAR, BULL, BEAR, BEAR], 2)).toEqual([BULL, BULL, BULL, BULL, BULL, BEAR]);
    expect(smoothLabels([BULL, BEAR, BULL], 1)).toEqual([BULL, BEAR, BULL]);
  });

  it('should require one full window', () => {
    expect(() => detectRegimes(returnSeriesFrom([0.01, 0.02]), BLOCK_CONFIG)).toThrow(InsufficientHistoryError);
  });
});

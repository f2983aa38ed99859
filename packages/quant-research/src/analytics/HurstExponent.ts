/**
 * Hurst exponent by rescaled-range (R/S) analysis.
 *
 * For each window size s the series is cut into floor(n / s) non-overlapping
 * chunks. Per chunk, R is the range of the cumulative mean-adjusted sum and
 * S the population standard deviation; R/S is averaged over chunks with
 * S > 0. H is the least-squares slope of log(R/S) against log(s).
 */

import * as ss from 'simple-statistics';
import { HurstConfig, parseAnalysisConfig } from '@quantbench/config';
import { InsufficientHistoryError, InvalidConfigurationError } from '@quantbench/types';
import { windowRanges } from '@quantbench/utils';

export type HurstInterpretation = 'trending' | 'random_walk' | 'mean_reverting';

export interface DifferencingAdvice {
  /** Order of differencing suggested before modelling; 1 is plain returns */
  suggestedOrder: 'fractional' | 'none' | 'first';
  recommendation: string;
}

const DIFFERENCING_ADVICE: Record<HurstInterpretation, DifferencingAdvice> = {
  trending: {
    suggestedOrder: 'fractional',
    recommendation: 'Series is persistent; consider fractional differencing with d < 1'
  },
  mean_reverting: {
    suggestedOrder: 'none',
    recommendation: 'Series is anti-persistent and already stationary'
  },
  random_walk: {
    suggestedOrder: 'first',
    recommendation: 'Series is close to a random walk; first differences are enough'
  }
};

export interface RescaledRangePoint {
  windowSize: number;
  chunks: number;
  rescaledRange: number;
}

export interface HurstResult {
  hurst: number;
  interpretation: HurstInterpretation;
  differencing: DifferencingAdvice;
  rSquared: number;
  intercept: number;
  observations: number;
  points: RescaledRangePoint[];
  /** True when fewer than two window sizes had non-zero dispersion */
  degenerate: boolean;
}

export const DEFAULT_HURST_CONFIG: HurstConfig = parseAnalysisConfig().hurst;

/**
 * Powers of two from `minWindow` up to n / 4.
 */
export function defaultWindowSizes(length: number, minWindow: number): number[] {
  const sizes: number[] = [];
  for (let size = minWindow; size <= Math.floor(length / 4); size *= 2) {
    sizes.push(size);
  }
  return sizes;
}

export function interpretHurst(hurst: number, bands: HurstConfig['bands']): HurstInterpretation {
  if (hurst > bands.trendingAbove) return 'trending';
  if (hurst < bands.meanRevertingBelow) return 'mean_reverting';
  return 'random_walk';
}

export function differencingAdvice(interpretation: HurstInterpretation): DifferencingAdvice {
  return DIFFERENCING_ADVICE[interpretation];
}

function chunkRescaledRange(values: readonly number[], start: number, end: number): number | null {
  const size = end - start;
  let mean = 0;
  let flat = true;
  for (let i = start; i < end; i++) {
    mean += values[i];
    flat = flat && values[i] === values[start];
  }
  if (flat) {
    return null;
  }
  mean /= size;

  let cumulative = 0;
  let max = -Infinity;
  let min = Infinity;
  let squares = 0;
  for (let i = start; i < end; i++) {
    const deviation = values[i] - mean;
    cumulative += deviation;
    max = Math.max(max, cumulative);
    min = Math.min(min, cumulative);
    squares += deviation * deviation;
  }

  const std = Math.sqrt(squares / size);
  if (std === 0) {
    return null;
  }
  return (max - min) / std;
}

export function rescaledRange(values: readonly number[], windowSize: number): RescaledRangePoint | null {
  const ratios: number[] = [];
  for (const { start, end } of windowRanges(values.length, windowSize, windowSize)) {
    const ratio = chunkRescaledRange(values, start, end);
    if (ratio !== null) {
      ratios.push(ratio);
    }
  }
  if (ratios.length === 0) {
    return null;
  }
  return { windowSize, chunks: ratios.length, rescaledRange: ss.mean(ratios) };
}

export function estimateHurst(returns: readonly number[], config: HurstConfig = DEFAULT_HURST_CONFIG): HurstResult {
  const n = returns.length;
  if (n < config.minLength) {
    throw new InsufficientHistoryError(config.minLength, n, 'Hurst exponent');
  }

  if (!config.windowSizes && n < 8 * config.minWindow) {
    // two default windows need minWindow * 2 <= n / 4
    throw new InsufficientHistoryError(8 * config.minWindow, n, 'Hurst exponent');
  }

  const sizes = config.windowSizes
    ? [...new Set(config.windowSizes)].filter(size => size <= n).sort((a, b) => a - b)
    : defaultWindowSizes(n, config.minWindow);
  if (sizes.length < 2) {
    throw new InvalidConfigurationError(
      'hurst.windowSizes',
      `Hurst estimation needs at least two window sizes not exceeding ${n} observations`
    );
  }

  const points = sizes
    .map(size => rescaledRange(returns, size))
    .filter((point): point is RescaledRangePoint => point !== null && point.rescaledRange > 0);

  if (points.length < 2) {
    return {
      hurst: 0.5,
      interpretation: 'random_walk',
      differencing: differencingAdvice('random_walk'),
      rSquared: 0,
      intercept: 0,
      observations: n,
      points,
      degenerate: true
    };
  }

  const logPoints = points.map(p => [Math.log(p.windowSize), Math.log(p.rescaledRange)]);
  const fit = ss.linearRegression(logPoints);
  const rSquared = ss.rSquared(logPoints, ss.linearRegressionLine(fit));
  const interpretation = interpretHurst(fit.m, config.bands);

  return {
    hurst: fit.m,
    interpretation,
    differencing: differencingAdvice(interpretation),
    rSquared,
    intercept: fit.b,
    observations: n,
    points,
    degenerate: false
  };
}

import * as ss from 'simple-statistics';
import { InvalidConfigurationError, TimeSeries } from '@quantbench/types';
import { alignWithMinimumOverlap, isConstant, meanOf, sampleStd, sampleVar } from '@quantbench/utils';

export const DEFAULT_MIN_OVERLAP = 20;

export interface BenchmarkOptions {
  periodsPerYear: number;
  riskFreeRate?: number;
  /** Fewest shared timestamps accepted before InsufficientOverlap */
  minOverlap?: number;
}

export interface BenchmarkStatistics {
  overlap: number;
  beta: number;
  /** Per-period alpha: mean(asset) - beta * mean(benchmark) */
  alpha: number;
  annualizedAlpha: number;
  correlation: number;
  trackingError: number;
  informationRatio: number;
  treynorRatio: number;
}

export interface PairedReturns {
  timestamps: number[];
  asset: number[];
  benchmark: number[];
}

/**
 * Intersect an asset and a benchmark series, requiring `minOverlap` common
 * observations.
 */
export function pairWithBenchmark(asset: TimeSeries, benchmark: TimeSeries, minOverlap = DEFAULT_MIN_OVERLAP): PairedReturns {
  const { timestamps, columns } = alignWithMinimumOverlap([asset, benchmark], minOverlap, 'benchmark comparison');
  return { timestamps, asset: columns[0], benchmark: columns[1] };
}

/**
 * Sample covariance over benchmark sample variance; 0 for a flat benchmark.
 */
export function beta(asset: readonly number[], benchmark: readonly number[]): number {
  const variance = sampleVar(benchmark);
  if (variance === 0 || isConstant(asset)) {
    return 0;
  }
  return ss.sampleCovariance([...asset], [...benchmark]) / variance;
}

export function alpha(asset: readonly number[], benchmark: readonly number[]): number {
  return meanOf(asset) - beta(asset, benchmark) * meanOf(benchmark);
}

function activeReturns(asset: readonly number[], benchmark: readonly number[]): number[] {
  return asset.map((r, i) => r - benchmark[i]);
}

export function trackingError(asset: readonly number[], benchmark: readonly number[], periodsPerYear: number): number {
  return sampleStd(activeReturns(asset, benchmark)) * Math.sqrt(periodsPerYear);
}

export function informationRatio(asset: readonly number[], benchmark: readonly number[], periodsPerYear: number): number {
  const error = trackingError(asset, benchmark, periodsPerYear);
  if (error === 0) {
    return 0;
  }
  return (meanOf(activeReturns(asset, benchmark)) * periodsPerYear) / error;
}

function compoundAnnualGrowth(returns: readonly number[], periodsPerYear: number): number {
  if (returns.length === 0) return 0;
  const growth = returns.reduce((acc, r) => acc * (1 + r), 1);
  if (growth <= 0) return -1;
  return Math.pow(growth, periodsPerYear / returns.length) - 1;
}

/**
 * Compound annual excess return per unit of beta; 0 when beta is 0.
 */
export function treynorRatio(
  asset: readonly number[],
  benchmark: readonly number[],
  periodsPerYear: number,
  riskFreeRate = 0
): number {
  const b = beta(asset, benchmark);
  if (b === 0) {
    return 0;
  }
  return (compoundAnnualGrowth(asset, periodsPerYear) - riskFreeRate) / b;
}

export function pearsonCorrelation(x: readonly number[], y: readonly number[]): number {
  if (x.length < 2 || isConstant(x) || isConstant(y)) {
    return 0;
  }
  return Math.max(-1, Math.min(1, ss.sampleCorrelation([...x], [...y])));
}

export function computeBenchmarkStatistics(
  asset: TimeSeries,
  benchmark: TimeSeries,
  options: BenchmarkOptions
): BenchmarkStatistics {
  if (!(options.periodsPerYear > 0)) {
    throw new InvalidConfigurationError('periodsPerYear', `periodsPerYear must be positive, got ${options.periodsPerYear}`);
  }
  const paired = pairWithBenchmark(asset, benchmark, options.minOverlap);
  const a = paired.asset;
  const b = paired.benchmark;
  const periodAlpha = alpha(a, b);

  return {
    overlap: paired.timestamps.length,
    beta: beta(a, b),
    alpha: periodAlpha,
    annualizedAlpha: periodAlpha * options.periodsPerYear,
    correlation: pearsonCorrelation(a, b),
    trackingError: trackingError(a, b, options.periodsPerYear),
    informationRatio: informationRatio(a, b, options.periodsPerYear),
    treynorRatio: treynorRatio(a, b, options.periodsPerYear, options.riskFreeRate)
  };
}

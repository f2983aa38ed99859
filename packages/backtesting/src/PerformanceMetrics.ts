/**
 * Return and risk statistics over an equity curve or a return series.
 *
 * Every function is pure. Degenerate inputs never produce NaN or Infinity:
 * zero variance gives 0, unbounded ratios give the signed RATIO_SENTINEL,
 * and an unfinished drawdown reports NOT_RECOVERED.
 */

import * as ss from 'simple-statistics';
import {
  EquityCurve,
  InvalidConfigurationError,
  MetricMap,
  NOT_RECOVERED,
  NotRecovered,
  RATIO_SENTINEL,
  TimeSeries
} from '@quantbench/types';
import {
  ZERO_VARIANCE_TOLERANCE,
  equityToReturns,
  isConstant,
  meanOf,
  rollingMoments,
  sampleStd
} from '@quantbench/utils';

export interface MetricsOptions {
  /** Sampling frequency of the series: 252 for daily bars, 12 for monthly */
  periodsPerYear: number;
  /** Annual risk-free rate, converted to a per-period rate internally */
  riskFreeRate?: number;
}

export interface PerformanceMetrics {
  periods: number;
  totalReturn: number;
  annualizedReturn: number;
  annualizedVolatility: number;
  sharpeRatio: number;
  sortinoRatio: number;
  calmarRatio: number;
  maxDrawdown: number;
  currentDrawdown: number;
  recoveryPeriods: number | NotRecovered;
  winRate: number;
  profitFactor: number;
  ulcerIndex: number;
  recoveryFactor: number;
  skewness: number;
  kurtosis: number;
  tailRatio: number;
}

export interface DrawdownPeriod {
  peakIndex: number;
  troughIndex: number;
  /** Index at which equity regained the peak, null while still under water */
  recoveryIndex: number | null;
  startTimestamp: number;
  troughTimestamp: number;
  recoveryTimestamp: number | null;
  depth: number;
}

function assertPeriodsPerYear(periodsPerYear: number): void {
  if (!Number.isFinite(periodsPerYear) || periodsPerYear <= 0) {
    throw new InvalidConfigurationError('periodsPerYear', `periodsPerYear must be positive, got ${periodsPerYear}`);
  }
}

function signedSentinel(value: number): number {
  if (value > 0) return RATIO_SENTINEL;
  if (value < 0) return -RATIO_SENTINEL;
  return 0;
}

function perPeriodRate(options: MetricsOptions): number {
  return (options.riskFreeRate ?? 0) / options.periodsPerYear;
}

// ============================================================================
// Return-based metrics
// ============================================================================

export function totalReturn(equity: readonly number[]): number {
  if (equity.length < 2) return 0;
  return equity[equity.length - 1] / equity[0] - 1;
}

/**
 * Compound annual growth: (final / initial)^(periodsPerYear / n) - 1, with n
 * the number of return periods.
 */
export function annualizedReturn(equity: readonly number[], periodsPerYear: number): number {
  assertPeriodsPerYear(periodsPerYear);
  const periods = equity.length - 1;
  if (periods <= 0) return 0;

  const growth = equity[equity.length - 1] / equity[0];
  if (growth <= 0) return -1;
  return Math.pow(growth, periodsPerYear / periods) - 1;
}

export function annualizedVolatility(returns: readonly number[], periodsPerYear: number): number {
  assertPeriodsPerYear(periodsPerYear);
  return sampleStd(returns) * Math.sqrt(periodsPerYear);
}

export function sharpeRatio(returns: readonly number[], options: MetricsOptions): number {
  assertPeriodsPerYear(options.periodsPerYear);
  const std = sampleStd(returns);
  if (std === 0) return 0;

  const excess = meanOf(returns) - perPeriodRate(options);
  return (excess / std) * Math.sqrt(options.periodsPerYear);
}

/**
 * Root-mean-square shortfall below `target` over the whole sample. Periods at
 * or above the target contribute zero, so any single loss makes it positive.
 */
export function downsideDeviation(returns: readonly number[], target = 0): number {
  if (returns.length === 0) return 0;
  const squares = returns.reduce((sum, r) => sum + Math.min(r - target, 0) ** 2, 0);
  return Math.sqrt(squares / returns.length);
}

export function sortinoRatio(returns: readonly number[], options: MetricsOptions): number {
  assertPeriodsPerYear(options.periodsPerYear);
  if (returns.length === 0) return 0;

  const rate = perPeriodRate(options);
  const excess = meanOf(returns) - rate;
  if (!returns.some(r => r < rate)) {
    return signedSentinel(excess);
  }
  const downside = downsideDeviation(returns, rate);
  return (excess / downside) * Math.sqrt(options.periodsPerYear);
}

export function winRate(returns: readonly number[]): number {
  if (returns.length === 0) return 0;
  return returns.filter(r => r > 0).length / returns.length;
}

export function profitFactor(returns: readonly number[]): number {
  let gains = 0;
  let losses = 0;
  for (const r of returns) {
    if (r > 0) gains += r;
    else if (r < 0) losses -= r;
  }
  if (losses === 0) return RATIO_SENTINEL;
  return gains / losses;
}

export function skewness(returns: readonly number[]): number {
  if (returns.length < 3 || isConstant(returns)) return 0;
  return ss.sampleSkewness([...returns]);
}

/**
 * Sample excess kurtosis.
 */
export function kurtosis(returns: readonly number[]): number {
  if (returns.length < 4 || isConstant(returns)) return 0;
  return ss.sampleKurtosis([...returns]);
}

/**
 * 95th percentile over the magnitude of the 5th percentile.
 */
export function tailRatio(returns: readonly number[]): number {
  if (returns.length === 0) return 0;
  const sorted = [...returns].sort((a, b) => a - b);
  const right = ss.quantileSorted(sorted, 0.95);
  const left = Math.abs(ss.quantileSorted(sorted, 0.05));
  if (left === 0) return signedSentinel(right);
  return right / left;
}

/**
 * Annualised Sharpe over each trailing window. Element k belongs to
 * `returns.timestamps[k + window - 1]`.
 */
export function rollingSharpe(returns: TimeSeries, window: number, options: MetricsOptions): TimeSeries {
  assertPeriodsPerYear(options.periodsPerYear);
  const { means, variances } = rollingMoments(returns.values, window, 1);
  const rate = perPeriodRate(options);
  const scale = Math.sqrt(options.periodsPerYear);

  return {
    timestamps: returns.timestamps.slice(window - 1),
    values: means.map((mean, k) =>
      variances[k] <= ZERO_VARIANCE_TOLERANCE ? 0 : ((mean - rate) / Math.sqrt(variances[k])) * scale
    )
  };
}

// ============================================================================
// Drawdown metrics
// ============================================================================

/**
 * equity[t] / max(equity[0..t]) - 1 for every t; always within [-1, 0].
 */
export function drawdownSeries(equity: readonly number[]): number[] {
  const out: number[] = [];
  let peak = -Infinity;
  for (const value of equity) {
    peak = Math.max(peak, value);
    out.push(peak > 0 ? value / peak - 1 : 0);
  }
  return out;
}

export function maxDrawdown(equity: readonly number[]): number {
  return drawdownSeries(equity).reduce((worst, dd) => Math.min(worst, dd), 0);
}

export function currentDrawdown(equity: readonly number[]): number {
  const series = drawdownSeries(equity);
  return series.length > 0 ? series[series.length - 1] : 0;
}

/**
 * Periods from the deepest trough until equity regains the peak that
 * preceded it. Closing exactly at the old peak counts as recovered, matching
 * `drawdownSeries`, where that bar's drawdown is 0. 0 when there is no
 * drawdown at all.
 */
export function recoveryPeriods(equity: readonly number[]): number | NotRecovered {
  const drawdowns = drawdownSeries(equity);
  let trough = -1;
  let worst = 0;
  for (let t = 0; t < drawdowns.length; t++) {
    if (drawdowns[t] < worst) {
      worst = drawdowns[t];
      trough = t;
    }
  }
  if (trough < 0) return 0;

  let peak = -Infinity;
  for (let t = 0; t <= trough; t++) {
    peak = Math.max(peak, equity[t]);
  }
  for (let t = trough + 1; t < equity.length; t++) {
    if (equity[t] >= peak) {
      return t - trough;
    }
  }
  return NOT_RECOVERED;
}

export function calmarRatio(equity: readonly number[], periodsPerYear: number): number {
  const cagr = annualizedReturn(equity, periodsPerYear);
  const mdd = maxDrawdown(equity);
  if (mdd === 0) return signedSentinel(cagr);
  return cagr / Math.abs(mdd);
}

/**
 * Root-mean-square drawdown, as a fraction.
 */
export function ulcerIndex(equity: readonly number[]): number {
  const series = drawdownSeries(equity);
  if (series.length === 0) return 0;
  return Math.sqrt(series.reduce((sum, dd) => sum + dd * dd, 0) / series.length);
}

export function recoveryFactor(equity: readonly number[]): number {
  const total = totalReturn(equity);
  const mdd = maxDrawdown(equity);
  if (mdd === 0) return signedSentinel(total);
  return total / Math.abs(mdd);
}

/**
 * Every peak-to-recovery episode of an equity curve, in chronological order.
 */
export function drawdownPeriods(curve: TimeSeries): DrawdownPeriod[] {
  const { timestamps, values } = curve;
  const periods: DrawdownPeriod[] = [];
  let peakIndex = 0;
  let current: DrawdownPeriod | null = null;

  for (let t = 0; t < values.length; t++) {
    if (values[t] >= values[peakIndex]) {
      if (current) {
        current.recoveryIndex = t;
        current.recoveryTimestamp = timestamps[t];
        periods.push(current);
        current = null;
      }
      peakIndex = t;
      continue;
    }

    const depth = values[t] / values[peakIndex] - 1;
    if (!current) {
      current = {
        peakIndex,
        troughIndex: t,
        recoveryIndex: null,
        startTimestamp: timestamps[peakIndex],
        troughTimestamp: timestamps[t],
        recoveryTimestamp: null,
        depth
      };
    } else if (depth < current.depth) {
      current.depth = depth;
      current.troughIndex = t;
      current.troughTimestamp = timestamps[t];
    }
  }

  if (current) {
    periods.push(current);
  }
  return periods;
}

// ============================================================================
// Aggregate
// ============================================================================

export function computePerformanceMetrics(curve: EquityCurve, options: MetricsOptions): PerformanceMetrics {
  assertPeriodsPerYear(options.periodsPerYear);
  const equity = curve.values;
  const returns = equityToReturns(curve).values;

  return {
    periods: returns.length,
    totalReturn: totalReturn(equity),
    annualizedReturn: annualizedReturn(equity, options.periodsPerYear),
    annualizedVolatility: annualizedVolatility(returns, options.periodsPerYear),
    sharpeRatio: sharpeRatio(returns, options),
    sortinoRatio: sortinoRatio(returns, options),
    calmarRatio: calmarRatio(equity, options.periodsPerYear),
    maxDrawdown: maxDrawdown(equity),
    currentDrawdown: currentDrawdown(equity),
    recoveryPeriods: recoveryPeriods(equity),
    winRate: winRate(returns),
    profitFactor: profitFactor(returns),
    ulcerIndex: ulcerIndex(equity),
    recoveryFactor: recoveryFactor(equity),
    skewness: skewness(returns),
    kurtosis: kurtosis(returns),
    tailRatio: tailRatio(returns)
  };
}

/**
 * Flatten metrics into the name -> value mapping handed to presentation.
 */
export function toMetricMap(metrics: PerformanceMetrics): MetricMap {
  return { ...metrics };
}

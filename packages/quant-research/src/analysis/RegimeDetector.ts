import * as ss from 'simple-statistics';
import { RegimeConfig, parseAnalysisConfig } from '@quantbench/config';
import { InsufficientHistoryError, RegimeLabel, ReturnSeries } from '@quantbench/types';
import { ZERO_VARIANCE_TOLERANCE, rollingMoments, windowRanges } from '@quantbench/utils';

export interface RegimeWindow {
  /** Index range into the return series, end exclusive */
  start: number;
  end: number;
  startTimestamp: number;
  endTimestamp: number;
  meanReturn: number;
  volatility: number;
  label: RegimeLabel;
  /** Label before persistence smoothing */
  rawLabel: RegimeLabel;
}

export interface RegimeSummary {
  windows: number;
  volatilityThreshold: number;
  counts: Record<RegimeLabel, number>;
  shares: Record<RegimeLabel, number>;
  current: RegimeLabel;
}

export interface RegimeAnalysis {
  windows: RegimeWindow[];
  summary: RegimeSummary;
}

export const DEFAULT_REGIME_CONFIG: RegimeConfig = parseAnalysisConfig().regime;

function classify(mean: number, volatility: number, volatilityThreshold: number, trendThreshold: number): RegimeLabel {
  if (volatility > volatilityThreshold) return RegimeLabel.HIGH_VOLATILITY;
  if (mean > trendThreshold) return RegimeLabel.BULL;
  if (mean < -trendThreshold) return RegimeLabel.BEAR;
  return RegimeLabel.SIDEWAYS;
}

/**
 * Hold the previous label until a new one has been seen in `minPersistence`
 * consecutive windows. Only windows at or before each position are read.
 */
export function smoothLabels(raw: readonly RegimeLabel[], minPersistence: number): RegimeLabel[] {
  const smoothed: RegimeLabel[] = [];
  for (let i = 0; i < raw.length; i++) {
    if (i === 0 || minPersistence <= 1) {
      smoothed.push(raw[i]);
      continue;
    }
    let persistent = i >= minPersistence - 1;
    for (let k = i - minPersistence + 1; persistent && k < i; k++) {
      persistent = raw[k] === raw[i];
    }
    smoothed.push(persistent ? raw[i] : smoothed[i - 1]);
  }
  return smoothed;
}

/**
 * Label sliding windows of a return series Bull, Bear, Sideways or
 * HighVolatility. HighVolatility takes precedence when the window's sample
 * volatility exceeds the threshold; otherwise the mean return is compared
 * against +/- trendThreshold. A relative threshold is the multiplier times the
 * median window volatility over the whole series.
 */
export function detectRegimes(returns: ReturnSeries, config: RegimeConfig = DEFAULT_REGIME_CONFIG): RegimeAnalysis {
  const n = returns.values.length;
  if (n < config.window) {
    throw new InsufficientHistoryError(config.window, n, 'regime detection');
  }

  const ranges = windowRanges(n, config.window, config.step);
  const moments = rollingMoments(returns.values, config.window, 1);
  const stats = ranges.map(({ start }) => ({
    mean: moments.means[start],
    volatility: moments.variances[start] <= ZERO_VARIANCE_TOLERANCE ? 0 : Math.sqrt(moments.variances[start])
  }));

  const volatilityThreshold = config.volatility.mode === 'absolute'
    ? config.volatility.threshold
    : config.volatility.multiplier * ss.median(stats.map(s => s.volatility));

  const raw = stats.map(s => classify(s.mean, s.volatility, volatilityThreshold, config.trendThreshold));
  const labels = smoothLabels(raw, config.minPersistence);

  const windows = ranges.map(({ start, end }, i): RegimeWindow => ({
    start,
    end,
    startTimestamp: returns.timestamps[start],
    endTimestamp: returns.timestamps[end - 1],
    meanReturn: stats[i].mean,
    volatility: stats[i].volatility,
    label: labels[i],
    rawLabel: raw[i]
  }));

  return { windows, summary: summarize(windows, volatilityThreshold) };
}

function byLabel(value: (label: RegimeLabel) => number): Record<RegimeLabel, number> {
  return {
    [RegimeLabel.BULL]: value(RegimeLabel.BULL),
    [RegimeLabel.BEAR]: value(RegimeLabel.BEAR),
    [RegimeLabel.SIDEWAYS]: value(RegimeLabel.SIDEWAYS),
    [RegimeLabel.HIGH_VOLATILITY]: value(RegimeLabel.HIGH_VOLATILITY)
  };
}

function summarize(windows: readonly RegimeWindow[], volatilityThreshold: number): RegimeSummary {
  const counts = byLabel(label => windows.filter(w => w.label === label).length);
  const shares = byLabel(label => counts[label] / windows.length);
  return {
    windows: windows.length,
    volatilityThreshold,
    counts,
    shares,
    current: windows[windows.length - 1].label
  };
}

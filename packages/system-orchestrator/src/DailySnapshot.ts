import { AnalysisConfig, parseAnalysisConfig } from '@quantbench/config';
import { InsufficientHistoryError, MetricMap, PriceSeries } from '@quantbench/types';
import { assertPriceSeries, isoDate, returnsToEquity, sampleStd, simpleReturns } from '@quantbench/utils';
import { computePerformanceMetrics, toMetricMap } from '@quantbench/backtesting';

export interface SnapshotEntry {
  symbol: string;
  timestamp: number;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  /** Close over the previous close, minus one */
  dailyChange: number;
  /** Annualised sample volatility of the trailing window of daily returns */
  trailingVolatility: number;
  /** Returns the trailing volatility was measured over */
  volatilityObservations: number;
  maxDrawdown: number;
  /** Buy-and-hold metrics over the whole series */
  metrics: MetricMap;
}

/**
 * Latest-bar summary for one instrument, as handed to the scheduled report.
 * The trailing window shrinks to the available history on short series.
 */
export function snapshotEntry(prices: PriceSeries, config: AnalysisConfig = parseAnalysisConfig()): SnapshotEntry {
  assertPriceSeries(prices);
  const { bars, symbol } = prices;
  if (bars.length < 2) {
    throw new InsufficientHistoryError(2, bars.length, `daily snapshot for ${symbol}`);
  }

  const returns = simpleReturns(prices);
  const trailing = returns.values.slice(-config.snapshot.volatilityWindow);
  const equity = returnsToEquity(returns, config.baseValue, bars[0].timestamp);
  const performance = computePerformanceMetrics(equity, {
    periodsPerYear: config.periodsPerYear,
    riskFreeRate: config.riskFreeRate
  });
  const latest = bars[bars.length - 1];

  return {
    symbol,
    timestamp: latest.timestamp,
    date: isoDate(latest.timestamp),
    open: latest.open,
    high: latest.high,
    low: latest.low,
    close: latest.close,
    volume: latest.volume,
    dailyChange: returns.values[returns.values.length - 1],
    trailingVolatility: sampleStd(trailing) * Math.sqrt(config.periodsPerYear),
    volatilityObservations: trailing.length,
    maxDrawdown: performance.maxDrawdown,
    metrics: toMetricMap(performance)
  };
}

/**
 * Snapshot every instrument, in the order given.
 */
export function buildDailySnapshot(
  prices: readonly PriceSeries[],
  config: AnalysisConfig = parseAnalysisConfig()
): SnapshotEntry[] {
  return prices.map(series => snapshotEntry(series, config));
}

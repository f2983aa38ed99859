import { parsePortfolioConfig } from '@quantbench/config';
import {
  InsufficientOverlapError,
  InvalidConfigurationError,
  PortfolioConfig,
  RebalanceFrequency,
  ReturnSeries
} from '@quantbench/types';
import { alignOnIntersection, monthIndex, quarterIndex } from '@quantbench/utils';

export interface AggregationResult {
  config: PortfolioConfig;
  returns: ReturnSeries;
  /**
   * Weights each period's return was earned on, one row per timestamp in
   * `config.tickers` order.
   */
  weights: number[][];
  /** Timestamps at which weights were reset to target before earning the bar */
  rebalanceTimestamps: number[];
  /** Aligned constituent returns, one column per ticker */
  assetReturns: number[][];
}

const PERIOD_KEY: Record<Exclude<RebalanceFrequency, 'none'>, (timestamp: number) => number> = {
  monthly: monthIndex,
  quarterly: quarterIndex
};

function opensNewPeriod(frequency: RebalanceFrequency, previous: number, current: number): boolean {
  if (frequency === 'none') {
    return false;
  }
  const key = PERIOD_KEY[frequency];
  return key(previous) !== key(current);
}

/**
 * Weighted portfolio returns over the timestamps every constituent shares.
 *
 * Weights start at target and drift with realised performance:
 *   w_i <- w_i (1 + r_i) / (1 + r_p)
 * A bar that opens a new calendar month (or quarter) under periodic
 * rebalancing earns its return on the target weights again. A period return
 * of -100% or worse ends the portfolio: later returns are 0.
 */
export function aggregateDetailed(
  assetReturns: ReadonlyMap<string, ReturnSeries>,
  rawConfig: PortfolioConfig
): AggregationResult {
  const config = parsePortfolioConfig(rawConfig);
  const { tickers } = config;

  const series = tickers.map(ticker => {
    const found = assetReturns.get(ticker);
    if (!found) {
      throw new InvalidConfigurationError('portfolio.tickers', `No return series supplied for ${ticker}`);
    }
    if (found.kind !== 'simple') {
      // Log returns do not add across assets
      throw new InvalidConfigurationError(`portfolio.returns.${ticker}`, `Expected simple returns for ${ticker}, got ${found.kind}`);
    }
    return found;
  });

  const aligned = alignOnIntersection(series);
  if (aligned.timestamps.length === 0) {
    throw new InsufficientOverlapError(1, 0, `portfolio ${tickers.join(',')}`);
  }

  const target = tickers.map(ticker => config.weights[ticker]);
  const { timestamps, columns } = aligned;
  const values: number[] = [];
  const history: number[][] = [];
  const rebalanceTimestamps: number[] = [];

  let weights = [...target];
  let ruined = false;

  for (let t = 0; t < timestamps.length; t++) {
    if (t > 0 && opensNewPeriod(config.rebalance, timestamps[t - 1], timestamps[t])) {
      weights = [...target];
      rebalanceTimestamps.push(timestamps[t]);
    }
    history.push([...weights]);

    if (ruined) {
      values.push(0);
      continue;
    }

    let portfolioReturn = 0;
    for (let i = 0; i < tickers.length; i++) {
      portfolioReturn += weights[i] * columns[i][t];
    }
    values.push(portfolioReturn);

    const growth = 1 + portfolioReturn;
    if (growth <= 0) {
      ruined = true;
      continue;
    }
    weights = weights.map((w, i) => (w * (1 + columns[i][t])) / growth);
  }

  return {
    config,
    returns: { kind: 'simple', timestamps, values },
    weights: history,
    rebalanceTimestamps,
    assetReturns: columns
  };
}

export function aggregate(assetReturns: ReadonlyMap<string, ReturnSeries>, config: PortfolioConfig): ReturnSeries {
  return aggregateDetailed(assetReturns, config).returns;
}

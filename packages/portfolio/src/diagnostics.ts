import { sampleStd } from '@quantbench/utils';
import { AggregationResult } from './PortfolioAggregator';

/**
 * Target-weighted average of constituent volatilities over the volatility of
 * the portfolio itself. 1 means no diversification benefit; a flat portfolio
 * reports 1.
 */
export function diversificationRatio(result: AggregationResult): number {
  const { config, assetReturns, returns } = result;
  const portfolioVol = sampleStd(returns.values);
  if (portfolioVol === 0) {
    return 1;
  }

  let weightedVol = 0;
  config.tickers.forEach((ticker, i) => {
    weightedVol += config.weights[ticker] * sampleStd(assetReturns[i]);
  });
  return weightedVol / portfolioVol;
}

/**
 * Inverse Herfindahl index of the weights.
 */
export function effectiveNumberOfAssets(weights: Readonly<Record<string, number>>): number {
  const hhi = Object.values(weights).reduce((sum, w) => sum + w * w, 0);
  return hhi > 0 ? 1 / hhi : 0;
}

/**
 * @quantbench/portfolio
 *
 * Combines per-asset return series into one portfolio return series.
 */

export * from './PortfolioAggregator';
export * from './diagnostics';

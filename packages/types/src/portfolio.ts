export type RebalanceFrequency = 'none' | 'monthly' | 'quarterly';

export interface PortfolioConfig {
  /** Display order is the order given here */
  tickers: readonly string[];
  weights: Readonly<Record<string, number>>;
  rebalance: RebalanceFrequency;
  benchmark?: string;
}

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export enum RegimeLabel {
  BULL = 'Bull',
  BEAR = 'Bear',
  SIDEWAYS = 'Sideways',
  HIGH_VOLATILITY = 'HighVolatility'
}

/**
 * Finite stand-in for an unbounded ratio (Sortino without downside, Calmar
 * without drawdown, profit factor without losses). Keeps results orderable.
 */
export const RATIO_SENTINEL = 1e6;

export const NOT_RECOVERED = 'NOT_RECOVERED' as const;
export type NotRecovered = typeof NOT_RECOVERED;

export type MetricValue = number | NotRecovered;

export type MetricMap = Record<string, MetricValue>;

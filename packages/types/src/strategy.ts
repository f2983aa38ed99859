/**
 * Strategy specifications.
 *
 * A strategy is a tagged variant: a `kind` plus the parameter record for that
 * kind. The signal engine dispatches on `kind` through a single lookup table,
 * so every rule lives next to its parameters.
 */

export interface BuyAndHoldParams {}

export interface TrendFollowingParams {
  maWindow: number;
  allowShort: boolean;
}

export interface GoldenCrossParams {
  fastWindow: number;
  slowWindow: number;
  allowShort: boolean;
}

export interface VolatilityBreakoutParams {
  lookback: number;
  /** Entry buffer in trailing close standard deviations */
  k: number;
  /** Exit band distance below the trailing mean, in standard deviations */
  exitK: number;
}

export interface RsiOversoldParams {
  period: number;
  oversold: number;
  exit: number;
}

export interface MacdCrossoverParams {
  fast: number;
  slow: number;
  signal: number;
  allowShort: boolean;
}

export interface EndOfMonthParams {
  /** Calendar days before month-end during which the position is held */
  windowDays: number;
}

export interface LinearRegressionParams {
  lookback: number;
}

export interface StrategyParamMap {
  buy_and_hold: BuyAndHoldParams;
  trend_following: TrendFollowingParams;
  golden_cross: GoldenCrossParams;
  volatility_breakout: VolatilityBreakoutParams;
  rsi_oversold: RsiOversoldParams;
  macd_crossover: MacdCrossoverParams;
  end_of_month: EndOfMonthParams;
  linear_regression: LinearRegressionParams;
}

export type StrategyKind = keyof StrategyParamMap;

export type StrategySpec<K extends StrategyKind = StrategyKind> = {
  [P in K]: { kind: P; params: StrategyParamMap[P] };
}[K];

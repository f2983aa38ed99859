/**
 * Market data and derived series.
 *
 * Every series is arena-style: parallel `timestamps` / `values` arrays that are
 * addressed by index. Timestamps are epoch milliseconds (UTC) and strictly
 * increasing. Nothing in the engine mutates a series after it is produced.
 */

export interface PriceBar {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface PriceSeries {
  symbol: string;
  bars: readonly PriceBar[];
}

export interface TimeSeries {
  readonly timestamps: readonly number[];
  readonly values: readonly number[];
}

export type ReturnKind = 'simple' | 'log';

export interface ReturnSeries extends TimeSeries {
  readonly kind: ReturnKind;
}

/**
 * One position weight per bar, on the same index domain as the price series
 * it was generated from. Weights lie in [-1, 1].
 */
export interface PositionSeries extends TimeSeries {
  readonly strategy: string;
  /** Index of the first bar whose position was computed from a full lookback */
  readonly warmupIndex: number;
}

export interface EquityCurve extends TimeSeries {
  readonly baseValue: number;
  /** Timestamp at which equity was floored at zero, null if it never was */
  readonly ruinedAt: number | null;
}

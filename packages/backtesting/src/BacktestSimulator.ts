import {
  EquityCurve,
  InsufficientHistoryError,
  InvalidConfigurationError,
  PositionSeries,
  PriceSeries,
  SeriesMisalignmentError
} from '@quantbench/types';
import { assertAligned, assertPriceSeries, timestampsOf } from '@quantbench/utils';

/**
 * Compound a position series over a price series.
 *
 * The position held over (t-1, t] is the one decided at t-1:
 *   equity[t] = equity[t-1] * (1 + position[t-1] * simpleReturn[t])
 * Equity that would fall to or below zero is floored at zero and stays there.
 * No transaction costs or slippage are applied.
 */
export function simulate(prices: PriceSeries, positions: PositionSeries, baseValue: number): EquityCurve {
  if (!Number.isFinite(baseValue) || baseValue <= 0) {
    throw new InvalidConfigurationError('baseValue', `Base value must be a positive number, got ${baseValue}`);
  }
  if (prices.bars.length === 0) {
    throw new InsufficientHistoryError(1, 0, `simulate ${prices.symbol}`);
  }

  assertPriceSeries(prices);
  const timestamps = timestampsOf(prices);
  assertAligned(timestamps, positions.timestamps);
  if (positions.values.length !== timestamps.length) {
    throw new SeriesMisalignmentError('length', 0, timestamps.length, positions.values.length);
  }

  const { bars } = prices;
  const values: number[] = [baseValue];
  let ruinedAt: number | null = null;

  for (let t = 1; t < bars.length; t++) {
    const previous = values[t - 1];
    if (previous === 0) {
      values.push(0);
      continue;
    }

    const periodReturn = bars[t].close / bars[t - 1].close - 1;
    const next = previous * (1 + positions.values[t - 1] * periodReturn);
    if (next <= 0) {
      values.push(0);
      ruinedAt = timestamps[t];
    } else {
      values.push(next);
    }
  }

  return { baseValue, ruinedAt, timestamps, values };
}

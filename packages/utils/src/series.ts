import {
  EquityCurve,
  InsufficientOverlapError,
  InvalidConfigurationError,
  PriceSeries,
  ReturnSeries,
  SeriesMisalignmentError,
  TimeSeries
} from '@quantbench/types';

/**
 * Check the PriceSeries invariants: strictly increasing timestamps and
 * positive closes. Gaps are legal and left as they are.
 */
export function assertPriceSeries(prices: PriceSeries): void {
  const { bars } = prices;
  for (let i = 0; i < bars.length; i++) {
    if (!(bars[i].close > 0)) {
      throw new InvalidConfigurationError(
        `${prices.symbol}.bars[${i}].close`,
        `Close price must be positive, got ${bars[i].close}`
      );
    }
    if (i > 0 && bars[i].timestamp <= bars[i - 1].timestamp) {
      throw new SeriesMisalignmentError('ordering', i, bars[i - 1].timestamp, bars[i].timestamp);
    }
  }
}

export function timestampsOf(prices: PriceSeries): number[] {
  return prices.bars.map(bar => bar.timestamp);
}

export function closesOf(prices: PriceSeries): number[] {
  return prices.bars.map(bar => bar.close);
}

/**
 * Close-to-close simple returns. The first bar has no predecessor, so the
 * result starts at the second bar's timestamp.
 */
export function simpleReturns(prices: PriceSeries): ReturnSeries {
  const { bars } = prices;
  const timestamps: number[] = [];
  const values: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    timestamps.push(bars[i].timestamp);
    values.push(bars[i].close / bars[i - 1].close - 1);
  }
  return { kind: 'simple', timestamps, values };
}

export function logReturns(prices: PriceSeries): ReturnSeries {
  const { bars } = prices;
  const timestamps: number[] = [];
  const values: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    timestamps.push(bars[i].timestamp);
    values.push(Math.log(bars[i].close / bars[i - 1].close));
  }
  return { kind: 'log', timestamps, values };
}

/**
 * Period returns implied by an equity curve. Once equity has been floored at
 * zero every later return is 0.
 */
export function equityToReturns(curve: EquityCurve): ReturnSeries {
  const timestamps: number[] = [];
  const values: number[] = [];
  for (let i = 1; i < curve.values.length; i++) {
    const previous = curve.values[i - 1];
    timestamps.push(curve.timestamps[i]);
    values.push(previous > 0 ? curve.values[i] / previous - 1 : 0);
  }
  return { kind: 'simple', timestamps, values };
}

/**
 * Compound a return series into an equity curve. `originTimestamp` is the bar
 * the first return is measured from; it carries `baseValue`. Equity is floored
 * at zero like the single-asset simulator.
 */
export function returnsToEquity(returns: TimeSeries, baseValue: number, originTimestamp: number): EquityCurve {
  if (!Number.isFinite(baseValue) || baseValue <= 0) {
    throw new InvalidConfigurationError('baseValue', `Base value must be a positive number, got ${baseValue}`);
  }
  if (returns.timestamps.length > 0 && originTimestamp >= returns.timestamps[0]) {
    throw new SeriesMisalignmentError('ordering', 0, returns.timestamps[0], originTimestamp);
  }

  const timestamps = [originTimestamp, ...returns.timestamps];
  const values = [baseValue];
  let ruinedAt: number | null = null;
  for (let i = 0; i < returns.values.length; i++) {
    const previous = values[i];
    const next = previous * (1 + returns.values[i]);
    if (previous > 0 && next <= 0) {
      ruinedAt = returns.timestamps[i];
    }
    values.push(previous > 0 && next > 0 ? next : 0);
  }
  return { baseValue, ruinedAt, timestamps, values };
}

/**
 * Require two timestamp arrays to be identical, index for index.
 */
export function assertAligned(expected: readonly number[], actual: readonly number[]): void {
  if (expected.length !== actual.length) {
    throw new SeriesMisalignmentError('length', Math.min(expected.length, actual.length), expected.length, actual.length);
  }
  for (let i = 0; i < expected.length; i++) {
    if (expected[i] !== actual[i]) {
      throw new SeriesMisalignmentError('timestamp', i, expected[i], actual[i]);
    }
  }
}

export interface AlignedColumns {
  timestamps: number[];
  /** One column per input series, in input order */
  columns: number[][];
}

/**
 * Inner-join several series on their common timestamps. No value is ever
 * filled in: a timestamp missing from any one series is dropped.
 */
export function alignOnIntersection(series: readonly TimeSeries[]): AlignedColumns {
  if (series.length === 0) {
    return { timestamps: [], columns: [] };
  }

  const cursors = series.map(() => 0);
  const timestamps: number[] = [];
  const columns: number[][] = series.map(() => []);

  // Merge walk over sorted timestamps
  for (;;) {
    let target = -Infinity;
    for (let s = 0; s < series.length; s++) {
      if (cursors[s] >= series[s].timestamps.length) {
        return { timestamps, columns };
      }
      target = Math.max(target, series[s].timestamps[cursors[s]]);
    }

    let matched = true;
    for (let s = 0; s < series.length; s++) {
      const stamps = series[s].timestamps;
      while (cursors[s] < stamps.length && stamps[cursors[s]] < target) {
        cursors[s]++;
      }
      if (cursors[s] >= stamps.length) {
        return { timestamps, columns };
      }
      if (stamps[cursors[s]] !== target) {
        matched = false;
      }
    }

    if (matched) {
      timestamps.push(target);
      for (let s = 0; s < series.length; s++) {
        columns[s].push(series[s].values[cursors[s]]);
        cursors[s]++;
      }
    }
  }
}

/**
 * Align and require at least `minimum` common observations.
 */
export function alignWithMinimumOverlap(
  series: readonly TimeSeries[],
  minimum: number,
  context: string
): AlignedColumns {
  const aligned = alignOnIntersection(series);
  if (aligned.timestamps.length < minimum) {
    throw new InsufficientOverlapError(minimum, aligned.timestamps.length, context);
  }
  return aligned;
}

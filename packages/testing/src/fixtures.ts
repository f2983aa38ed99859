import { all, create } from 'mathjs';
import { PriceBar, PriceSeries, ReturnSeries } from '@quantbench/types';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const BASE_TIMESTAMP = Date.UTC(2024, 0, 1);

export interface SeriesOptions {
  symbol?: string;
  start?: number;
  stepMs?: number;
}

export function dailyTimestamps(count: number, start = BASE_TIMESTAMP, stepMs = DAY_MS): number[] {
  return Array.from({ length: count }, (_, i) => start + i * stepMs);
}

/**
 * Build bars from closes. Each bar opens at the previous close; high and low
 * bracket open and close exactly.
 */
export function priceSeriesFromCloses(closes: readonly number[], options: SeriesOptions = {}): PriceSeries {
  const timestamps = dailyTimestamps(closes.length, options.start, options.stepMs);
  const bars: PriceBar[] = closes.map((close, i) => {
    const open = i === 0 ? close : closes[i - 1];
    return {
      timestamp: timestamps[i],
      open,
      high: Math.max(open, close),
      low: Math.min(open, close),
      close,
      volume: 1000 + i
    };
  });
  return { symbol: options.symbol ?? 'TEST', bars };
}

export function returnSeriesFrom(values: readonly number[], options: SeriesOptions = {}): ReturnSeries {
  return {
    kind: 'simple',
    timestamps: dailyTimestamps(values.length, options.start, options.stepMs),
    values: [...values]
  };
}

/**
 * Seeded standard-normal generator (Box-Muller over mathjs' seeded uniform).
 */
export function seededNormal(seed: string): () => number {
  const math = create(all, { randomSeed: seed });
  let spare: number | null = null;
  return () => {
    if (spare !== null) {
      const value = spare;
      spare = null;
      return value;
    }
    const u1 = 1 - math.random();
    const u2 = math.random();
    const radius = Math.sqrt(-2 * Math.log(u1));
    spare = radius * Math.sin(2 * Math.PI * u2);
    return radius * Math.cos(2 * Math.PI * u2);
  };
}

export interface RandomWalkOptions extends SeriesOptions {
  seed: string;
  mean?: number;
  stdDev?: number;
}

export function randomReturns(count: number, options: RandomWalkOptions): number[] {
  const normal = seededNormal(options.seed);
  const mean = options.mean ?? 0;
  const stdDev = options.stdDev ?? 0.01;
  return Array.from({ length: count }, () => mean + stdDev * normal());
}

export function randomWalkPrices(count: number, options: RandomWalkOptions, startPrice = 100): PriceSeries {
  const returns = randomReturns(count - 1, options);
  const closes = [startPrice];
  for (const r of returns) {
    closes.push(closes[closes.length - 1] * Math.exp(r));
  }
  return priceSeriesFromCloses(closes, options);
}

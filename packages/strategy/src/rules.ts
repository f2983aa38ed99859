import * as ss from 'simple-statistics';
import { PriceBar, StrategyKind, StrategyParamMap } from '@quantbench/types';
import { dayOfMonth, daysInMonth, rollingMax, rollingMean, rollingMoments } from '@quantbench/utils';
import { macd, wilderRsi } from './indicators';

/**
 * A strategy rule. `positions` returns one weight per bar; bars before
 * `requiredBars - 1` are flat. The weight at bar t may depend on bars 0..t only.
 */
export interface StrategyRule<P> {
  label: string;
  requiredBars(params: P): number;
  positions(bars: readonly PriceBar[], params: P): number[];
}

export type StrategyTable = { [K in StrategyKind]: StrategyRule<StrategyParamMap[K]> };

/**
 * Stateful cross rule shared by the moving-average families. Long while
 * fast > slow, flat (or short) while fast < slow; an exact tie keeps the
 * previous position.
 */
function crossoverPositions(
  length: number,
  from: number,
  fast: (t: number) => number,
  slow: (t: number) => number,
  allowShort: boolean
): number[] {
  const out: number[] = new Array<number>(length).fill(0);
  let state = 0;
  for (let t = from; t < length; t++) {
    const spread = fast(t) - slow(t);
    if (spread > 0) {
      state = 1;
    } else if (spread < 0) {
      state = allowShort ? -1 : 0;
    }
    out[t] = state;
  }
  return out;
}

const closesOf = (bars: readonly PriceBar[]): number[] => bars.map(bar => bar.close);

export const STRATEGY_RULES: StrategyTable = {
  buy_and_hold: {
    label: 'Buy and Hold',
    requiredBars: () => 1,
    positions: bars => bars.map(() => 1)
  },

  trend_following: {
    label: 'Trend Following',
    requiredBars: params => params.maWindow,
    positions: (bars, params) => {
      const closes = closesOf(bars);
      const sma = rollingMean(closes, params.maWindow);
      const offset = params.maWindow - 1;
      return crossoverPositions(
        bars.length,
        offset,
        t => closes[t],
        t => sma[t - offset],
        params.allowShort
      );
    }
  },

  golden_cross: {
    label: 'Golden Cross',
    requiredBars: params => params.slowWindow,
    positions: (bars, params) => {
      const closes = closesOf(bars);
      const fastSma = rollingMean(closes, params.fastWindow);
      const slowSma = rollingMean(closes, params.slowWindow);
      const fastOffset = params.fastWindow - 1;
      const slowOffset = params.slowWindow - 1;
      return crossoverPositions(
        bars.length,
        slowOffset,
        t => fastSma[t - fastOffset],
        t => slowSma[t - slowOffset],
        params.allowShort
      );
    }
  },

  volatility_breakout: {
    label: 'Volatility Breakout',
    requiredBars: params => params.lookback + 1,
    positions: (bars, params) => {
      const { lookback, k, exitK } = params;
      const closes = closesOf(bars);
      // Window w spans bars w .. w + lookback - 1, the bars strictly before t
      const highWater = rollingMax(bars.map(bar => bar.high), lookback);
      const moments = rollingMoments(closes, lookback, 0);

      const out: number[] = new Array<number>(bars.length).fill(0);
      let state = 0;
      for (let t = lookback; t < bars.length; t++) {
        const w = t - lookback;
        const sigma = Math.sqrt(moments.variances[w]);
        const upper = highWater[w] + k * sigma;
        const lower = moments.means[w] - exitK * sigma;
        if (closes[t] > upper) {
          state = 1;
        } else if (state === 1 && closes[t] < lower) {
          state = 0;
        }
        out[t] = state;
      }
      return out;
    }
  },

  rsi_oversold: {
    label: 'RSI Oversold',
    requiredBars: params => params.period + 1,
    positions: (bars, params) => {
      const rsi = wilderRsi(closesOf(bars), params.period);
      const out: number[] = new Array<number>(bars.length).fill(0);
      let state = 0;
      for (let t = params.period; t < bars.length; t++) {
        const value = rsi[t - params.period];
        if (value < params.oversold) {
          state = 1;
        } else if (value > params.exit) {
          state = 0;
        }
        out[t] = state;
      }
      return out;
    }
  },

  macd_crossover: {
    label: 'MACD Crossover',
    requiredBars: params => params.slow + params.signal,
    positions: (bars, params) => {
      const series = macd(closesOf(bars), params.fast, params.slow, params.signal);
      return crossoverPositions(
        bars.length,
        params.slow + params.signal - 1,
        t => series.macd[t],
        t => series.signal[t],
        params.allowShort
      );
    }
  },

  end_of_month: {
    label: 'End of Month',
    requiredBars: () => 1,
    positions: (bars, params) =>
      bars.map(bar => (daysInMonth(bar.timestamp) - dayOfMonth(bar.timestamp) < params.windowDays ? 1 : 0))
  },

  linear_regression: {
    label: 'Linear Regression',
    requiredBars: params => params.lookback + 1,
    positions: (bars, params) => {
      const closes = closesOf(bars);
      const out: number[] = new Array<number>(bars.length).fill(0);
      for (let t = params.lookback; t < bars.length; t++) {
        const points: number[][] = [];
        for (let j = 0; j < params.lookback; j++) {
          points.push([j, closes[t - params.lookback + j]]);
        }
        const { m, b } = ss.linearRegression(points);
        const fitted = m * params.lookback + b;
        out[t] = fitted > closes[t] ? 1 : 0;
      }
      return out;
    }
  }
};

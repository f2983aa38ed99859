/**
 * Technical indicators used by the strategy rules.
 *
 * All of them read only values at or before the index they produce, so any
 * prefix of an input yields the same prefix of the output.
 */

/**
 * Exponential moving average with alpha = 2 / (span + 1), seeded with the
 * first value (no bias adjustment). Same length as the input.
 */
export function ema(values: readonly number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  for (let i = 0; i < values.length; i++) {
    out.push(i === 0 ? values[0] : alpha * values[i] + (1 - alpha) * out[i - 1]);
  }
  return out;
}

/**
 * Relative Strength Index with Wilder's smoothing.
 *
 * The first average gain/loss is the simple mean of the first `period`
 * close-to-close changes; later ones use
 *   avg' = (avg * (period - 1) + current) / period.
 * Element k belongs to bar k + period. A zero average loss gives 100.
 */
export function wilderRsi(closes: readonly number[], period: number): number[] {
  const out: number[] = [];
  if (closes.length <= period) {
    return out;
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const change = closes[i] - closes[i - 1];
    avgGain += Math.max(change, 0);
    avgLoss += Math.max(-change, 0);
  }
  avgGain /= period;
  avgLoss /= period;
  out.push(rsiFrom(avgGain, avgLoss));

  for (let i = period + 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    out.push(rsiFrom(avgGain, avgLoss));
  }
  return out;
}

function rsiFrom(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export function macd(closes: readonly number[], fast: number, slow: number, signalSpan: number): MacdSeries {
  const fastEma = ema(closes, fast);
  const slowEma = ema(closes, slow);
  const line = fastEma.map((value, i) => value - slowEma[i]);
  const signal = ema(line, signalSpan);
  return {
    macd: line,
    signal,
    histogram: line.map((value, i) => value - signal[i])
  };
}

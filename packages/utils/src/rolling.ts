/**
 * Rolling-window statistics over index-addressed arrays.
 *
 * Every function returns one value per complete window: element k describes
 * the window `values[k .. k + window - 1]`, so it belongs to bar
 * `k + window - 1`. Nothing is reallocated per step.
 */

import { InvalidConfigurationError } from '@quantbench/types';

function assertWindow(window: number, field = 'window'): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new InvalidConfigurationError(field, `Window must be a positive integer, got ${window}`);
  }
}

/**
 * Trailing simple moving average. Uses the same incremental mean as
 * `rollingMoments`, so a constant input yields exactly that constant.
 */
export function rollingMean(values: readonly number[], window: number): number[] {
  return rollingMoments(values, window, 0).means;
}

export interface RollingMoments {
  means: number[];
  variances: number[];
}

/**
 * Sliding mean and variance using the fixed-width Welford update
 *   mean' = mean + (x - y) / n
 *   M2'   = M2 + (x - y)(x - mean' + y - mean)
 * where x enters and y leaves the window. `ddof` 1 gives the sample variance.
 */
export function rollingMoments(values: readonly number[], window: number, ddof: 0 | 1 = 1): RollingMoments {
  assertWindow(window);
  const means: number[] = [];
  const variances: number[] = [];
  if (values.length < window) {
    return { means, variances };
  }

  let mean = 0;
  let m2 = 0;
  for (let i = 0; i < window; i++) {
    const delta = values[i] - mean;
    mean += delta / (i + 1);
    m2 += delta * (values[i] - mean);
  }

  const divisor = window - ddof;
  const push = (): void => {
    means.push(mean);
    variances.push(divisor > 0 ? Math.max(m2, 0) / divisor : 0);
  };
  push();

  for (let i = window; i < values.length; i++) {
    const incoming = values[i];
    const outgoing = values[i - window];
    const previousMean = mean;
    mean += (incoming - outgoing) / window;
    m2 += (incoming - outgoing) * (incoming - mean + outgoing - previousMean);
    push();
  }

  return { means, variances };
}

function rollingExtreme(
  values: readonly number[],
  window: number,
  better: (candidate: number, incumbent: number) => boolean
): number[] {
  assertWindow(window);
  const out: number[] = [];
  // Monotonic deque of indices into `values`
  const deque: number[] = [];
  let head = 0;

  for (let i = 0; i < values.length; i++) {
    while (deque.length > head && !better(values[deque[deque.length - 1]], values[i])) {
      deque.pop();
    }
    deque.push(i);
    if (deque[head] <= i - window) {
      head++;
    }
    if (i >= window - 1) {
      out.push(values[deque[head]]);
    }
  }
  return out;
}

export function rollingMax(values: readonly number[], window: number): number[] {
  return rollingExtreme(values, window, (candidate, incumbent) => candidate > incumbent);
}

export function rollingMin(values: readonly number[], window: number): number[] {
  return rollingExtreme(values, window, (candidate, incumbent) => candidate < incumbent);
}

export interface IndexRange {
  start: number;
  /** Exclusive */
  end: number;
}

/**
 * Window index ranges of width `window`, advancing by `step`.
 */
export function windowRanges(length: number, window: number, step = 1): IndexRange[] {
  assertWindow(window);
  assertWindow(step, 'step');
  const ranges: IndexRange[] = [];
  for (let start = 0; start + window <= length; start += step) {
    ranges.push({ start, end: start + window });
  }
  return ranges;
}

import * as ss from 'simple-statistics';

/**
 * Variances at or below this are treated as zero by the rolling estimators,
 * whose incremental updates can leave residue of a few ulps on flat windows.
 */
export const ZERO_VARIANCE_TOLERANCE = 1e-20;

export function isConstant(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (values[i] !== values[0]) {
      return false;
    }
  }
  return true;
}

/**
 * Sample standard deviation; 0 for fewer than two points or a constant sample.
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2 || isConstant(values)) {
    return 0;
  }
  return ss.sampleStandardDeviation([...values]);
}

/**
 * Sample variance; 0 for fewer than two points or a constant sample.
 */
export function sampleVar(values: readonly number[]): number {
  if (values.length < 2 || isConstant(values)) {
    return 0;
  }
  return ss.sampleVariance([...values]);
}

export function meanOf(values: readonly number[]): number {
  return values.length === 0 ? 0 : ss.mean([...values]);
}

/**
 * Lower empirical quantile: the smallest observation x with F(x) >= p.
 * `p * n` is rounded to 1e-9 first so 0.05 * 20 lands on 1, not 1.0000000000000009.
 */
export function lowerQuantileIndex(length: number, p: number): number {
  const rank = Math.round(p * length * 1e9) / 1e9;
  return Math.min(length - 1, Math.max(0, Math.ceil(rank) - 1));
}

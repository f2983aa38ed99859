import { sampleVar, windowRanges } from '@quantbench/utils';

export interface ScaleVariance {
  scale: number;
  /** Sample variance of non-overlapping `scale`-period summed returns */
  variance: number;
  /** variance / one-period variance */
  varRatio: number;
  /** Ratio expected of a random walk */
  theoretical: number;
  /** varRatio / scale; 1 for a random walk */
  deviation: number;
}

/**
 * Variance of aggregated returns at each scale. Scales that leave fewer than
 * two complete blocks are omitted.
 */
export function multiScaleVariance(returns: readonly number[], scales: readonly number[]): ScaleVariance[] {
  const baseVariance = sampleVar(returns);
  const results: ScaleVariance[] = [];

  for (const scale of scales) {
    if (scale >= returns.length) {
      continue;
    }
    const blocks = windowRanges(returns.length, scale, scale).map(({ start, end }) => {
      let sum = 0;
      for (let i = start; i < end; i++) {
        sum += returns[i];
      }
      return sum;
    });
    if (blocks.length < 2) {
      continue;
    }

    const variance = sampleVar(blocks);
    const varRatio = baseVariance > 0 ? variance / baseVariance : 0;
    results.push({
      scale,
      variance,
      varRatio,
      theoretical: scale,
      deviation: varRatio / scale
    });
  }
  return results;
}

import { InvalidConfigurationError, TimeSeries } from '@quantbench/types';
import { alignWithMinimumOverlap } from '@quantbench/utils';
import { pearsonCorrelation } from './BenchmarkAnalyzer';

export interface CorrelationMatrix {
  tickers: string[];
  /** matrix[i][j] is the correlation of tickers[i] with tickers[j] */
  matrix: number[][];
  observations: number;
}

/**
 * Pairwise Pearson correlation over the timestamps all series share. The
 * diagonal is 1 and the matrix is symmetric by construction; a pair involving
 * a flat series correlates at 0.
 */
export function correlationMatrix(
  series: ReadonlyMap<string, TimeSeries>,
  tickers: readonly string[] = [...series.keys()]
): CorrelationMatrix {
  const columnsIn = tickers.map(ticker => {
    const found = series.get(ticker);
    if (!found) {
      throw new InvalidConfigurationError('tickers', `No return series supplied for ${ticker}`);
    }
    return found;
  });

  const { timestamps, columns } = alignWithMinimumOverlap(columnsIn, 2, 'correlation matrix');
  const size = tickers.length;
  const matrix: number[][] = Array.from({ length: size }, () => new Array<number>(size).fill(0));

  for (let i = 0; i < size; i++) {
    matrix[i][i] = 1;
    for (let j = i + 1; j < size; j++) {
      const rho = pearsonCorrelation(columns[i], columns[j]);
      matrix[i][j] = rho;
      matrix[j][i] = rho;
    }
  }

  return { tickers: [...tickers], matrix, observations: timestamps.length };
}

/**
 * Mean of the off-diagonal correlations; 0 for fewer than two assets.
 */
export function averageCorrelation(result: CorrelationMatrix): number {
  const size = result.tickers.length;
  if (size < 2) {
    return 0;
  }
  let sum = 0;
  for (let i = 0; i < size; i++) {
    for (let j = i + 1; j < size; j++) {
      sum += result.matrix[i][j];
    }
  }
  return sum / ((size * (size - 1)) / 2);
}

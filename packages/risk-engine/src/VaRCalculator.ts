import { EventEmitter } from 'events';
import {
  InsufficientHistoryError,
  InvalidConfigurationError,
  ReturnSeries
} from '@quantbench/types';
import { Logger, lowerQuantileIndex, meanOf } from '@quantbench/utils';

export interface VaRResult {
  confidence: number;
  /** (1 - confidence) quantile of period returns; a loss is negative */
  valueAtRisk: number;
  /** Mean of the returns at or below valueAtRisk */
  conditionalVaR: number;
  /** Observations at or below valueAtRisk */
  tailCount: number;
  methodology: 'historical';
}

export interface VaRReport {
  observations: number;
  results: VaRResult[];
}

function assertConfidence(confidence: number): void {
  if (!(confidence > 0 && confidence < 1)) {
    throw new InvalidConfigurationError('confidence', `Confidence level must lie in (0, 1), got ${confidence}`);
  }
}

function sortedReturns(returns: readonly number[], context: string): number[] {
  if (returns.length === 0) {
    throw new InsufficientHistoryError(1, 0, context);
  }
  return [...returns].sort((a, b) => a - b);
}

/**
 * Historical-simulation VaR: the lower empirical (1 - c) quantile of the
 * observed returns. With 20 observations at 95% this is the single worst one.
 */
export function historicalVaR(returns: readonly number[], confidence: number): number {
  assertConfidence(confidence);
  const sorted = sortedReturns(returns, 'historical VaR');
  return sorted[lowerQuantileIndex(sorted.length, 1 - confidence)];
}

export function conditionalVaR(returns: readonly number[], confidence: number): number {
  const threshold = historicalVaR(returns, confidence);
  return meanOf(returns.filter(r => r <= threshold));
}

/**
 * Historical VaR and CVaR over a return series at several confidence levels.
 * Emits `var:calculated` with each report.
 */
export class VaRCalculator extends EventEmitter {
  private logger: Logger;

  constructor(logger?: Logger) {
    super();
    this.logger = logger ?? new Logger('VaRCalculator');
  }

  calculate(returns: ReturnSeries, confidenceLevels: readonly number[]): VaRReport {
    confidenceLevels.forEach(assertConfidence);
    const sorted = sortedReturns(returns.values, 'historical VaR');

    const results = confidenceLevels.map((confidence): VaRResult => {
      const valueAtRisk = sorted[lowerQuantileIndex(sorted.length, 1 - confidence)];
      const tail = sorted.filter(r => r <= valueAtRisk);
      return {
        confidence,
        valueAtRisk,
        conditionalVaR: meanOf(tail),
        tailCount: tail.length,
        methodology: 'historical'
      };
    });

    if (sorted.length < 100) {
      this.logger.debug('VaR estimated from a short sample', { observations: sorted.length });
    }

    const report: VaRReport = { observations: sorted.length, results };
    this.emit('var:calculated', report);
    return report;
  }
}

/**
 * QuantResearchService - time-series diagnostics over one return series
 *
 * Runs the Hurst, multi-scale variance, variance-ratio and regime analyses
 * with one analysis configuration. An estimator the sample is too short for
 * is reported as skipped instead of failing the whole run.
 */

import { EventEmitter } from 'events';
import { AnalysisConfig, parseAnalysisConfig } from '@quantbench/config';
import { InsufficientHistoryError, ReturnSeries } from '@quantbench/types';
import { Logger } from '@quantbench/utils';
import { HurstResult, estimateHurst } from '../analytics/HurstExponent';
import { ScaleVariance, multiScaleVariance } from '../analytics/MultiScaleVariance';
import { VarianceRatioResult, varianceRatioProfile } from '../analytics/VarianceRatioTest';
import { RegimeAnalysis, detectRegimes } from '../analysis/RegimeDetector';

export type AnalysisOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'skipped'; reason: string; required: number; available: number };

export interface AdvancedAnalyticsReport {
  observations: number;
  hurst: AnalysisOutcome<HurstResult>;
  multiScaleVariance: ScaleVariance[];
  varianceRatio: VarianceRatioResult[];
  regimes: AnalysisOutcome<RegimeAnalysis>;
}

export class QuantResearchService extends EventEmitter {
  private logger: Logger;
  private config: AnalysisConfig;

  constructor(config: AnalysisConfig = parseAnalysisConfig(), logger?: Logger) {
    super();
    this.config = config;
    this.logger = logger ?? new Logger('QuantResearchService');
  }

  analyze(returns: ReturnSeries, label = 'series'): AdvancedAnalyticsReport {
    const values = returns.values;
    this.logger.info('Running advanced analytics', { label, observations: values.length });

    const varianceRatio = varianceRatioProfile(values, this.config.varianceRatio.lags, this.config.varianceRatio.significance);
    const skippedLags = this.config.varianceRatio.lags.filter(lag => values.length < 2 * lag);
    if (skippedLags.length > 0) {
      this.logger.debug('Variance ratio lags skipped for short sample', { label, skippedLags });
    }

    const report: AdvancedAnalyticsReport = {
      observations: values.length,
      hurst: this.attempt('Hurst exponent', label, () => estimateHurst(values, this.config.hurst)),
      multiScaleVariance: multiScaleVariance(values, this.config.multiScaleVariance.scales),
      varianceRatio,
      regimes: this.attempt('regime detection', label, () => detectRegimes(returns, this.config.regime))
    };

    this.emit('analytics:completed', { label, report });
    return report;
  }

  private attempt<T>(name: string, label: string, run: () => T): AnalysisOutcome<T> {
    try {
      return { status: 'ok', value: run() };
    } catch (error) {
      if (error instanceof InsufficientHistoryError) {
        this.logger.warn(`Skipping ${name}`, {
          label,
          required: error.required,
          available: error.available
        });
        return { status: 'skipped', reason: error.message, required: error.required, available: error.available };
      }
      throw error;
    }
  }
}

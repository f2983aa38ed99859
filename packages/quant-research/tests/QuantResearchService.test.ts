import { describe, it, expect, jest } from '@jest/globals';
import { parseAnalysisConfig } from '@quantbench/config';
import { Logger } from '@quantbench/utils';
import { randomReturns, returnSeriesFrom } from '@quantbench/testing';
import { QuantResearchService } from '../src/core/QuantResearchService';

const silent = new Logger('QuantResearchServiceTest', { silent: true });

describe('QuantResearchService', () => {
  it('should run every diagnostic on a long enough sample', () => {
    const service = new QuantResearchService(parseAnalysisConfig(), silent);
    const listener = jest.fn();
    service.on('analytics:completed', listener);

    const report = service.analyze(returnSeriesFrom(randomReturns(300, { seed: 'service-long' })), 'portfolio');

    expect(report.observations).toBe(300);
    expect(report.hurst.status).toBe('ok');
    expect(report.regimes.status).toBe('ok');
    expect(report.varianceRatio.map(r => r.lag)).toEqual([2, 5, 10, 20]);
    expect(report.multiScaleVariance.map(s => s.scale)).toEqual([1, 5, 10, 20, 60]);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should report short-sample estimators as skipped', () => {
    const service = new QuantResearchService(parseAnalysisConfig(), silent);
    const report = service.analyze(returnSeriesFrom(randomReturns(50, { seed: 'service-short' })));

    expect(report.hurst).toEqual({
      status: 'skipped',
      reason: 'Hurst exponent: requires 100 observations, 50 available',
      required: 100,
      available: 50
    });
    expect(report.regimes.status).toBe('skipped');
    expect(report.varianceRatio.map(r => r.lag)).toEqual([2, 5, 10, 20]);
    expect(report.multiScaleVariance.map(s => s.scale)).toEqual([1, 5, 10, 20]);
  });

  it('should skip Hurst when the sample cannot hold two default windows', () => {
    const config = parseAnalysisConfig({ hurst: { minLength: 30 } });
    const service = new QuantResearchService(config, silent);
    const report = service.analyze(returnSeriesFrom(randomReturns(40, { seed: 'service-hurst-windows' })));

    expect(report.hurst).toEqual({
      status: 'skipped',
      reason: 'Hurst exponent: requires 64 observations, 40 available',
      required: 64,
      available: 40
    });
  });

  it('should apply the configured lags', () => {
    const config = parseAnalysisConfig({ varianceRatio: { lags: [3] } });
    const service = new QuantResearchService(config, silent);
    const report = service.analyze(returnSeriesFrom(randomReturns(120, { seed: 'service-lags' })));

    expect(report.varianceRatio.map(r => r.lag)).toEqual([3]);
  });
});

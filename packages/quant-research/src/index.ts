/**
 * Quant Research Module - diagnostics over a single return series
 *
 * Hurst exponent (rescaled range), multi-scale variance, the Lo-MacKinlay
 * variance-ratio test and sliding-window regime labelling.
 */

export { QuantResearchService } from './core/QuantResearchService';
export type { AdvancedAnalyticsReport, AnalysisOutcome } from './core/QuantResearchService';

export * from './analytics/HurstExponent';
export * from './analytics/MultiScaleVariance';
export * from './analytics/VarianceRatioTest';
export * from './analysis/RegimeDetector';

/**
 * Risk Engine Module
 * Historical VaR/CVaR, benchmark-relative statistics and correlation matrices
 */

export * from './VaRCalculator';
export * from './BenchmarkAnalyzer';
export * from './CorrelationAnalyzer';

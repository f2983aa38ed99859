import { z } from 'zod';
import {
  ConfigurationIssue,
  InvalidConfigurationError,
  PortfolioConfig,
  StrategySpec,
  WEIGHT_SUM_TOLERANCE
} from '@quantbench/types';

const windowLength = z.number().int().positive();
const probability = z.number().gt(0).lt(1);

// ============================================================================
// Strategy Schemas
// ============================================================================

const BuyAndHoldSchema = z.object({
  kind: z.literal('buy_and_hold'),
  params: z.object({}).default({})
});

const TrendFollowingSchema = z.object({
  kind: z.literal('trend_following'),
  params: z.object({
    maWindow: windowLength.default(50),
    allowShort: z.boolean().default(false)
  }).default({})
});

const GoldenCrossSchema = z.object({
  kind: z.literal('golden_cross'),
  params: z.object({
    fastWindow: windowLength.default(50),
    slowWindow: windowLength.default(200),
    allowShort: z.boolean().default(false)
  })
    .refine(p => p.fastWindow < p.slowWindow, { message: 'fastWindow must be shorter than slowWindow' })
    .default({})
});

const VolatilityBreakoutSchema = z.object({
  kind: z.literal('volatility_breakout'),
  params: z.object({
    lookback: windowLength.default(20),
    k: z.number().min(0).default(0.5),
    exitK: z.number().min(0).default(0)
  }).default({})
});

const RsiOversoldSchema = z.object({
  kind: z.literal('rsi_oversold'),
  params: z.object({
    period: windowLength.default(14),
    oversold: z.number().min(0).max(100).default(30),
    exit: z.number().min(0).max(100).default(50)
  })
    .refine(p => p.oversold < p.exit, { message: 'oversold threshold must be below the exit threshold' })
    .default({})
});

const MacdCrossoverSchema = z.object({
  kind: z.literal('macd_crossover'),
  params: z.object({
    fast: windowLength.default(12),
    slow: windowLength.default(26),
    signal: windowLength.default(9),
    allowShort: z.boolean().default(false)
  })
    .refine(p => p.fast < p.slow, { message: 'fast span must be shorter than slow span' })
    .default({})
});

const EndOfMonthSchema = z.object({
  kind: z.literal('end_of_month'),
  params: z.object({
    windowDays: z.number().int().min(1).max(31).default(3)
  }).default({})
});

const LinearRegressionSchema = z.object({
  kind: z.literal('linear_regression'),
  params: z.object({
    lookback: z.number().int().min(2).default(20)
  }).default({})
});

export const StrategySpecSchema = z.discriminatedUnion('kind', [
  BuyAndHoldSchema,
  TrendFollowingSchema,
  GoldenCrossSchema,
  VolatilityBreakoutSchema,
  RsiOversoldSchema,
  MacdCrossoverSchema,
  EndOfMonthSchema,
  LinearRegressionSchema
]);

// ============================================================================
// Portfolio Schema
// ============================================================================

export const PortfolioConfigSchema = z.object({
  tickers: z.array(z.string().min(1)).min(1),
  weights: z.record(z.string(), z.number().finite()).optional(),
  rebalance: z.enum(['none', 'monthly', 'quarterly']).default('none'),
  benchmark: z.string().min(1).optional()
}).superRefine((config, ctx) => {
  if (new Set(config.tickers).size !== config.tickers.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tickers'], message: 'tickers must be unique' });
  }
  if (!config.weights) {
    return;
  }
  for (const ticker of config.tickers) {
    if (config.weights[ticker] === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['weights', ticker], message: `missing weight for ${ticker}` });
    }
  }
  for (const key of Object.keys(config.weights)) {
    if (!config.tickers.includes(key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['weights', key], message: `weight given for unknown ticker ${key}` });
    }
  }
  const total = Object.values(config.weights).reduce((sum, w) => sum + w, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['weights'], message: `weights sum to ${total}, expected 1` });
  }
});

// ============================================================================
// Analysis Parameters Schema
// ============================================================================

const RegimeVolatilitySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('relative'), multiplier: z.number().positive().default(1.5) }),
  z.object({ mode: z.literal('absolute'), threshold: z.number().positive() })
]);

export const AnalysisConfigSchema = z.object({
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  periodsPerYear: z.number().positive().default(252),
  riskFreeRate: z.number().default(0),
  baseValue: z.number().positive().default(100),
  varConfidenceLevels: z.array(probability).min(1).default([0.95, 0.99]),
  minBenchmarkOverlap: z.number().int().min(2).default(20),
  hurst: z.object({
    minLength: z.number().int().min(16).default(100),
    minWindow: z.number().int().min(4).default(8),
    windowSizes: z.array(z.number().int().min(4)).min(2).optional(),
    bands: z.object({
      trendingAbove: z.number().min(0).max(1).default(0.55),
      meanRevertingBelow: z.number().min(0).max(1).default(0.45)
    })
      .refine(b => b.meanRevertingBelow <= b.trendingAbove, { message: 'meanRevertingBelow must not exceed trendingAbove' })
      .default({})
  }).default({}),
  multiScaleVariance: z.object({
    scales: z.array(z.number().int().positive()).min(1).default([1, 5, 10, 20, 60])
  }).default({}),
  varianceRatio: z.object({
    lags: z.array(z.number().int().min(2)).min(1).default([2, 5, 10, 20]),
    significance: probability.default(0.05)
  }).default({}),
  regime: z.object({
    window: z.number().int().min(2).default(60),
    step: z.number().int().positive().default(1),
    trendThreshold: z.number().min(0).default(0.0005),
    volatility: RegimeVolatilitySchema.default({ mode: 'relative', multiplier: 1.5 }),
    minPersistence: z.number().int().positive().default(1)
  }).default({}),
  snapshot: z.object({
    volatilityWindow: z.number().int().min(2).default(30)
  }).default({})
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type HurstConfig = AnalysisConfig['hurst'];
export type RegimeConfig = AnalysisConfig['regime'];

// ============================================================================
// Parsing
// ============================================================================

export function toConfigurationError(field: string, error: z.ZodError): InvalidConfigurationError {
  const issues: ConfigurationIssue[] = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
  const summary = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
  return new InvalidConfigurationError(field, `Invalid ${field}: ${summary}`, issues);
}

export function parseStrategySpec(raw: unknown): StrategySpec {
  const result = StrategySpecSchema.safeParse(raw);
  if (!result.success) {
    throw toConfigurationError('strategy', result.error);
  }
  return result.data;
}

/**
 * Validate a portfolio configuration. Omitted weights default to equal weights.
 */
export function parsePortfolioConfig(raw: unknown): PortfolioConfig {
  const result = PortfolioConfigSchema.safeParse(raw);
  if (!result.success) {
    throw toConfigurationError('portfolio', result.error);
  }
  const { tickers, weights, rebalance, benchmark } = result.data;
  return {
    tickers,
    weights: weights ?? equalWeights(tickers),
    rebalance,
    ...(benchmark !== undefined ? { benchmark } : {})
  };
}

export function parseAnalysisConfig(raw: unknown = {}): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse(raw);
  if (!result.success) {
    throw toConfigurationError('analysis', result.error);
  }
  return result.data;
}

export function equalWeights(tickers: readonly string[]): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const ticker of tickers) {
    weights[ticker] = 1 / tickers.length;
  }
  return weights;
}

/**
 * Rescale weights to sum to 1. A zero total falls back to equal weights.
 */
export function normalizeWeights(weights: Readonly<Record<string, number>>): Record<string, number> {
  const tickers = Object.keys(weights);
  const total = tickers.reduce((sum, t) => sum + weights[t], 0);
  if (total === 0) {
    return equalWeights(tickers);
  }
  const normalized: Record<string, number> = {};
  for (const ticker of tickers) {
    normalized[ticker] = weights[ticker] / total;
  }
  return normalized;
}

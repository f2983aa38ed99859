import { describe, it, expect } from '@jest/globals';
import { InvalidConfigurationError } from '@quantbench/types';
import {
  normalizeWeights,
  parseAnalysisConfig,
  parsePortfolioConfig,
  parseStrategySpec
} from '../src/schemas';

function issuesOf(run: () => unknown): { field: string; paths: string[]; messages: string[] } {
  try {
    run();
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      return {
        field: error.field,
        paths: error.issues.map(i => i.path),
        messages: error.issues.map(i => i.message)
      };
    }
    throw error;
  }
  throw new Error('expected an InvalidConfigurationError');
}

describe('schemas', () => {
  describe('parseStrategySpec', () => {
    it('should fill in default parameters', () => {
      expect(parseStrategySpec({ kind: 'golden_cross' })).toEqual({
        kind: 'golden_cross',
        params: { fastWindow: 50, slowWindow: 200, allowShort: false }
      });
      expect(parseStrategySpec({ kind: 'rsi_oversold', params: { period: 10 } })).toEqual({
        kind: 'rsi_oversold',
        params: { period: 10, oversold: 30, exit: 50 }
      });
    });

    it('should reject unknown strategy kinds', () => {
      expect(issuesOf(() => parseStrategySpec({ kind: 'martingale' })).field).toBe('strategy');
    });

    it('should reject inverted moving-average windows', () => {
      const result = issuesOf(() => parseStrategySpec({ kind: 'golden_cross', params: { fastWindow: 200, slowWindow: 50 } }));
      expect(result.paths).toEqual(['params']);
      expect(result.messages).toEqual(['fastWindow must be shorter than slowWindow']);
    });

    it('should reject non-positive windows', () => {
      const result = issuesOf(() => parseStrategySpec({ kind: 'trend_following', params: { maWindow: 0 } }));
      expect(result.paths).toEqual(['params.maWindow']);
    });
  });

  describe('parsePortfolioConfig', () => {
    it('should default to equal weights without rebalancing', () => {
      expect(parsePortfolioConfig({ tickers: ['A', 'B', 'C', 'D'] })).toEqual({
        tickers: ['A', 'B', 'C', 'D'],
        weights: { A: 0.25, B: 0.25, C: 0.25, D: 0.25 },
        rebalance: 'none'
      });
    });

    it('should keep a configured benchmark', () => {
      const config = parsePortfolioConfig({ tickers: ['A'], rebalance: 'quarterly', benchmark: 'IDX' });
      expect(config.benchmark).toBe('IDX');
      expect(config.rebalance).toBe('quarterly');
    });

    it('should require weights to sum to one', () => {
      const result = issuesOf(() => parsePortfolioConfig({ tickers: ['A', 'B'], weights: { A: 0.7, B: 0.5 } }));
      expect(result.field).toBe('portfolio');
      expect(result.paths).toEqual(['weights']);
    });

    it('should require a weight for every ticker', () => {
      const result = issuesOf(() => parsePortfolioConfig({ tickers: ['A', 'B'], weights: { A: 1 } }));
      expect(result.paths).toEqual(['weights.B']);
      expect(result.messages).toEqual(['missing weight for B']);
    });

    it('should reject duplicate tickers and unknown frequencies', () => {
      expect(issuesOf(() => parsePortfolioConfig({ tickers: ['A', 'A'] })).paths).toEqual(['tickers']);
      expect(issuesOf(() => parsePortfolioConfig({ tickers: ['A'], rebalance: 'weekly' })).paths).toEqual(['rebalance']);
    });
  });

  describe('parseAnalysisConfig', () => {
    it('should apply defaults', () => {
      const config = parseAnalysisConfig();
      expect(config.periodsPerYear).toBe(252);
      expect(config.varConfidenceLevels).toEqual([0.95, 0.99]);
      expect(config.hurst).toEqual({
        minLength: 100,
        minWindow: 8,
        bands: { trendingAbove: 0.55, meanRevertingBelow: 0.45 }
      });
      expect(config.regime.volatility).toEqual({ mode: 'relative', multiplier: 1.5 });
      expect(config.regime.minPersistence).toBe(1);
    });

    it('should require a threshold for absolute regime volatility', () => {
      const result = issuesOf(() => parseAnalysisConfig({ regime: { volatility: { mode: 'absolute' } } }));
      expect(result.paths).toEqual(['regime.volatility.threshold']);
    });

    it('should reject confidence levels outside (0, 1)', () => {
      expect(() => parseAnalysisConfig({ varConfidenceLevels: [1] })).toThrow(InvalidConfigurationError);
    });
  });

  describe('normalizeWeights', () => {
    it('should rescale to a unit sum', () => {
      expect(normalizeWeights({ A: 2, B: 6 })).toEqual({ A: 0.25, B: 0.75 });
    });

    it('should fall back to equal weights for a zero total', () => {
      expect(normalizeWeights({ A: 0, B: 0 })).toEqual({ A: 0.5, B: 0.5 });
    });
  });
});

/**
 * AnalysisOrchestrator - end-to-end analysis runs
 *
 * Wires the pipeline stages together for one invocation: signal generation
 * and simulation per asset, portfolio aggregation, risk statistics and the
 * advanced time-series diagnostics. Every run gets its own id and shares no
 * state with other runs.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { AnalysisConfig, parseAnalysisConfig, parsePortfolioConfig } from '@quantbench/config';
import {
  EquityCurve,
  InsufficientOverlapError,
  InvalidConfigurationError,
  MetricMap,
  PortfolioConfig,
  PriceSeries,
  ReturnSeries,
  StrategySpec
} from '@quantbench/types';
import { Logger, assertPriceSeries, returnsToEquity, simpleReturns } from '@quantbench/utils';
import {
  BacktestResult,
  BacktestingFramework,
  DrawdownPeriod,
  MetricsOptions,
  PerformanceMetrics,
  computePerformanceMetrics,
  drawdownPeriods,
  toMetricMap
} from '@quantbench/backtesting';
import { AggregationResult, aggregateDetailed, diversificationRatio, effectiveNumberOfAssets } from '@quantbench/portfolio';
import {
  BenchmarkStatistics,
  CorrelationMatrix,
  VaRCalculator,
  VaRReport,
  computeBenchmarkStatistics,
  correlationMatrix,
  historicalVaR
} from '@quantbench/risk-engine';
import { AdvancedAnalyticsReport, AnalysisOutcome, QuantResearchService } from '@quantbench/quant-research';

export interface SingleAssetReport {
  runId: string;
  symbol: string;
  backtest: BacktestResult;
  metrics: MetricMap;
  risk: VaRReport;
  benchmark: AnalysisOutcome<BenchmarkStatistics> | null;
  advanced: AdvancedAnalyticsReport;
}

export interface PortfolioRunOptions {
  /** Strategy per ticker; tickers without one are held throughout */
  strategies?: Readonly<Record<string, StrategySpec>>;
}

/** One constituent measured on its own, before weighting */
export interface AssetSummary {
  weight: number;
  annualizedReturn: number;
  annualizedVolatility: number;
  sharpeRatio: number;
  sortinoRatio: number;
  maxDrawdown: number;
  /** Historical VaR at `ASSET_VAR_CONFIDENCE` */
  valueAtRisk: number;
}

export const ASSET_VAR_CONFIDENCE = 0.95;

export interface PortfolioReport {
  runId: string;
  config: PortfolioConfig;
  aggregation: AggregationResult;
  equityCurve: EquityCurve;
  performance: PerformanceMetrics;
  metrics: MetricMap;
  drawdowns: DrawdownPeriod[];
  risk: VaRReport;
  correlation: CorrelationMatrix;
  benchmark: AnalysisOutcome<BenchmarkStatistics> | null;
  diversification: {
    ratio: number;
    effectiveAssets: number;
  };
  advanced: AdvancedAnalyticsReport;
  /** Per-constituent figures over each ticker's own return history */
  assets: Record<string, AssetSummary>;
  /** Backtests of the tickers that were given a strategy */
  backtests: Record<string, BacktestResult>;
}

export class AnalysisOrchestrator extends EventEmitter {
  private logger: Logger;
  private config: AnalysisConfig;
  private backtester: BacktestingFramework;
  private varCalculator: VaRCalculator;
  private research: QuantResearchService;

  constructor(config: AnalysisConfig = parseAnalysisConfig(), logger?: Logger) {
    super();
    this.config = config;
    this.logger = logger ?? new Logger('AnalysisOrchestrator');
    this.backtester = new BacktestingFramework(this.logger.child('backtesting'));
    this.varCalculator = new VaRCalculator(this.logger.child('risk'));
    this.research = new QuantResearchService(config, this.logger.child('research'));
  }

  /**
   * Backtest one strategy on one instrument and run the risk and advanced
   * analytics over the strategy's returns. A benchmark, when given, is
   * compared against those returns.
   */
  runSingleAsset(prices: PriceSeries, strategy: StrategySpec, benchmark?: PriceSeries): SingleAssetReport {
    const runId = uuidv4();
    this.logger.info('Starting single-asset analysis', { runId, symbol: prices.symbol, strategy: strategy.kind });

    try {
      const backtest = this.backtester.runBacktest(prices, strategy, {
        ...this.metricsOptions(),
        baseValue: this.config.baseValue
      });
      const benchmarkStats = benchmark ? this.compareToBenchmark(backtest.returns, benchmark) : null;

      const report: SingleAssetReport = {
        runId,
        symbol: prices.symbol,
        backtest,
        metrics: toMetricMap(backtest.performance),
        risk: this.varCalculator.calculate(backtest.returns, this.config.varConfidenceLevels),
        benchmark: benchmarkStats,
        advanced: this.research.analyze(backtest.returns, prices.symbol)
      };

      this.logger.info('Single-asset analysis completed', { runId, symbol: prices.symbol });
      this.emit('analysis:completed', { runId, kind: 'single', report });
      return report;
    } catch (error) {
      this.logger.error('Single-asset analysis failed', error, { runId, symbol: prices.symbol });
      throw error;
    }
  }

  /**
   * Aggregate several instruments into one portfolio and analyse it.
   * `prices` must hold a series for every configured ticker and for the
   * benchmark, if one is configured.
   */
  runPortfolio(
    prices: ReadonlyMap<string, PriceSeries>,
    rawConfig: unknown,
    options: PortfolioRunOptions = {}
  ): PortfolioReport {
    const runId = uuidv4();

    try {
      const config = parsePortfolioConfig(rawConfig);
      this.logger.info('Starting portfolio analysis', {
        runId,
        tickers: config.tickers,
        rebalance: config.rebalance
      });

      const backtests: Record<string, BacktestResult> = {};
      const assetReturns = new Map<string, ReturnSeries>();
      const assets: Record<string, AssetSummary> = {};
      for (const ticker of config.tickers) {
        const series = this.pricesFor(prices, ticker, 'portfolio.tickers');
        const strategy = options.strategies?.[ticker];
        if (strategy) {
          const backtest = this.backtester.runBacktest(series, strategy, {
            ...this.metricsOptions(),
            baseValue: this.config.baseValue
          });
          backtests[ticker] = backtest;
          assetReturns.set(ticker, backtest.returns);
          assets[ticker] = this.summarizeAsset(backtest.equityCurve, backtest.returns, config.weights[ticker]);
        } else {
          assertPriceSeries(series);
          const returns = simpleReturns(series);
          const equity = returnsToEquity(returns, this.config.baseValue, series.bars[0].timestamp);
          assetReturns.set(ticker, returns);
          assets[ticker] = this.summarizeAsset(equity, returns, config.weights[ticker]);
        }
      }

      const aggregation = aggregateDetailed(assetReturns, config);
      const { returns } = aggregation;
      const origin = this.originTimestamp(this.pricesFor(prices, config.tickers[0], 'portfolio.tickers'), returns);
      const equityCurve = returnsToEquity(returns, this.config.baseValue, origin);
      const performance = computePerformanceMetrics(equityCurve, this.metricsOptions());

      const benchmark = config.benchmark
        ? this.compareToBenchmark(returns, this.pricesFor(prices, config.benchmark, 'portfolio.benchmark'))
        : null;

      const report: PortfolioReport = {
        runId,
        config,
        aggregation,
        equityCurve,
        performance,
        metrics: toMetricMap(performance),
        drawdowns: drawdownPeriods(equityCurve),
        risk: this.varCalculator.calculate(returns, this.config.varConfidenceLevels),
        correlation: correlationMatrix(assetReturns, config.tickers),
        benchmark,
        diversification: {
          ratio: diversificationRatio(aggregation),
          effectiveAssets: effectiveNumberOfAssets(config.weights)
        },
        advanced: this.research.analyze(returns, 'portfolio'),
        assets,
        backtests
      };

      this.logger.info('Portfolio analysis completed', {
        runId,
        observations: returns.values.length,
        sharpeRatio: performance.sharpeRatio,
        maxDrawdown: performance.maxDrawdown
      });
      this.emit('analysis:completed', { runId, kind: 'portfolio', report });
      return report;
    } catch (error) {
      this.logger.error('Portfolio analysis failed', error, { runId });
      throw error;
    }
  }

  private metricsOptions(): MetricsOptions {
    return { periodsPerYear: this.config.periodsPerYear, riskFreeRate: this.config.riskFreeRate };
  }

  private summarizeAsset(equity: EquityCurve, returns: ReturnSeries, weight: number): AssetSummary {
    const performance = computePerformanceMetrics(equity, this.metricsOptions());
    return {
      weight,
      annualizedReturn: performance.annualizedReturn,
      annualizedVolatility: performance.annualizedVolatility,
      sharpeRatio: performance.sharpeRatio,
      sortinoRatio: performance.sortinoRatio,
      maxDrawdown: performance.maxDrawdown,
      valueAtRisk: historicalVaR(returns.values, ASSET_VAR_CONFIDENCE)
    };
  }

  private pricesFor(prices: ReadonlyMap<string, PriceSeries>, ticker: string, field: string): PriceSeries {
    const series = prices.get(ticker);
    if (!series) {
      throw new InvalidConfigurationError(field, `No price series supplied for ${ticker}`);
    }
    return series;
  }

  /**
   * The bar the first aligned portfolio return is measured from: the bar
   * preceding it in the first constituent's own series.
   */
  private originTimestamp(prices: PriceSeries, returns: ReturnSeries): number {
    const first = returns.timestamps[0];
    const index = prices.bars.findIndex(bar => bar.timestamp === first);
    return prices.bars[index - 1].timestamp;
  }

  private compareToBenchmark(returns: ReturnSeries, benchmark: PriceSeries): AnalysisOutcome<BenchmarkStatistics> {
    assertPriceSeries(benchmark);
    try {
      const value = computeBenchmarkStatistics(returns, simpleReturns(benchmark), {
        ...this.metricsOptions(),
        minOverlap: this.config.minBenchmarkOverlap
      });
      return { status: 'ok', value };
    } catch (error) {
      if (error instanceof InsufficientOverlapError) {
        this.logger.warn('Skipping benchmark comparison', {
          benchmark: benchmark.symbol,
          required: error.required,
          available: error.available
        });
        return { status: 'skipped', reason: error.message, required: error.required, available: error.available };
      }
      throw error;
    }
  }
}

import { EventEmitter } from 'events';
import {
  EquityCurve,
  PositionSeries,
  PriceSeries,
  ReturnSeries,
  StrategySpec
} from '@quantbench/types';
import { Logger, equityToReturns } from '@quantbench/utils';
import { generatePositions } from '@quantbench/strategy';
import { simulate } from './BacktestSimulator';
import {
  DrawdownPeriod,
  MetricsOptions,
  PerformanceMetrics,
  computePerformanceMetrics,
  drawdownPeriods
} from './PerformanceMetrics';

export interface BacktestConfig extends MetricsOptions {
  baseValue: number;
}

export interface BacktestResult {
  symbol: string;
  strategy: StrategySpec;
  positions: PositionSeries;
  equityCurve: EquityCurve;
  returns: ReturnSeries;
  performance: PerformanceMetrics;
  drawdowns: DrawdownPeriod[];
}

/**
 * Runs one strategy over one price series: signal generation, equity
 * simulation and metrics. Emits `backtest:completed` with the result and
 * `backtest:ruined` when equity is floored at zero.
 */
export class BacktestingFramework extends EventEmitter {
  private logger: Logger;

  constructor(logger?: Logger) {
    super();
    this.logger = logger ?? new Logger('BacktestingFramework');
  }

  runBacktest(prices: PriceSeries, strategy: StrategySpec, config: BacktestConfig): BacktestResult {
    this.logger.info('Starting backtest', {
      symbol: prices.symbol,
      strategy: strategy.kind,
      bars: prices.bars.length
    });

    try {
      const positions = generatePositions(prices, strategy);
      const equityCurve = simulate(prices, positions, config.baseValue);
      const returns = equityToReturns(equityCurve);
      const performance = computePerformanceMetrics(equityCurve, config);

      if (equityCurve.ruinedAt !== null) {
        this.logger.warn('Equity floored at zero', {
          symbol: prices.symbol,
          ruinedAt: new Date(equityCurve.ruinedAt).toISOString()
        });
        this.emit('backtest:ruined', { symbol: prices.symbol, ruinedAt: equityCurve.ruinedAt });
      }

      const result: BacktestResult = {
        symbol: prices.symbol,
        strategy,
        positions,
        equityCurve,
        returns,
        performance,
        drawdowns: drawdownPeriods(equityCurve)
      };

      this.logger.info('Backtest completed', {
        symbol: prices.symbol,
        strategy: strategy.kind,
        sharpeRatio: performance.sharpeRatio,
        totalReturn: performance.totalReturn,
        maxDrawdown: performance.maxDrawdown
      });
      this.emit('backtest:completed', result);
      return result;
    } catch (error) {
      this.logger.error('Backtest failed', error, { symbol: prices.symbol, strategy: strategy.kind });
      throw error;
    }
  }
}

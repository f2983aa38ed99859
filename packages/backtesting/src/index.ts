/**
 * @quantbench/backtesting
 *
 * Single-asset backtests: equity simulation from a position series plus
 * return, risk and drawdown statistics over the resulting curve.
 *
 * @module @quantbench/backtesting
 */

export { simulate } from './BacktestSimulator';
export * from './PerformanceMetrics';
export * from './BacktestingFramework';

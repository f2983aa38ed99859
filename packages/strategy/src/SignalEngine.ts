import { parseStrategySpec } from '@quantbench/config';
import {
  InsufficientHistoryError,
  PositionSeries,
  PriceSeries,
  StrategyKind,
  StrategySpec
} from '@quantbench/types';
import { assertPriceSeries, timestampsOf } from '@quantbench/utils';
import { STRATEGY_RULES } from './rules';

/**
 * Convert a price series into a position series for one strategy.
 *
 * The strategy is validated first (unknown kinds and non-positive windows raise
 * InvalidConfigurationError); a series shorter than the strategy's lookback
 * raises InsufficientHistoryError instead of producing a partial signal.
 */
export function generatePositions(prices: PriceSeries, strategy: StrategySpec): PositionSeries {
  const spec = parseStrategySpec(strategy);
  assertPriceSeries(prices);
  return runRule(spec, prices);
}

function runRule<K extends StrategyKind>(spec: StrategySpec<K>, prices: PriceSeries): PositionSeries {
  const rule = STRATEGY_RULES[spec.kind];
  const required = rule.requiredBars(spec.params);

  if (prices.bars.length < required) {
    throw new InsufficientHistoryError(required, prices.bars.length, `${spec.kind} on ${prices.symbol}`);
  }

  return {
    strategy: spec.kind,
    warmupIndex: required - 1,
    timestamps: timestampsOf(prices),
    values: rule.positions(prices.bars, spec.params)
  };
}

/**
 * Number of bars a strategy needs before it can emit its first position.
 */
export function requiredHistory(strategy: StrategySpec): number {
  const spec = parseStrategySpec(strategy);
  return requiredBarsOf(spec);
}

function requiredBarsOf<K extends StrategyKind>(spec: StrategySpec<K>): number {
  return STRATEGY_RULES[spec.kind].requiredBars(spec.params);
}

export function strategyLabel(kind: StrategyKind): string {
  return STRATEGY_RULES[kind].label;
}

export function listStrategies(): StrategyKind[] {
  return Object.keys(STRATEGY_RULES).filter(isStrategyKind);
}

function isStrategyKind(value: string): value is StrategyKind {
  return Object.prototype.hasOwnProperty.call(STRATEGY_RULES, value);
}

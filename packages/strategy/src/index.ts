/**
 * @quantbench/strategy
 *
 * Signal engine. Each strategy is a tagged StrategySpec dispatched through one lookup
 * table; every rule reads only bars at or before the bar it positions.
 */

export { generatePositions, requiredHistory, strategyLabel, listStrategies } from './SignalEngine';
export { STRATEGY_RULES } from './rules';
export type { StrategyRule, StrategyTable } from './rules';
export * from './indicators';

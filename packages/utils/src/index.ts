/**
 * @quantbench/utils - Shared utilities for quantbench
 */

export * from './logger';
export * from './series';
export * from './rolling';
export * from './calendar';
export * from './stats';

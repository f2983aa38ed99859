/**
 * @quantbench/types
 *
 * Data model shared by every quantbench package: price and derived series,
 * strategy and portfolio configuration, regime labels, metric sentinels and
 * the typed analytics errors.
 */

export * from './market';
export * from './strategy';
export * from './portfolio';
export * from './analytics';
export * from './errors';

/**
 * @quantbench/config
 *
 * zod schemas for strategy specs, portfolio configs and analysis parameters,
 * plus the file/environment loader.
 */

export * from './schemas';
export * from './ConfigService';

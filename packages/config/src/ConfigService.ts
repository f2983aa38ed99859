import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as dotenv from 'dotenv';
import _ from 'lodash';
import { InvalidConfigurationError } from '@quantbench/types';
import { Logger } from '@quantbench/utils';
import { AnalysisConfig, parseAnalysisConfig } from './schemas';

export interface ConfigServiceOptions {
  configPath?: string;
  environment?: string;
  /** dotenv file read before environment overrides are applied */
  envFile?: string;
  logger?: Logger;
}

type EnvParser = (value: string) => unknown;

const toNumber: EnvParser = value => Number(value);

const toNumberList: EnvParser = value =>
  value.split(',').map(part => Number(part.trim()));

/**
 * Environment variables that override file configuration, keyed by variable
 * name. Values are parsed before validation so a malformed number still
 * surfaces as an InvalidConfigurationError.
 */
const ENV_OVERRIDES: Record<string, { path: string; parse: EnvParser }> = {
  QUANTBENCH_LOG_LEVEL: { path: 'logLevel', parse: value => value },
  QUANTBENCH_PERIODS_PER_YEAR: { path: 'periodsPerYear', parse: toNumber },
  QUANTBENCH_RISK_FREE_RATE: { path: 'riskFreeRate', parse: toNumber },
  QUANTBENCH_BASE_VALUE: { path: 'baseValue', parse: toNumber },
  QUANTBENCH_VAR_CONFIDENCE_LEVELS: { path: 'varConfidenceLevels', parse: toNumberList },
  QUANTBENCH_MIN_BENCHMARK_OVERLAP: { path: 'minBenchmarkOverlap', parse: toNumber },
  QUANTBENCH_HURST_MIN_LENGTH: { path: 'hurst.minLength', parse: toNumber },
  QUANTBENCH_REGIME_WINDOW: { path: 'regime.window', parse: toNumber },
  QUANTBENCH_REGIME_MIN_PERSISTENCE: { path: 'regime.minPersistence', parse: toNumber }
};

export class ConfigService extends EventEmitter {
  private config: AnalysisConfig | null = null;
  private logger: Logger;
  private configPath: string;
  private environment: string;
  private envFile?: string;

  constructor(options: ConfigServiceOptions = {}) {
    super();
    this.logger = options.logger ?? new Logger('ConfigService');
    this.configPath = options.configPath ?? './config';
    this.environment = options.environment ?? process.env.NODE_ENV ?? 'development';
    this.envFile = options.envFile;
  }

  /**
   * Load configuration from files and environment
   */
  async load(): Promise<AnalysisConfig> {
    this.logger.info('Loading configuration', {
      environment: this.environment,
      configPath: this.configPath
    });

    try {
      if (this.envFile) {
        dotenv.config({ path: this.envFile });
      }

      const baseConfig = await this.loadConfigFile('default.json');
      const envConfig = await this.loadConfigFile(`${this.environment}.json`);
      const merged = _.merge({}, baseConfig, envConfig);

      this.applyEnvironmentOverrides(merged);

      this.config = parseAnalysisConfig(merged);
      this.logger.info('Configuration loaded', {
        periodsPerYear: this.config.periodsPerYear,
        varConfidenceLevels: this.config.varConfidenceLevels
      });

      this.emit('config:loaded', this.config);
      return this.config;
    } catch (error) {
      this.logger.error('Failed to load configuration', error);
      throw error;
    }
  }

  /**
   * Validate an in-memory configuration object and make it current
   */
  use(raw: unknown): AnalysisConfig {
    this.config = parseAnalysisConfig(raw);
    this.emit('config:loaded', this.config);
    return this.config;
  }

  get(): AnalysisConfig {
    if (!this.config) {
      throw new InvalidConfigurationError('analysis', 'Configuration not loaded');
    }
    return _.cloneDeep(this.config);
  }

  private async loadConfigFile(filename: string): Promise<Record<string, unknown>> {
    const filePath = path.join(this.configPath, filename);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.warn(`Configuration file not found: ${filename}`);
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new InvalidConfigurationError(
        filename,
        `Configuration file ${filename} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!isRecord(parsed)) {
      throw new InvalidConfigurationError(filename, `Configuration file ${filename} must contain a JSON object`);
    }
    return parsed;
  }

  private applyEnvironmentOverrides(target: Record<string, unknown>): void {
    for (const [variable, override] of Object.entries(ENV_OVERRIDES)) {
      const value = process.env[variable];
      if (value !== undefined && value !== '') {
        _.set(target, override.path, override.parse(value));
        this.logger.debug(`Applied environment override: ${override.path}`);
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return _.isPlainObject(value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

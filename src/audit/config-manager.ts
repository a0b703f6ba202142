/**
 * Audit configuration
 *
 * Layers, later wins: built-in defaults, the first config file found
 * (YAML or JSON), environment variables (with .env files loaded through
 * dotenv), then explicit overrides from the command line.
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import yaml from 'js-yaml';
import { AuditError, AuditErrorType } from './utils/error-handler';
import { AuditLogger, LogLevel, createModuleLogger, isLogLevel } from './utils/logger';

export interface AuditConfig {
  /** Executable used to query MAAS */
  maasCommand: string;

  /** Kill the maas process after this many milliseconds */
  commandTimeout: number;

  /** Minimum size (bytes) for a disk to count as a large SSD */
  minDiskSizeBytes: number;

  /** Minimum number of connected physical NICs */
  minConnectedNics: number;

  logLevel: LogLevel;
}

export enum ConfigSource {
  DEFAULT = 'default',
  FILE = 'file',
  ENV = 'env',
  OVERRIDE = 'override'
}

export interface ConfigSourceInfo {
  source: ConfigSource;
  path?: string;
  values: Partial<AuditConfig>;
}

export interface ConfigManagerOptions {
  /** Explicit config file; skips the search when set */
  configPath?: string;

  /** Directory searched for audit.yaml / audit.yml / audit.json */
  configDir?: string;

  /** .env files to load before reading the environment */
  envFiles?: string[];

  /** Environment to read, defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_CONFIG: AuditConfig = {
  maasCommand: 'maas',
  commandTimeout: 120000,
  minDiskSizeBytes: 1_000_000_000_000,
  minConnectedNics: 3,
  logLevel: LogLevel.WARN
};

const CONFIG_FILE_NAMES = ['audit.yaml', 'audit.yml', 'audit.json'];

const ENV_VAR_MAPPINGS: Record<string, keyof AuditConfig> = {
  MAAS_CLI_PATH: 'maasCommand',
  MAAS_COMMAND_TIMEOUT: 'commandTimeout',
  MAAS_AUDIT_MIN_DISK_BYTES: 'minDiskSizeBytes',
  MAAS_AUDIT_MIN_CONNECTED_NICS: 'minConnectedNics',
  LOG_LEVEL: 'logLevel'
};

function configurationError(message: string, details?: Record<string, unknown>): AuditError {
  return new AuditError(message, AuditErrorType.CONFIGURATION_ERROR, { details });
}

export class AuditConfigManager {
  private options: ConfigManagerOptions;
  private logger: AuditLogger;
  private sources: ConfigSourceInfo[] = [];

  constructor(options: ConfigManagerOptions = {}, logger?: AuditLogger) {
    this.options = options;
    this.logger = logger || createModuleLogger('config');
  }

  /**
   * Resolve the effective configuration
   */
  load(overrides: Partial<AuditConfig> = {}): AuditConfig {
    this.sources = [{ source: ConfigSource.DEFAULT, values: { ...DEFAULT_CONFIG } }];
    let config: AuditConfig = { ...DEFAULT_CONFIG };

    const fileConfig = this.loadConfigFile();
    if (fileConfig) {
      config = { ...config, ...fileConfig.values };
      this.sources.push(fileConfig);
    }

    const envValues = this.loadEnvironmentVariables();
    if (Object.keys(envValues).length > 0) {
      config = { ...config, ...envValues };
      this.sources.push({ source: ConfigSource.ENV, values: envValues });
    }

    const definedOverrides = this.dropUndefined(overrides);
    if (Object.keys(definedOverrides).length > 0) {
      config = { ...config, ...definedOverrides };
      this.sources.push({ source: ConfigSource.OVERRIDE, values: definedOverrides });
    }

    this.validate(config);
    this.logger.debug('Configuration resolved', {
      sources: this.sources.map(info => info.path ?? info.source)
    });

    return config;
  }

  /**
   * Layers that contributed to the last load, lowest precedence first
   */
  getSources(): ConfigSourceInfo[] {
    return [...this.sources];
  }

  /**
   * Parse the config file, if any, keeping only known keys
   */
  private loadConfigFile(): ConfigSourceInfo | null {
    const configFile = this.findConfigFile();
    if (!configFile) {
      return null;
    }

    let raw: unknown;
    try {
      const content = fs.readFileSync(configFile, 'utf-8');
      raw = configFile.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
    } catch (error) {
      throw configurationError(`Failed to read configuration file ${configFile}`, {
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    // An empty YAML document loads as undefined
    if (raw === undefined || raw === null) {
      return { source: ConfigSource.FILE, path: configFile, values: {} };
    }

    if (typeof raw !== 'object' || Array.isArray(raw)) {
      throw configurationError(`Configuration file ${configFile} must contain a mapping`);
    }

    const values: Partial<AuditConfig> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!this.isConfigKey(key)) {
        this.logger.warn(`Ignoring unknown configuration key: ${key}`, { file: configFile });
        continue;
      }
      this.assign(values, key, value, configFile);
    }

    this.logger.info(`Loaded configuration from: ${configFile}`);
    return { source: ConfigSource.FILE, path: configFile, values };
  }

  /**
   * Explicit path, else the first of audit.yaml, audit.yml, audit.json in the config directory
   */
  private findConfigFile(): string | null {
    if (this.options.configPath) {
      if (!fs.existsSync(this.options.configPath)) {
        throw configurationError(`Configuration file not found: ${this.options.configPath}`);
      }
      return this.options.configPath;
    }

    const env = this.options.env ?? process.env;
    const configDir = this.options.configDir ?? env.CONFIG_DIR ?? path.join(process.cwd(), 'config');

    for (const fileName of CONFIG_FILE_NAMES) {
      const candidate = path.join(configDir, fileName);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }

    return null;
  }

  /**
   * Read mapped variables from the environment and the first .env file found
   */
  private loadEnvironmentVariables(): Partial<AuditConfig> {
    const envFiles = this.options.envFiles ?? [
      path.join(process.cwd(), '.env.local'),
      path.join(process.cwd(), '.env')
    ];
    const env = this.options.env ?? process.env;

    // Real environment variables take precedence over .env entries
    let fileEnv: Record<string, string> = {};
    for (const envFile of envFiles) {
      if (fs.existsSync(envFile)) {
        fileEnv = dotenv.parse(fs.readFileSync(envFile));
        this.logger.debug(`Loaded environment variables from: ${envFile}`);
        break;
      }
    }

    const values: Partial<AuditConfig> = {};
    for (const [envVar, key] of Object.entries(ENV_VAR_MAPPINGS)) {
      const envValue = env[envVar] ?? fileEnv[envVar];
      if (envValue !== undefined && envValue !== '') {
        this.assign(values, key, envValue, envVar);
      }
    }
    return values;
  }

  /**
   * Type-check a single value and store it under its key
   */
  private assign(target: Partial<AuditConfig>, key: keyof AuditConfig, value: unknown, origin: string): void {
    switch (key) {
      case 'maasCommand':
        if (typeof value !== 'string') {
          throw configurationError(`${origin}: ${key} must be a string`, { value });
        }
        target.maasCommand = value;
        return;

      case 'logLevel': {
        const level = typeof value === 'string' ? value.toLowerCase() : value;
        if (typeof level !== 'string' || !isLogLevel(level)) {
          throw configurationError(`${origin}: unknown log level ${String(value)}`);
        }
        target.logLevel = level;
        return;
      }

      case 'commandTimeout':
      case 'minDiskSizeBytes':
      case 'minConnectedNics':
        target[key] = this.toNumber(value, key, origin);
        return;
    }
  }

  /** Accepts numbers and numeric strings */
  private toNumber(value: unknown, key: string, origin: string): number {
    const num = typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value;
    if (typeof num !== 'number' || !Number.isFinite(num)) {
      throw configurationError(`${origin}: ${key} must be a number`, { value });
    }
    return num;
  }

  /**
   * Range checks on the merged configuration
   */
  private validate(config: AuditConfig): void {
    if (config.maasCommand.trim() === '') {
      throw configurationError('maasCommand must not be empty');
    }
    if (config.commandTimeout <= 0) {
      throw configurationError('commandTimeout must be positive', { value: config.commandTimeout });
    }
    if (config.minDiskSizeBytes <= 0) {
      throw configurationError('minDiskSizeBytes must be positive', { value: config.minDiskSizeBytes });
    }
    if (!Number.isInteger(config.minConnectedNics) || config.minConnectedNics <= 0) {
      throw configurationError('minConnectedNics must be a positive integer', {
        value: config.minConnectedNics
      });
    }
  }

  /** Keys of AuditConfig, as found in DEFAULT_CONFIG */
  private isConfigKey(key: string): key is keyof AuditConfig {
    return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
  }

  /** Unset CLI options must not mask lower layers */
  private dropUndefined(overrides: Partial<AuditConfig>): Partial<AuditConfig> {
    const result: Partial<AuditConfig> = {};
    if (overrides.maasCommand !== undefined) result.maasCommand = overrides.maasCommand;
    if (overrides.commandTimeout !== undefined) result.commandTimeout = overrides.commandTimeout;
    if (overrides.minDiskSizeBytes !== undefined) result.minDiskSizeBytes = overrides.minDiskSizeBytes;
    if (overrides.minConnectedNics !== undefined) result.minConnectedNics = overrides.minConnectedNics;
    if (overrides.logLevel !== undefined) result.logLevel = overrides.logLevel;
    return result;
  }
}

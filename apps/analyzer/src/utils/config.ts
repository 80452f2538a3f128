import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import type { PhasePolicy } from '@match-digest/shared-types';
import type { LoggerConfig } from './logger.js';
import { ConfigurationError } from './errors.js';

dotenv.config();

/**
 * Application configuration
 */
export interface AppConfig {
  analysis: {
    phasePolicy?: PhasePolicy;
    partnershipBreakdownMinRuns: number;
  };
  data: {
    matchDataDir: string;
    outputPath: string;
  };
  logging: LoggerConfig;
}

function defaultConfigDir(): string {
  return process.env.CONFIG_DIR || path.join(process.cwd(), 'config');
}

/**
 * Load configuration from file
 */
function loadConfigFile(configDir: string): AppConfig {
  const env = process.env.NODE_ENV || 'development';

  // Try environment-specific config first
  let configPath = path.join(configDir, `${env}.json`);
  if (!fs.existsSync(configPath)) {
    configPath = path.join(configDir, 'default.json');
  }

  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  const configData = fs.readFileSync(configPath, 'utf-8');
  try {
    return JSON.parse(configData);
  } catch (error) {
    throw new ConfigurationError(
      `Configuration file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function envInt(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return undefined;
  }

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Merge config with environment variables
 */
function mergeEnvConfig(config: AppConfig): AppConfig {
  const powerplayOvers = envInt('POWERPLAY_OVERS');
  const deathStartOver = envInt('DEATH_START_OVER');
  const phasePolicy =
    powerplayOvers !== undefined && deathStartOver !== undefined
      ? { powerplayOvers, deathStartOver }
      : config.analysis.phasePolicy;

  return {
    ...config,
    analysis: {
      ...config.analysis,
      phasePolicy,
      partnershipBreakdownMinRuns:
        envInt('PARTNERSHIP_BREAKDOWN_MIN_RUNS') ?? config.analysis.partnershipBreakdownMinRuns,
    },
    data: {
      ...config.data,
      matchDataDir: process.env.MATCH_DATA_DIR || config.data.matchDataDir,
      outputPath: process.env.DIGEST_OUTPUT_PATH || config.data.outputPath,
    },
    logging: {
      ...config.logging,
      level: process.env.LOG_LEVEL || config.logging.level,
      directory: process.env.LOG_DIRECTORY || config.logging.directory,
    },
  };
}

/**
 * Get application configuration
 */
export function getConfig(configDir: string = defaultConfigDir()): AppConfig {
  const fileConfig = loadConfigFile(configDir);
  return mergeEnvConfig(fileConfig);
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  if (config.analysis.partnershipBreakdownMinRuns < 0) {
    throw new ConfigurationError('Configuration error: partnershipBreakdownMinRuns must not be negative');
  }

  const policy = config.analysis.phasePolicy;
  if (policy) {
    if (policy.powerplayOvers < 0) {
      throw new ConfigurationError('Configuration error: powerplayOvers must not be negative');
    }
    if (policy.deathStartOver < policy.powerplayOvers) {
      throw new ConfigurationError('Configuration error: deathStartOver must not precede the end of the powerplay');
    }
  }

  if (config.logging.maxFiles <= 0) {
    throw new ConfigurationError('Configuration error: logging.maxFiles must be positive');
  }

  if (!config.data.matchDataDir) {
    throw new ConfigurationError('Configuration error: Match data directory not specified');
  }
}

/**
 * Singleton config instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get or create config instance
 */
export function loadConfig(configDir?: string): AppConfig {
  if (!configInstance) {
    configInstance = getConfig(configDir);
    validateConfig(configInstance);
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

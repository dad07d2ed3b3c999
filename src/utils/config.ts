import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export type OutputFormatName = 'dot' | 'mermaid' | 'json';

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface GraphConfig {
  concurrency: number;
  maxFileSize: number;
  defaultFormat: OutputFormatName;
}

export interface Config {
  logging: Readonly<LoggingConfig>;
  graph: Readonly<GraphConfig>;
  nodeEnv: string;
}

export function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

export function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

function getPositiveEnvVar(key: string, defaultValue: number): number {
  const value = getEnvVarAsNumber(key, defaultValue);
  if (value < 1) {
    throw new Error(`Environment variable ${key} must be at least 1`);
  }
  return value;
}

function getFormatEnvVar(key: string, defaultValue: OutputFormatName): OutputFormatName {
  const value = getEnvVar(key, defaultValue);
  if (value === 'dot' || value === 'mermaid' || value === 'json') {
    return value;
  }
  throw new Error(`Environment variable ${key} must be one of dot, mermaid, json`);
}

export const config: Readonly<Config> = Object.freeze({
  logging: Object.freeze({
    level: getEnvVar('LOG_LEVEL', 'warn'),
    file: process.env.LOG_FILE || undefined,
  }),
  graph: Object.freeze({
    concurrency: getPositiveEnvVar('DEPWEAVE_CONCURRENCY', 8),
    maxFileSize: getPositiveEnvVar('DEPWEAVE_MAX_FILE_SIZE', 5 * 1024 * 1024),
    defaultFormat: getFormatEnvVar('DEPWEAVE_DEFAULT_FORMAT', 'dot'),
  }),
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
});

/**
 * Environment Configuration
 *
 * Loads and validates environment variables, providing a typed configuration object.
 * Malformed numeric values fail fast; a missing LLM key is not an error, the
 * pipeline then runs with the fixed tool order and the formatting-only rewriter.
 *
 * Usage:
 *   import { getConfig } from './config';
 *   console.log(getConfig().llm.model);
 */

import 'dotenv/config';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';

export type EnvRecord = Record<string, string | undefined>;

/**
 * Process-level settings read by the logger
 */
export interface AppConfig {
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isTest: boolean;
  logLevel: string;
  /** pino-pretty output instead of JSON lines */
  prettyLogs: boolean;
}

export interface LLMSettings {
  apiKey: string;
  hasApiKey: boolean;
  baseUrl: string;
  model: string;
  /** HTTP timeout for a single chat call, in milliseconds */
  timeoutMs: number;
  temperature: number;
}

export interface LatexSettings {
  compiler: string;
  timeoutMs: number;
}

export interface OutputSettings {
  dir: string;
}

export interface Config {
  llm: LLMSettings;
  latex: LatexSettings;
  output: OutputSettings;
}

export const DEFAULT_BASE_URL = 'https://api.deepseek.com';
export const DEFAULT_MODEL = 'deepseek-chat';
export const DEFAULT_LLM_TIMEOUT_SECONDS = 30;
export const DEFAULT_LATEX_TIMEOUT_SECONDS = 60;

// =============================================================================
// Validation Helpers
// =============================================================================

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function getEnv(env: EnvRecord, key: string): string {
  return (env[key] || '').trim();
}

function getEnvWithDefault(env: EnvRecord, key: string, defaultValue: string): string {
  return getEnv(env, key) || defaultValue;
}

/**
 * Get a positive numeric environment variable
 */
function getEnvNumber(env: EnvRecord, key: string, defaultValue: number): number {
  const value = getEnv(env, key);
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a positive number.`
    );
  }
  return parsed;
}

function getEnvFloat(env: EnvRecord, key: string, defaultValue: number, max: number): number {
  const value = getEnv(env, key);
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > max) {
    throw new ConfigurationError(
      `Invalid value for ${key}: "${value}". Expected a number between 0 and ${max}.`
    );
  }
  return parsed;
}

function parseNodeEnv(value: string): NodeEnv {
  if (value === 'production' || value === 'test' || value === 'development') {
    return value;
  }
  return 'production';
}

function defaultLogLevel(nodeEnv: NodeEnv): string {
  switch (nodeEnv) {
    case 'test':
      return 'silent';
    case 'development':
      return 'debug';
    default:
      return 'info';
  }
}

// =============================================================================
// Configuration Loader
// =============================================================================

/**
 * Logger settings. An unset NODE_ENV is an end-user run: info level, and
 * pretty output only when stderr is a terminal.
 */
export function loadAppConfig(env: EnvRecord = process.env, interactive = false): AppConfig {
  const nodeEnv = parseNodeEnv(getEnv(env, 'NODE_ENV'));

  return {
    nodeEnv,
    isDevelopment: nodeEnv === 'development',
    isTest: nodeEnv === 'test',
    logLevel: getEnvWithDefault(env, 'LOG_LEVEL', defaultLogLevel(nodeEnv)),
    prettyLogs: nodeEnv === 'development' || (interactive && nodeEnv !== 'test'),
  };
}

export function loadConfig(env: EnvRecord = process.env): Config {
  const apiKey = getEnv(env, 'DEEPSEEK_API_KEY');

  return {
    llm: {
      apiKey,
      hasApiKey: apiKey.length > 0,
      baseUrl: getEnvWithDefault(env, 'DEEPSEEK_BASE_URL', DEFAULT_BASE_URL),
      model: getEnvWithDefault(env, 'DEEPSEEK_MODEL', DEFAULT_MODEL),
      timeoutMs: getEnvNumber(env, 'DEEPSEEK_TIMEOUT', DEFAULT_LLM_TIMEOUT_SECONDS) * 1000,
      temperature: getEnvFloat(env, 'LLM_TEMPERATURE', 0.2, 2),
    },

    latex: {
      compiler: getEnvWithDefault(env, 'LATEX_COMPILER', 'pdflatex'),
      timeoutMs: getEnvNumber(env, 'LATEX_TIMEOUT', DEFAULT_LATEX_TIMEOUT_SECONDS) * 1000,
    },

    output: {
      dir: getEnvWithDefault(env, 'OUTPUT_DIR', 'output'),
    },
  };
}

// =============================================================================
// Export
// =============================================================================

let cached: Config | null = null;

/**
 * Application configuration loaded from the process environment.
 * Read once; throws ConfigurationError on malformed values.
 */
export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}

export { ConfigurationError };

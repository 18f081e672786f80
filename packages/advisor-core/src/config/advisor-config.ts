/**
 * Advisor Configuration Loader
 *
 * Loads advisor configuration with support for:
 * - Optional fields with sensible defaults
 * - A local or user-level JSON config file
 * - Environment variable overrides
 * - Runtime overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import _ from 'lodash';
import { ConfigError } from '../errors';
import { errorMessage, isRecord } from '../shared/guards';
import { createAgentLogger, type LogLevel } from '../tracing';

const log = createAgentLogger('AdvisorConfig');

/**
 * Hard upper bound on supervisor turns. Configuration may lower it, never raise it.
 */
export const HARD_TURN_CAP = 5;

/**
 * Full advisor configuration
 */
export interface AdvisorConfig {
  // LLM settings
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-request LLM timeout in ms */
  timeout?: number;
  /** Retries performed by the LLM client itself */
  maxRetries?: number;

  // Orchestration settings
  /** Supervisor turn cap (1..HARD_TURN_CAP) */
  maxTurns?: number;
  /** Retries per collaborator call at the integration boundary */
  collaboratorRetries?: number;
  /** Base backoff between collaborator retries in ms */
  retryDelayMs?: number;
  /** Wall-clock limit for a whole run in ms (0 disables) */
  runTimeoutMs?: number;
  /** Length of observation previews embedded in worker messages */
  previewLength?: number;

  logLevel?: LogLevel;
}

export type ResolvedAdvisorConfig = AdvisorConfig & Required<Pick<AdvisorConfig,
  'model' | 'temperature' | 'timeout' | 'maxRetries' | 'maxTurns' |
  'collaboratorRetries' | 'retryDelayMs' | 'runTimeoutMs' | 'previewLength' | 'logLevel'
>>;

export const DEFAULT_ADVISOR_CONFIG: ResolvedAdvisorConfig = {
  model: 'claude-3-5-haiku-latest',
  temperature: 0,
  timeout: 60000,
  maxRetries: 2,
  maxTurns: HARD_TURN_CAP,
  collaboratorRetries: 1,
  retryDelayMs: 250,
  runTimeoutMs: 0,
  previewLength: 200,
  logLevel: 'info',
};

/**
 * Config file search paths (in priority order)
 */
const CONFIG_PATHS = [
  './advisor.config.json',
  './.advisor.config.json',
  path.join(os.homedir(), '.pension-advisor', 'advisor.config.json'),
];

/**
 * Environment variable mappings
 */
const ENV_MAPPINGS = {
  apiKey: 'ANTHROPIC_API_KEY',
  baseUrl: 'ANTHROPIC_API_URL',
  model: 'ADVISOR_MODEL',
  temperature: 'ADVISOR_TEMPERATURE',
  maxTokens: 'ADVISOR_MAX_TOKENS',
  timeout: 'ADVISOR_LLM_TIMEOUT',
  maxRetries: 'ADVISOR_LLM_RETRIES',
  maxTurns: 'ADVISOR_MAX_TURNS',
  collaboratorRetries: 'ADVISOR_RETRIES',
  retryDelayMs: 'ADVISOR_RETRY_DELAY_MS',
  runTimeoutMs: 'ADVISOR_TIMEOUT_MS',
  previewLength: 'ADVISOR_PREVIEW_LENGTH',
  logLevel: 'ADVISOR_LOG_LEVEL',
} as const satisfies Record<keyof AdvisorConfig, string>;

const LOG_LEVEL_VALUES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVEL_VALUES.some((level) => level === value);
}

/**
 * Find the first existing config file
 */
function findConfigFile(customPath?: string): string | null {
  const paths = customPath ? [customPath, ...CONFIG_PATHS] : CONFIG_PATHS;

  for (const configPath of paths) {
    const absolutePath = path.isAbsolute(configPath)
      ? configPath
      : path.resolve(process.cwd(), configPath);

    if (fs.existsSync(absolutePath)) {
      return absolutePath;
    }
  }

  return null;
}

function readNumber(value: unknown, min: number, max = Number.POSITIVE_INFINITY): number | undefined {
  if (typeof value !== 'number' || Number.isNaN(value)) return undefined;
  return Math.max(min, Math.min(max, value));
}

/**
 * Validate and sanitize a raw config object (from file or env)
 */
export function sanitizeConfig(raw: Record<string, unknown>): Partial<AdvisorConfig> {
  const validated: Partial<AdvisorConfig> = {};

  if (typeof raw.apiKey === 'string') validated.apiKey = raw.apiKey;
  if (typeof raw.baseUrl === 'string') validated.baseUrl = raw.baseUrl;
  if (typeof raw.model === 'string') validated.model = raw.model;
  validated.temperature = readNumber(raw.temperature, 0, 1);
  if (typeof raw.maxTokens === 'number' && raw.maxTokens > 0) {
    validated.maxTokens = Math.floor(raw.maxTokens);
  }
  if (typeof raw.timeout === 'number' && raw.timeout > 0) validated.timeout = raw.timeout;
  if (typeof raw.maxRetries === 'number' && raw.maxRetries >= 0) {
    validated.maxRetries = Math.floor(raw.maxRetries);
  }
  if (typeof raw.maxTurns === 'number' && raw.maxTurns >= 1) {
    validated.maxTurns = Math.floor(raw.maxTurns);
  }
  if (typeof raw.collaboratorRetries === 'number' && raw.collaboratorRetries >= 0) {
    validated.collaboratorRetries = Math.floor(raw.collaboratorRetries);
  }
  validated.retryDelayMs = readNumber(raw.retryDelayMs, 0);
  validated.runTimeoutMs = readNumber(raw.runTimeoutMs, 0);
  if (typeof raw.previewLength === 'number' && raw.previewLength >= 1) {
    validated.previewLength = Math.floor(raw.previewLength);
  }
  if (isLogLevel(raw.logLevel)) validated.logLevel = raw.logLevel;

  return validated;
}

/**
 * Load config from JSON file
 */
function loadConfigFile(filePath: string): Partial<AdvisorConfig> {
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      log.warn('Config file is not a JSON object, ignoring', { filePath });
      return {};
    }
    return sanitizeConfig(parsed);
  } catch (error) {
    log.warn('Failed to load config file', { filePath, error: errorMessage(error) });
    return {};
  }
}

/**
 * Load config from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<AdvisorConfig> {
  const raw: Record<string, unknown> = {};

  for (const [key, envName] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envName];
    if (value === undefined || value === '') continue;

    const numeric = Number(value);
    raw[key] = ['apiKey', 'baseUrl', 'model', 'logLevel'].includes(key) || Number.isNaN(numeric)
      ? value
      : numeric;
  }

  return sanitizeConfig(raw);
}

/**
 * Reject values that cannot be made safe by clamping
 */
function validateConfig(config: ResolvedAdvisorConfig): ResolvedAdvisorConfig {
  if (!Number.isInteger(config.maxTurns) || config.maxTurns < 1) {
    throw new ConfigError(`maxTurns must be a positive integer, got ${config.maxTurns}`, 'maxTurns');
  }
  if (!Number.isInteger(config.previewLength) || config.previewLength < 1) {
    throw new ConfigError(`previewLength must be a positive integer, got ${config.previewLength}`, 'previewLength');
  }
  if (config.maxTurns > HARD_TURN_CAP) {
    log.warn('maxTurns above the hard cap, clamping', { requested: config.maxTurns, cap: HARD_TURN_CAP });
    return { ...config, maxTurns: HARD_TURN_CAP };
  }
  return config;
}

let cachedConfig: ResolvedAdvisorConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load advisor configuration
 *
 * Priority (highest to lowest):
 * 1. Runtime overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export function loadAdvisorConfig(
  overrides?: Partial<AdvisorConfig>,
  customConfigPath?: string,
  forceReload = false
): ResolvedAdvisorConfig {
  if (cachedConfig && !forceReload && !overrides && !customConfigPath) {
    return cachedConfig;
  }

  const configPath = findConfigFile(customConfigPath);
  const fileConfig = configPath ? loadConfigFile(configPath) : {};

  if (configPath) {
    log.debug('Loaded config file', { configPath });
    cachedConfigPath = configPath;
  }

  const envConfig = loadEnvConfig();

  const merged: ResolvedAdvisorConfig = {
    ...DEFAULT_ADVISOR_CONFIG,
    ..._.omitBy(fileConfig, _.isNil),
    ..._.omitBy(envConfig, _.isNil),
    ..._.omitBy(overrides ?? {}, _.isNil),
  };

  const validated = validateConfig(merged);

  log.debug('Resolved advisor config', {
    model: validated.model,
    maxTurns: validated.maxTurns,
    collaboratorRetries: validated.collaboratorRetries,
    hasApiKey: !!validated.apiKey,
  });

  if (!overrides && !customConfigPath) {
    cachedConfig = validated;
  }

  return validated;
}

/**
 * Get the path of the currently loaded config file
 */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}

/**
 * Clear cached config (useful for testing or hot-reload)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

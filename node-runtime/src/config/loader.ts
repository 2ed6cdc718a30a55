import { EngineConfigSchema } from '../schemas/index.js';
import type { EngineConfig } from '../types/index.js';
import { ConfigError } from '../exception/errors.js';
import {
  DEFAULT_WIZARDS_DIR,
  NAVIGATION,
  PRODUCTION_RETENTION,
  SCREENSHOT_QUALITY,
  SETTLE,
  TIMEOUTS,
  VIEWPORT,
} from './defaults.js';

export const ENV_PREFIX = 'WIZARD_RUNNER_';

type Env = Record<string, string | undefined>;

function envKey(key: string): string {
  return `${ENV_PREFIX}${key}`;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[envKey(key)] ?? defaultValue;
}

function getEnvOptional(env: Env, key: string): string | undefined {
  const value = env[envKey(key)];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[envKey(key)];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

// Anything but a whole decimal number becomes NaN so validation names the key.
function getEnvInt(env: Env, key: string, defaultValue: number): number {
  const value = getEnvOptional(env, key);
  if (value === undefined) return defaultValue;
  return /^-?\d+$/.test(value.trim()) ? Number(value) : NaN;
}

/**
 * Builds the engine configuration from WIZARD_RUNNER_* variables.
 * Throws ConfigError when a value is out of range or the timeout
 * hierarchy is broken.
 */
export function loadConfig(env: Env = process.env): EngineConfig {
  const headless = getEnvBool(env, 'HEADLESS', true);
  const mode = getEnvOrDefault(env, 'MODE', headless ? 'production' : 'interactive');

  const candidate = {
    browserType: getEnvOrDefault(env, 'BROWSER', 'chromium'),
    headless,
    slowMoMs: getEnvInt(env, 'SLOW_MO_MS', 0),
    viewport: {
      width: getEnvInt(env, 'VIEWPORT_WIDTH', VIEWPORT.width),
      height: getEnvInt(env, 'VIEWPORT_HEIGHT', VIEWPORT.height),
    },
    userAgent: getEnvOptional(env, 'USER_AGENT'),
    mode: mode,
    screenshotQuality: getEnvInt(env, 'SCREENSHOT_QUALITY', SCREENSHOT_QUALITY),
    productionRetention: getEnvInt(env, 'PRODUCTION_RETENTION', PRODUCTION_RETENTION),
    timeouts: {
      selectStrategyTimeoutMs: getEnvInt(env, 'SELECT_STRATEGY_TIMEOUT_MS', TIMEOUTS.selectStrategyTimeoutMs),
      operationTimeoutMs: getEnvInt(env, 'OPERATION_TIMEOUT_MS', TIMEOUTS.operationTimeoutMs),
      navigationTimeoutMs: getEnvInt(env, 'NAVIGATION_TIMEOUT_MS', TIMEOUTS.navigationTimeoutMs),
      executionTimeoutMs: getEnvInt(env, 'EXECUTION_TIMEOUT_MS', TIMEOUTS.executionTimeoutMs),
      hostRequestTimeoutMs: getEnvInt(env, 'HOST_REQUEST_TIMEOUT_MS', TIMEOUTS.hostRequestTimeoutMs),
    },
    navigation: {
      maxRetries: getEnvInt(env, 'NAVIGATION_MAX_RETRIES', NAVIGATION.maxRetries),
      retryDelayMs: getEnvInt(env, 'NAVIGATION_RETRY_DELAY_MS', NAVIGATION.retryDelayMs),
      waitUntil: getEnvOrDefault(env, 'NAVIGATION_WAIT_UNTIL', NAVIGATION.waitUntil),
    },
    settle: { ...SETTLE },
    wizardsDir: getEnvOrDefault(env, 'WIZARDS_DIR', DEFAULT_WIZARDS_DIR),
    runsDir: getEnvOptional(env, 'RUNS_DIR'),
    logLevel: getEnvOrDefault(env, 'LOG_LEVEL', 'info'),
  };

  return validateConfig(candidate);
}

export function validateConfig(candidate: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

let configInstance: EngineConfig | null = null;

export function getConfig(): EngineConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// Allow resetting config (useful for testing)
export function resetConfig(): void {
  configInstance = null;
}

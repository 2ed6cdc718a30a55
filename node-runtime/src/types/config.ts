import type { ExecutionMode } from './execution.js';

export type BrowserType = 'chromium' | 'firefox' | 'webkit';

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Every bound the engine waits on. Ordered from innermost to outermost:
 * selectStrategy < operation < navigation < execution < hostRequest.
 */
export interface TimeoutConfig {
  selectStrategyTimeoutMs: number;
  operationTimeoutMs: number;
  navigationTimeoutMs: number;
  executionTimeoutMs: number;
  hostRequestTimeoutMs: number;
}

export interface NavigationRetryConfig {
  maxRetries: number;
  retryDelayMs: number;
  waitUntil: WaitUntil;
}

export interface SettleConfig {
  afterNavigationMs: number;
  afterFieldMs: number;
  afterEnterMs: number;
  afterContinueMs: number;
  afterGroupItemMs: number;
}

export interface EngineConfig {
  browserType: BrowserType;
  headless: boolean;
  slowMoMs: number;
  viewport: { width: number; height: number };
  userAgent?: string;
  mode: ExecutionMode;
  screenshotQuality: number;
  productionRetention: number;
  timeouts: TimeoutConfig;
  navigation: NavigationRetryConfig;
  settle: SettleConfig;
  wizardsDir: string;
  runsDir?: string;
  logLevel: LogLevel;
}

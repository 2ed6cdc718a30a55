import type { NavigationRetryConfig, SettleConfig, TimeoutConfig } from '../types/index.js';

// ── Timeouts (ms) ───────────────────────────────────────────

export const TIMEOUTS: TimeoutConfig = {
  selectStrategyTimeoutMs: 5_000,
  operationTimeoutMs: 10_000,
  navigationTimeoutMs: 20_000,
  executionTimeoutMs: 180_000,
  hostRequestTimeoutMs: 240_000,
};

// ── Navigation retry ────────────────────────────────────────

// Tuned against targets that either load within a few seconds or hang until
// the timeout; short attempts with a pause in between recover most stalls.
export const NAVIGATION: NavigationRetryConfig = {
  maxRetries: 4,
  retryDelayMs: 2_000,
  waitUntil: 'networkidle',
};

// ── Settle pauses (ms) ──────────────────────────────────────

export const SETTLE: SettleConfig = {
  afterNavigationMs: 1_000,
  afterFieldMs: 300,
  afterEnterMs: 500,
  afterContinueMs: 1_500,
  afterGroupItemMs: 500,
};

// ── Browser ─────────────────────────────────────────────────

export const VIEWPORT = { width: 1280, height: 1024 } as const;

export const SCREENSHOT_QUALITY = 80;

export const PRODUCTION_RETENTION = 1;

export const DEFAULT_WIZARDS_DIR = './wizards';

export const RESULT_TEXT_MAX_CHARS = 2_000;

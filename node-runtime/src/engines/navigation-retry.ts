import type { Logger } from '../logging/logger.js';
import type { NavigationRetryConfig } from '../types/index.js';
import { NavigationError, describeCause } from '../exception/errors.js';
import type { BrowserPage } from './browser-page.js';

export interface NavigationOptions extends NavigationRetryConfig {
  navigationTimeoutMs: number;
}

export interface NavigationAttempt {
  attempt: number;
  maxAttempts: number;
  ok: boolean;
  error?: string;
}

interface RetryState {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  lastError: unknown;
}

/**
 * Loads `url`, retrying after a fixed pause. `maxRetries` retries means at
 * most `maxRetries + 1` calls to page.goto. Resolves with the attempt that
 * succeeded; throws NavigationError once the budget is spent.
 */
export async function navigateWithRetry(
  page: BrowserPage,
  url: string,
  options: NavigationOptions,
  logger: Logger,
  onAttempt?: (attempt: NavigationAttempt) => void,
): Promise<number> {
  const state: RetryState = {
    attempt: 0,
    maxAttempts: options.maxRetries + 1,
    delayMs: options.retryDelayMs,
    lastError: undefined,
  };

  while (state.attempt < state.maxAttempts) {
    state.attempt++;

    if (state.attempt > 1) {
      logger.warn({ attempt: state.attempt, maxAttempts: state.maxAttempts, delayMs: state.delayMs }, 'Retrying navigation');
      await page.waitForTimeout(state.delayMs);
    }

    try {
      await page.goto(url, { waitUntil: options.waitUntil, timeout: options.navigationTimeoutMs });
      logger.info({ attempt: state.attempt, maxAttempts: state.maxAttempts }, 'Navigation succeeded');
      onAttempt?.({ attempt: state.attempt, maxAttempts: state.maxAttempts, ok: true });
      return state.attempt;
    } catch (error) {
      state.lastError = error;
      const message = describeCause(error);
      logger.warn({ attempt: state.attempt, maxAttempts: state.maxAttempts, error: message }, 'Navigation attempt failed');
      onAttempt?.({ attempt: state.attempt, maxAttempts: state.maxAttempts, ok: false, error: message });
    }
  }

  throw new NavigationError(url, state.attempt, state.lastError);
}

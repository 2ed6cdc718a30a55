import { chromium, firefox, webkit } from 'playwright';
import type { Logger } from '../logging/logger.js';
import type { EngineConfig } from '../types/index.js';
import { describeCause } from '../exception/errors.js';
import type { BrowserPage, LaunchedBrowser } from './browser-page.js';
import { navigateWithRetry } from './navigation-retry.js';
import type { NavigationAttempt } from './navigation-retry.js';

export interface BrowserLauncher {
  launch(config: EngineConfig): Promise<LaunchedBrowser>;
}

const BROWSER_TYPES = { chromium, firefox, webkit };

export const playwrightLauncher: BrowserLauncher = {
  async launch(config) {
    const browser = await BROWSER_TYPES[config.browserType].launch({
      headless: config.headless,
      slowMo: config.slowMoMs,
      timeout: config.timeouts.navigationTimeoutMs,
    });

    try {
      const context = await browser.newContext({
        viewport: config.viewport,
        userAgent: config.userAgent,
      });
      return { context, close: () => browser.close() };
    } catch (error) {
      await browser.close();
      throw error;
    }
  },
};

/**
 * One isolated browser context and page for exactly one execution.
 */
export class BrowserSession {
  private closed = false;

  private constructor(
    private browser: LaunchedBrowser,
    readonly page: BrowserPage,
    private config: EngineConfig,
    private logger: Logger,
  ) {}

  static async open(launcher: BrowserLauncher, config: EngineConfig, logger: Logger): Promise<BrowserSession> {
    const browser = await launcher.launch(config);

    try {
      // Every page operation is bounded from here on; nothing falls back to
      // the library's own default.
      browser.context.setDefaultTimeout(config.timeouts.operationTimeoutMs);
      browser.context.setDefaultNavigationTimeout(config.timeouts.navigationTimeoutMs);
      const page = await browser.context.newPage();

      logger.info(
        { browser: config.browserType, headless: config.headless, viewport: config.viewport },
        'Browser session opened',
      );
      return new BrowserSession(browser, page, config, logger);
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        logger.warn({ error: describeCause(closeError) }, 'Failed to close browser after setup error');
      });
      throw error;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  navigate(url: string, onAttempt?: (attempt: NavigationAttempt) => void): Promise<number> {
    return navigateWithRetry(
      this.page,
      url,
      { ...this.config.navigation, navigationTimeoutMs: this.config.timeouts.navigationTimeoutMs },
      this.logger,
      onAttempt,
    );
  }

  /**
   * Idempotent. Close failures are logged, never thrown, so they cannot
   * replace the outcome of the run.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.browser.context.close();
    } catch (error) {
      this.logger.warn({ error: describeCause(error) }, 'Failed to close browser context');
    }

    try {
      await this.browser.close();
      this.logger.info('Browser session closed');
    } catch (error) {
      this.logger.warn({ error: describeCause(error) }, 'Failed to close browser');
    }
  }
}

/**
 * Opens a session, runs `fn` and closes the session on every exit path.
 */
export async function withBrowserSession<T>(
  launcher: BrowserLauncher,
  config: EngineConfig,
  logger: Logger,
  fn: (session: BrowserSession) => Promise<T>,
): Promise<T> {
  const session = await BrowserSession.open(launcher, config, logger);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

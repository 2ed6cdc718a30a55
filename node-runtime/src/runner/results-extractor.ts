import type { Logger } from '../logging/logger.js';
import type { ResultsDeclaration } from '../types/index.js';
import type { BrowserPage } from '../engines/browser-page.js';
import { resolveControl } from '../engines/selectors.js';
import { describeCause } from '../exception/errors.js';
import { RESULT_TEXT_MAX_CHARS } from '../config/defaults.js';

export const DEFAULT_RESULTS: ResultsDeclaration = { kind: 'page_text', maxChars: RESULT_TEXT_MAX_CHARS };

/**
 * Reads the terminal page exactly where the wizard's results declaration
 * points; without one, the body text is returned.
 */
export async function extractResults(
  page: BrowserPage,
  declaration: ResultsDeclaration | undefined,
  timeoutMs: number,
  logger: Logger,
): Promise<Record<string, unknown>> {
  const results = declaration ?? DEFAULT_RESULTS;
  const pageUrl = page.url();
  const pageTitle = await page.title();

  switch (results.kind) {
    case 'page_text': {
      const text = await page.locator('body').innerText({ timeout: timeoutMs });
      return {
        pageUrl,
        pageTitle,
        text: text.slice(0, results.maxChars),
        truncated: text.length > results.maxChars,
      };
    }

    case 'selectors': {
      const values: Record<string, string | null> = {};
      for (const [name, control] of Object.entries(results.fields)) {
        try {
          const text = await resolveControl(page, control).innerText({ timeout: timeoutMs });
          values[name] = text.trim();
        } catch (error) {
          logger.warn({ result: name, selector: control.selector, error: describeCause(error) }, 'Result element not found');
          values[name] = null;
        }
      }
      return { pageUrl, pageTitle, values };
    }
  }
}

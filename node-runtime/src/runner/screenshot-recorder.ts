import type { Logger } from '../logging/logger.js';
import type { RunLogger } from '../logging/run-logger.js';
import type { ExecutionMode, ExecutionOutcome, Screenshot } from '../types/index.js';
import type { BrowserPage } from '../engines/browser-page.js';
import { describeCause } from '../exception/errors.js';

export const ERROR_LABEL = 'error';

export interface RecorderOptions {
  quality: number;
  logger: Logger;
  runLogger?: RunLogger;
}

/**
 * Captures a JPEG of the viewport at every step, whatever the eventual
 * retention. Retention is applied later by selectScreenshots.
 */
export class ScreenshotRecorder {
  private readonly shots: Screenshot[] = [];

  constructor(private options: RecorderOptions) {}

  get all(): readonly Screenshot[] {
    return this.shots;
  }

  get count(): number {
    return this.shots.length;
  }

  async capture(page: BrowserPage, label: string): Promise<Screenshot | null> {
    const step = this.shots.length + 1;
    let buffer: Buffer;
    try {
      buffer = await page.screenshot({ type: 'jpeg', quality: this.options.quality, fullPage: false });
    } catch (error) {
      this.options.logger.warn({ label, error: describeCause(error) }, 'Screenshot capture failed');
      return null;
    }

    const shot: Screenshot = {
      label,
      step,
      mimeType: 'image/jpeg',
      base64: buffer.toString('base64'),
      sizeBytes: buffer.length,
      capturedAt: new Date().toISOString(),
    };
    this.shots.push(shot);
    this.options.logger.debug({ label, step, sizeKb: Math.round(buffer.length / 1024) }, 'Screenshot captured');

    const { runLogger } = this.options;
    if (runLogger) {
      await runLogger
        .saveScreenshot(step, label, buffer)
        .then(() => runLogger.logEvent({ type: 'screenshot', step, label, sizeBytes: buffer.length }))
        .catch((error: unknown) => {
          this.options.logger.warn({ label, error: describeCause(error) }, 'Failed to write screenshot to run directory');
        });
    }
    return shot;
  }
}

/**
 * Which screenshots go back to the caller. Interactive runs get everything;
 * production runs get the last `retention` (1 or 2) images, ending at the
 * failure screenshot when the run failed.
 */
export function selectScreenshots(
  mode: ExecutionMode,
  outcome: ExecutionOutcome,
  all: readonly Screenshot[],
  retention = 1,
): Screenshot[] {
  if (mode === 'interactive') return [...all];

  const keep = Math.min(Math.max(Math.trunc(retention), 1), 2);

  switch (outcome) {
    case 'success':
      return all.slice(-keep);
    case 'failure': {
      const errorIndex = all.map((s) => s.label).lastIndexOf(ERROR_LABEL);
      const end = errorIndex === -1 ? all.length : errorIndex + 1;
      return all.slice(Math.max(0, end - keep), end);
    }
  }
}

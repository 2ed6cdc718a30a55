import { describe, it, expect } from 'vitest';
import { ScreenshotRecorder, selectScreenshots } from '../../src/runner/screenshot-recorder.js';
import { createSilentLogger } from '../../src/logging/logger.js';
import type { Screenshot } from '../../src/types/index.js';
import { FakePage } from '../helpers/fake-browser.js';

function shots(...labels: string[]): Screenshot[] {
  return labels.map((label, i): Screenshot => ({
    label,
    step: i + 1,
    mimeType: 'image/jpeg',
    base64: '',
    sizeBytes: 0,
    capturedAt: '2026-01-01T00:00:00.000Z',
  }));
}

function labels(list: Screenshot[]): string[] {
  return list.map((s) => s.label);
}

describe('ScreenshotRecorder', () => {
  it('numbers captures in order and encodes them as base64 JPEG', async () => {
    const page = new FakePage();
    const recorder = new ScreenshotRecorder({ quality: 80, logger: createSilentLogger() });

    await recorder.capture(page, 'initial');
    const second = await recorder.capture(page, 'page_1_filled');

    expect(recorder.count).toBe(2);
    expect(second).toMatchObject({
      label: 'page_1_filled',
      step: 2,
      mimeType: 'image/jpeg',
      base64: Buffer.from('jpeg-2').toString('base64'),
      sizeBytes: 6,
    });
  });

  it('returns null and records nothing when capture fails', async () => {
    const page = new FakePage({ screenshotError: new Error('Target closed') });
    const recorder = new ScreenshotRecorder({ quality: 80, logger: createSilentLogger() });

    expect(await recorder.capture(page, 'error')).toBeNull();
    expect(recorder.all).toEqual([]);
  });
});

describe('selectScreenshots', () => {
  const captured = shots('initial', 'page_1_filled', 'page_1_advanced', 'page_2_filled', 'page_2_advanced', 'final_results');

  it('keeps only the final screenshot of a successful production run', () => {
    expect(labels(selectScreenshots('production', 'success', captured))).toEqual(['final_results']);
  });

  it('keeps at most two in production whatever the retention asks for', () => {
    expect(selectScreenshots('production', 'success', captured, 2)).toHaveLength(2);
    expect(selectScreenshots('production', 'success', captured, 10)).toHaveLength(2);
    expect(selectScreenshots('production', 'success', captured, 0)).toHaveLength(1);
  });

  it('ends a failed production run at the failure screenshot', () => {
    const failed = shots('initial', 'page_1_filled', 'error');
    expect(labels(selectScreenshots('production', 'failure', failed))).toEqual(['error']);
    expect(labels(selectScreenshots('production', 'failure', failed, 2))).toEqual(['page_1_filled', 'error']);
  });

  it('falls back to the last capture when the failure screenshot is missing', () => {
    expect(labels(selectScreenshots('production', 'failure', shots('initial', 'page_1_filled')))).toEqual([
      'page_1_filled',
    ]);
  });

  it('returns every capture in interactive mode', () => {
    expect(selectScreenshots('interactive', 'success', captured)).toHaveLength(6);
    expect(selectScreenshots('interactive', 'failure', shots('initial', 'error'))).toHaveLength(2);
  });

  it('returns nothing when nothing was captured', () => {
    expect(selectScreenshots('production', 'failure', [])).toEqual([]);
  });
});

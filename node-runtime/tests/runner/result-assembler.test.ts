import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  assembleFailure,
  assembleSuccess,
  assembleValidationFailure,
} from '../../src/runner/result-assembler.js';
import type { AssemblyInput } from '../../src/runner/result-assembler.js';
import { FieldFillError, NavigationError } from '../../src/exception/errors.js';
import type { Screenshot } from '../../src/types/index.js';

function shot(label: string, step: number): Screenshot {
  return { label, step, mimeType: 'image/jpeg', base64: 'AA==', sizeBytes: 1, capturedAt: '2026-01-01T00:00:00.000Z' };
}

function input(overrides: Partial<AssemblyInput> = {}): AssemblyInput {
  return {
    wizardId: 'contact-form',
    runId: 'run-1',
    mode: 'production',
    retention: 1,
    screenshots: [shot('initial', 1), shot('page_1_filled', 2), shot('final_results', 3)],
    pagesCompleted: 2,
    startedAt: 1_000,
    finalState: 'DONE',
    selectStrategies: { country: 'value' },
    ...overrides,
  };
}

describe('result assembler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('assembles a success with results and retained screenshots', () => {
    vi.spyOn(Date, 'now').mockReturnValue(4_500);

    const result = assembleSuccess(input(), { text: 'Done' });

    expect(result).toEqual({
      success: true,
      wizardId: 'contact-form',
      runId: 'run-1',
      results: { text: 'Done' },
      screenshots: [shot('final_results', 3)],
      totalScreenshots: 3,
      pagesCompleted: 2,
      executionTimeMs: 3_500,
      finalState: 'DONE',
      selectStrategies: { country: 'value' },
    });
  });

  it('assembles a failure with a null result and the error block', () => {
    const error = new FieldFillError({
      fieldId: 'country',
      selector: '#country',
      reason: 'no option matched',
      attemptedStrategies: ['value', 'label'],
    });

    const result = assembleFailure(
      input({ finalState: 'FAILED', pagesCompleted: 1, screenshots: [shot('initial', 1), shot('error', 2)] }),
      error,
    );

    expect(result.success).toBe(false);
    expect(result.results).toBeNull();
    expect(result.screenshots.map((s) => s.label)).toEqual(['error']);
    expect(result.error).toEqual({
      kind: 'FieldFillError',
      message: "Failed to fill field 'country' (selector: #country): no option matched. Tried: value, label.",
      fieldId: 'country',
      selector: '#country',
      attemptedStrategies: ['value', 'label'],
    });
  });

  it('keeps every screenshot for interactive failures', () => {
    const result = assembleFailure(
      input({ mode: 'interactive', finalState: 'FAILED' }),
      new NavigationError('https://forms.test', 5, new Error('timeout')),
    );
    expect(result.screenshots).toHaveLength(3);
    expect(result.error?.kind).toBe('NavigationError');
  });

  it('builds a validation rejection without any screenshots', () => {
    const validation = {
      valid: false,
      missingFields: [{ fieldId: 'name', description: 'Full name' }],
      invalidFields: [],
    };

    expect(assembleValidationFailure('contact-form', validation)).toEqual({
      success: false,
      wizardId: 'contact-form',
      error: {
        kind: 'SchemaValidationError',
        message: 'User data failed schema validation (missing: [name], invalid: [])',
      },
      validation,
    });
  });
});

import { describe, it, expect } from 'vitest';
import { timeoutHierarchyViolations } from '../../src/schemas/config.schema.js';
import { NAVIGATION, TIMEOUTS } from '../../src/config/defaults.js';

describe('timeoutHierarchyViolations', () => {
  it('accepts the defaults', () => {
    expect(timeoutHierarchyViolations({ timeouts: TIMEOUTS, navigation: NAVIGATION })).toEqual([]);
  });

  it('reports an inner bound that is not smaller than its outer bound', () => {
    const timeouts = { ...TIMEOUTS, operationTimeoutMs: 5_000 };
    expect(timeoutHierarchyViolations({ timeouts, navigation: NAVIGATION })).toEqual([
      'operationTimeoutMs (5000) must be greater than selectStrategyTimeoutMs (5000)',
    ]);
  });

  it('requires the execution deadline to cover every navigation attempt', () => {
    // 5 attempts x 20000 + 4 pauses x 2000 = 108000
    const timeouts = { ...TIMEOUTS, executionTimeoutMs: 100_000 };
    expect(timeoutHierarchyViolations({ timeouts, navigation: NAVIGATION })).toEqual([
      'executionTimeoutMs (100000) must be greater than the navigation retry budget (108000)',
    ]);
  });

  it('reports the host request timeout falling below the execution deadline', () => {
    const timeouts = { ...TIMEOUTS, hostRequestTimeoutMs: 120_000 };
    expect(timeoutHierarchyViolations({ timeouts, navigation: NAVIGATION })).toEqual([
      'hostRequestTimeoutMs (120000) must be greater than executionTimeoutMs (180000)',
    ]);
  });
});

import { z } from 'zod';

export const TimeoutConfigSchema = z.object({
  selectStrategyTimeoutMs: z.number().int().positive(),
  operationTimeoutMs: z.number().int().positive(),
  navigationTimeoutMs: z.number().int().positive(),
  executionTimeoutMs: z.number().int().positive(),
  hostRequestTimeoutMs: z.number().int().positive(),
});

export const EngineConfigSchema = z
  .object({
    browserType: z.enum(['chromium', 'firefox', 'webkit']),
    headless: z.boolean(),
    slowMoMs: z.number().int().min(0).max(5000),
    viewport: z.object({
      width: z.number().int().min(320).max(3840),
      height: z.number().int().min(240).max(2160),
    }),
    userAgent: z.string().optional(),
    mode: z.enum(['production', 'interactive']),
    screenshotQuality: z.number().int().min(1).max(100),
    productionRetention: z.number().int().min(1).max(2),
    timeouts: TimeoutConfigSchema,
    navigation: z.object({
      maxRetries: z.number().int().min(0).max(10),
      retryDelayMs: z.number().int().min(0),
      waitUntil: z.enum(['load', 'domcontentloaded', 'networkidle', 'commit']),
    }),
    settle: z.object({
      afterNavigationMs: z.number().int().min(0),
      afterFieldMs: z.number().int().min(0),
      afterEnterMs: z.number().int().min(0),
      afterContinueMs: z.number().int().min(0),
      afterGroupItemMs: z.number().int().min(0),
    }),
    wizardsDir: z.string().min(1),
    runsDir: z.string().min(1).optional(),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  })
  .superRefine((config, ctx) => {
    for (const issue of timeoutHierarchyViolations(config)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['timeouts'], message: issue });
    }
  });

type HierarchyInput = Pick<z.infer<typeof EngineConfigSchema>, 'timeouts' | 'navigation'>;

const ORDER = [
  'selectStrategyTimeoutMs',
  'operationTimeoutMs',
  'navigationTimeoutMs',
  'executionTimeoutMs',
  'hostRequestTimeoutMs',
] as const;

/**
 * Lists every broken pair of the timeout hierarchy. Each bound must be
 * strictly greater than the one inside it, and the execution deadline must
 * cover the worst-case navigation budget.
 */
export function timeoutHierarchyViolations(config: HierarchyInput): string[] {
  const violations: string[] = [];
  const { timeouts, navigation } = config;

  for (let i = 1; i < ORDER.length; i++) {
    const inner = ORDER[i - 1];
    const outer = ORDER[i];
    if (timeouts[outer] <= timeouts[inner]) {
      violations.push(`${outer} (${timeouts[outer]}) must be greater than ${inner} (${timeouts[inner]})`);
    }
  }

  const navigationBudget =
    (navigation.maxRetries + 1) * timeouts.navigationTimeoutMs + navigation.maxRetries * navigation.retryDelayMs;
  if (timeouts.executionTimeoutMs <= navigationBudget) {
    violations.push(
      `executionTimeoutMs (${timeouts.executionTimeoutMs}) must be greater than the navigation retry budget (${navigationBudget})`,
    );
  }

  return violations;
}

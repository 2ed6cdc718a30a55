import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import type { Logger } from '../logging/logger.js';
import { RunLogger } from '../logging/run-logger.js';
import type { RunEvent } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import type {
  ControlRef,
  EngineConfig,
  ExecutionResult,
  ExecutionState,
  UserData,
  WizardStructure,
} from '../types/index.js';
import type { BrowserLauncher, BrowserSession } from '../engines/browser-session.js';
import { withBrowserSession } from '../engines/browser-session.js';
import type { BrowserPage, LoadState } from '../engines/browser-page.js';
import { normalizeSelector, resolveControl } from '../engines/selectors.js';
import { ControlClickError, describeCause } from '../exception/errors.js';
import type { ControlRole } from '../exception/errors.js';
import { toExecutionError } from '../exception/classifier.js';
import { ownValue } from '../utils/records.js';
import { ExecutionStateMachine } from './execution-state.js';
import type { StateChange } from './execution-state.js';
import { FieldExecutor } from './field-executor.js';
import { ScreenshotRecorder, ERROR_LABEL } from './screenshot-recorder.js';
import { extractResults } from './results-extractor.js';
import { runWithDeadline } from './deadline.js';
import { assembleFailure, assembleSuccess } from './result-assembler.js';
import type { AssemblyInput } from './result-assembler.js';

export interface WizardRunnerDeps {
  launcher: BrowserLauncher;
  config: EngineConfig;
  logger: Logger;
}

export interface RunOptions {
  runId?: string;
  onStateChange?: (change: StateChange) => void;
}

/** Everything that belongs to a single execution. */
interface RunScope {
  runId: string;
  wizard: WizardStructure;
  userData: UserData;
  log: Logger;
  machine: ExecutionStateMachine;
  recorder: ScreenshotRecorder;
  runLogger: RunLogger | null;
  pendingTrace: Promise<void>;
  pagesCompleted: number;
  selectStrategies: Record<string, string>;
}

export function createRunId(): string {
  return `run-${Date.now()}-${randomUUID().slice(0, 8)}`;
}

/**
 * Drives one wizard end to end in a fresh browser session. Holds no state
 * between calls, so one instance can serve concurrent executions.
 */
export class WizardRunner {
  constructor(private deps: WizardRunnerDeps) {}

  async run(wizard: WizardStructure, userData: UserData, options: RunOptions = {}): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const { config } = this.deps;
    const runId = options.runId ?? createRunId();
    const log = this.deps.logger.child({ runId, wizardId: wizard.wizardId });
    const runLogger = config.runsDir ? new RunLogger(join(config.runsDir, runId)) : null;

    const scope: RunScope = {
      runId,
      wizard,
      userData,
      log,
      machine: new ExecutionStateMachine((change) => {
        log.info({ from: change.from, to: change.to, pageNumber: change.pageNumber }, 'State transition');
        this.trace(scope, { type: 'state', state: change.to, pageNumber: change.pageNumber });
        options.onStateChange?.(change);
      }),
      recorder: new ScreenshotRecorder({
        quality: config.screenshotQuality,
        logger: log,
        runLogger: runLogger ?? undefined,
      }),
      runLogger,
      pendingTrace: Promise.resolve(),
      pagesCompleted: 0,
      selectStrategies: {},
    };

    log.info({ url: wizard.url, totalPages: wizard.pages.length, mode: config.mode }, 'Starting wizard execution');

    let result: ExecutionResult;
    try {
      const results = await withBrowserSession(this.deps.launcher, config, log, (session) =>
        this.runInSession(session, scope),
      );
      result = assembleSuccess(this.assemblyInput(scope, startedAt), results);
      log.info({ executionTimeMs: result.executionTimeMs, pagesCompleted: result.pagesCompleted }, 'Execution completed');
    } catch (error) {
      scope.machine.fail();
      result = assembleFailure(this.assemblyInput(scope, startedAt), error);
      log.error(
        { kind: result.error?.kind, error: result.error?.message, pagesCompleted: result.pagesCompleted },
        'Execution failed',
      );
    }

    if (runLogger) {
      await scope.pendingTrace;
      await writeSummary({ runDir: runLogger.getRunDir(), wizard, result }).catch((error: unknown) => {
        log.warn({ error: describeCause(error) }, 'Failed to write run summary');
      });
    }

    return result;
  }

  private assemblyInput(scope: RunScope, startedAt: number): AssemblyInput {
    return {
      wizardId: scope.wizard.wizardId,
      runId: scope.runId,
      mode: this.deps.config.mode,
      retention: this.deps.config.productionRetention,
      screenshots: scope.recorder.all,
      pagesCompleted: scope.pagesCompleted,
      startedAt,
      finalState: scope.machine.state,
      selectStrategies: scope.selectStrategies,
    };
  }

  /**
   * The single handler for anything thrown mid-run: marks the run failed and
   * captures the failure point while the page is still open.
   */
  private async runInSession(session: BrowserSession, scope: RunScope): Promise<Record<string, unknown>> {
    try {
      return await runWithDeadline(
        (signal) => this.walk(session.page, session, scope, signal),
        this.deps.config.timeouts.executionTimeoutMs,
        scope.log,
      );
    } catch (error) {
      scope.machine.fail();
      const executionError = toExecutionError(error);
      this.trace(scope, { type: 'error', kind: executionError.kind, message: executionError.message });
      await scope.recorder.capture(session.page, ERROR_LABEL);
      throw error;
    }
  }

  private async walk(
    page: BrowserPage,
    session: BrowserSession,
    scope: RunScope,
    signal: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const { wizard, machine, recorder } = scope;
    const { settle, timeouts } = this.deps.config;
    const fieldExecutor = new FieldExecutor(this.deps.config, scope.log);

    await session.navigate(wizard.url, (attempt) =>
      this.trace(scope, { type: 'navigation_attempt', attempt: attempt.attempt, ok: attempt.ok, message: attempt.error }),
    );
    await page.waitForTimeout(settle.afterNavigationMs);
    this.advance(machine, 'NAVIGATED', signal);
    await recorder.capture(page, 'initial');

    if (wizard.startAction) {
      await this.clickControl(page, wizard.startAction, 'start');
      await this.waitForLoad(page);
      await page.waitForTimeout(settle.afterNavigationMs);
      this.advance(machine, 'STARTED', signal);
      await recorder.capture(page, 'after_start');
    }

    for (const wizardPage of wizard.pages) {
      this.advance(machine, 'PAGE', signal, wizardPage.pageNumber);
      scope.log.info({ pageNumber: wizardPage.pageNumber, title: wizardPage.title }, 'Filling page');

      // Declared order matters: later options can depend on earlier answers.
      for (const field of wizardPage.fields) {
        signal.throwIfAborted();
        const outcome = await fieldExecutor.execute(page, field, ownValue(scope.userData, field.fieldId));
        if (outcome.strategy) {
          scope.selectStrategies[field.fieldId] = outcome.strategy;
        }
        this.trace(scope, {
          type: 'field',
          fieldId: field.fieldId,
          interaction: field.interaction,
          ok: true,
          strategy: outcome.strategy,
          message: outcome.skipped ? 'skipped' : undefined,
        });
      }

      await recorder.capture(page, `page_${wizardPage.pageNumber}_filled`);
      signal.throwIfAborted();

      await this.clickControl(page, wizardPage.continueButton, 'continue');
      await this.waitForLoad(page);
      await page.waitForTimeout(settle.afterContinueMs);
      // A lapsed deadline leaves this walk running; stop before touching run state.
      signal.throwIfAborted();
      scope.pagesCompleted++;
      await recorder.capture(page, `page_${wizardPage.pageNumber}_advanced`);
    }

    this.advance(machine, 'RESULTS', signal);
    const results = await extractResults(page, wizard.results, timeouts.operationTimeoutMs, scope.log);
    signal.throwIfAborted();
    await recorder.capture(page, 'final_results');
    this.advance(machine, 'DONE', signal);
    return results;
  }

  private advance(machine: ExecutionStateMachine, to: ExecutionState, signal: AbortSignal, pageNumber?: number): void {
    signal.throwIfAborted();
    machine.transition(to, pageNumber);
  }

  private async clickControl(page: BrowserPage, control: ControlRef, role: ControlRole): Promise<void> {
    try {
      await resolveControl(page, control).click();
    } catch (error) {
      throw new ControlClickError(role, normalizeSelector(control), error);
    }
  }

  private async waitForLoad(page: BrowserPage): Promise<void> {
    const { waitUntil } = this.deps.config.navigation;
    const state: LoadState = waitUntil === 'commit' ? 'load' : waitUntil;
    await page.waitForLoadState(state, { timeout: this.deps.config.timeouts.navigationTimeoutMs });
  }

  /**
   * Run traces are best-effort debug artifacts and never fail a run. Writes
   * are chained so logs.jsonl keeps event order.
   */
  private trace(scope: RunScope, event: RunEvent): void {
    const { runLogger } = scope;
    if (!runLogger) return;
    scope.pendingTrace = scope.pendingTrace
      .then(() => runLogger.logEvent(event))
      .catch((error: unknown) => {
        scope.log.warn({ error: describeCause(error) }, 'Failed to write run trace');
      });
  }
}

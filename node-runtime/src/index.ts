export type * from './types/index.js';
export * from './schemas/index.js';

export { loadConfig, validateConfig, getConfig, resetConfig } from './config/loader.js';
export * as defaults from './config/defaults.js';

export { createLogger, createSilentLogger } from './logging/logger.js';
export type { Logger, LoggerOptions } from './logging/logger.js';
export { RunLogger } from './logging/run-logger.js';
export type { RunEvent } from './logging/run-logger.js';

export * from './exception/errors.js';
export { classifyError, toExecutionError } from './exception/classifier.js';

export { validateUserData, validateForWizard, exampleUserData } from './validation/schema-validator.js';

export type { BrowserPage, WizardLocator, SessionContext, LaunchedBrowser } from './engines/browser-page.js';
export { BrowserSession, playwrightLauncher, withBrowserSession } from './engines/browser-session.js';
export type { BrowserLauncher } from './engines/browser-session.js';

export { FieldExecutor } from './runner/field-executor.js';
export type { FieldOutcome } from './runner/field-executor.js';
export { selectScreenshots } from './runner/screenshot-recorder.js';
export type { StateChange } from './runner/execution-state.js';
export { WizardRunner, createRunId } from './runner/wizard-runner.js';
export type { WizardRunnerDeps, RunOptions } from './runner/wizard-runner.js';

export { WizardCatalog } from './catalog/wizard-catalog.js';
export type { WizardSummary } from './catalog/wizard-catalog.js';
export { parseWizardStructure, parseUserDataSchema } from './catalog/documents.js';
export { createWizardTools, runWizard } from './tools/wizard-tools.js';
export type {
  ExecuteWizardResponse,
  ListWizardsResponse,
  ToolFailure,
  WizardInfoResponse,
  WizardToolDeps,
  WizardTools,
} from './tools/wizard-tools.js';

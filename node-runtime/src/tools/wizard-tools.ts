import type { Logger } from '../logging/logger.js';
import type {
  ExecutionError,
  ExecutionResult,
  UserData,
  UserDataSchema,
  ValidationRejection,
  WizardStructure,
} from '../types/index.js';
import type { WizardCatalog, WizardSummary } from '../catalog/wizard-catalog.js';
import type { RunOptions, WizardRunner } from '../runner/wizard-runner.js';
import { exampleUserData, validateForWizard } from '../validation/schema-validator.js';
import { assembleValidationFailure } from '../runner/result-assembler.js';
import { toExecutionError } from '../exception/classifier.js';

export interface ToolFailure {
  success: false;
  error: ExecutionError;
}

export type ListWizardsResponse = { success: true; wizards: WizardSummary[]; count: number } | ToolFailure;

export type WizardInfoResponse =
  | {
      success: true;
      wizardId: string;
      name: string;
      url: string;
      totalPages: number;
      schema: UserDataSchema;
      exampleUserData: UserData;
    }
  | ToolFailure;

export type ExecuteWizardResponse = ExecutionResult | ValidationRejection | ToolFailure;

export interface WizardToolDeps {
  catalog: WizardCatalog;
  runner: WizardRunner;
  logger: Logger;
}

function failure(error: unknown): ToolFailure {
  return { success: false, error: toExecutionError(error) };
}

/**
 * Validates first and only opens a browser for data that passes.
 */
export async function runWizard(
  runner: WizardRunner,
  wizard: WizardStructure,
  schema: UserDataSchema,
  userData: UserData,
  options: RunOptions = {},
): Promise<ExecutionResult | ValidationRejection> {
  const validation = validateForWizard(wizard, schema, userData);
  if (!validation.valid) {
    return assembleValidationFailure(wizard.wizardId, validation);
  }
  return runner.run(wizard, userData, options);
}

export function createWizardTools(deps: WizardToolDeps) {
  const { catalog, runner, logger } = deps;

  async function listWizards(): Promise<ListWizardsResponse> {
    try {
      const wizards = await catalog.list();
      logger.info({ count: wizards.length }, 'Listed wizards');
      return { success: true, wizards, count: wizards.length };
    } catch (error) {
      logger.error({ error: toExecutionError(error).message }, 'Failed to list wizards');
      return failure(error);
    }
  }

  async function getWizardInfo(wizardId: string): Promise<WizardInfoResponse> {
    try {
      const wizard = await catalog.loadStructure(wizardId);
      const schema = await catalog.loadSchema(wizardId);
      return {
        success: true,
        wizardId: wizard.wizardId,
        name: wizard.name,
        url: wizard.url,
        totalPages: wizard.pages.length,
        schema,
        exampleUserData: exampleUserData(schema),
      };
    } catch (error) {
      logger.error({ wizardId, error: toExecutionError(error).message }, 'Failed to load wizard info');
      return failure(error);
    }
  }

  async function executeWizard(
    wizardId: string,
    userData: UserData,
    options: RunOptions = {},
  ): Promise<ExecuteWizardResponse> {
    let wizard: WizardStructure;
    let schema: UserDataSchema;
    try {
      wizard = await catalog.loadStructure(wizardId);
      schema = await catalog.loadSchema(wizardId);
    } catch (error) {
      logger.error({ wizardId, error: toExecutionError(error).message }, 'Failed to load wizard');
      return failure(error);
    }

    logger.info({ wizardId, fields: Object.keys(userData) }, 'Executing wizard');
    return runWizard(runner, wizard, schema, userData, options);
  }

  return { listWizards, getWizardInfo, executeWizard };
}

export type WizardTools = ReturnType<typeof createWizardTools>;

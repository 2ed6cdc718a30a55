import type {
  ExecutionMode,
  ExecutionResult,
  ExecutionState,
  Screenshot,
  ValidationRejection,
  ValidationResult,
} from '../types/index.js';
import { toExecutionError } from '../exception/classifier.js';
import { SchemaValidationError } from '../exception/errors.js';
import { selectScreenshots } from './screenshot-recorder.js';

export interface AssemblyInput {
  wizardId: string;
  runId: string;
  mode: ExecutionMode;
  retention: number;
  screenshots: readonly Screenshot[];
  pagesCompleted: number;
  startedAt: number;
  finalState: ExecutionState;
  selectStrategies: Record<string, string>;
}

function base(input: AssemblyInput, success: boolean): Omit<ExecutionResult, 'results' | 'error'> {
  return {
    success,
    wizardId: input.wizardId,
    runId: input.runId,
    screenshots: selectScreenshots(input.mode, success ? 'success' : 'failure', input.screenshots, input.retention),
    totalScreenshots: input.screenshots.length,
    pagesCompleted: input.pagesCompleted,
    executionTimeMs: Date.now() - input.startedAt,
    finalState: input.finalState,
    selectStrategies: { ...input.selectStrategies },
  };
}

export function assembleSuccess(input: AssemblyInput, results: Record<string, unknown>): ExecutionResult {
  return { ...base(input, true), results };
}

export function assembleFailure(input: AssemblyInput, error: unknown): ExecutionResult {
  return { ...base(input, false), results: null, error: toExecutionError(error) };
}

export function assembleValidationFailure(wizardId: string, validation: ValidationResult): ValidationRejection {
  const error = new SchemaValidationError(validation);
  return {
    success: false,
    wizardId,
    error: { kind: error.kind, message: error.message },
    validation,
  };
}

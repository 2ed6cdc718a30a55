import type { ErrorKind, ExecutionError } from '../types/index.js';
import { FieldFillError, WizardRunnerError } from './errors.js';

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof WizardRunnerError) {
    return error.kind;
  }
  return 'InternalError';
}

/**
 * Flattens any thrown value into the error block of an ExecutionResult.
 */
export function toExecutionError(error: unknown): ExecutionError {
  const kind = classifyError(error);
  const message = extractMessage(error);

  if (error instanceof FieldFillError) {
    return {
      kind,
      message,
      fieldId: error.fieldId,
      selector: error.selector,
      attemptedStrategies: error.attemptedStrategies,
    };
  }

  if (kind === 'InternalError') {
    const name = error instanceof Error ? error.name : typeof error;
    return { kind, message: `${name}: ${message}` };
  }

  return { kind, message };
}

function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

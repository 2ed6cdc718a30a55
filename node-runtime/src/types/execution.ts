import type { ValidationResult } from './data-schema.js';

export type ExecutionState =
  | 'INIT'
  | 'NAVIGATED'
  | 'STARTED'
  | 'PAGE'
  | 'RESULTS'
  | 'DONE'
  | 'FAILED';

export type ExecutionMode = 'production' | 'interactive';

export type ExecutionOutcome = 'success' | 'failure';

export type ErrorKind =
  | 'SchemaValidationError'
  | 'NavigationError'
  | 'FieldFillError'
  | 'ControlError'
  | 'ExecutionTimeout'
  | 'StructureError'
  | 'ConfigError'
  | 'WizardNotFound'
  | 'SchemaNotFound'
  | 'InternalError';

export interface Screenshot {
  label: string;
  step: number;
  mimeType: 'image/jpeg';
  base64: string;
  sizeBytes: number;
  capturedAt: string;
}

export interface ExecutionError {
  kind: ErrorKind;
  message: string;
  fieldId?: string;
  selector?: string;
  attemptedStrategies?: string[];
}

export interface ExecutionResult {
  success: boolean;
  wizardId: string;
  runId: string;
  results: Record<string, unknown> | null;
  screenshots: Screenshot[];
  totalScreenshots: number;
  pagesCompleted: number;
  executionTimeMs: number;
  finalState: ExecutionState;
  selectStrategies: Record<string, string>;
  error?: ExecutionError;
}

export interface ValidationRejection {
  success: false;
  wizardId: string;
  error: ExecutionError;
  validation: ValidationResult;
}

import type { ErrorKind, ValidationResult } from '../types/index.js';

export abstract class WizardRunnerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SchemaValidationError extends WizardRunnerError {
  readonly kind = 'SchemaValidationError';

  constructor(readonly validation: ValidationResult) {
    const missing = validation.missingFields.map((f) => f.fieldId);
    const invalid = validation.invalidFields.map((f) => f.fieldId);
    super(
      `User data failed schema validation (missing: [${missing.join(', ')}], invalid: [${invalid.join(', ')}])`,
    );
  }
}

export class NavigationError extends WizardRunnerError {
  readonly kind = 'NavigationError';

  constructor(
    readonly url: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`Failed to load ${url} after ${attempts} attempt(s): ${describeCause(cause)}`, { cause });
  }
}

export interface FieldFillDetails {
  fieldId: string;
  selector: string;
  reason: string;
  attemptedStrategies?: string[];
  cause?: unknown;
}

export class FieldFillError extends WizardRunnerError {
  readonly kind = 'FieldFillError';
  readonly fieldId: string;
  readonly selector: string;
  readonly attemptedStrategies: string[];

  constructor(details: FieldFillDetails) {
    const strategies = details.attemptedStrategies ?? [];
    const tried = strategies.length > 0 ? ` Tried: ${strategies.join(', ')}.` : '';
    const cause = details.cause === undefined ? '' : ` Cause: ${describeCause(details.cause)}`;
    super(
      `Failed to fill field '${details.fieldId}' (selector: ${details.selector}): ${details.reason}.${tried}${cause}`,
      { cause: details.cause },
    );
    this.fieldId = details.fieldId;
    this.selector = details.selector;
    this.attemptedStrategies = strategies;
  }
}

export type ControlRole = 'start' | 'continue';

export class ControlClickError extends WizardRunnerError {
  readonly kind = 'ControlError';

  constructor(
    readonly role: ControlRole,
    readonly selector: string,
    cause: unknown,
  ) {
    super(
      `Failed to click ${role} control (selector: ${selector}); it may be hidden or the selector may be stale: ${describeCause(cause)}`,
      { cause },
    );
  }
}

export class ExecutionTimeoutError extends WizardRunnerError {
  readonly kind = 'ExecutionTimeout';

  constructor(readonly timeoutMs: number) {
    super(`Execution exceeded its ${timeoutMs}ms deadline`);
  }
}

export class StructureError extends WizardRunnerError {
  readonly kind = 'StructureError';

  constructor(
    readonly source: string,
    readonly issues: string[],
  ) {
    super(`Invalid wizard document ${source}: ${issues.join('; ')}`);
  }
}

export class ConfigError extends WizardRunnerError {
  readonly kind = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class WizardNotFoundError extends WizardRunnerError {
  readonly kind = 'WizardNotFound';

  constructor(readonly wizardId: string) {
    super(`Wizard not found: ${wizardId}`);
  }
}

export class SchemaNotFoundError extends WizardRunnerError {
  readonly kind = 'SchemaNotFound';

  constructor(readonly wizardId: string) {
    super(`User data schema not found for wizard: ${wizardId}`);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message.split('\n')[0];
  return String(cause);
}

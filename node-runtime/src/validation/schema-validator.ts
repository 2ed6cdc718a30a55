import type {
  ExpectedConstraint,
  GroupField,
  InvalidField,
  MissingField,
  PropertySchema,
  UserData,
  UserDataSchema,
  ValidationResult,
  WizardStructure,
} from '../types/index.js';
import { isRecord, ownValue } from '../utils/records.js';
import { compileProperty, formatIssue } from './property-schema.js';

function describeMissing(fieldId: string, prop: PropertySchema | undefined): MissingField {
  return {
    fieldId,
    description: prop?.description ?? 'No description',
    type: prop?.type,
    pattern: prop?.pattern,
    enum: prop?.enum,
    examples: prop?.examples,
  };
}

function expectedConstraint(prop: PropertySchema): ExpectedConstraint {
  const expected: ExpectedConstraint = { type: prop.type };
  if (prop.pattern !== undefined) expected.pattern = prop.pattern;
  if (prop.enum !== undefined) expected.enum = prop.enum;
  if (prop.minimum !== undefined) expected.minimum = prop.minimum;
  if (prop.maximum !== undefined) expected.maximum = prop.maximum;
  return expected;
}

/**
 * Checks user data against its schema and reports every violation at once.
 * Never throws; callers branch on `valid`.
 */
export function validateUserData(schema: UserDataSchema, userData: UserData): ValidationResult {
  const missingFields: MissingField[] = [];
  const invalidFields: InvalidField[] = [];

  for (const fieldId of schema.required) {
    if (ownValue(userData, fieldId) === undefined) {
      missingFields.push(describeMissing(fieldId, ownValue(schema.properties, fieldId)));
    }
  }

  for (const [fieldId, value] of Object.entries(userData)) {
    if (value === undefined) continue;

    const prop = ownValue(schema.properties, fieldId);
    if (!prop) {
      if (schema.additionalProperties === false) {
        invalidFields.push({ fieldId, providedValue: value, expected: {}, reason: 'not declared in schema' });
      }
      continue;
    }

    const result = compileProperty(prop).safeParse(value);
    if (!result.success) {
      invalidFields.push({
        fieldId,
        providedValue: value,
        expected: expectedConstraint(prop),
        reason: formatIssue(result.error.issues[0]),
      });
    }
  }

  return {
    valid: missingFields.length === 0 && invalidFields.length === 0,
    missingFields,
    invalidFields,
  };
}

function checkGroupValue(field: GroupField, value: unknown): string | null {
  if (!Array.isArray(value)) return 'must be a list of records';
  if (value.length < field.minItems) return `must contain at least ${field.minItems} item(s)`;
  if (field.maxItems !== undefined && value.length > field.maxItems) {
    return `must contain at most ${field.maxItems} item(s)`;
  }

  const declared = new Set(field.subFields.map((s) => s.fieldId));
  for (const [index, item] of value.entries()) {
    if (!isRecord(item)) return `item ${index} must be a record`;
    for (const key of Object.keys(item)) {
      if (!declared.has(key)) return `item ${index} has undeclared sub-field "${key}"`;
    }
  }
  return null;
}

/**
 * Structural check of group values against the wizard's sub-field
 * descriptors, independent of what the data schema declares.
 */
export function checkGroupFields(wizard: WizardStructure, userData: UserData): InvalidField[] {
  const invalid: InvalidField[] = [];

  for (const page of wizard.pages) {
    for (const field of page.fields) {
      if (field.interaction !== 'group') continue;
      const value = ownValue(userData, field.fieldId);
      if (value === undefined) continue;

      const reason = checkGroupValue(field, value);
      if (reason) {
        invalid.push({ fieldId: field.fieldId, providedValue: value, expected: { type: 'array' }, reason });
      }
    }
  }

  return invalid;
}

/**
 * Schema validation plus the wizard's own group constraints.
 */
export function validateForWizard(
  wizard: WizardStructure,
  schema: UserDataSchema,
  userData: UserData,
): ValidationResult {
  const result = validateUserData(schema, userData);
  const reported = new Set(result.invalidFields.map((f) => f.fieldId));
  const groupIssues = checkGroupFields(wizard, userData).filter((f) => !reported.has(f.fieldId));
  const invalidFields = [...result.invalidFields, ...groupIssues];

  return {
    valid: result.missingFields.length === 0 && invalidFields.length === 0,
    missingFields: result.missingFields,
    invalidFields,
  };
}

function exampleFor(prop: PropertySchema): unknown {
  if (prop.examples && prop.examples.length > 0) return prop.examples[0];
  if (prop.enum && prop.enum.length > 0) return prop.enum[0];

  switch (prop.type) {
    case 'string':
      return 'example';
    case 'number':
    case 'integer':
      return prop.minimum ?? 0;
    case 'boolean':
      return true;
    case 'array':
      return [];
    case 'object':
      return {};
  }
}

export function exampleUserData(schema: UserDataSchema): UserData {
  return Object.fromEntries(
    Object.entries(schema.properties).map(([fieldId, prop]) => [fieldId, exampleFor(prop)]),
  );
}

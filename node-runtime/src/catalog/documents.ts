import type { ZodType, ZodTypeDef } from 'zod';
import { UserDataSchemaSchema, WizardStructureSchema } from '../schemas/index.js';
import type { UserDataSchema, WizardStructure } from '../types/index.js';
import { StructureError } from '../exception/errors.js';

function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, raw: unknown, source: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new StructureError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function parseWizardStructure(raw: unknown, source = 'wizard structure'): WizardStructure {
  return parseWith(WizardStructureSchema, raw, source);
}

export function parseUserDataSchema(raw: unknown, source = 'user data schema'): UserDataSchema {
  return parseWith(UserDataSchemaSchema, raw, source);
}

export function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new StructureError(source, [error instanceof Error ? error.message : String(error)]);
  }
}

import { z } from 'zod';
import type { PropertySchema } from '../types/index.js';

function typeErrors(label: string): { required_error: string; invalid_type_error: string } {
  return { required_error: 'is required', invalid_type_error: `must be of type ${label}` };
}

function compilePattern(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern);
  } catch {
    return null;
  }
}

function compileString(prop: PropertySchema): z.ZodTypeAny {
  let schema = z.string(typeErrors('string'));
  if (prop.minLength !== undefined) {
    schema = schema.min(prop.minLength, { message: `must be at least ${prop.minLength} characters` });
  }
  if (prop.maxLength !== undefined) {
    schema = schema.max(prop.maxLength, { message: `must be at most ${prop.maxLength} characters` });
  }
  if (prop.pattern === undefined) return schema;

  const pattern = prop.pattern;
  const regex = compilePattern(pattern);
  if (!regex) {
    return schema.refine(() => false, { message: `schema pattern ${pattern} is not a valid regular expression` });
  }
  return schema.regex(regex, { message: `must match pattern ${pattern}` });
}

function compileNumber(prop: PropertySchema): z.ZodTypeAny {
  let schema = z.number(typeErrors(prop.type));
  if (prop.type === 'integer') {
    schema = schema.int({ message: 'must be an integer' });
  }
  if (prop.minimum !== undefined) {
    schema = schema.gte(prop.minimum, { message: `must be >= ${prop.minimum}` });
  }
  if (prop.maximum !== undefined) {
    schema = schema.lte(prop.maximum, { message: `must be <= ${prop.maximum}` });
  }
  return schema;
}

function compileArray(prop: PropertySchema): z.ZodTypeAny {
  let schema = z.array(prop.items ? compileProperty(prop.items) : z.unknown(), typeErrors('array'));
  if (prop.minItems !== undefined) {
    schema = schema.min(prop.minItems, { message: `must contain at least ${prop.minItems} item(s)` });
  }
  if (prop.maxItems !== undefined) {
    schema = schema.max(prop.maxItems, { message: `must contain at most ${prop.maxItems} item(s)` });
  }
  return schema;
}

function compileObject(prop: PropertySchema): z.ZodTypeAny {
  const required = new Set(prop.required ?? []);
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, child] of Object.entries(prop.properties ?? {})) {
    const compiled = compileProperty(child);
    shape[key] = required.has(key) ? compiled : compiled.optional();
  }
  return z.object(shape, typeErrors('object')).passthrough();
}

function compileBase(prop: PropertySchema): z.ZodTypeAny {
  switch (prop.type) {
    case 'string':
      return compileString(prop);
    case 'number':
    case 'integer':
      return compileNumber(prop);
    case 'boolean':
      return z.boolean(typeErrors('boolean'));
    case 'array':
      return compileArray(prop);
    case 'object':
      return compileObject(prop);
  }
}

/**
 * Compiles one property of a user data schema into a zod schema.
 */
export function compileProperty(prop: PropertySchema): z.ZodTypeAny {
  const base = compileBase(prop);
  if (!prop.enum) return base;

  const allowed = prop.enum;
  return base.refine((value: unknown) => allowed.some((candidate) => candidate === value), {
    message: `must be one of: ${allowed.map((a) => JSON.stringify(a)).join(', ')}`,
  });
}

export function formatIssue(issue: z.ZodIssue | undefined): string {
  if (!issue) return 'invalid value';
  if (issue.path.length === 0) return issue.message;
  return `at ${issue.path.join('.')}: ${issue.message}`;
}

import { z } from 'zod';
import type { PropertySchema } from '../types/index.js';

export const PropertyTypeSchema = z.enum(['string', 'number', 'integer', 'boolean', 'array', 'object']);

export const PropertySchemaSchema: z.ZodType<PropertySchema> = z.lazy(() =>
  z.object({
    type: PropertyTypeSchema,
    description: z.string().optional(),
    pattern: z.string().optional(),
    enum: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1).optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    minLength: z.number().int().min(0).optional(),
    maxLength: z.number().int().min(0).optional(),
    examples: z.array(z.unknown()).optional(),
    items: PropertySchemaSchema.optional(),
    minItems: z.number().int().min(0).optional(),
    maxItems: z.number().int().min(0).optional(),
    properties: z.record(PropertySchemaSchema).optional(),
    required: z.array(z.string()).optional(),
  }),
);

export const UserDataSchemaSchema = z.object({
  $schema: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  type: z.literal('object'),
  properties: z.record(PropertySchemaSchema),
  required: z.array(z.string()).default([]),
  additionalProperties: z.boolean().optional(),
});

import { z } from 'zod';

export const SelectorTypeSchema = z.enum(['css', 'id', 'text']);

export const ControlRefSchema = z.object({
  selector: z.string().min(1),
  selectorType: SelectorTypeSchema.default('css'),
});

export const StartActionSchema = ControlRefSchema.extend({
  selectorType: SelectorTypeSchema.default('text'),
  description: z.string().optional(),
});

export const ContinueButtonSchema = ControlRefSchema.extend({
  text: z.string().optional(),
});

const FieldBaseSchema = z.object({
  fieldId: z.string().regex(/^[A-Za-z0-9_]+$/, 'fieldId must be letters, digits or underscores'),
  selector: z.string().min(1),
  selectorType: SelectorTypeSchema.default('css'),
  required: z.boolean().default(false),
  label: z.string().optional(),
});

export const SubFieldSchema = z.object({
  fieldId: z.string().min(1),
  selector: z.string().min(1),
  selectorType: SelectorTypeSchema.default('css'),
  interaction: z.enum(['fill', 'select']),
});

export const GroupFieldSchema = FieldBaseSchema.extend({
  interaction: z.literal('group'),
  addButton: ControlRefSchema,
  saveButton: ControlRefSchema.default({ selector: 'Save', selectorType: 'text' }),
  subFields: z.array(SubFieldSchema).min(1),
  minItems: z.number().int().min(0).default(0),
  maxItems: z.number().int().min(1).optional(),
});

export const WizardFieldSchema = z.discriminatedUnion('interaction', [
  FieldBaseSchema.extend({ interaction: z.literal('fill') }),
  FieldBaseSchema.extend({ interaction: z.literal('fill_enter') }),
  FieldBaseSchema.extend({ interaction: z.literal('click') }),
  FieldBaseSchema.extend({ interaction: z.literal('javascript_click') }),
  FieldBaseSchema.extend({ interaction: z.literal('select') }),
  GroupFieldSchema,
]);

export const WizardPageSchema = z.object({
  pageNumber: z.number().int().min(1),
  title: z.string().optional(),
  fields: z.array(WizardFieldSchema).default([]),
  continueButton: ContinueButtonSchema,
});

export const ResultsDeclarationSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('page_text'),
    maxChars: z.number().int().min(1).default(2000),
  }),
  z.object({
    kind: z.literal('selectors'),
    fields: z.record(ControlRefSchema),
  }),
]);

export const WizardStructureSchema = z
  .object({
    wizardId: z.string().regex(/^[a-z0-9-]+$/, 'wizardId must be lowercase letters, digits or hyphens'),
    name: z.string().min(1),
    url: z
      .string()
      .url()
      .refine((u) => u.startsWith('http://') || u.startsWith('https://'), 'url must be http or https'),
    description: z.string().optional(),
    startAction: StartActionSchema.optional(),
    pages: z.array(WizardPageSchema).min(1),
    results: ResultsDeclarationSchema.optional(),
  })
  .superRefine((wizard, ctx) => {
    wizard.pages.forEach((page, index) => {
      if (page.pageNumber !== index + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pages', index, 'pageNumber'],
          message: `Expected page number ${index + 1}, found ${page.pageNumber}`,
        });
      }
    });

    const seen = new Set<string>();
    for (const page of wizard.pages) {
      for (const field of page.fields) {
        if (seen.has(field.fieldId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['pages', page.pageNumber - 1, 'fields'],
            message: `Duplicate fieldId "${field.fieldId}"`,
          });
        }
        seen.add(field.fieldId);
      }
    }
  });

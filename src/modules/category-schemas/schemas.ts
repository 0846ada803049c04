import { z } from 'zod';

import { FIELD_TYPES } from './types';

const validationRulesSchema = z.object({
  minLength: z.number().int().min(0).nullable().optional(),
  maxLength: z.number().int().min(0).nullable().optional(),
  minValue: z.number().nullable().optional(),
  maxValue: z.number().nullable().optional(),
  pattern: z
    .string()
    .refine((value) => {
      try {
        new RegExp(value);
        return true;
      } catch {
        return false;
      }
    }, 'Invalid regular expression')
    .nullable()
    .optional(),
  customErrorMessage: z.string().nullable().optional(),
});

const conditionalLogicSchema = z.object({
  showIfField: z.string().min(1),
  showIfValue: z.string(),
});

const subFieldSchema = z.object({
  name: z.string().trim().min(1),
  fieldName: z.string().trim().regex(/^[a-z][a-z0-9_]*$/),
  fieldType: z.literal('number').default('number'),
  isRequired: z.boolean().default(false),
  placeholder: z.string().nullable().optional(),
  displayOrder: z.number().int().min(0).default(0),
});

export const fieldDefinitionSchema = z
  .object({
    fieldId: z.string().min(1).optional(),
    label: z.string().trim().min(1),
    fieldName: z.string().trim().regex(/^[a-z][a-z0-9_]*$/, 'Field names must be snake_case'),
    fieldType: z.enum(FIELD_TYPES),
    isRequired: z.boolean().default(false),
    placeholder: z.string().nullable().optional(),
    defaultValue: z.string().nullable().optional(),
    options: z.array(z.string()).nullable().optional(),
    validation: validationRulesSchema.nullable().optional(),
    displayOrder: z.number().int().min(0).optional(),
    helpText: z.string().nullable().optional(),
    conditionalLogic: conditionalLogicSchema.nullable().optional(),
    subFields: z.array(subFieldSchema).nullable().optional(),
  })
  .superRefine((field, ctx) => {
    const subFieldCount = field.subFields?.length ?? 0;
    if (field.fieldType === 'composite' && subFieldCount === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['subFields'], message: 'Composite fields need at least one sub-field' });
    }
    if (field.fieldType !== 'composite' && subFieldCount > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['subFields'], message: 'Only composite fields may carry sub-fields' });
    }
  });

export const fieldListSchema = z.array(fieldDefinitionSchema).superRefine((fields, ctx) => {
  const names = new Set<string>();
  const ids = new Set<string>();

  fields.forEach((field, index) => {
    if (names.has(field.fieldName)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'fieldName'], message: `Duplicate field name '${field.fieldName}'` });
    }
    names.add(field.fieldName);

    if (field.fieldId) {
      if (ids.has(field.fieldId)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'fieldId'], message: `Duplicate field id '${field.fieldId}'` });
      }
      ids.add(field.fieldId);
    }
  });
});

/** Shape of `category_schemas.fields` once persisted. */
export const storedFieldListSchema = z.array(
  z.object({
    fieldId: z.string(),
    label: z.string(),
    fieldName: z.string(),
    fieldType: z.enum(FIELD_TYPES),
    isRequired: z.boolean(),
    placeholder: z.string().nullable().optional(),
    defaultValue: z.string().nullable().optional(),
    options: z.array(z.string()).nullable().optional(),
    validation: validationRulesSchema.nullable().optional(),
    displayOrder: z.number(),
    helpText: z.string().nullable().optional(),
    conditionalLogic: conditionalLogicSchema.nullable().optional(),
    subFields: z.array(subFieldSchema).nullable().optional(),
  }),
);

export const createCategorySchemaBodySchema = z.object({
  name: z.string().trim().min(1).max(200),
  group: z.string().trim().regex(/^[a-z0-9_-]+$/),
  description: z.string().max(2000).nullable().optional(),
  descriptionTemplate: z.string().max(2000).nullable().optional(),
  fields: fieldListSchema.default([]),
});

export const updateCategorySchemaBodySchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    description: z.string().max(2000).nullable().optional(),
    descriptionTemplate: z.string().max(2000).nullable().optional(),
    isActive: z.boolean().optional(),
  })
  .refine((value) => Object.keys(value).length > 0, 'At least one property must be provided');

export const replaceFieldsBodySchema = z.object({
  fields: fieldListSchema,
});

export const reorderFieldsBodySchema = z.object({
  fieldIds: z.array(z.string().min(1)),
});

export const listCategorySchemasQuerySchema = z.object({
  group: z.string().trim().min(1).optional(),
  isActive: z.enum(['true', 'false']).transform((value) => value === 'true').optional(),
  search: z.string().trim().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  sortBy: z.enum(['createdAt', 'name']).default('createdAt'),
  order: z.enum(['asc', 'desc']).default('desc'),
});

export const availableSchemasQuerySchema = z.object({
  group: z.string().trim().min(1).optional(),
});

export const categorySchemaIdParamSchema = z.object({
  id: z.string().uuid(),
});

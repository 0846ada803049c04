import { z } from 'zod';

const optionalProperty = z.string().trim().max(64).nullable().optional();

export const attributeBodySchema = z.object({
  name: z.string().max(200).default(''),
  hardness: optionalProperty,
  ri: optionalProperty,
  sg: optionalProperty,
});

export const attributeScopeParamSchema = z.object({
  group: z.string().trim().regex(/^[a-z0-9_-]+$/),
  type: z.string().trim().regex(/^[a-z][a-z0-9_]*$/),
});

export const attributeGroupParamSchema = z.object({
  group: z.string().trim().regex(/^[a-z0-9_-]+$/),
});

export const attributeIdParamSchema = z.object({
  id: z.string().uuid(),
});

export const listAttributesQuerySchema = z.object({
  search: z.string().trim().min(1).optional(),
});

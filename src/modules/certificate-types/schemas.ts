import { z } from 'zod';

export const certificateTypeSlugSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^[a-z0-9_-]+$/, 'Slug may only contain lowercase letters, digits, dashes and underscores');

export const createCertificateTypeBodySchema = z.object({
  slug: certificateTypeSlugSchema,
  name: z.string().trim().min(1).max(120),
  description: z.string().max(500).nullable().optional(),
  icon: z.string().trim().min(1).max(64).optional(),
  hasPhoto: z.boolean().optional(),
  hasLogo: z.boolean().optional(),
  hasRearLogo: z.boolean().optional(),
});

export const updateCertificateTypeBodySchema = z
  .object({
    name: z.string().trim().min(1).max(120).optional(),
    description: z.string().max(500).nullable().optional(),
    icon: z.string().trim().min(1).max(64).optional(),
    hasPhoto: z.boolean().optional(),
    hasLogo: z.boolean().optional(),
    hasRearLogo: z.boolean().optional(),
    isActive: z.boolean().optional(),
  })
  .refine((value) => Object.keys(value).length > 0, 'At least one property must be provided');

export const reorderCertificateTypesBodySchema = z.object({
  ids: z.array(z.string().uuid()).min(1),
});

export const certificateTypeIdParamSchema = z.object({
  id: z.string().uuid(),
});

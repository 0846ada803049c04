import { z } from 'zod';

import { fieldValueMapSchema } from './field-values';

const stagedFileIdSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Invalid staged file id')
  .nullable()
  .optional();

export const issueCertificateBodySchema = z.object({
  type: z.string().trim().regex(/^[a-z0-9_-]+$/),
  clientId: z.string().trim().min(1),
  categoryId: z.string().uuid().nullable().optional(),
  fields: fieldValueMapSchema.default({}),
  stagedFileIds: z
    .object({
      photo: stagedFileIdSchema,
      logo: stagedFileIdSchema,
      rearLogo: stagedFileIdSchema,
    })
    .default({}),
});

export const issueCertificatesBulkBodySchema = z.object({
  certificates: z.array(issueCertificateBodySchema).min(1).max(100),
});

export const listCertificatesQuerySchema = z.object({
  search: z.string().trim().min(1).optional(),
  type: z.string().trim().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  sortBy: z.enum(['createdAt', 'type', 'certificateNumber']).default('createdAt'),
  order: z.enum(['asc', 'desc']).default('desc'),
});

export const certificateIdParamSchema = z.object({
  id: z.string().uuid(),
});

export const formSchemaParamSchema = z.object({
  categoryId: z.string().uuid(),
});

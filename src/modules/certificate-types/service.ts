import { logger } from '../../config/logger';
import { ConflictError, NotFoundError } from '../../shared/errors';
import {
  getCertificateTypeById,
  getCertificateTypeBySlug,
  getNextDisplayOrder,
  insertCertificateType,
  listCertificateTypes,
  reorderCertificateTypes as reorderCertificateTypesRepository,
  softDeleteCertificateType,
  updateCertificateType as updateCertificateTypeRepository,
} from './repository';
import type { CertificateTypeRecord, CreateCertificateTypeParams, UpdateCertificateTypeParams } from './types';

export async function listActiveCertificateTypes(): Promise<CertificateTypeRecord[]> {
  return listCertificateTypes({ activeOnly: true });
}

export async function listAllCertificateTypes(): Promise<CertificateTypeRecord[]> {
  return listCertificateTypes({ activeOnly: false });
}

export async function createCertificateType(params: CreateCertificateTypeParams): Promise<CertificateTypeRecord> {
  const existing = await getCertificateTypeBySlug(params.slug);
  if (existing) {
    throw new ConflictError(`A certificate type with slug '${params.slug}' already exists`);
  }

  const displayOrder = await getNextDisplayOrder();
  const created = await insertCertificateType({ ...params, displayOrder });
  logger.info({ certificateTypeId: created.id, slug: created.slug }, 'certificate type created');
  return created;
}

export async function updateCertificateType(
  id: string,
  params: UpdateCertificateTypeParams,
): Promise<CertificateTypeRecord> {
  const updated = await updateCertificateTypeRepository(id, params);
  if (!updated) {
    throw new NotFoundError('Certificate type not found');
  }
  return updated;
}

export async function deleteCertificateType(id: string): Promise<void> {
  const deleted = await softDeleteCertificateType(id);
  if (!deleted) {
    throw new NotFoundError('Certificate type not found');
  }
  logger.info({ certificateTypeId: id }, 'certificate type deleted');
}

export async function reorderCertificateTypes(ids: string[]): Promise<CertificateTypeRecord[]> {
  await reorderCertificateTypesRepository(ids);
  return listAllCertificateTypes();
}

/** Resolves a live certificate type by slug; `null` when the group is unknown. */
export async function findCertificateTypeBySlug(slug: string): Promise<CertificateTypeRecord | null> {
  return getCertificateTypeBySlug(slug);
}

export async function getCertificateTypeOrFail(id: string): Promise<CertificateTypeRecord> {
  const type = await getCertificateTypeById(id);
  if (!type) {
    throw new NotFoundError('Certificate type not found');
  }
  return type;
}

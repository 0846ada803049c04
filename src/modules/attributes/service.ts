import { logger } from '../../config/logger';
import { AppError, ConflictError, NotFoundError } from '../../shared/errors';
import type { Identity } from '../auth/roles';
import { getActiveCategorySchemaByGroup } from '../category-schemas/repository';
import { isOptionField } from '../category-schemas/types';
import { findCertificateTypeBySlug } from '../certificate-types/service';
import {
  findAttributeByName,
  getAttributeById,
  insertAttribute,
  listAttributes as listAttributesRepository,
  softDeleteAttribute,
  updateAttribute as updateAttributeRepository,
} from './repository';
import type { AttributeProperties, AttributeRecord, ManageableFields } from './types';

function normalizeProperties(properties: AttributeProperties): AttributeProperties {
  const name = properties.name.trim();
  if (!name) {
    throw new AppError('Attribute name is required', 422, { field: 'name' });
  }

  return { ...properties, name };
}

export async function listAttributes(group: string, type: string, search?: string): Promise<AttributeRecord[]> {
  return listAttributesRepository({ group, type, search });
}

export async function createAttribute(
  group: string,
  type: string,
  properties: AttributeProperties,
  createdBy: Identity,
): Promise<AttributeRecord> {
  const certificateType = await findCertificateTypeBySlug(group);
  if (!certificateType) {
    throw new AppError(`Invalid certificate type: ${group}`, 400);
  }

  const normalized = normalizeProperties(properties);
  const duplicate = await findAttributeByName({ group, type, name: normalized.name });
  if (duplicate) {
    throw new ConflictError(`Attribute '${normalized.name}' already exists for ${group}/${type}`);
  }

  const attribute = await insertAttribute({ group, type, properties: normalized, createdBy });
  logger.info({ attributeId: attribute.id, group, type }, 'attribute created');
  return attribute;
}

export async function updateAttribute(id: string, properties: AttributeProperties): Promise<AttributeRecord> {
  const existing = await getAttributeById(id);
  if (!existing) {
    throw new NotFoundError('Attribute not found');
  }

  const normalized = normalizeProperties(properties);
  const duplicate = await findAttributeByName({
    group: existing.group,
    type: existing.type,
    name: normalized.name,
    excludeId: id,
  });
  if (duplicate) {
    throw new ConflictError(`Attribute '${normalized.name}' already exists for ${existing.group}/${existing.type}`);
  }

  const updated = await updateAttributeRepository(id, normalized);
  if (!updated) {
    throw new NotFoundError('Attribute not found');
  }
  return updated;
}

export async function deleteAttribute(id: string): Promise<void> {
  const deleted = await softDeleteAttribute(id);
  if (!deleted) {
    throw new NotFoundError('Attribute not found');
  }
}

/** Option-bearing fields of the group's active schema, i.e. the catalog types worth managing. */
export async function listManageableFields(group: string): Promise<ManageableFields> {
  const certificateType = await findCertificateTypeBySlug(group);
  if (!certificateType) {
    throw new NotFoundError('Certificate type not found');
  }

  const schema = await getActiveCategorySchemaByGroup(group);
  if (!schema) {
    return { group, schemaId: null, schemaName: null, fields: [] };
  }

  const fields = schema.fields
    .filter((field) => isOptionField(field.fieldType))
    .sort((a, b) => a.displayOrder - b.displayOrder)
    .map((field) => ({
      fieldName: field.fieldName,
      label: field.label,
      fieldType: field.fieldType,
      displayOrder: field.displayOrder,
    }));

  return { group, schemaId: schema.id, schemaName: schema.name, fields };
}

import { randomUUID } from 'node:crypto';

import { logger } from '../../config/logger';
import { ConflictError, NotFoundError } from '../../shared/errors';
import { paginate } from '../../shared/pagination';
import type { Paginated } from '../../shared/pagination';
import type { Identity } from '../auth/roles';
import { availableTemplateFields } from '../certificates/template-renderer';
import { resolveSchemaOptions } from './option-resolver';
import {
  findCategorySchemaByName,
  getCategorySchemaById,
  insertCategorySchema,
  listActiveCategorySchemaSummaries,
  listCategorySchemas as listCategorySchemasRepository,
  softDeleteCategorySchema,
  updateCategorySchema,
  updateCategorySchemaFields,
} from './repository';
import type {
  CategorySchemaRecord,
  CategorySchemaSummary,
  CreateCategorySchemaParams,
  FieldDefinition,
  FieldDefinitionInput,
  ListCategorySchemasFilters,
  UpdateCategorySchemaParams,
} from './types';

const DUPLICATE_NAME_MESSAGE = 'A category with this name already exists';

/** Assigns missing field ids and sets `displayOrder` to each field's position. */
export function normalizeFields(fields: readonly FieldDefinitionInput[]): FieldDefinition[] {
  return fields.map((field, index) => ({
    ...field,
    fieldId: field.fieldId ?? randomUUID(),
    displayOrder: index,
    subFields: field.fieldType === 'composite' ? field.subFields ?? [] : null,
  }));
}

/**
 * Named fields first in the requested order (unknown ids ignored), then every
 * field the list omitted, keeping its previous relative order.
 */
export function reorderFields(fields: readonly FieldDefinition[], orderedFieldIds: readonly string[]): FieldDefinition[] {
  const byId = new Map(fields.map((field) => [field.fieldId, field]));
  const seen = new Set<string>();
  const ordered: FieldDefinition[] = [];

  for (const fieldId of orderedFieldIds) {
    const field = byId.get(fieldId);
    if (field && !seen.has(fieldId)) {
      ordered.push(field);
      seen.add(fieldId);
    }
  }

  const remaining = [...fields]
    .filter((field) => !seen.has(field.fieldId))
    .sort((a, b) => a.displayOrder - b.displayOrder);

  return [...ordered, ...remaining].map((field, index) => ({ ...field, displayOrder: index }));
}

/** First free `"<name> (Copy)"`, `"<name> (Copy 2)"`, ... among live schemas. */
async function nextCopyName(sourceName: string): Promise<string> {
  for (let copy = 1; ; copy += 1) {
    const candidate = copy === 1 ? `${sourceName} (Copy)` : `${sourceName} (Copy ${copy})`;
    if (!(await findCategorySchemaByName(candidate))) {
      return candidate;
    }
  }
}

async function assertNameAvailable(name: string, excludeId?: string): Promise<void> {
  const existing = await findCategorySchemaByName(name, excludeId);
  if (existing) {
    throw new ConflictError(DUPLICATE_NAME_MESSAGE);
  }
}

export async function getCategorySchemaOrFail(id: string): Promise<CategorySchemaRecord> {
  const schema = await getCategorySchemaById(id);
  if (!schema) {
    throw new NotFoundError('Category schema not found');
  }
  return schema;
}

export async function createCategorySchema(params: CreateCategorySchemaParams): Promise<CategorySchemaRecord> {
  const name = params.name.trim();
  await assertNameAvailable(name);

  const schema = await insertCategorySchema({
    name,
    group: params.group,
    description: params.description ?? null,
    descriptionTemplate: params.descriptionTemplate ?? null,
    fields: normalizeFields(params.fields),
    isActive: true,
    createdBy: params.createdBy,
  });

  logger.info({ categorySchemaId: schema.id, group: schema.group }, 'category schema created');
  return schema;
}

export async function listCategorySchemas(filters: ListCategorySchemasFilters): Promise<Paginated<CategorySchemaRecord>> {
  const { data, total } = await listCategorySchemasRepository(filters);
  return paginate(data, total, filters.page, filters.limit);
}

export async function updateCategorySchemaMetadata(
  id: string,
  params: UpdateCategorySchemaParams,
): Promise<CategorySchemaRecord> {
  await getCategorySchemaOrFail(id);

  const name = params.name?.trim();
  if (name) {
    await assertNameAvailable(name, id);
  }

  const updated = await updateCategorySchema(id, { ...params, name });
  if (!updated) {
    throw new NotFoundError('Category schema not found');
  }
  return updated;
}

export async function deleteCategorySchema(id: string): Promise<void> {
  const deleted = await softDeleteCategorySchema(id);
  if (!deleted) {
    throw new NotFoundError('Category schema not found');
  }
  logger.info({ categorySchemaId: id }, 'category schema deleted');
}

export async function replaceCategorySchemaFields(
  id: string,
  fields: readonly FieldDefinitionInput[],
): Promise<CategorySchemaRecord> {
  await getCategorySchemaOrFail(id);

  const updated = await updateCategorySchemaFields(id, normalizeFields(fields));
  if (!updated) {
    throw new NotFoundError('Category schema not found');
  }
  return updated;
}

export async function reorderCategorySchemaFields(id: string, orderedFieldIds: readonly string[]): Promise<CategorySchemaRecord> {
  const schema = await getCategorySchemaOrFail(id);

  const updated = await updateCategorySchemaFields(id, reorderFields(schema.fields, orderedFieldIds));
  if (!updated) {
    throw new NotFoundError('Category schema not found');
  }
  return updated;
}

export async function duplicateCategorySchema(id: string, createdBy: Identity): Promise<CategorySchemaRecord> {
  const source = await getCategorySchemaOrFail(id);
  const name = await nextCopyName(source.name);

  const idMap = new Map(source.fields.map((field) => [field.fieldId, randomUUID()]));
  const fields = source.fields.map((field) => ({
    ...field,
    fieldId: idMap.get(field.fieldId) ?? randomUUID(),
    options: field.options ? [...field.options] : field.options,
    subFields: field.subFields ? field.subFields.map((subField) => ({ ...subField })) : field.subFields,
    conditionalLogic: field.conditionalLogic
      ? {
          ...field.conditionalLogic,
          showIfField: idMap.get(field.conditionalLogic.showIfField) ?? field.conditionalLogic.showIfField,
        }
      : field.conditionalLogic,
  }));

  const copy = await insertCategorySchema({
    name,
    group: source.group,
    description: source.description,
    descriptionTemplate: source.descriptionTemplate,
    fields,
    isActive: false,
    createdBy,
  });

  logger.info({ categorySchemaId: copy.id, sourceId: source.id }, 'category schema duplicated');
  return copy;
}

export async function getTemplateFields(id: string): Promise<{ fields: string[]; descriptionTemplate: string | null }> {
  const schema = await getCategorySchemaOrFail(id);
  return {
    fields: availableTemplateFields(schema.fields),
    descriptionTemplate: schema.descriptionTemplate,
  };
}

export async function listAvailableSchemas(group?: string): Promise<CategorySchemaSummary[]> {
  return listActiveCategorySchemaSummaries(group);
}

/** Active schema with catalog-backed options, as rendered by certificate forms. */
export async function getFormSchema(id: string): Promise<CategorySchemaRecord> {
  const schema = await getCategorySchemaOrFail(id);
  if (!schema.isActive) {
    throw new NotFoundError('Category schema not found');
  }
  return resolveSchemaOptions(schema);
}

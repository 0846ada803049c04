import { query } from '../../db';
import { likePattern, parseIdentity, parseJsonColumn, toIsoString } from '../../db/mappers';
import type { Identity } from '../auth/roles';
import { storedFieldListSchema } from './schemas';
import type {
  CategorySchemaRecord,
  CategorySchemaSummary,
  FieldDefinition,
  ListCategorySchemasFilters,
  UpdateCategorySchemaParams,
} from './types';

type RawCategorySchemaRow = {
  id: string;
  name: string;
  group_slug: string;
  description: string | null;
  description_template: string | null;
  fields: unknown;
  is_active: boolean;
  created_by: unknown;
  created_at: Date;
  updated_at: Date;
};

const SORT_COLUMNS: Record<ListCategorySchemasFilters['sortBy'], string> = {
  createdAt: 'created_at',
  name: 'name',
};

function parseFields(raw: unknown): FieldDefinition[] {
  const parsed = storedFieldListSchema.safeParse(parseJsonColumn(raw) ?? []);
  if (!parsed.success) {
    throw new Error('Stored category schema fields are malformed');
  }
  return parsed.data;
}

function mapCategorySchemaRow(row: RawCategorySchemaRow): CategorySchemaRecord {
  return {
    id: row.id,
    name: row.name,
    group: row.group_slug,
    description: row.description,
    descriptionTemplate: row.description_template,
    fields: parseFields(row.fields),
    isActive: row.is_active,
    createdBy: parseIdentity(row.created_by),
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
  };
}

export async function insertCategorySchema(params: {
  name: string;
  group: string;
  description: string | null;
  descriptionTemplate: string | null;
  fields: FieldDefinition[];
  isActive: boolean;
  createdBy: Identity;
}): Promise<CategorySchemaRecord> {
  const { rows } = await query<RawCategorySchemaRow>(
    `insert into category_schemas (name, group_slug, description, description_template, fields, is_active, created_by)
     values ($1, $2, $3, $4, $5::jsonb, $6, $7::jsonb)
     returning *`,
    [
      params.name,
      params.group,
      params.description,
      params.descriptionTemplate,
      JSON.stringify(params.fields),
      params.isActive,
      JSON.stringify(params.createdBy),
    ],
  );

  return mapCategorySchemaRow(rows[0]);
}

export async function getCategorySchemaById(id: string): Promise<CategorySchemaRecord | null> {
  const { rows } = await query<RawCategorySchemaRow>(
    'select * from category_schemas where id = $1 and is_deleted = false',
    [id],
  );

  return rows[0] ? mapCategorySchemaRow(rows[0]) : null;
}

export async function findCategorySchemaByName(name: string, excludeId?: string): Promise<CategorySchemaRecord | null> {
  const values: unknown[] = [name.trim()];
  let exclusion = '';

  if (excludeId) {
    values.push(excludeId);
    exclusion = `and id <> $${values.length}`;
  }

  const { rows } = await query<RawCategorySchemaRow>(
    `select * from category_schemas
      where lower(name) = lower($1)
        and is_deleted = false
        ${exclusion}
      limit 1`,
    values,
  );

  return rows[0] ? mapCategorySchemaRow(rows[0]) : null;
}

export async function getActiveCategorySchemaByGroup(group: string): Promise<CategorySchemaRecord | null> {
  const { rows } = await query<RawCategorySchemaRow>(
    `select * from category_schemas
      where group_slug = $1
        and is_active = true
        and is_deleted = false
      order by created_at desc
      limit 1`,
    [group],
  );

  return rows[0] ? mapCategorySchemaRow(rows[0]) : null;
}

export async function listCategorySchemas(
  filters: ListCategorySchemasFilters,
): Promise<{ data: CategorySchemaRecord[]; total: number }> {
  const conditions = ['is_deleted = false'];
  const values: unknown[] = [];

  if (filters.group) {
    values.push(filters.group);
    conditions.push(`group_slug = $${values.length}`);
  }

  if (filters.isActive !== undefined) {
    values.push(filters.isActive);
    conditions.push(`is_active = $${values.length}`);
  }

  if (filters.search) {
    values.push(likePattern(filters.search));
    conditions.push(`lower(name) like $${values.length}`);
  }

  const where = conditions.join(' and ');
  const countResult = await query<{ total: number }>(
    `select count(*)::int as total from category_schemas where ${where}`,
    values,
  );

  const direction = filters.order === 'asc' ? 'asc' : 'desc';
  const offset = (filters.page - 1) * filters.limit;
  const { rows } = await query<RawCategorySchemaRow>(
    `select * from category_schemas
      where ${where}
      order by ${SORT_COLUMNS[filters.sortBy]} ${direction}
      limit $${values.length + 1} offset $${values.length + 2}`,
    [...values, filters.limit, offset],
  );

  return {
    data: rows.map(mapCategorySchemaRow),
    total: Number(countResult.rows[0]?.total ?? 0),
  };
}

export async function listActiveCategorySchemaSummaries(group?: string): Promise<CategorySchemaSummary[]> {
  const values: unknown[] = [];
  let groupFilter = '';

  if (group) {
    values.push(group);
    groupFilter = `and group_slug = $${values.length}`;
  }

  const { rows } = await query<RawCategorySchemaRow>(
    `select * from category_schemas
      where is_active = true
        and is_deleted = false
        ${groupFilter}
      order by name asc`,
    values,
  );

  return rows.map((row) => ({
    id: row.id,
    name: row.name,
    group: row.group_slug,
    description: row.description,
    fieldCount: parseFields(row.fields).length,
  }));
}

export async function updateCategorySchema(
  id: string,
  params: UpdateCategorySchemaParams,
): Promise<CategorySchemaRecord | null> {
  const updates: string[] = [];
  const values: unknown[] = [];

  if (params.name !== undefined) {
    values.push(params.name);
    updates.push(`name = $${values.length}`);
  }

  if (params.description !== undefined) {
    values.push(params.description);
    updates.push(`description = $${values.length}`);
  }

  if (params.descriptionTemplate !== undefined) {
    values.push(params.descriptionTemplate);
    updates.push(`description_template = $${values.length}`);
  }

  if (params.isActive !== undefined) {
    values.push(params.isActive);
    updates.push(`is_active = $${values.length}`);
  }

  if (updates.length === 0) {
    return getCategorySchemaById(id);
  }

  updates.push('updated_at = now()');
  values.push(id);

  const { rows } = await query<RawCategorySchemaRow>(
    `update category_schemas
        set ${updates.join(', ')}
      where id = $${values.length}
        and is_deleted = false
      returning *`,
    values,
  );

  return rows[0] ? mapCategorySchemaRow(rows[0]) : null;
}

export async function updateCategorySchemaFields(id: string, fields: FieldDefinition[]): Promise<CategorySchemaRecord | null> {
  const { rows } = await query<RawCategorySchemaRow>(
    `update category_schemas
        set fields = $1::jsonb,
            updated_at = now()
      where id = $2
        and is_deleted = false
      returning *`,
    [JSON.stringify(fields), id],
  );

  return rows[0] ? mapCategorySchemaRow(rows[0]) : null;
}

export async function softDeleteCategorySchema(id: string): Promise<boolean> {
  const { rows } = await query<{ id: string }>(
    `update category_schemas
        set is_deleted = true,
            updated_at = now()
      where id = $1
        and is_deleted = false
      returning id`,
    [id],
  );

  return rows.length > 0;
}

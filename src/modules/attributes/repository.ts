import { query } from '../../db';
import { likePattern, parseIdentity, toIsoString } from '../../db/mappers';
import type { Identity } from '../auth/roles';
import type { AttributeProperties, AttributeRecord } from './types';

type RawAttributeRow = {
  id: string;
  group_slug: string;
  type: string;
  name: string;
  hardness: string | null;
  ri: string | null;
  sg: string | null;
  created_by: unknown;
  created_at: Date;
  updated_at: Date;
};

function mapAttributeRow(row: RawAttributeRow): AttributeRecord {
  return {
    id: row.id,
    group: row.group_slug,
    type: row.type,
    name: row.name,
    hardness: row.hardness,
    ri: row.ri,
    sg: row.sg,
    createdBy: parseIdentity(row.created_by),
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
  };
}

export async function listAttributes(params: { group: string; type: string; search?: string }): Promise<AttributeRecord[]> {
  const values: unknown[] = [params.group, params.type];
  let searchFilter = '';

  if (params.search) {
    values.push(likePattern(params.search));
    searchFilter = `and lower(name) like $${values.length}`;
  }

  const { rows } = await query<RawAttributeRow>(
    `select * from attributes
      where group_slug = $1
        and type = $2
        and is_deleted = false
        ${searchFilter}
      order by created_at desc`,
    values,
  );

  return rows.map(mapAttributeRow);
}

/** Catalog names for one `(group, type)`, sorted by name. */
export async function listAttributeNames(group: string, type: string): Promise<string[]> {
  const { rows } = await query<{ name: string }>(
    `select name from attributes
      where group_slug = $1
        and type = $2
        and is_deleted = false
      order by name asc`,
    [group, type],
  );

  return rows.map((row) => row.name);
}

export async function getAttributeById(id: string): Promise<AttributeRecord | null> {
  const { rows } = await query<RawAttributeRow>(
    'select * from attributes where id = $1 and is_deleted = false',
    [id],
  );

  return rows[0] ? mapAttributeRow(rows[0]) : null;
}

export async function findAttributeByName(params: {
  group: string;
  type: string;
  name: string;
  excludeId?: string;
}): Promise<AttributeRecord | null> {
  const values: unknown[] = [params.group, params.type, params.name];
  let exclusion = '';

  if (params.excludeId) {
    values.push(params.excludeId);
    exclusion = `and id <> $${values.length}`;
  }

  const { rows } = await query<RawAttributeRow>(
    `select * from attributes
      where group_slug = $1
        and type = $2
        and lower(name) = lower($3)
        and is_deleted = false
        ${exclusion}
      limit 1`,
    values,
  );

  return rows[0] ? mapAttributeRow(rows[0]) : null;
}

export async function insertAttribute(params: {
  group: string;
  type: string;
  properties: AttributeProperties;
  createdBy: Identity;
}): Promise<AttributeRecord> {
  const { rows } = await query<RawAttributeRow>(
    `insert into attributes (group_slug, type, name, hardness, ri, sg, created_by)
     values ($1, $2, $3, $4, $5, $6, $7::jsonb)
     returning *`,
    [
      params.group,
      params.type,
      params.properties.name,
      params.properties.hardness ?? null,
      params.properties.ri ?? null,
      params.properties.sg ?? null,
      JSON.stringify(params.createdBy),
    ],
  );

  return mapAttributeRow(rows[0]);
}

export async function updateAttribute(id: string, properties: AttributeProperties): Promise<AttributeRecord | null> {
  const { rows } = await query<RawAttributeRow>(
    `update attributes
        set name = $1,
            hardness = $2,
            ri = $3,
            sg = $4,
            updated_at = now()
      where id = $5
        and is_deleted = false
      returning *`,
    [properties.name, properties.hardness ?? null, properties.ri ?? null, properties.sg ?? null, id],
  );

  return rows[0] ? mapAttributeRow(rows[0]) : null;
}

export async function softDeleteAttribute(id: string): Promise<boolean> {
  const { rows } = await query<{ id: string }>(
    `update attributes
        set is_deleted = true,
            updated_at = now()
      where id = $1
        and is_deleted = false
      returning id`,
    [id],
  );

  return rows.length > 0;
}

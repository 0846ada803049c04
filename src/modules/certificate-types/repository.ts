import { query, withTransaction } from '../../db';
import { parseIdentity, toIsoString } from '../../db/mappers';
import type { CertificateTypeRecord, CreateCertificateTypeParams, UpdateCertificateTypeParams } from './types';

type RawCertificateTypeRow = {
  id: string;
  slug: string;
  name: string;
  description: string | null;
  icon: string;
  display_order: number;
  has_photo: boolean;
  has_logo: boolean;
  has_rear_logo: boolean;
  is_active: boolean;
  created_by: unknown;
  created_at: Date;
  updated_at: Date;
};

function mapCertificateTypeRow(row: RawCertificateTypeRow): CertificateTypeRecord {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    description: row.description,
    icon: row.icon,
    displayOrder: Number(row.display_order),
    hasPhoto: row.has_photo,
    hasLogo: row.has_logo,
    hasRearLogo: row.has_rear_logo,
    isActive: row.is_active,
    createdBy: parseIdentity(row.created_by),
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
  };
}

export async function listCertificateTypes(options: { activeOnly: boolean }): Promise<CertificateTypeRecord[]> {
  const { rows } = await query<RawCertificateTypeRow>(
    `select * from certificate_types
      where is_deleted = false
        ${options.activeOnly ? 'and is_active = true' : ''}
      order by display_order asc, name asc`,
  );

  return rows.map(mapCertificateTypeRow);
}

export async function getCertificateTypeById(id: string): Promise<CertificateTypeRecord | null> {
  const { rows } = await query<RawCertificateTypeRow>(
    'select * from certificate_types where id = $1 and is_deleted = false',
    [id],
  );

  return rows[0] ? mapCertificateTypeRow(rows[0]) : null;
}

export async function getCertificateTypeBySlug(slug: string): Promise<CertificateTypeRecord | null> {
  const { rows } = await query<RawCertificateTypeRow>(
    'select * from certificate_types where slug = $1 and is_deleted = false',
    [slug],
  );

  return rows[0] ? mapCertificateTypeRow(rows[0]) : null;
}

export async function getNextDisplayOrder(): Promise<number> {
  const { rows } = await query<{ max_order: number | null }>(
    'select max(display_order) as max_order from certificate_types where is_deleted = false',
  );

  const current = rows[0]?.max_order;
  return current === null || current === undefined ? 0 : Number(current) + 1;
}

export async function insertCertificateType(
  params: CreateCertificateTypeParams & { displayOrder: number },
): Promise<CertificateTypeRecord> {
  const { rows } = await query<RawCertificateTypeRow>(
    `insert into certificate_types (
        slug, name, description, icon, display_order, has_photo, has_logo, has_rear_logo, created_by
      )
      values ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb)
      returning *`,
    [
      params.slug,
      params.name,
      params.description ?? null,
      params.icon ?? 'file-text',
      params.displayOrder,
      params.hasPhoto ?? true,
      params.hasLogo ?? true,
      params.hasRearLogo ?? true,
      JSON.stringify(params.createdBy),
    ],
  );

  return mapCertificateTypeRow(rows[0]);
}

export async function updateCertificateType(
  id: string,
  params: UpdateCertificateTypeParams,
): Promise<CertificateTypeRecord | null> {
  const columns: Array<[keyof UpdateCertificateTypeParams, string]> = [
    ['name', 'name'],
    ['description', 'description'],
    ['icon', 'icon'],
    ['hasPhoto', 'has_photo'],
    ['hasLogo', 'has_logo'],
    ['hasRearLogo', 'has_rear_logo'],
    ['isActive', 'is_active'],
  ];
  const updates: string[] = [];
  const values: unknown[] = [];

  for (const [property, column] of columns) {
    if (params[property] !== undefined) {
      values.push(params[property]);
      updates.push(`${column} = $${values.length}`);
    }
  }

  if (updates.length === 0) {
    return getCertificateTypeById(id);
  }

  updates.push('updated_at = now()');
  values.push(id);

  const { rows } = await query<RawCertificateTypeRow>(
    `update certificate_types
        set ${updates.join(', ')}
      where id = $${values.length}
        and is_deleted = false
      returning *`,
    values,
  );

  return rows[0] ? mapCertificateTypeRow(rows[0]) : null;
}

export async function softDeleteCertificateType(id: string): Promise<boolean> {
  const { rows } = await query<{ id: string }>(
    `update certificate_types
        set is_deleted = true,
            updated_at = now()
      where id = $1
        and is_deleted = false
      returning id`,
    [id],
  );

  return rows.length > 0;
}

export async function reorderCertificateTypes(ids: string[]): Promise<void> {
  await withTransaction(async (client) => {
    for (const [index, id] of ids.entries()) {
      await client.query(
        `update certificate_types
            set display_order = $1,
                updated_at = now()
          where id = $2
            and is_deleted = false`,
        [index, id],
      );
    }
  });
}

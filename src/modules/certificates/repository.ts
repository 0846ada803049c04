import type { DbClient } from '../../db';
import { query } from '../../db';
import { likePattern, parseIdentity, parseJsonColumn, toIsoString } from '../../db/mappers';
import { fieldValueMapSchema } from './field-values';
import type { FieldValueMap } from './field-values';
import type { CertificateRecord, IssuedCertificate, ListCertificatesFilters, NewCertificateRow } from './types';

type RawCertificateRow = {
  id: string;
  certificate_number: string;
  type: string;
  client_id: string;
  category_id: string | null;
  fields: unknown;
  photo_url: string | null;
  brand_logo_url: string | null;
  rear_brand_logo_url: string | null;
  qr_code_url: string | null;
  is_rejected: boolean;
  created_by: unknown;
  created_at: Date;
  updated_at: Date;
};

const SORT_COLUMNS: Record<ListCertificatesFilters['sortBy'], string> = {
  createdAt: 'created_at',
  type: 'type',
  certificateNumber: 'certificate_number',
};

function parseFieldValues(raw: unknown): FieldValueMap {
  const parsed = fieldValueMapSchema.safeParse(parseJsonColumn(raw) ?? {});
  return parsed.success ? parsed.data : {};
}

function mapCertificateRow(row: RawCertificateRow): CertificateRecord {
  return {
    id: row.id,
    certificateNumber: row.certificate_number,
    type: row.type,
    clientId: row.client_id,
    categoryId: row.category_id,
    fields: parseFieldValues(row.fields),
    photoUrl: row.photo_url,
    brandLogoUrl: row.brand_logo_url,
    rearBrandLogoUrl: row.rear_brand_logo_url,
    qrCodeUrl: row.qr_code_url,
    isRejected: row.is_rejected,
    createdBy: parseIdentity(row.created_by),
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
  };
}

/**
 * Atomically increments the counter for `key`, creating it at 1 on first
 * use, and returns the post-increment value.
 */
export async function incrementCounter(key: string): Promise<number> {
  const { rows } = await query<{ seq: number }>(
    `insert into certificate_counters (counter_key, seq)
     values ($1, 1)
     on conflict (counter_key) do update
       set seq = certificate_counters.seq + 1,
           updated_at = now()
     returning seq`,
    [key],
  );

  return Number(rows[0].seq);
}

export async function insertCertificate(row: NewCertificateRow, client?: DbClient): Promise<IssuedCertificate> {
  const sql = `insert into certificates (
      certificate_number, type, client_id, category_id, fields,
      photo_url, brand_logo_url, rear_brand_logo_url, created_by
    )
    values ($1, $2, $3, $4, $5::jsonb, $6, $7, $8, $9::jsonb)
    returning id, certificate_number`;
  const values = [
    row.certificateNumber,
    row.type,
    row.clientId,
    row.categoryId,
    JSON.stringify(row.fields),
    row.photoUrl,
    row.brandLogoUrl,
    row.rearBrandLogoUrl,
    JSON.stringify(row.createdBy),
  ];

  const { rows } = client
    ? await client.query<{ id: string; certificate_number: string }>(sql, values)
    : await query<{ id: string; certificate_number: string }>(sql, values);

  return { id: rows[0].id, certificateNumber: rows[0].certificate_number };
}

export async function getCertificateById(id: string): Promise<CertificateRecord | null> {
  const { rows } = await query<RawCertificateRow>(
    'select * from certificates where id = $1 and is_deleted = false',
    [id],
  );

  return rows[0] ? mapCertificateRow(rows[0]) : null;
}

export async function listCertificates(
  filters: ListCertificatesFilters,
): Promise<{ data: CertificateRecord[]; total: number }> {
  const conditions = ['is_deleted = false'];
  const values: unknown[] = [];

  if (filters.type) {
    values.push(filters.type);
    conditions.push(`type = $${values.length}`);
  }

  if (filters.search) {
    values.push(likePattern(filters.search));
    conditions.push(`(lower(certificate_number) like $${values.length} or lower(type) like $${values.length})`);
  }

  const where = conditions.join(' and ');
  const countResult = await query<{ total: number }>(
    `select count(*)::int as total from certificates where ${where}`,
    values,
  );

  const direction = filters.order === 'asc' ? 'asc' : 'desc';
  const offset = (filters.page - 1) * filters.limit;
  const { rows } = await query<RawCertificateRow>(
    `select * from certificates
      where ${where}
      order by ${SORT_COLUMNS[filters.sortBy]} ${direction}
      limit $${values.length + 1} offset $${values.length + 2}`,
    [...values, filters.limit, offset],
  );

  return {
    data: rows.map(mapCertificateRow),
    total: Number(countResult.rows[0]?.total ?? 0),
  };
}

export async function softDeleteCertificate(id: string): Promise<boolean> {
  const { rows } = await query<{ id: string }>(
    `update certificates
        set is_deleted = true,
            updated_at = now()
      where id = $1
        and is_deleted = false
      returning id`,
    [id],
  );

  return rows.length > 0;
}

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { getEnv } from '../config/env';
import { logger } from '../config/logger';
import { pool } from '../db/pool';
import type { Identity } from '../modules/auth/roles';
import { insertAttribute } from '../modules/attributes/repository';
import { insertCategorySchema } from '../modules/category-schemas/repository';
import { fieldListSchema } from '../modules/category-schemas/schemas';
import { normalizeFields } from '../modules/category-schemas/service';
import { insertCertificateType } from '../modules/certificate-types/repository';

const SEED_DIR = path.resolve(process.cwd(), 'artifacts', 'seeds');

const SYSTEM_AUTHOR: Identity = { userId: 'system', name: 'System', email: 'system' };

const certificateTypeSeedSchema = z.array(
  z.object({
    slug: z.string(),
    name: z.string(),
    description: z.string(),
    icon: z.string(),
    displayOrder: z.number().int(),
  }),
);

/** `{ [group]: { [type]: names[] } }` */
const attributeSeedSchema = z.record(z.string(), z.record(z.string(), z.array(z.string())));

const categorySchemaSeedSchema = z.array(
  z.object({
    name: z.string(),
    group: z.string(),
    description: z.string(),
    descriptionTemplate: z.string(),
    fields: fieldListSchema,
  }),
);

async function readSeed<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const seedPath = path.join(SEED_DIR, file);

  try {
    const raw = await fs.readFile(seedPath, 'utf8');
    return schema.parse(JSON.parse(raw));
  } catch (error) {
    logger.error({ seedPath, err: error }, 'failed to load seed file');
    throw error;
  }
}

async function countLiveRows(table: 'certificate_types' | 'attributes' | 'category_schemas'): Promise<number> {
  const { rows } = await pool.query<{ total: number }>(
    `select count(*)::int as total from ${table} where is_deleted = false`,
  );
  return Number(rows[0]?.total ?? 0);
}

async function seedCertificateTypes() {
  if ((await countLiveRows('certificate_types')) > 0) {
    return;
  }

  const types = await readSeed('certificate-types.json', certificateTypeSeedSchema);
  for (const type of types) {
    await insertCertificateType({ ...type, createdBy: SYSTEM_AUTHOR });
  }

  logger.info({ count: types.length }, 'seeded certificate types');
}

async function seedAttributes() {
  if ((await countLiveRows('attributes')) > 0) {
    return;
  }

  const catalog = await readSeed('attributes.json', attributeSeedSchema);
  let count = 0;

  for (const [group, types] of Object.entries(catalog)) {
    for (const [type, names] of Object.entries(types)) {
      for (const name of names) {
        await insertAttribute({ group, type, properties: { name }, createdBy: SYSTEM_AUTHOR });
        count += 1;
      }
    }
  }

  logger.info({ count }, 'seeded attributes');
}

async function seedCategorySchemas() {
  if ((await countLiveRows('category_schemas')) > 0) {
    return;
  }

  const schemas = await readSeed('category-schemas.json', categorySchemaSeedSchema);
  for (const schema of schemas) {
    await insertCategorySchema({
      name: schema.name,
      group: schema.group,
      description: schema.description,
      descriptionTemplate: schema.descriptionTemplate,
      fields: normalizeFields(schema.fields),
      isActive: true,
      createdBy: SYSTEM_AUTHOR,
    });
  }

  logger.info({ count: schemas.length }, 'seeded category schemas');
}

export async function seedDatabase() {
  getEnv();
  await seedCertificateTypes();
  await seedAttributes();
  await seedCategorySchemas();
  logger.info('Seed completed');
}

async function run() {
  try {
    await seedDatabase();
  } catch (error) {
    logger.error({ err: error }, 'Seed failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  void run();
}

import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';

vi.setConfig({ testTimeout: 20000, hookTimeout: 30000 });

vi.mock('pg', async () => {
  const { adapter } = await import('../support/pg-mem');
  return { Pool: adapter.Pool, Client: adapter.Client };
});

import { createApp } from '../../src/app';
import { pool } from '../../src/db/pool';
import type { UserRole } from '../../src/modules/auth/roles';
import { setObjectStorage } from '../../src/modules/files/storage';
import { seedDatabase } from '../../src/scripts/seed';
import { InMemoryObjectStorage } from '../support/memory-storage';
import { loadSchema, mem } from '../support/pg-mem';

let app: FastifyInstance;
const storage = new InMemoryObjectStorage();

function tokenFor(role: UserRole): string {
  return app.jwt.sign({ sub: `user-${role}`, email: `${role}@lab.test`, name: `Lab ${role}`, role });
}

function auth(role: UserRole) {
  return { authorization: `Bearer ${tokenFor(role)}` };
}

async function looseDiamondSchemaId(): Promise<string> {
  const response = await app.inject({
    method: 'GET',
    url: '/certificates/available-schemas?group=loose_diamond',
    headers: auth('staff'),
  });
  expect(response.statusCode).toBe(200);
  const body = response.json<{ data: Array<{ id: string; name: string; fieldCount: number }> }>();
  expect(body.data).toHaveLength(1);
  expect(body.data[0]).toMatchObject({ name: 'Loose Diamond Certificate', fieldCount: 10 });
  return body.data[0].id;
}

const diamondFields = {
  shape: 'Round',
  weight: '1.02 cts',
  clarity: 'VS1',
  color: 'F',
  conclusion: 'Natural Diamond',
  dimension: { length: '6.5', width: '6.4', height: '3.9' },
};

describe('certificate routes', () => {
  beforeAll(async () => {
    loadSchema();
    mem.public.none(`insert into clients (id, name) values ('client-1', 'Acme Jewels')`);
    setObjectStorage(storage);

    await seedDatabase();
    app = await createApp();
    await app.ready();
  });

  afterAll(async () => {
    setObjectStorage(null);
    await app.close();
    await pool.end();
  });

  it('reports readiness', async () => {
    const response = await app.inject({ method: 'GET', url: '/health/ready' });
    expect(response.json()).toEqual({ status: 'ok', database: 'up' });
  });

  it('lists active certificate types without authentication', async () => {
    const response = await app.inject({ method: 'GET', url: '/certificate-types' });

    expect(response.statusCode).toBe(200);
    const body = response.json<{ data: Array<{ slug: string }> }>();
    expect(body.data).toHaveLength(6);
  });

  it('serves the form schema with catalog options', async () => {
    const schemaId = await looseDiamondSchemaId();

    const response = await app.inject({
      method: 'GET',
      url: `/certificates/form-schema/${schemaId}`,
      headers: auth('staff'),
    });

    expect(response.statusCode).toBe(200);
    const { schema } = response.json<{ schema: { fields: Array<{ fieldName: string; options?: string[] | null }> } }>();
    const clarity = schema.fields.find((field) => field.fieldName === 'clarity');
    expect(clarity?.options).toContain('VVS1');
  });

  it('requires authentication to issue', async () => {
    const response = await app.inject({ method: 'POST', url: '/certificates', payload: {} });
    expect(response.statusCode).toBe(401);
  });

  it('rejects a submission missing a required field', async () => {
    const categoryId = await looseDiamondSchemaId();

    const response = await app.inject({
      method: 'POST',
      url: '/certificates',
      headers: auth('staff'),
      payload: {
        type: 'loose_diamond',
        clientId: 'client-1',
        categoryId,
        fields: { shape: 'Round', weight: '1.02 cts' },
      },
    });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toMatchObject({ message: "Required field 'Clarity' is missing" });
  });

  it('issues, reads and lists a certificate', async () => {
    const categoryId = await looseDiamondSchemaId();
    await storage.put('cert-temp', 'photo-1_round.jpg', Buffer.from('jpeg'), 'image/jpeg');

    const issued = await app.inject({
      method: 'POST',
      url: '/certificates',
      headers: auth('staff'),
      payload: {
        type: 'loose_diamond',
        clientId: 'client-1',
        categoryId,
        fields: diamondFields,
        stagedFileIds: { photo: 'photo-1_round.jpg' },
      },
    });

    expect(issued.statusCode).toBe(201);
    const { certificate } = issued.json<{ certificate: { id: string; certificateNumber: string } }>();
    expect(certificate.certificateNumber).toMatch(/^G\d{6}0001$/);
    expect(storage.has('certificates', 'photo-1_round.jpg')).toBe(true);
    expect(storage.has('cert-temp', 'photo-1_round.jpg')).toBe(false);

    const details = await app.inject({
      method: 'GET',
      url: `/certificates/${certificate.id}`,
      headers: auth('staff'),
    });

    expect(details.statusCode).toBe(200);
    expect(details.json()).toMatchObject({
      certificate: {
        certificateNumber: certificate.certificateNumber,
        categoryId,
        client: { id: 'client-1', name: 'Acme Jewels' },
        photoUrl: 'certificates/photo-1_round.jpg',
        photoSignedUrl: 'https://storage.test/certificates/photo-1_round.jpg?expires=3600',
        description: 'One Round shaped Natural Diamond weighing 1.02 cts.',
        createdBy: { userId: 'user-staff', name: 'Lab staff', email: 'staff@lab.test' },
      },
    });

    const list = await app.inject({
      method: 'GET',
      url: '/certificates?type=loose_diamond',
      headers: auth('staff'),
    });

    expect(list.statusCode).toBe(200);
    expect(list.json()).toMatchObject({ total: 1, data: [{ id: certificate.id }] });
  });

  it('issues a batch with consecutive numbers', async () => {
    const categoryId = await looseDiamondSchemaId();
    const item = { type: 'loose_diamond', clientId: 'client-1', categoryId, fields: diamondFields };

    const response = await app.inject({
      method: 'POST',
      url: '/certificates/bulk',
      headers: auth('admin'),
      payload: { certificates: [item, item] },
    });

    expect(response.statusCode).toBe(201);
    const body = response.json<{ count: number; data: Array<{ certificateNumber: string }> }>();
    expect(body.count).toBe(2);
    expect(body.data[0].certificateNumber).toMatch(/0002$/);
    expect(body.data[1].certificateNumber).toMatch(/0003$/);
  });

  it('issues without field validation when no category schema is referenced', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/certificates',
      headers: auth('staff'),
      payload: { type: 'loose_diamond', clientId: 'client-1', fields: { shape: 'Round' } },
    });

    expect(response.statusCode).toBe(201);
    const { certificate } = response.json<{ certificate: { id: string; certificateNumber: string } }>();
    expect(certificate.certificateNumber).toMatch(/^G\d{6}0004$/);

    const details = await app.inject({ method: 'GET', url: `/certificates/${certificate.id}`, headers: auth('staff') });
    expect(details.json()).toMatchObject({ certificate: { categoryId: null, schema: null, fields: { shape: 'Round' } } });
  });

  it('rejects an unknown client without consuming a number', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/certificates',
      headers: auth('staff'),
      payload: { type: 'navaratna', clientId: 'client-unknown', fields: {} },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ message: 'Client not found' });
  });

  it('keeps deletion for administrators', async () => {
    const list = await app.inject({ method: 'GET', url: '/certificates', headers: auth('staff') });
    const [first] = list.json<{ data: Array<{ id: string }> }>().data;

    const forbidden = await app.inject({ method: 'DELETE', url: `/certificates/${first.id}`, headers: auth('staff') });
    expect(forbidden.statusCode).toBe(403);

    const deleted = await app.inject({ method: 'DELETE', url: `/certificates/${first.id}`, headers: auth('admin') });
    expect(deleted.statusCode).toBe(204);

    const missing = await app.inject({ method: 'GET', url: `/certificates/${first.id}`, headers: auth('staff') });
    expect(missing.statusCode).toBe(404);
  });

  it('rejects duplicate category schema names', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/category-schemas',
      headers: auth('super_admin'),
      payload: { name: 'loose diamond certificate', group: 'loose_diamond', fields: [] },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toMatchObject({ message: 'A category with this name already exists' });
  });
});

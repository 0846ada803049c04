import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { AttributeRecord } from '../src/modules/attributes/types';
import { createAttribute, listManageableFields, updateAttribute } from '../src/modules/attributes/service';

const {
  findAttributeByNameMock,
  getAttributeByIdMock,
  insertAttributeMock,
  updateAttributeMock,
  findCertificateTypeBySlugMock,
  getActiveCategorySchemaByGroupMock,
} = vi.hoisted(() => ({
  findAttributeByNameMock: vi.fn(),
  getAttributeByIdMock: vi.fn(),
  insertAttributeMock: vi.fn(),
  updateAttributeMock: vi.fn(),
  findCertificateTypeBySlugMock: vi.fn(),
  getActiveCategorySchemaByGroupMock: vi.fn(),
}));

vi.mock('../src/modules/attributes/repository', () => ({
  listAttributes: vi.fn(),
  listAttributeNames: vi.fn(),
  getAttributeById: getAttributeByIdMock,
  findAttributeByName: findAttributeByNameMock,
  insertAttribute: insertAttributeMock,
  updateAttribute: updateAttributeMock,
  softDeleteAttribute: vi.fn(),
}));

vi.mock('../src/modules/certificate-types/service', () => ({
  findCertificateTypeBySlug: findCertificateTypeBySlugMock,
}));

vi.mock('../src/modules/category-schemas/repository', () => ({
  getActiveCategorySchemaByGroup: getActiveCategorySchemaByGroupMock,
}));

const author = { userId: 'user-1', name: 'Admin', email: 'admin@lab.test' };

const attribute = (overrides?: Partial<AttributeRecord>): AttributeRecord => ({
  id: 'attr-1',
  group: 'loose_stone',
  type: 'gemstone',
  name: 'Ruby',
  hardness: '9',
  ri: '1.762-1.770',
  sg: '4.00',
  createdBy: author,
  createdAt: '2025-01-01T00:00:00.000Z',
  updatedAt: '2025-01-01T00:00:00.000Z',
  ...overrides,
});

describe('attribute service', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    findCertificateTypeBySlugMock.mockResolvedValue({ id: 'type-1', slug: 'loose_stone' });
    findAttributeByNameMock.mockResolvedValue(null);
    insertAttributeMock.mockImplementation(async (params: { group: string; type: string; properties: { name: string } }) =>
      attribute({ group: params.group, type: params.type, name: params.properties.name }),
    );
  });

  it('rejects unknown certificate types', async () => {
    findCertificateTypeBySlugMock.mockResolvedValueOnce(null);

    await expect(createAttribute('pearl', 'gemstone', { name: 'Akoya' }, author)).rejects.toMatchObject({
      statusCode: 400,
      message: 'Invalid certificate type: pearl',
    });
    expect(insertAttributeMock).not.toHaveBeenCalled();
  });

  it('requires a non-blank name', async () => {
    await expect(createAttribute('loose_stone', 'gemstone', { name: '   ' }, author)).rejects.toMatchObject({
      statusCode: 422,
    });
  });

  it('trims the name and rejects duplicates', async () => {
    findAttributeByNameMock.mockResolvedValueOnce(attribute());

    await expect(createAttribute('loose_stone', 'gemstone', { name: ' Ruby ' }, author)).rejects.toMatchObject({
      statusCode: 409,
    });
    expect(findAttributeByNameMock).toHaveBeenCalledWith({ group: 'loose_stone', type: 'gemstone', name: 'Ruby' });
  });

  it('creates the attribute with its physical properties', async () => {
    const created = await createAttribute('loose_stone', 'gemstone', { name: 'Spinel', hardness: '8' }, author);

    expect(insertAttributeMock).toHaveBeenCalledWith({
      group: 'loose_stone',
      type: 'gemstone',
      properties: { name: 'Spinel', hardness: '8' },
      createdBy: author,
    });
    expect(created.name).toBe('Spinel');
  });

  it('excludes the attribute itself from the duplicate check on update', async () => {
    getAttributeByIdMock.mockResolvedValue(attribute());
    updateAttributeMock.mockResolvedValue(attribute({ name: 'Pigeon Blood Ruby' }));

    await updateAttribute('attr-1', { name: 'Pigeon Blood Ruby' });

    expect(findAttributeByNameMock).toHaveBeenCalledWith({
      group: 'loose_stone',
      type: 'gemstone',
      name: 'Pigeon Blood Ruby',
      excludeId: 'attr-1',
    });
  });

  it('lists option-bearing fields of the active schema in display order', async () => {
    getActiveCategorySchemaByGroupMock.mockResolvedValue({
      id: 'schema-1',
      name: 'Loose Stone Certificate',
      fields: [
        { fieldId: 'c', label: 'Gemstone', fieldName: 'gemstone', fieldType: 'creatable_select', isRequired: true, displayOrder: 2 },
        { fieldId: 'a', label: 'Weight', fieldName: 'weight', fieldType: 'text', isRequired: false, displayOrder: 0 },
        { fieldId: 'b', label: 'Shape', fieldName: 'shape', fieldType: 'dropdown', isRequired: false, displayOrder: 1 },
      ],
    });

    await expect(listManageableFields('loose_stone')).resolves.toEqual({
      group: 'loose_stone',
      schemaId: 'schema-1',
      schemaName: 'Loose Stone Certificate',
      fields: [
        { fieldName: 'shape', label: 'Shape', fieldType: 'dropdown', displayOrder: 1 },
        { fieldName: 'gemstone', label: 'Gemstone', fieldType: 'creatable_select', displayOrder: 2 },
      ],
    });
  });
});

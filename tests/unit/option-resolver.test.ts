import { describe, expect, it, vi } from 'vitest';

import { resolveSchemaOptions } from '../../src/modules/category-schemas/option-resolver';
import type { CategorySchemaRecord } from '../../src/modules/category-schemas/types';

const schema: CategorySchemaRecord = {
  id: 'schema-1',
  name: 'Single Gemstone Certificate',
  group: 'single_gemstone',
  description: null,
  descriptionTemplate: null,
  isActive: true,
  createdBy: null,
  createdAt: '2025-01-01T00:00:00.000Z',
  updatedAt: '2025-01-01T00:00:00.000Z',
  fields: [
    { fieldId: 'a', label: 'Species', fieldName: 'species', fieldType: 'dropdown', isRequired: true, displayOrder: 0, options: ['Old'] },
    { fieldId: 'b', label: 'Shape', fieldName: 'shape', fieldType: 'creatable_select', isRequired: false, displayOrder: 1, options: ['Oval'] },
    { fieldId: 'c', label: 'Weight', fieldName: 'weight', fieldType: 'number', isRequired: true, displayOrder: 2 },
  ],
};

describe('resolveSchemaOptions', () => {
  it('replaces options of option-bearing fields with catalog names', async () => {
    const lookup = vi.fn(async (_group: string, type: string) => (type === 'species' ? ['Corundum', 'Beryl'] : []));

    const resolved = await resolveSchemaOptions(schema, lookup);

    expect(resolved.fields.map((field) => field.options)).toEqual([['Corundum', 'Beryl'], ['Oval'], undefined]);
    expect(lookup).toHaveBeenCalledTimes(2);
    expect(lookup).toHaveBeenCalledWith('single_gemstone', 'species');
    expect(lookup).toHaveBeenCalledWith('single_gemstone', 'shape');
  });

  it('leaves the stored schema untouched', async () => {
    await resolveSchemaOptions(schema, async () => ['New']);
    expect(schema.fields[0].options).toEqual(['Old']);
  });
});

import { listAttributeNames } from '../attributes/repository';
import { isOptionField } from './types';
import type { CategorySchemaRecord, FieldDefinition } from './types';

export type OptionLookup = (group: string, type: string) => Promise<string[]>;

async function resolveField(group: string, field: FieldDefinition, lookup: OptionLookup): Promise<FieldDefinition> {
  if (!isOptionField(field.fieldType)) {
    return field;
  }

  const names = await lookup(group, field.fieldName);
  if (names.length === 0) {
    return field;
  }

  return { ...field, options: names };
}

/**
 * Returns a copy of the schema whose option-bearing fields list the catalog
 * entries for `(schema.group, field.fieldName)`. Fields without catalog
 * entries keep their authored options.
 */
export async function resolveSchemaOptions(
  schema: CategorySchemaRecord,
  lookup: OptionLookup = listAttributeNames,
): Promise<CategorySchemaRecord> {
  const fields = await Promise.all(schema.fields.map((field) => resolveField(schema.group, field, lookup)));
  return { ...schema, fields };
}

import type { Identity } from '../auth/roles';

export const FIELD_TYPES = [
  'text',
  'textarea',
  'number',
  'dropdown',
  'radio',
  'checkbox',
  'date',
  'file',
  'creatable_select',
  'composite',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export const OPTION_FIELD_TYPES: readonly FieldType[] = ['dropdown', 'radio', 'creatable_select'];

export function isOptionField(fieldType: FieldType): boolean {
  return OPTION_FIELD_TYPES.includes(fieldType);
}

export type FieldValidationRules = {
  minLength?: number | null;
  maxLength?: number | null;
  minValue?: number | null;
  maxValue?: number | null;
  pattern?: string | null;
  customErrorMessage?: string | null;
};

export type ConditionalLogic = {
  /** `fieldId` of the controlling field. */
  showIfField: string;
  showIfValue: string;
};

export type SubFieldDefinition = {
  name: string;
  fieldName: string;
  fieldType: 'number';
  isRequired: boolean;
  placeholder?: string | null;
  displayOrder: number;
};

export type FieldDefinition = {
  fieldId: string;
  label: string;
  fieldName: string;
  fieldType: FieldType;
  isRequired: boolean;
  placeholder?: string | null;
  defaultValue?: string | null;
  options?: string[] | null;
  validation?: FieldValidationRules | null;
  displayOrder: number;
  helpText?: string | null;
  conditionalLogic?: ConditionalLogic | null;
  subFields?: SubFieldDefinition[] | null;
};

/** Field as submitted by an administrator; ids and ordering are assigned on save. */
export type FieldDefinitionInput = Omit<FieldDefinition, 'fieldId' | 'displayOrder'> & {
  fieldId?: string;
  displayOrder?: number;
};

export type CategorySchemaRecord = {
  id: string;
  name: string;
  group: string;
  description: string | null;
  descriptionTemplate: string | null;
  fields: FieldDefinition[];
  isActive: boolean;
  createdBy: Identity | null;
  createdAt: string;
  updatedAt: string;
};

export type CategorySchemaSummary = {
  id: string;
  name: string;
  group: string;
  description: string | null;
  fieldCount: number;
};

export type CreateCategorySchemaParams = {
  name: string;
  group: string;
  description?: string | null;
  descriptionTemplate?: string | null;
  fields: FieldDefinitionInput[];
  createdBy: Identity;
};

export type UpdateCategorySchemaParams = {
  name?: string;
  description?: string | null;
  descriptionTemplate?: string | null;
  isActive?: boolean;
};

export type ListCategorySchemasFilters = {
  group?: string;
  isActive?: boolean;
  search?: string;
  page: number;
  limit: number;
  sortBy: 'createdAt' | 'name';
  order: 'asc' | 'desc';
};

import type { Identity } from '../auth/roles';

export type AttributeRecord = {
  id: string;
  group: string;
  type: string;
  name: string;
  hardness: string | null;
  ri: string | null;
  sg: string | null;
  createdBy: Identity | null;
  createdAt: string;
  updatedAt: string;
};

export type AttributeProperties = {
  name: string;
  hardness?: string | null;
  ri?: string | null;
  sg?: string | null;
};

export type ManageableField = {
  fieldName: string;
  label: string;
  fieldType: string;
  displayOrder: number;
};

export type ManageableFields = {
  group: string;
  schemaId: string | null;
  schemaName: string | null;
  fields: ManageableField[];
};

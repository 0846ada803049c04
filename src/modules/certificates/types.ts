import type { Identity } from '../auth/roles';
import type { FieldDefinition } from '../category-schemas/types';
import type { FieldValueMap } from './field-values';

export type StagedFileIds = {
  photo?: string | null;
  logo?: string | null;
  rearLogo?: string | null;
};

export type IssueCertificateInput = {
  type: string;
  clientId: string;
  categoryId?: string | null;
  fields: FieldValueMap;
  stagedFileIds: StagedFileIds;
};

export type IssuedCertificate = {
  id: string;
  certificateNumber: string;
};

export type NewCertificateRow = {
  certificateNumber: string;
  type: string;
  clientId: string;
  categoryId: string | null;
  fields: FieldValueMap;
  photoUrl: string | null;
  brandLogoUrl: string | null;
  rearBrandLogoUrl: string | null;
  createdBy: Identity;
};

export type CertificateRecord = {
  id: string;
  certificateNumber: string;
  type: string;
  clientId: string;
  categoryId: string | null;
  fields: FieldValueMap;
  photoUrl: string | null;
  brandLogoUrl: string | null;
  rearBrandLogoUrl: string | null;
  qrCodeUrl: string | null;
  isRejected: boolean;
  createdBy: Identity | null;
  createdAt: string;
  updatedAt: string;
};

export type CertificateDetails = CertificateRecord & {
  client: { id: string; name: string } | null;
  schema: { id: string; name: string; group: string; fields: FieldDefinition[] } | null;
  description: string;
  photoSignedUrl: string | null;
  brandLogoSignedUrl: string | null;
  rearBrandLogoSignedUrl: string | null;
  qrCodeSignedUrl: string | null;
};

export type ListCertificatesFilters = {
  search?: string;
  type?: string;
  page: number;
  limit: number;
  sortBy: 'createdAt' | 'type' | 'certificateNumber';
  order: 'asc' | 'desc';
};

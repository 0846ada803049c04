import type { Identity } from '../auth/roles';

export type CertificateTypeRecord = {
  id: string;
  slug: string;
  name: string;
  description: string | null;
  icon: string;
  displayOrder: number;
  hasPhoto: boolean;
  hasLogo: boolean;
  hasRearLogo: boolean;
  isActive: boolean;
  createdBy: Identity | null;
  createdAt: string;
  updatedAt: string;
};

export type CreateCertificateTypeParams = {
  slug: string;
  name: string;
  description?: string | null;
  icon?: string;
  hasPhoto?: boolean;
  hasLogo?: boolean;
  hasRearLogo?: boolean;
  createdBy: Identity;
};

export type UpdateCertificateTypeParams = {
  name?: string;
  description?: string | null;
  icon?: string;
  hasPhoto?: boolean;
  hasLogo?: boolean;
  hasRearLogo?: boolean;
  isActive?: boolean;
};

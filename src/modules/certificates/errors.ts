import { AppError } from '../../shared/errors';

export class SchemaNotFoundError extends AppError {
  constructor(categoryId: string) {
    super('Category schema not found', 404, { code: 'SCHEMA_NOT_FOUND', categoryId });
  }
}

export class ClientNotFoundError extends AppError {
  constructor(clientId: string) {
    super('Client not found', 404, { code: 'CLIENT_NOT_FOUND', clientId });
  }
}

export class RequiredFieldMissingError extends AppError {
  public readonly label: string;

  constructor(label: string) {
    super(`Required field '${label}' is missing`, 422, { code: 'REQUIRED_FIELD_MISSING', label });
    this.label = label;
  }
}

export class FieldValidationError extends AppError {
  public readonly label: string;

  constructor(label: string, message: string) {
    super(message, 422, { code: 'FIELD_VALIDATION', label });
    this.label = label;
  }
}

export class FilePromotionFailedError extends AppError {
  public readonly fileId: string;

  constructor(fileId: string, cause: unknown) {
    super('Failed to promote staged file', 502, {
      code: 'FILE_PROMOTION_FAILED',
      fileId,
      cause: cause instanceof Error ? cause.message : String(cause),
    });
    this.fileId = fileId;
  }
}

export class AllocationExhaustedError extends AppError {
  constructor(date: string) {
    super('Certificate number sequence exhausted for date', 500, { code: 'ALLOCATION_EXHAUSTED', date });
  }
}

export class PersistFailedError extends AppError {
  constructor(cause: unknown) {
    super('Failed to persist certificate', 500, {
      code: 'PERSIST_FAILED',
      cause: cause instanceof Error ? cause.message : String(cause),
    });
  }
}

export class CertificateNotFoundError extends AppError {
  constructor() {
    super('Certificate not found', 404);
  }
}

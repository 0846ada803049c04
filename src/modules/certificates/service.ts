import { SpanStatusCode, trace } from '@opentelemetry/api';

import { getEnv } from '../../config/env';
import { logger } from '../../config/logger';
import { isUniqueViolation, withTransaction } from '../../db';
import { setLogContext } from '../../observability/log-context';
import { CompensatingTransaction } from '../../shared/compensation';
import { AppError } from '../../shared/errors';
import { paginate } from '../../shared/pagination';
import type { Paginated } from '../../shared/pagination';
import type { Identity } from '../auth/roles';
import { getCategorySchemaById } from '../category-schemas/repository';
import { findClientById } from '../clients/repository';
import { formatObjectRef, getBuckets, getObjectStorage, parseObjectRef } from '../files/storage';
import type { ObjectStorage } from '../files/storage';
import {
  CertificateNotFoundError,
  ClientNotFoundError,
  FilePromotionFailedError,
  PersistFailedError,
  SchemaNotFoundError,
} from './errors';
import { validateFieldValues } from './field-validation';
import { createNumberAllocator } from './numbering';
import type { CertificateNumberAllocator } from './numbering';
import {
  getCertificateById,
  insertCertificate,
  listCertificates as listCertificatesRepository,
  softDeleteCertificate,
} from './repository';
import { renderTemplate } from './template-renderer';
import type {
  CertificateDetails,
  CertificateRecord,
  IssueCertificateInput,
  IssuedCertificate,
  ListCertificatesFilters,
  NewCertificateRow,
  StagedFileIds,
} from './types';

const tracer = trace.getTracer('certificates');

type PromotedAssets = {
  photoUrl: string | null;
  brandLogoUrl: string | null;
  rearBrandLogoUrl: string | null;
};

type ValidatedSubmission = {
  categoryId: string | null;
};

async function validateSubmission(input: IssueCertificateInput): Promise<ValidatedSubmission> {
  const client = await findClientById(input.clientId);
  if (!client) {
    throw new ClientNotFoundError(input.clientId);
  }

  if (!input.categoryId) {
    logger.debug({ type: input.type }, 'no category schema referenced, fields not validated');
    return { categoryId: null };
  }

  const schema = await getCategorySchemaById(input.categoryId);
  if (!schema || !schema.isActive) {
    throw new SchemaNotFoundError(input.categoryId);
  }

  if (schema.group !== input.type) {
    throw new AppError('Category schema does not belong to the certificate type', 422, {
      categoryId: schema.id,
      group: schema.group,
      type: input.type,
    });
  }

  validateFieldValues(schema.fields, input.fields);
  return { categoryId: schema.id };
}

async function promoteStagedFile(
  tx: CompensatingTransaction,
  storage: ObjectStorage,
  slot: keyof StagedFileIds,
  fileId: string | null | undefined,
): Promise<string | null> {
  if (!fileId) {
    return null;
  }

  const { staging, permanent } = getBuckets();

  return tx.step<string | null>({
    name: `promote:${slot}`,
    run: async () => {
      try {
        const stat = await storage.stat(staging, fileId);
        if (!stat.exists) {
          logger.warn({ fileId, slot }, 'staged file not found, continuing without it');
          return null;
        }

        await storage.copy(staging, fileId, permanent, fileId);
      } catch (error) {
        throw new FilePromotionFailedError(fileId, error);
      }

      try {
        await storage.remove(staging, fileId);
      } catch (error) {
        logger.warn({ err: error, fileId }, 'failed to remove staged file after promotion');
      }

      return formatObjectRef(permanent, fileId);
    },
    compensate: async (ref) => {
      if (ref) {
        await storage.remove(permanent, fileId);
        logger.info({ fileId }, 'removed promoted file during rollback');
      }
    },
  });
}

async function promoteAssets(tx: CompensatingTransaction, stagedFileIds: StagedFileIds): Promise<PromotedAssets> {
  const storage = getObjectStorage();
  const photoUrl = await promoteStagedFile(tx, storage, 'photo', stagedFileIds.photo);
  const brandLogoUrl = await promoteStagedFile(tx, storage, 'logo', stagedFileIds.logo);
  const rearBrandLogoUrl = await promoteStagedFile(tx, storage, 'rearLogo', stagedFileIds.rearLogo);
  return { photoUrl, brandLogoUrl, rearBrandLogoUrl };
}

/**
 * Runs `persist` with a freshly allocated number, re-allocating when another
 * writer already holds the number. Other failures are terminal.
 */
async function persistWithRetry<T>(
  allocator: CertificateNumberAllocator,
  initialNumbers: string[],
  persist: (numbers: string[]) => Promise<T>,
): Promise<T> {
  const maxAttempts = Number(getEnv().CERTIFICATE_PERSIST_ATTEMPTS);
  let numbers = initialNumbers;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await persist(numbers);
    } catch (error) {
      if (!isUniqueViolation(error) || attempt >= maxAttempts) {
        throw new PersistFailedError(error);
      }

      logger.warn({ attempt, numbers }, 'certificate number already taken, allocating again');
      const replacements: string[] = [];
      for (let index = 0; index < numbers.length; index += 1) {
        replacements.push(await allocator.next());
      }
      numbers = replacements;
    }
  }
}

function buildRow(
  input: IssueCertificateInput,
  validated: ValidatedSubmission,
  assets: PromotedAssets,
  certificateNumber: string,
  createdBy: Identity,
): NewCertificateRow {
  return {
    certificateNumber,
    type: input.type,
    clientId: input.clientId,
    categoryId: validated.categoryId,
    fields: input.fields,
    ...assets,
    createdBy,
  };
}

async function traced<T>(name: string, work: () => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    try {
      return await work();
    } catch (error) {
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function issueCertificate(
  input: IssueCertificateInput,
  createdBy: Identity,
  signal?: AbortSignal,
): Promise<IssuedCertificate> {
  return traced('certificates.issue', async () => {
    const tx = new CompensatingTransaction(logger, signal);
    const allocator = createNumberAllocator();

    const issued = await tx.execute(async () => {
      const validated = await tx.step({ name: 'validate', run: () => validateSubmission(input), compensate: null });
      const assets = await promoteAssets(tx, input.stagedFileIds);
      const certificateNumber = await tx.step({ name: 'allocate', run: () => allocator.next(), compensate: null });
      setLogContext({ certificate_number: certificateNumber });

      return tx.step({
        name: 'persist',
        run: () =>
          persistWithRetry(allocator, [certificateNumber], ([nextNumber]) =>
            insertCertificate(buildRow(input, validated, assets, nextNumber, createdBy)),
          ),
        compensate: null,
      });
    });

    logger.info({ certificateId: issued.id, certificate_number: issued.certificateNumber }, 'certificate issued');
    return issued;
  });
}

/**
 * All-or-nothing issuance of several certificates: every item is validated
 * before any file moves, and one database transaction persists the batch.
 */
export async function issueCertificatesBulk(
  inputs: IssueCertificateInput[],
  createdBy: Identity,
  signal?: AbortSignal,
): Promise<{ count: number; data: IssuedCertificate[] }> {
  return traced('certificates.issue_bulk', async () => {
    const tx = new CompensatingTransaction(logger, signal);
    const allocator = createNumberAllocator();

    const issued = await tx.execute(async () => {
      const validated: ValidatedSubmission[] = [];
      for (const [index, input] of inputs.entries()) {
        validated.push(await tx.step({ name: `validate:${index}`, run: () => validateSubmission(input), compensate: null }));
      }

      const prepared: Array<{ assets: PromotedAssets; number: string }> = [];
      for (const [index, input] of inputs.entries()) {
        const assets = await promoteAssets(tx, input.stagedFileIds);
        const number = await tx.step({ name: `allocate:${index}`, run: () => allocator.next(), compensate: null });
        prepared.push({ assets, number });
      }

      return tx.step({
        name: 'persist',
        run: () =>
          persistWithRetry(
            allocator,
            prepared.map((item) => item.number),
            (numbers) =>
              withTransaction(async (client) => {
                const results: IssuedCertificate[] = [];
                for (const [index, input] of inputs.entries()) {
                  const row = buildRow(input, validated[index], prepared[index].assets, numbers[index], createdBy);
                  results.push(await insertCertificate(row, client));
                }
                return results;
              }),
          ),
        compensate: null,
      });
    });

    logger.info({ count: issued.length }, 'certificate batch issued');
    return { count: issued.length, data: issued };
  });
}

async function signRef(storage: ObjectStorage, ref: string | null, ttlSeconds: number): Promise<string | null> {
  if (!ref) {
    return null;
  }

  const parsed = parseObjectRef(ref);
  if (!parsed) {
    return null;
  }

  try {
    return await storage.signedUrl(parsed.bucket, parsed.key, ttlSeconds);
  } catch (error) {
    logger.warn({ err: error, ref }, 'failed to sign certificate asset url');
    return null;
  }
}

export async function getCertificateOrFail(id: string): Promise<CertificateDetails> {
  const certificate = await getCertificateById(id);
  if (!certificate) {
    throw new CertificateNotFoundError();
  }

  const [client, schema] = await Promise.all([
    findClientById(certificate.clientId),
    certificate.categoryId ? getCategorySchemaById(certificate.categoryId) : Promise.resolve(null),
  ]);

  const storage = getObjectStorage();
  const ttl = Number(getEnv().SIGNED_URL_TTL_SECONDS);
  const [photoSignedUrl, brandLogoSignedUrl, rearBrandLogoSignedUrl, qrCodeSignedUrl] = await Promise.all([
    signRef(storage, certificate.photoUrl, ttl),
    signRef(storage, certificate.brandLogoUrl, ttl),
    signRef(storage, certificate.rearBrandLogoUrl, ttl),
    signRef(storage, certificate.qrCodeUrl, ttl),
  ]);

  return {
    ...certificate,
    client,
    schema: schema ? { id: schema.id, name: schema.name, group: schema.group, fields: schema.fields } : null,
    description: renderTemplate(schema?.descriptionTemplate, certificate.fields),
    photoSignedUrl,
    brandLogoSignedUrl,
    rearBrandLogoSignedUrl,
    qrCodeSignedUrl,
  };
}

export async function listCertificates(filters: ListCertificatesFilters): Promise<Paginated<CertificateRecord>> {
  const { data, total } = await listCertificatesRepository(filters);
  return paginate(data, total, filters.page, filters.limit);
}

export async function deleteCertificate(id: string): Promise<void> {
  const deleted = await softDeleteCertificate(id);
  if (!deleted) {
    throw new CertificateNotFoundError();
  }
  logger.info({ certificateId: id }, 'certificate deleted');
}

import { randomUUID } from 'node:crypto';
import path from 'node:path';

import { getEnv } from '../../config/env';
import { logger } from '../../config/logger';
import { AppError } from '../../shared/errors';
import { EmptyFileError, FileTooLargeError, InvalidMimeTypeError, StagedFileNotFoundError } from './errors';
import { getBuckets, getObjectStorage } from './storage';

export type StagedUpload = {
  fileId: string;
  bucket: string;
  filename: string;
  contentType: string;
  size: number;
  uploadedAt: string;
};

function allowedMimeTypes(): Set<string> {
  return new Set(
    getEnv()
      .UPLOAD_ALLOWED_MIME_TYPES.split(',')
      .map((entry) => entry.trim().toLowerCase())
      .filter(Boolean),
  );
}

export function sanitizeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/')).trim();
  const cleaned = base.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._-]+/, '');
  return (cleaned || 'upload').slice(0, 100);
}

export function maxUploadBytes(): number {
  return Number(getEnv().UPLOAD_MAX_SIZE_BYTES);
}

/** Stores an upload in the staging bucket; issuance later promotes it by `fileId`. */
export async function stageFile(params: { buffer: Buffer; filename: string; mimeType: string }): Promise<StagedUpload> {
  const mimeType = params.mimeType.toLowerCase();
  if (!allowedMimeTypes().has(mimeType)) {
    throw new InvalidMimeTypeError(mimeType);
  }

  if (params.buffer.length === 0) {
    throw new EmptyFileError();
  }

  const maxBytes = maxUploadBytes();
  if (params.buffer.length > maxBytes) {
    throw new FileTooLargeError(maxBytes);
  }

  const { staging } = getBuckets();
  const fileId = `${randomUUID()}_${sanitizeFilename(params.filename)}`;
  await getObjectStorage().put(staging, fileId, params.buffer, mimeType);

  logger.info({ fileId, size: params.buffer.length }, 'file staged');

  return {
    fileId,
    bucket: staging,
    filename: params.filename,
    contentType: mimeType,
    size: params.buffer.length,
    uploadedAt: new Date().toISOString(),
  };
}

export async function createPresignedUrl(bucket: string, fileId: string): Promise<string> {
  const { staging, permanent } = getBuckets();
  if (bucket !== staging && bucket !== permanent) {
    throw new AppError('Unknown bucket', 400, { bucket });
  }

  const storage = getObjectStorage();
  const stat = await storage.stat(bucket, fileId);
  if (!stat.exists) {
    throw new StagedFileNotFoundError();
  }

  return storage.signedUrl(bucket, fileId, Number(getEnv().SIGNED_URL_TTL_SECONDS));
}

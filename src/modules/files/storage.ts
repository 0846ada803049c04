import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

import { getEnv } from '../../config/env';

export type ObjectStat = {
  exists: boolean;
  size: number | null;
  contentType: string | null;
};

/** Bucket/key object store used for staged and permanent certificate assets. */
export interface ObjectStorage {
  put(bucket: string, key: string, body: Buffer, contentType?: string | null): Promise<void>;
  get(bucket: string, key: string): Promise<Buffer>;
  copy(sourceBucket: string, sourceKey: string, targetBucket: string, targetKey: string): Promise<void>;
  stat(bucket: string, key: string): Promise<ObjectStat>;
  remove(bucket: string, key: string): Promise<void>;
  signedUrl(bucket: string, key: string, ttlSeconds: number): Promise<string>;
}

export function formatObjectRef(bucket: string, key: string): string {
  return `${bucket}/${key}`;
}

export function parseObjectRef(ref: string): { bucket: string; key: string } | null {
  const separator = ref.indexOf('/');
  if (separator <= 0 || separator === ref.length - 1) {
    return null;
  }

  return { bucket: ref.slice(0, separator), key: ref.slice(separator + 1) };
}

function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    return error.name === 'NotFound' || error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404;
  }

  return false;
}

export class S3ObjectStorage implements ObjectStorage {
  constructor(private readonly client: S3Client) {}

  async put(bucket: string, key: string, body: Buffer, contentType?: string | null): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType ?? undefined,
      }),
    );
  }

  async get(bucket: string, key: string): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new Error('Empty object body received from storage');
    }

    return Buffer.from(await response.Body.transformToByteArray());
  }

  async copy(sourceBucket: string, sourceKey: string, targetBucket: string, targetKey: string): Promise<void> {
    await this.client.send(
      new CopyObjectCommand({
        Bucket: targetBucket,
        Key: targetKey,
        CopySource: `${sourceBucket}/${encodeURIComponent(sourceKey)}`,
      }),
    );
  }

  async stat(bucket: string, key: string): Promise<ObjectStat> {
    try {
      const response = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return {
        exists: true,
        size: response.ContentLength ?? null,
        contentType: response.ContentType ?? null,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return { exists: false, size: null, contentType: null };
      }
      throw error;
    }
  }

  async remove(bucket: string, key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }

  async signedUrl(bucket: string, key: string, ttlSeconds: number): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: bucket, Key: key }), { expiresIn: ttlSeconds });
  }
}

let storage: ObjectStorage | null = null;

function createS3Client(): S3Client {
  const env = getEnv();
  return new S3Client({
    region: env.S3_REGION,
    endpoint: env.S3_ENDPOINT,
    forcePathStyle: env.S3_FORCE_PATH_STYLE === 'true',
    credentials:
      env.S3_ACCESS_KEY_ID && env.S3_SECRET_ACCESS_KEY
        ? {
            accessKeyId: env.S3_ACCESS_KEY_ID,
            secretAccessKey: env.S3_SECRET_ACCESS_KEY,
          }
        : undefined,
  });
}

export function getObjectStorage(): ObjectStorage {
  if (!storage) {
    storage = new S3ObjectStorage(createS3Client());
  }

  return storage;
}

export function setObjectStorage(next: ObjectStorage | null): void {
  storage = next;
}

export function getBuckets(): { staging: string; permanent: string } {
  const env = getEnv();
  return { staging: env.STAGING_BUCKET, permanent: env.CERTIFICATES_BUCKET };
}

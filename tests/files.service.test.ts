import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EmptyFileError, FileTooLargeError, InvalidMimeTypeError } from '../src/modules/files/errors';
import { createPresignedUrl, sanitizeFilename, stageFile } from '../src/modules/files/service';
import { setObjectStorage } from '../src/modules/files/storage';
import { InMemoryObjectStorage } from './support/memory-storage';

describe('file staging', () => {
  let storage: InMemoryObjectStorage;

  beforeEach(() => {
    storage = new InMemoryObjectStorage();
    setObjectStorage(storage);
  });

  afterEach(() => {
    setObjectStorage(null);
    delete process.env.UPLOAD_MAX_SIZE_BYTES;
  });

  it('sanitizes client file names', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\photos\\ruby front (1).JPG')).toBe('ruby_front_1_.JPG');
    expect(sanitizeFilename('...')).toBe('upload');
  });

  it('stores uploads in the staging bucket under a unique id', async () => {
    const staged = await stageFile({ buffer: Buffer.from('jpeg-bytes'), filename: 'ruby.jpg', mimeType: 'IMAGE/JPEG' });

    expect(staged.fileId).toMatch(/^[0-9a-f-]{36}_ruby\.jpg$/);
    expect(staged).toMatchObject({ bucket: 'cert-temp', filename: 'ruby.jpg', contentType: 'image/jpeg', size: 10 });
    await expect(storage.get('cert-temp', staged.fileId)).resolves.toEqual(Buffer.from('jpeg-bytes'));
  });

  it('rejects unsupported, empty and oversized uploads', async () => {
    await expect(stageFile({ buffer: Buffer.from('x'), filename: 'a.pdf', mimeType: 'application/pdf' })).rejects.toBeInstanceOf(
      InvalidMimeTypeError,
    );
    await expect(stageFile({ buffer: Buffer.alloc(0), filename: 'a.png', mimeType: 'image/png' })).rejects.toBeInstanceOf(
      EmptyFileError,
    );

    process.env.UPLOAD_MAX_SIZE_BYTES = '4';
    await expect(stageFile({ buffer: Buffer.from('12345'), filename: 'a.png', mimeType: 'image/png' })).rejects.toBeInstanceOf(
      FileTooLargeError,
    );
    expect(storage.keys('cert-temp')).toEqual([]);
  });

  it('signs urls only for known buckets and existing objects', async () => {
    await storage.put('cert-temp', 'abc_ruby.jpg', Buffer.from('x'), 'image/jpeg');

    await expect(createPresignedUrl('cert-temp', 'abc_ruby.jpg')).resolves.toBe(
      'https://storage.test/cert-temp/abc_ruby.jpg?expires=3600',
    );
    await expect(createPresignedUrl('other-bucket', 'abc_ruby.jpg')).rejects.toMatchObject({ statusCode: 400 });
    await expect(createPresignedUrl('certificates', 'abc_ruby.jpg')).rejects.toMatchObject({ statusCode: 404 });
  });
});

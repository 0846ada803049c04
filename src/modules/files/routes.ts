import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { AppError } from '../../shared/errors';
import { STAFF_ROLES } from '../auth/roles';
import { EmptyFileError } from './errors';
import { createPresignedUrl, stageFile } from './service';
import type { StagedUpload } from './service';

const presignedParamSchema = z.object({
  bucket: z.string().trim().min(3),
  fileId: z.string().trim().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/),
});

export const fileRoutes: FastifyPluginAsync = async (app) => {
  app.post('/files/upload-temp', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request, reply) => {
    if (!request.isMultipart()) {
      throw new AppError('Multipart form data expected', 400);
    }

    const uploaded: StagedUpload[] = [];
    for await (const file of request.files()) {
      const buffer = await file.toBuffer();
      uploaded.push(await stageFile({ buffer, filename: file.filename, mimeType: file.mimetype }));
    }

    if (uploaded.length === 0) {
      throw new EmptyFileError('No file provided');
    }

    return reply.code(201).send({ uploaded });
  });

  app.get('/files/presigned/:bucket/:fileId', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request) => {
    const parsedParams = presignedParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const url = await createPresignedUrl(parsedParams.data.bucket, parsedParams.data.fileId);
    return { url };
  });
};

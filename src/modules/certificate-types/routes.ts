import type { FastifyPluginAsync } from 'fastify';
import { AppError } from '../../shared/errors';
import { ADMIN_ROLES, identityFromUser, SUPER_ADMIN_ONLY } from '../auth/roles';
import {
  certificateTypeIdParamSchema,
  createCertificateTypeBodySchema,
  reorderCertificateTypesBodySchema,
  updateCertificateTypeBodySchema,
} from './schemas';
import {
  createCertificateType,
  deleteCertificateType,
  getCertificateTypeOrFail,
  listActiveCertificateTypes,
  listAllCertificateTypes,
  reorderCertificateTypes,
  updateCertificateType,
} from './service';

export const certificateTypeRoutes: FastifyPluginAsync = async (app) => {
  app.get('/certificate-types', async () => {
    const types = await listActiveCertificateTypes();
    return { data: types };
  });

  app.get('/certificate-types/all', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async () => {
    const types = await listAllCertificateTypes();
    return { data: types };
  });

  app.get('/certificate-types/:id', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request) => {
    const parsedParams = certificateTypeIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const certificateType = await getCertificateTypeOrFail(parsedParams.data.id);
    return { certificateType };
  });

  app.post('/certificate-types', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request, reply) => {
    const parsed = createCertificateTypeBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw new AppError('Invalid body', 400, parsed.error.flatten());
    }

    const certificateType = await createCertificateType({
      ...parsed.data,
      createdBy: identityFromUser(request.user),
    });
    return reply.code(201).send({ certificateType });
  });

  app.put('/certificate-types/reorder', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request) => {
    const parsed = reorderCertificateTypesBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw new AppError('Invalid body', 400, parsed.error.flatten());
    }

    const types = await reorderCertificateTypes(parsed.data.ids);
    return { data: types };
  });

  app.put('/certificate-types/:id', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request) => {
    const parsedParams = certificateTypeIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const parsedBody = updateCertificateTypeBodySchema.safeParse(request.body);
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const certificateType = await updateCertificateType(parsedParams.data.id, parsedBody.data);
    return { certificateType };
  });

  app.delete('/certificate-types/:id', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request, reply) => {
    const parsedParams = certificateTypeIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    await deleteCertificateType(parsedParams.data.id);
    return reply.code(204).send();
  });
};

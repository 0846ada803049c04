import type { FastifyPluginAsync } from 'fastify';
import { withDisconnectSignal } from '../../shared/disconnect-signal';
import { AppError } from '../../shared/errors';
import { ADMIN_ROLES, identityFromUser, STAFF_ROLES } from '../auth/roles';
import { availableSchemasQuerySchema } from '../category-schemas/schemas';
import { getFormSchema, listAvailableSchemas } from '../category-schemas/service';
import {
  certificateIdParamSchema,
  formSchemaParamSchema,
  issueCertificateBodySchema,
  issueCertificatesBulkBodySchema,
  listCertificatesQuerySchema,
} from './schemas';
import {
  deleteCertificate,
  getCertificateOrFail,
  issueCertificate,
  issueCertificatesBulk,
  listCertificates,
} from './service';

export const certificateRoutes: FastifyPluginAsync = async (app) => {
  app.post('/certificates', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request, reply) => {
    const parsed = issueCertificateBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw new AppError('Invalid body', 400, parsed.error.flatten());
    }

    const certificate = await withDisconnectSignal(reply, (signal) =>
      issueCertificate(parsed.data, identityFromUser(request.user), signal),
    );
    return reply.code(201).send({ certificate });
  });

  app.post('/certificates/bulk', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request, reply) => {
    const parsed = issueCertificatesBulkBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw new AppError('Invalid body', 400, parsed.error.flatten());
    }

    const result = await withDisconnectSignal(reply, (signal) =>
      issueCertificatesBulk(parsed.data.certificates, identityFromUser(request.user), signal),
    );
    return reply.code(201).send(result);
  });

  app.get('/certificates', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request) => {
    const parsed = listCertificatesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError('Invalid query', 400, parsed.error.flatten());
    }

    return listCertificates(parsed.data);
  });

  app.get('/certificates/available-schemas', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request) => {
    const parsed = availableSchemasQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError('Invalid query', 400, parsed.error.flatten());
    }

    const schemas = await listAvailableSchemas(parsed.data.group);
    return { data: schemas };
  });

  app.get('/certificates/form-schema/:categoryId', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request) => {
    const parsedParams = formSchemaParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const schema = await getFormSchema(parsedParams.data.categoryId);
    return { schema };
  });

  app.get('/certificates/:id', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request) => {
    const parsedParams = certificateIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const certificate = await getCertificateOrFail(parsedParams.data.id);
    return { certificate };
  });

  app.delete('/certificates/:id', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request, reply) => {
    const parsedParams = certificateIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    await deleteCertificate(parsedParams.data.id);
    return reply.code(204).send();
  });
};

import type { FastifyPluginAsync } from 'fastify';
import { AppError } from '../../shared/errors';
import { ADMIN_ROLES, identityFromUser, STAFF_ROLES } from '../auth/roles';
import {
  attributeBodySchema,
  attributeGroupParamSchema,
  attributeIdParamSchema,
  attributeScopeParamSchema,
  listAttributesQuerySchema,
} from './schemas';
import { createAttribute, deleteAttribute, listAttributes, listManageableFields, updateAttribute } from './service';

export const attributeRoutes: FastifyPluginAsync = async (app) => {
  app.get('/attributes/:group/:type', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request) => {
    const parsedParams = attributeScopeParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const parsedQuery = listAttributesQuerySchema.safeParse(request.query);
    if (!parsedQuery.success) {
      throw new AppError('Invalid query', 400, parsedQuery.error.flatten());
    }

    const attributes = await listAttributes(parsedParams.data.group, parsedParams.data.type, parsedQuery.data.search);
    return { data: attributes };
  });

  app.post('/attributes/:group/:type', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request, reply) => {
    const parsedParams = attributeScopeParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const parsedBody = attributeBodySchema.safeParse(request.body ?? {});
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const attribute = await createAttribute(
      parsedParams.data.group,
      parsedParams.data.type,
      parsedBody.data,
      identityFromUser(request.user),
    );
    return reply.code(201).send({ attribute });
  });

  app.put('/attributes/:id', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request) => {
    const parsedParams = attributeIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const parsedBody = attributeBodySchema.safeParse(request.body ?? {});
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const attribute = await updateAttribute(parsedParams.data.id, parsedBody.data);
    return { attribute };
  });

  app.delete('/attributes/:id', {
    preHandler: [app.authenticate, app.authorize(ADMIN_ROLES)],
  }, async (request, reply) => {
    const parsedParams = attributeIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    await deleteAttribute(parsedParams.data.id);
    return reply.code(204).send();
  });

  app.get('/attribute-groups/:group/fields', {
    preHandler: [app.authenticate, app.authorize(STAFF_ROLES)],
  }, async (request) => {
    const parsedParams = attributeGroupParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    return listManageableFields(parsedParams.data.group);
  });
};

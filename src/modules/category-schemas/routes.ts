import type { FastifyPluginAsync } from 'fastify';
import { AppError } from '../../shared/errors';
import { identityFromUser, SUPER_ADMIN_ONLY } from '../auth/roles';
import {
  categorySchemaIdParamSchema,
  createCategorySchemaBodySchema,
  listCategorySchemasQuerySchema,
  reorderFieldsBodySchema,
  replaceFieldsBodySchema,
  updateCategorySchemaBodySchema,
} from './schemas';
import {
  createCategorySchema,
  deleteCategorySchema,
  duplicateCategorySchema,
  getCategorySchemaOrFail,
  getTemplateFields,
  listCategorySchemas,
  reorderCategorySchemaFields,
  replaceCategorySchemaFields,
  updateCategorySchemaMetadata,
} from './service';

export const categorySchemaRoutes: FastifyPluginAsync = async (app) => {
  app.post('/category-schemas', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request, reply) => {
    const parsed = createCategorySchemaBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw new AppError('Invalid body', 400, parsed.error.flatten());
    }

    const schema = await createCategorySchema({
      ...parsed.data,
      createdBy: identityFromUser(request.user),
    });
    return reply.code(201).send({ schema });
  });

  app.get('/category-schemas', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request) => {
    const parsed = listCategorySchemasQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError('Invalid query', 400, parsed.error.flatten());
    }

    return listCategorySchemas(parsed.data);
  });

  app.get('/category-schemas/:id', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request) => {
    const parsedParams = categorySchemaIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const schema = await getCategorySchemaOrFail(parsedParams.data.id);
    return { schema };
  });

  app.put('/category-schemas/:id', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request) => {
    const parsedParams = categorySchemaIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const parsedBody = updateCategorySchemaBodySchema.safeParse(request.body);
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const schema = await updateCategorySchemaMetadata(parsedParams.data.id, parsedBody.data);
    return { schema };
  });

  app.delete('/category-schemas/:id', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request, reply) => {
    const parsedParams = categorySchemaIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    await deleteCategorySchema(parsedParams.data.id);
    return reply.code(204).send();
  });

  app.put('/category-schemas/:id/fields', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request) => {
    const parsedParams = categorySchemaIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const parsedBody = replaceFieldsBodySchema.safeParse(request.body);
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const schema = await replaceCategorySchemaFields(parsedParams.data.id, parsedBody.data.fields);
    return { schema };
  });

  app.patch('/category-schemas/:id/reorder', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request) => {
    const parsedParams = categorySchemaIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const parsedBody = reorderFieldsBodySchema.safeParse(request.body);
    if (!parsedBody.success) {
      throw new AppError('Invalid body', 400, parsedBody.error.flatten());
    }

    const schema = await reorderCategorySchemaFields(parsedParams.data.id, parsedBody.data.fieldIds);
    return { schema };
  });

  app.post('/category-schemas/:id/duplicate', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request, reply) => {
    const parsedParams = categorySchemaIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    const schema = await duplicateCategorySchema(parsedParams.data.id, identityFromUser(request.user));
    return reply.code(201).send({ schema });
  });

  app.get('/category-schemas/:id/template-fields', {
    preHandler: [app.authenticate, app.authorize(SUPER_ADMIN_ONLY)],
  }, async (request) => {
    const parsedParams = categorySchemaIdParamSchema.safeParse(request.params);
    if (!parsedParams.success) {
      throw new AppError('Invalid params', 400, parsedParams.error.flatten());
    }

    return getTemplateFields(parsedParams.data.id);
  });
};

import type { FastifyInstance } from 'fastify';

import { registerAuthDecorators } from './auth/plugin';
import { healthRoutes } from './system/health.route';
import { certificateTypeRoutes } from './certificate-types/routes';
import { attributeRoutes } from './attributes/routes';
import { categorySchemaRoutes } from './category-schemas/routes';
import { certificateRoutes } from './certificates/routes';
import { fileRoutes } from './files/routes';

export async function registerModules(app: FastifyInstance) {
  await registerAuthDecorators(app);

  await app.register(healthRoutes);
  await app.register(certificateTypeRoutes);
  await app.register(attributeRoutes);
  await app.register(categorySchemaRoutes);
  await app.register(certificateRoutes);
  await app.register(fileRoutes);
}

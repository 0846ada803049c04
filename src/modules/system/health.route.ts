import type { FastifyPluginAsync } from 'fastify';
import { query } from '../../db';

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/health/ready', async (request, reply) => {
    try {
      await query('select 1');
      return { status: 'ok', database: 'up' };
    } catch (error) {
      request.log.error({ err: error }, 'readiness check failed');
      return reply.code(503).send({ status: 'unavailable', database: 'down' });
    }
  });
};

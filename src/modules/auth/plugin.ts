import type { FastifyInstance } from 'fastify';
import { ForbiddenError, UnauthorizedError } from '../../shared/errors';
import type { AuthorizationRequirement, UserRole } from './roles';

function normalizeRequirement(requirement: AuthorizationRequirement): readonly UserRole[] {
  return typeof requirement === 'string' ? [requirement] : requirement;
}

export async function registerAuthDecorators(app: FastifyInstance) {
  app.decorate('authenticate', async (request) => {
    try {
      await request.jwtVerify();
    } catch {
      throw new UnauthorizedError();
    }
  });

  app.decorate('authorize', (requirement: AuthorizationRequirement) => async (request) => {
    const roles = normalizeRequirement(requirement);
    const role = request.user?.role;

    if (roles.length > 0 && (!role || !roles.includes(role))) {
      throw new ForbiddenError('Insufficient permissions');
    }
  });
}

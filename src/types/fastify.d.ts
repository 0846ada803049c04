import 'fastify';
import '@fastify/jwt';

import type { AuthorizationRequirement, UserRole } from '../modules/auth/roles';

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: import('fastify').preHandlerHookHandler;
    authorize: (requirement: AuthorizationRequirement) => import('fastify').preHandlerHookHandler;
  }
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: {
      sub: string;
      email: string;
      name: string;
      role: UserRole;
    };
    user: {
      sub: string;
      email: string;
      name: string;
      role: UserRole;
    };
  }
}

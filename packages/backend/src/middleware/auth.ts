import type { FastifyRequest, FastifyReply } from 'fastify';

export interface AuthUser {
  userId: string;
  email: string;
  role: string;
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: AuthUser;
    user: AuthUser;
  }
}

/**
 * Prehandler that verifies the bearer JWT and attaches its payload as
 * `request.user`. Tokens are issued by the identity service; this backend
 * only verifies them. Relies on @fastify/jwt being registered.
 */
export async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  try {
    await request.jwtVerify();
  } catch (err) {
    request.log.debug({ err }, 'JWT verification failed');
    return reply.status(401).send({ error: 'Unauthorized' });
  }
}

/**
 * Factory that returns a prehandler checking the user has one of the required roles.
 * Must be used after `authenticate`.
 */
export function requireRole(roles: string[]) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const role = request.user?.role;
    if (!role || !roles.includes(role)) {
      return reply.status(403).send({ error: 'Forbidden: insufficient role' });
    }
  };
}

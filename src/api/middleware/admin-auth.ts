import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import {
  canAccessPmc,
  resolveAdminScope,
  verifyAdminToken,
  type AdminScope,
} from '../../services/auth.service';
import { bearerToken } from './bearer';

declare module 'fastify' {
  interface FastifyRequest {
    admin: AdminScope | null;
  }
}

/**
 * Admin scope for a request that passed the admin-auth hook. Throws when
 * used on a route outside that scope.
 */
export function adminOf(request: FastifyRequest): AdminScope {
  if (!request.admin) throw new Error(`admin scope missing on ${request.method} ${request.url}`);
  return request.admin;
}

/**
 * Route-level preHandler for content writes: a PMC whose billing is not
 * active gets 402. Platform admins are never gated.
 */
export async function requirePaid(
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply | undefined> {
  const scope = adminOf(request);
  if (scope.role === 'pmc' && scope.needsPayment) {
    return reply.status(402).send({
      error: 'payment_required',
      message: 'Activate billing to change this content.',
    });
  }
  return undefined;
}

/**
 * Authenticates every route registered in the same scope with an admin
 * bearer token, and rejects PMC-scoped admins addressing another PMC.
 */
async function adminAuthPlugin(app: FastifyInstance): Promise<void> {
  app.decorateRequest('admin', null);

  app.addHook('preHandler', async (request: FastifyRequest, reply: FastifyReply) => {
    const token = bearerToken(request);
    const email = token ? await verifyAdminToken(token) : null;
    if (!email) {
      return reply.status(401).send({ error: 'unauthenticated', message: 'Admin sign-in required.' });
    }

    const scope = await resolveAdminScope(email);
    request.admin = scope;

    const params = request.params;
    const pmcId =
      params && typeof params === 'object' && 'pmcId' in params && typeof params.pmcId === 'string'
        ? params.pmcId
        : null;
    if (pmcId !== null && !canAccessPmc(scope, pmcId)) {
      request.log.warn({ email, pmcId, requestId: request.requestId }, 'Cross-tenant admin access denied');
      return reply.status(403).send({ error: 'forbidden' });
    }
    return undefined;
  });
}

export default fp(adminAuthPlugin, {
  name: 'admin-auth',
});

import type { FastifyInstance } from 'fastify';
import adminAuthPlugin, { adminOf } from '../middleware/admin-auth';
import { analyticsAdminRoutes } from './analytics';
import { chatAdminRoutes } from './chats';
import { guideAdminRoutes } from './guides';
import { inboxRoutes } from './inbox';
import { integrationRoutes } from './integrations';
import { onboardingRoutes } from './onboarding';
import { propertyAdminRoutes } from './properties';
import { teamRoutes } from './team';
import { upgradeAdminRoutes } from './upgrades';

/**
 * Everything under /admin that needs an admin bearer token. Registered as
 * its own encapsulated scope so the auth hook stays off guest routes.
 */
export async function adminRoutes(app: FastifyInstance): Promise<void> {
  await app.register(adminAuthPlugin);

  app.get('/admin/me', async (request, reply) => {
    const scope = adminOf(request);
    return reply.send({
      email: scope.email,
      role: scope.role,
      pmcId: scope.pmcId,
      teamRole: scope.user?.role ?? null,
      billingStatus: scope.billingStatus,
      needsPayment: scope.needsPayment,
    });
  });

  await app.register(onboardingRoutes);
  await app.register(propertyAdminRoutes);
  await app.register(guideAdminRoutes);
  await app.register(upgradeAdminRoutes);
  await app.register(chatAdminRoutes);
  await app.register(inboxRoutes);
  await app.register(teamRoutes);
  await app.register(integrationRoutes);
  await app.register(analyticsAdminRoutes);
}

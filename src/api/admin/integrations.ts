import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { saveHostawayCredentials, syncPmc } from '../../services/pms-sync.service';
import { disconnect, getConnectStatus, startConnect } from '../../services/stripe-connect.service';
import { sendFailure } from '../errors';
import { adminOf, requirePaid } from '../middleware/admin-auth';
import { pmcParamSchema } from './schemas';

const hostawayBodySchema = z.object({
  accountId: z.string().min(1).max(64),
  apiSecret: z.string().min(1).max(256),
});

/**
 * PMS sync and provider connections:
 *  - POST /admin/pmcs/:pmcId/sync
 *  - PUT /admin/pmcs/:pmcId/integrations/hostaway
 *  - GET /admin/pmcs/:pmcId/integrations/stripe
 *  - POST /admin/pmcs/:pmcId/integrations/stripe/connect
 *  - POST /admin/pmcs/:pmcId/integrations/stripe/disconnect
 */
export async function integrationRoutes(app: FastifyInstance): Promise<void> {
  app.post('/admin/pmcs/:pmcId/sync', { preHandler: requirePaid }, async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const result = await syncPmc(params.data.pmcId, { requestId: request.requestId });
    if (!result.success) return sendFailure(reply, result);
    return reply.send({
      ok: true,
      propertiesCreated: result.propertiesCreated,
      propertiesUpdated: result.propertiesUpdated,
      reservations: result.reservations,
      synced_at: result.syncedAt.toISOString(),
    });
  });

  app.put('/admin/pmcs/:pmcId/integrations/hostaway', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = hostawayBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await saveHostawayCredentials(
      params.data.pmcId,
      body.data.accountId,
      body.data.apiSecret,
    );
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ integration: result.integration });
  });

  app.get('/admin/pmcs/:pmcId/integrations/stripe', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    return reply.send(await getConnectStatus(params.data.pmcId));
  });

  app.post('/admin/pmcs/:pmcId/integrations/stripe/connect', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    return reply.send(await startConnect(params.data.pmcId, adminOf(request).email));
  });

  app.post('/admin/pmcs/:pmcId/integrations/stripe/disconnect', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    await disconnect(params.data.pmcId);
    return reply.send({ ok: true });
  });
}

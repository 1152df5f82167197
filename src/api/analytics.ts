import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ingestEvent, type IngestScope } from '../services/analytics.service';
import { resolveAdminScope, verifyAdminToken, verifyGuestToken } from '../services/auth.service';
import { sendFailure } from './errors';
import { bearerToken } from './middleware/bearer';

const optionalId = z.string().min(1).max(128).optional();

const eventBodySchema = z.object({
  event_name: z.string().min(1).max(64),
  pmc_id: optionalId,
  property_id: optionalId,
  session_id: optionalId,
  thread_id: optionalId,
  message_id: optionalId,
  parent_id: optionalId,
  sender: z.string().max(32).optional(),
  variant: z.string().max(64).optional(),
  length: z.number().int().min(0).optional(),
  data: z.record(z.unknown()).optional(),
});

/**
 * POST /analytics/event — client event ingest. Accepts a guest token
 * (tenant taken from the guest's session) or an admin token.
 */
export async function analyticsRoutes(app: FastifyInstance): Promise<void> {
  app.post('/analytics/event', async (request, reply) => {
    const body = eventBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const token = bearerToken(request);
    let caller: IngestScope | null = null;
    if (token) {
      const identity = await verifyGuestToken(token);
      if (identity) {
        caller = { kind: 'guest', identity };
      } else {
        const email = await verifyAdminToken(token);
        if (email) caller = { kind: 'admin', scope: await resolveAdminScope(email) };
      }
    }
    if (!caller) return reply.status(401).send({ error: 'unauthenticated' });

    const input = body.data;
    const result = await ingestEvent(caller, {
      eventName: input.event_name,
      pmcId: input.pmc_id,
      propertyId: input.property_id,
      sessionId: input.session_id,
      threadId: input.thread_id,
      messageId: input.message_id,
      parentId: input.parent_id,
      sender: input.sender,
      variant: input.variant,
      length: input.length,
      data: input.data,
    });
    if (!result.success) return sendFailure(reply, result);
    return reply.status(201).send({ ok: true, id: result.id });
  });
}

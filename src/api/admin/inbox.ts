import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  listInbox,
  markInboxMessageRead,
  MAX_INBOX_PAGE,
  resolveInboxMessage,
  unreadCount,
} from '../../services/pmc-message.service';
import { entityIdSchema } from '../../types/common';
import { sendFailure } from '../errors';
import { pmcParamSchema } from './schemas';

const messageParamSchema = pmcParamSchema.extend({
  messageId: entityIdSchema,
});

const listQuerySchema = z.object({
  status: z.enum(['open', 'resolved']).optional(),
  type: z.string().max(64).optional(),
  q: z.string().max(200).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_INBOX_PAGE).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

const BASE = '/admin/pmcs/:pmcId/messages';

/** Admin inbox: purchase and refund notices addressed to the PMC. */
export async function inboxRoutes(app: FastifyInstance): Promise<void> {
  app.get(`${BASE}/unread-count`, async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    return reply.send({ unread: await unreadCount(params.data.pmcId) });
  });

  app.get(BASE, async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }
    return reply.send(await listInbox(params.data.pmcId, query.data));
  });

  app.post(`${BASE}/:messageId/read`, async (request, reply) => {
    const params = messageParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await markInboxMessageRead(params.data.pmcId, params.data.messageId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ message: result.message });
  });

  app.post(`${BASE}/:messageId/resolve`, async (request, reply) => {
    const params = messageParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await resolveInboxMessage(params.data.pmcId, params.data.messageId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ message: result.message });
  });
}

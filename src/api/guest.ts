import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { handleGuestMessage } from '../services/chat.service';
import { unlockStay } from '../services/guest-access.service';
import { listGuestGuides } from '../services/guide.service';
import { entityIdSchema } from '../types/common';
import { sendFailure } from './errors';
import { bearerToken } from './middleware/bearer';

const propertyParamSchema = z.object({
  propertyId: entityIdSchema,
});

const verifyBodySchema = z.object({
  code: z.string().max(32),
});

const chatBodySchema = z.object({
  message: z.string().max(4000),
  session_id: entityIdSchema.optional(),
  language: z.string().min(2).max(32).optional(),
  client_message_id: z.string().max(128).optional(),
  thread_id: z.string().max(128).optional(),
  parent_id: z.string().max(128).optional(),
});

/**
 * Guest-facing routes:
 *  - POST /guest/properties/:propertyId/verify
 *  - GET /properties/:propertyId/guides
 *  - POST /properties/:propertyId/chat
 */
export async function guestRoutes(app: FastifyInstance): Promise<void> {
  app.post('/guest/properties/:propertyId/verify', async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = verifyBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await unlockStay(params.data.propertyId, body.data.code, {
      requestId: request.requestId,
    });
    if (!result.success) return sendFailure(reply, result);

    return reply.send({
      success: true,
      session_id: result.sessionId,
      guest_token: result.guestToken,
      guest_name: result.guestName,
      arrival_date: result.arrivalDate,
      departure_date: result.departureDate,
      check_in_time: result.checkInTime,
      check_out_time: result.checkOutTime,
    });
  });

  app.get('/properties/:propertyId/guides', async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const result = await listGuestGuides(params.data.propertyId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ guides: result.guides });
  });

  app.post('/properties/:propertyId/chat', async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = chatBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await handleGuestMessage({
      propertyId: params.data.propertyId,
      message: body.data.message,
      sessionId: body.data.session_id,
      guestToken: bearerToken(request) ?? undefined,
      language: body.data.language,
      clientMessageId: body.data.client_message_id,
      threadId: body.data.thread_id,
      parentId: body.data.parent_id,
      requestId: request.requestId,
    });
    if (!result.success) return sendFailure(reply, result);

    return reply.send({
      session_id: result.sessionId,
      response: result.response,
      reply_to: result.replyTo,
      category: result.category,
      degraded: result.degraded,
    });
  });
}

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  assignChat,
  escalateChat,
  getChatDetail,
  hostReply,
  listChatSessions,
  MAX_SESSIONS_PAGE,
  resolveChat,
  setChatNote,
  summarizeChat,
  unresolveChat,
} from '../../services/chat-admin.service';
import { entityIdSchema } from '../../types/common';
import { sendFailure } from '../errors';
import { pmcParamSchema, queryBoolean } from './schemas';

const sessionParamSchema = pmcParamSchema.extend({
  sessionId: entityIdSchema,
});

const listQuerySchema = z.object({
  propertyId: entityIdSchema.optional(),
  resolved: queryBoolean.optional(),
  priority: z.enum(['none', 'low', 'medium', 'high', 'urgent']).optional(),
  escalation: z.enum(['low', 'medium', 'high']).optional(),
  mood: z.string().max(32).optional(),
  q: z.string().max(200).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_SESSIONS_PAGE).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

const escalateBodySchema = z.object({
  level: z.enum(['low', 'medium', 'high']).nullable(),
});

const assignBodySchema = z.object({
  assignee: z.string().max(200).nullable(),
});

const noteBodySchema = z.object({
  note: z.string().max(5000).nullable(),
});

const replyBodySchema = z.object({
  content: z.string().trim().min(1).max(4000),
});

const BASE = '/admin/pmcs/:pmcId/chats';

/**
 * Admin chat console: list and read guest conversations, triage them, and
 * reply as the host.
 */
export async function chatAdminRoutes(app: FastifyInstance): Promise<void> {
  app.get(BASE, async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }

    return reply.send(await listChatSessions({ pmcId: params.data.pmcId, ...query.data }));
  });

  app.get(`${BASE}/:sessionId`, async (request, reply) => {
    const params = sessionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await getChatDetail(params.data.pmcId, params.data.sessionId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ session: result.session, messages: result.messages });
  });

  app.post(`${BASE}/:sessionId/resolve`, async (request, reply) => {
    const params = sessionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await resolveChat(params.data.pmcId, params.data.sessionId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ session: result.session });
  });

  app.post(`${BASE}/:sessionId/unresolve`, async (request, reply) => {
    const params = sessionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await unresolveChat(params.data.pmcId, params.data.sessionId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ session: result.session });
  });

  app.put(`${BASE}/:sessionId/escalation`, async (request, reply) => {
    const params = sessionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = escalateBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }
    const result = await escalateChat(params.data.pmcId, params.data.sessionId, body.data.level);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ session: result.session });
  });

  app.put(`${BASE}/:sessionId/assignee`, async (request, reply) => {
    const params = sessionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = assignBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }
    const result = await assignChat(params.data.pmcId, params.data.sessionId, body.data.assignee);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ session: result.session });
  });

  app.put(`${BASE}/:sessionId/note`, async (request, reply) => {
    const params = sessionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = noteBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }
    const result = await setChatNote(params.data.pmcId, params.data.sessionId, body.data.note);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ session: result.session });
  });

  app.post(`${BASE}/:sessionId/summarize`, async (request, reply) => {
    const params = sessionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await summarizeChat(params.data.pmcId, params.data.sessionId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ summary: result.summary });
  });

  app.post(`${BASE}/:sessionId/messages`, async (request, reply) => {
    const params = sessionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = replyBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }
    const result = await hostReply(params.data.pmcId, params.data.sessionId, body.data.content);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(201).send({ message: result.message });
  });
}

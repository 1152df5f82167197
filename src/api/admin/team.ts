import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { inviteMember, listMembers, updateMember } from '../../services/team.service';
import { entityIdSchema } from '../../types/common';
import { sendFailure } from '../errors';
import { nullableText, pmcParamSchema } from './schemas';

const memberParamSchema = pmcParamSchema.extend({
  userId: entityIdSchema,
});

const roleSchema = z.enum(['owner', 'admin', 'staff']);

const inviteBodySchema = z.object({
  email: z.string().email().max(320),
  fullName: nullableText(200),
  role: roleSchema.default('staff'),
});

const updateBodySchema = z
  .object({
    role: roleSchema.optional(),
    isActive: z.boolean().optional(),
    fullName: nullableText(200),
  })
  .refine((body) => Object.keys(body).length > 0, 'Nothing to update');

const BASE = '/admin/pmcs/:pmcId/team';

export async function teamRoutes(app: FastifyInstance): Promise<void> {
  app.get(BASE, async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    return reply.send({ members: await listMembers(params.data.pmcId) });
  });

  app.post(BASE, async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = inviteBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await inviteMember(params.data.pmcId, body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(201).send({ member: result.member });
  });

  app.patch(`${BASE}/:userId`, async (request, reply) => {
    const params = memberParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = updateBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await updateMember(params.data.pmcId, params.data.userId, body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ member: result.member });
  });
}

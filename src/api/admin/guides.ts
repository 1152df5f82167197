import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  createGuide,
  deleteGuide,
  listGuides,
  reorderGuides,
  updateGuide,
} from '../../services/guide.service';
import { entityIdSchema } from '../../types/common';
import { sendFailure } from '../errors';
import { requirePaid } from '../middleware/admin-auth';
import { nullableText, propertyParamSchema, reorderBodySchema } from './schemas';

const guideParamSchema = propertyParamSchema.extend({
  guideId: entityIdSchema,
});

const guideFieldsSchema = z.object({
  title: z.string().min(1).max(200).optional(),
  category: nullableText(80),
  shortDescription: nullableText(500),
  longDescription: nullableText(10_000),
  bodyHtml: nullableText(50_000),
  imageUrl: z.string().url().max(2000).nullable().optional(),
  isActive: z.boolean().optional(),
});

const createGuideSchema = guideFieldsSchema.extend({
  title: z.string().min(1).max(200),
});

const BASE = '/admin/pmcs/:pmcId/properties/:propertyId/guides';

/** Guide CRUD and reorder under a property. Writes need active billing. */
export async function guideAdminRoutes(app: FastifyInstance): Promise<void> {
  app.get(BASE, async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await listGuides(params.data.pmcId, params.data.propertyId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ guides: result.guides });
  });

  app.post(BASE, { preHandler: requirePaid }, async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = createGuideSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await createGuide(params.data.pmcId, params.data.propertyId, body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(201).send({ guide: result.guide });
  });

  app.put(`${BASE}/order`, { preHandler: requirePaid }, async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = reorderBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await reorderGuides(params.data.pmcId, params.data.propertyId, body.data.ids);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ guides: result.guides });
  });

  app.patch(`${BASE}/:guideId`, { preHandler: requirePaid }, async (request, reply) => {
    const params = guideParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = guideFieldsSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const { pmcId, propertyId, guideId } = params.data;
    const result = await updateGuide(pmcId, propertyId, guideId, body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ guide: result.guide });
  });

  app.delete(`${BASE}/:guideId`, { preHandler: requirePaid }, async (request, reply) => {
    const params = guideParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const { pmcId, propertyId, guideId } = params.data;
    const result = await deleteGuide(pmcId, propertyId, guideId);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(204).send();
  });
}

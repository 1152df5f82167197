import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  createUpgrade,
  deleteUpgrade,
  listUpgrades,
  reorderUpgrades,
  updateUpgrade,
} from '../../services/upgrade-admin.service';
import { entityIdSchema } from '../../types/common';
import { sendFailure } from '../errors';
import { requirePaid } from '../middleware/admin-auth';
import { nullableText, propertyParamSchema, reorderBodySchema } from './schemas';

const upgradeParamSchema = propertyParamSchema.extend({
  upgradeId: entityIdSchema,
});

const upgradeFieldsSchema = z.object({
  slug: z.string().min(1).max(120).optional(),
  title: z.string().min(1).max(200).optional(),
  shortDescription: nullableText(500),
  longDescription: nullableText(10_000),
  priceCents: z.number().int().min(0).max(10_000_000).optional(),
  currency: z.string().length(3).optional(),
  imageUrl: z.string().url().max(2000).nullable().optional(),
  stripePriceId: z.string().startsWith('price_').max(255).nullable().optional(),
  isActive: z.boolean().optional(),
});

const createUpgradeSchema = upgradeFieldsSchema.extend({
  title: z.string().min(1).max(200),
  priceCents: z.number().int().min(0).max(10_000_000),
});

const BASE = '/admin/pmcs/:pmcId/properties/:propertyId/upgrades';

/** Upgrade CRUD and reorder under a property. Writes need active billing. */
export async function upgradeAdminRoutes(app: FastifyInstance): Promise<void> {
  app.get(BASE, async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await listUpgrades(params.data.pmcId, params.data.propertyId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ upgrades: result.upgrades });
  });

  app.post(BASE, { preHandler: requirePaid }, async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = createUpgradeSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await createUpgrade(params.data.pmcId, params.data.propertyId, body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(201).send({ upgrade: result.upgrade });
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

    const result = await reorderUpgrades(params.data.pmcId, params.data.propertyId, body.data.ids);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ upgrades: result.upgrades });
  });

  app.patch(`${BASE}/:upgradeId`, { preHandler: requirePaid }, async (request, reply) => {
    const params = upgradeParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = upgradeFieldsSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const { pmcId, propertyId, upgradeId } = params.data;
    const result = await updateUpgrade(pmcId, propertyId, upgradeId, body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ upgrade: result.upgrade });
  });

  app.delete(`${BASE}/:upgradeId`, { preHandler: requirePaid }, async (request, reply) => {
    const params = upgradeParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const { pmcId, propertyId, upgradeId } = params.data;
    const result = await deleteUpgrade(pmcId, propertyId, upgradeId);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(204).send();
  });
}

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  createProperty,
  deleteProperty,
  getProperty,
  listProperties,
  setChatEnabled,
  updateProperty,
} from '../../services/property-admin.service';
import { sendFailure } from '../errors';
import { requirePaid } from '../middleware/admin-auth';
import { nullableText, pmcParamSchema, propertyParamSchema } from './schemas';

const timeOfDay = z.string().max(16).nullable().optional();

const propertyFieldsSchema = z.object({
  name: z.string().min(1).max(200).optional(),
  slug: z.string().min(1).max(120).optional(),
  address: nullableText(500),
  description: nullableText(5000),
  houseRules: nullableText(5000),
  wifiName: nullableText(200),
  wifiPassword: nullableText(200),
  checkInTime: timeOfDay,
  checkOutTime: timeOfDay,
  emergencyPhone: nullableText(40),
  heroImageUrl: z.string().url().max(2000).nullable().optional(),
});

const createPropertySchema = propertyFieldsSchema.extend({
  name: z.string().min(1).max(200),
});

const chatToggleSchema = z.object({
  enabled: z.boolean(),
});

/**
 * Property admin:
 *  - GET/POST /admin/pmcs/:pmcId/properties
 *  - GET/PATCH/DELETE /admin/pmcs/:pmcId/properties/:propertyId
 *  - PUT /admin/pmcs/:pmcId/properties/:propertyId/chat
 */
export async function propertyAdminRoutes(app: FastifyInstance): Promise<void> {
  app.get('/admin/pmcs/:pmcId/properties', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    return reply.send({ properties: await listProperties(params.data.pmcId) });
  });

  app.post('/admin/pmcs/:pmcId/properties', { preHandler: requirePaid }, async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = createPropertySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await createProperty(params.data.pmcId, body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(201).send({ property: result.property });
  });

  app.get('/admin/pmcs/:pmcId/properties/:propertyId', async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await getProperty(params.data.pmcId, params.data.propertyId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ property: result.property });
  });

  app.patch('/admin/pmcs/:pmcId/properties/:propertyId', { preHandler: requirePaid }, async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = propertyFieldsSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await updateProperty(params.data.pmcId, params.data.propertyId, body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ property: result.property });
  });

  app.put('/admin/pmcs/:pmcId/properties/:propertyId/chat', { preHandler: requirePaid }, async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const body = chatToggleSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await setChatEnabled(params.data.pmcId, params.data.propertyId, body.data.enabled);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ property: result.property });
  });

  app.delete('/admin/pmcs/:pmcId/properties/:propertyId', { preHandler: requirePaid }, async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const result = await deleteProperty(params.data.pmcId, params.data.propertyId);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(204).send();
  });
}

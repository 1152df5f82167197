import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  assistantPerformance,
  chatSummary,
  chatTimeseries,
  responseTimeReport,
  topProperties,
} from '../../services/analytics.service';
import { entityIdSchema, validateDateRange } from '../../types/common';
import { pmcParamSchema } from './schemas';

const DAY_MS = 24 * 60 * 60 * 1000;

const rangeQuerySchema = z.object({
  from: z.coerce.number().int().optional(),
  to: z.coerce.number().int().optional(),
  propertyId: entityIdSchema.optional(),
});

const timeseriesQuerySchema = rangeQuerySchema.extend({
  bucket: z.enum(['day', 'hour']).default('day'),
});

const topQuerySchema = rangeQuerySchema.extend({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

const performanceQuerySchema = rangeQuerySchema.extend({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

/** Defaults to the 30 days ending now when from/to are omitted. */
function rangeOf(query: { from?: number; to?: number }) {
  const to = query.to ?? Date.now();
  const from = query.from ?? to - 30 * DAY_MS;
  return validateDateRange(from, to);
}

/**
 * Chat analytics (epoch-ms ranges):
 *  - GET /admin/pmcs/:pmcId/analytics/chat/summary
 *  - GET /admin/pmcs/:pmcId/analytics/chat/timeseries
 *  - GET /admin/pmcs/:pmcId/analytics/chat/top-properties
 *  - GET /admin/pmcs/:pmcId/analytics/chat/response-time
 *  - GET /admin/pmcs/:pmcId/analytics/chat/assistant-performance
 */
export async function analyticsAdminRoutes(app: FastifyInstance): Promise<void> {
  app.get('/admin/pmcs/:pmcId/analytics/chat/summary', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const query = rangeQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }
    const range = rangeOf(query.data);
    if (!range.valid) return reply.status(400).send({ error: 'invalid_query', message: range.error });

    const summary = await chatSummary(params.data.pmcId, range.from, range.to, query.data.propertyId);
    return reply.send({ from: range.from.getTime(), to: range.to.getTime(), summary });
  });

  app.get('/admin/pmcs/:pmcId/analytics/chat/timeseries', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const query = timeseriesQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }
    const range = rangeOf(query.data);
    if (!range.valid) return reply.status(400).send({ error: 'invalid_query', message: range.error });
    if (query.data.bucket === 'hour' && range.to.getTime() - range.from.getTime() > 31 * DAY_MS) {
      return reply
        .status(400)
        .send({ error: 'invalid_query', message: 'Hourly buckets are limited to 31 days' });
    }

    const series = await chatTimeseries(
      params.data.pmcId,
      range.from,
      range.to,
      query.data.bucket,
      query.data.propertyId,
    );
    return reply.send(series);
  });

  app.get('/admin/pmcs/:pmcId/analytics/chat/top-properties', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const query = topQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }
    const range = rangeOf(query.data);
    if (!range.valid) return reply.status(400).send({ error: 'invalid_query', message: range.error });

    const properties = await topProperties(params.data.pmcId, range.from, range.to, query.data.limit);
    return reply.send({ properties });
  });

  app.get('/admin/pmcs/:pmcId/analytics/chat/response-time', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const query = rangeQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }
    const range = rangeOf(query.data);
    if (!range.valid) return reply.status(400).send({ error: 'invalid_query', message: range.error });

    return reply.send(
      await responseTimeReport(params.data.pmcId, range.from, range.to, query.data.propertyId),
    );
  });

  app.get('/admin/pmcs/:pmcId/analytics/chat/assistant-performance', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const query = performanceQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }
    const range = rangeOf(query.data);
    if (!range.valid) return reply.status(400).send({ error: 'invalid_query', message: range.error });

    const rows = await assistantPerformance(params.data.pmcId, range.from, range.to, {
      propertyId: query.data.propertyId,
      limit: query.data.limit,
    });
    return reply.send({ rows });
  });
}

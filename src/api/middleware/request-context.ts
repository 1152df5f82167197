import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { v4 as uuid } from 'uuid';
import { logEvent } from '../../services/telemetry.service';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
    pmcId?: string;
  }
}

function routeOf(request: FastifyRequest): string {
  return request.routeOptions.url ?? request.url;
}

/**
 * Attaches a request id to every request, picks pmcId out of the route
 * params, and records api.request.start / api.request.end with route,
 * status code and duration.
 */
async function requestContextPlugin(app: FastifyInstance): Promise<void> {
  app.decorateRequest('requestId', '');

  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const header = request.headers['x-request-id'];
    request.requestId = typeof header === 'string' && header.length > 0 ? header : uuid();
    void reply.header('x-request-id', request.requestId);
  });

  // Params are parsed by the time preHandler runs.
  app.addHook('preHandler', async (request: FastifyRequest) => {
    const params = request.params;
    if (params && typeof params === 'object' && 'pmcId' in params && typeof params.pmcId === 'string') {
      request.pmcId = params.pmcId;
    }

    request.log.info(
      { requestId: request.requestId, pmcId: request.pmcId, route: routeOf(request), method: request.method },
      'api.request.start',
    );
    await logEvent({
      pmcId: request.pmcId,
      type: 'api.request.start',
      requestId: request.requestId,
      payload: { route: routeOf(request), method: request.method },
    });
  });

  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const durationMs = Math.round(reply.elapsedTime);

    request.log.info(
      {
        requestId: request.requestId,
        pmcId: request.pmcId,
        route: routeOf(request),
        method: request.method,
        statusCode: reply.statusCode,
        durationMs,
      },
      'api.request.end',
    );
    await logEvent({
      pmcId: request.pmcId,
      type: 'api.request.end',
      requestId: request.requestId,
      durationMs,
      payload: { route: routeOf(request), method: request.method, statusCode: reply.statusCode },
    });
  });
}

export default fp(requestContextPlugin, {
  name: 'request-context',
});

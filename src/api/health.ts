import type { FastifyInstance } from 'fastify';
import { sqlite } from '../db/client';

function databaseReachable(): boolean {
  try {
    sqlite.prepare('SELECT 1').get();
    return true;
  } catch {
    return false;
  }
}

/**
 * GET /health: liveness plus a database check. 503 when SQLite is unusable.
 * No authentication or tenant context required.
 */
export async function healthRoutes(app: FastifyInstance): Promise<void> {
  app.get('/health', async (request, reply) => {
    const database = databaseReachable();
    if (!database) request.log.error({ requestId: request.requestId }, 'Health check: database unreachable');
    return reply.status(database ? 200 : 503).send({
      ok: database,
      database: database ? 'up' : 'down',
      timestamp: new Date().toISOString(),
    });
  });
}

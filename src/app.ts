import fastify, { type FastifyInstance } from 'fastify';
import { loggerOptions } from './config/logger';
import requestContextPlugin from './api/middleware/request-context';
import { healthRoutes } from './api/health';
import { versionRoutes } from './api/version';
import { guestRoutes } from './api/guest';
import { guestUpgradeRoutes } from './api/guest-upgrades';
import { stripeRoutes } from './api/stripe';
import { analyticsRoutes } from './api/analytics';
import { adminRoutes } from './api/admin';

/**
 * Creates and configures the Fastify application.
 * Exported as a factory so tests can create isolated instances.
 */
export function buildApp(): FastifyInstance {
  const app = fastify({ logger: loggerOptions });

  app.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.status(400).send({ error: 'invalid_body', message: error.message });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.code, message: error.message });
    }
    request.log.error({ err: error, requestId: request.requestId }, 'Unhandled route error');
    return reply.status(500).send({ error: 'internal_error' });
  });

  // Middleware: request_id + structured logging on all routes
  void app.register(requestContextPlugin);

  // Register routes
  void app.register(healthRoutes);
  void app.register(versionRoutes);
  void app.register(guestRoutes);
  void app.register(guestUpgradeRoutes);
  void app.register(stripeRoutes);
  void app.register(analyticsRoutes);
  void app.register(adminRoutes);

  return app;
}

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { env } from '../config/env';
import { completeConnect } from '../services/stripe-connect.service';
import { handleStripeWebhook } from '../services/stripe-webhook.service';
import { sendFailure } from './errors';

const connectCallbackQuerySchema = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  error: z.string().optional(),
});

function settingsUrl(outcome: 'connected' | 'error', reason?: string): string {
  const base = `${env.APP_BASE_URL.replace(/\/+$/, '')}/admin/settings/integrations?stripe=${outcome}`;
  return reason ? `${base}&reason=${encodeURIComponent(reason)}` : base;
}

/**
 * Public Stripe routes:
 *  - POST /stripe/webhook (signature-verified, raw body)
 *  - GET /admin/integrations/stripe/oauth/callback (authorized by the signed state)
 */
export async function stripeRoutes(app: FastifyInstance): Promise<void> {
  // Signature verification needs the exact bytes Stripe sent.
  app.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.post('/stripe/webhook', async (request, reply) => {
    const raw = request.body;
    if (!Buffer.isBuffer(raw)) {
      return reply.status(400).send({ error: 'invalid_body', message: 'Expected a JSON payload.' });
    }
    const header = request.headers['stripe-signature'];
    const signature = typeof header === 'string' ? header : undefined;

    const result = await handleStripeWebhook(raw, signature);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({ ok: true, duplicate: result.duplicate });
  });

  app.get('/admin/integrations/stripe/oauth/callback', async (request, reply) => {
    const query = connectCallbackQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }
    if (query.data.error) {
      request.log.warn({ reason: query.data.error }, 'Stripe Connect authorization declined');
      return reply.redirect(settingsUrl('error', query.data.error));
    }

    const result = await completeConnect(query.data.code, query.data.state);
    if (!result.success) {
      if (result.error === 'invalid_state') return sendFailure(reply, result);
      return reply.redirect(settingsUrl('error', result.error));
    }
    return reply.redirect(settingsUrl('connected'));
  });
}

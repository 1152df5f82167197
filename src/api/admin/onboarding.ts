import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { startBillingCheckout } from '../../services/billing.service';
import { signUpPmc } from '../../services/pmc-signup.service';
import { sendFailure } from '../errors';
import { adminOf } from '../middleware/admin-auth';
import { pmcParamSchema } from './schemas';

const signupBodySchema = z.object({
  pmcName: z.string().trim().min(1, 'PMC name is required').max(200),
  adminName: z.string().trim().max(200).nullish(),
});

/**
 * Onboarding for a new PMC. Neither route is behind the billing gate,
 * since paying is what they lead to.
 *  - POST /admin/signup
 *  - POST /admin/pmcs/:pmcId/billing/checkout
 */
export async function onboardingRoutes(app: FastifyInstance): Promise<void> {
  app.post('/admin/signup', async (request, reply) => {
    const body = signupBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await signUpPmc(adminOf(request), body.data);
    if (!result.success) return sendFailure(reply, result);
    return reply.status(result.created ? 201 : 200).send({
      pmc: {
        id: result.pmc.id,
        name: result.pmc.name,
        email: result.pmc.email,
        billingStatus: result.pmc.billingStatus,
      },
      owner: { id: result.owner.id, email: result.owner.email, role: result.owner.role },
      created: result.created,
    });
  });

  app.post('/admin/pmcs/:pmcId/billing/checkout', async (request, reply) => {
    const params = pmcParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const result = await startBillingCheckout(params.data.pmcId, { requestId: request.requestId });
    if (!result.success) return sendFailure(reply, result);
    return reply.send({
      checkoutUrl: result.checkoutUrl,
      checkoutSessionId: result.checkoutSessionId,
      quantity: result.quantity,
    });
  });
}

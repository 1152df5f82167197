import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { UpgradePurchase } from '../db/schema';
import {
  listGuestUpgrades,
  listPaidUpgradeIds,
  loadVerifiedStay,
  recommendationFor,
  type GuestStay,
  type GuestUpgradeView,
} from '../services/guest-upgrades.service';
import { getPurchaseStatus, startUpgradeCheckout } from '../services/upgrade-checkout.service';
import { entityIdSchema } from '../types/common';
import { sendFailure } from './errors';
import { guestIdentity } from './middleware/bearer';

const propertyParamSchema = z.object({
  propertyId: entityIdSchema,
});

const upgradeParamSchema = z.object({
  propertyId: entityIdSchema,
  upgradeId: entityIdSchema,
});

const purchaseStatusQuerySchema = z.object({
  purchase_id: entityIdSchema,
  session_id: z.string().min(1).max(255).optional(),
});

function upgradeView(view: GuestUpgradeView) {
  const { upgrade } = view;
  return {
    id: upgrade.id,
    slug: upgrade.slug,
    title: upgrade.title,
    short_description: upgrade.shortDescription,
    long_description: upgrade.longDescription,
    price_cents: upgrade.priceCents,
    currency: upgrade.currency,
    image_url: upgrade.imageUrl,
    eligible: view.eligible,
    reason: view.reason,
    opens_at: view.opensAt ? view.opensAt.toISOString() : null,
    purchased: view.purchased,
  };
}

function purchaseView(purchase: UpgradePurchase) {
  return {
    purchase_id: purchase.id,
    upgrade_id: purchase.upgradeId,
    status: purchase.status,
    paid: purchase.status === 'paid',
    refunded: purchase.status === 'refunded',
    amount_cents: purchase.amountCents,
    currency: purchase.currency,
    paid_at: purchase.paidAt ? purchase.paidAt.toISOString() : null,
  };
}

/** Resolves the guest's verified stay or sends the error reply. */
async function verifiedStay(
  request: FastifyRequest,
  reply: FastifyReply,
  propertyId: string,
): Promise<GuestStay | null> {
  const identity = await guestIdentity(request);
  if (!identity) {
    await reply.status(401).send({ error: 'unauthenticated', message: 'Please unlock your stay first.' });
    return null;
  }
  const stay = await loadVerifiedStay(identity, propertyId);
  if (!stay.success) {
    await sendFailure(reply, stay);
    return null;
  }
  return { property: stay.property, session: stay.session };
}

/**
 * Guest upgrade routes (bearer guest token):
 *  - GET /guest/properties/:propertyId/upgrades
 *  - GET /guest/properties/:propertyId/upgrades/paid
 *  - GET /guest/properties/:propertyId/upgrades/:upgradeId/recommendation
 *  - POST /guest/properties/:propertyId/upgrades/:upgradeId/checkout
 *  - GET /guest/upgrades/purchase-status
 */
export async function guestUpgradeRoutes(app: FastifyInstance): Promise<void> {
  app.get('/guest/properties/:propertyId/upgrades', async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const stay = await verifiedStay(request, reply, params.data.propertyId);
    if (!stay) return reply;

    const upgrades = await listGuestUpgrades(stay);
    return reply.send({ upgrades: upgrades.map(upgradeView) });
  });

  app.get('/guest/properties/:propertyId/upgrades/paid', async (request, reply) => {
    const params = propertyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const stay = await verifiedStay(request, reply, params.data.propertyId);
    if (!stay) return reply;

    return reply.send({ paid_upgrade_ids: await listPaidUpgradeIds(stay) });
  });

  app.get('/guest/properties/:propertyId/upgrades/:upgradeId/recommendation', async (request, reply) => {
    const params = upgradeParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const stay = await verifiedStay(request, reply, params.data.propertyId);
    if (!stay) return reply;

    const result = await recommendationFor(stay, params.data.upgradeId);
    if (!result.success) return sendFailure(reply, result);
    return reply.send({
      eligible: result.eligible,
      reason: result.reason,
      next_eligible_date: result.nextEligibleDate,
      suggested_message: result.suggestedMessage,
      arrival_date: result.arrivalDate,
      departure_date: result.departureDate,
    });
  });

  app.post('/guest/properties/:propertyId/upgrades/:upgradeId/checkout', async (request, reply) => {
    const params = upgradeParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }
    const stay = await verifiedStay(request, reply, params.data.propertyId);
    if (!stay) return reply;

    const result = await startUpgradeCheckout(stay, params.data.upgradeId, {
      requestId: request.requestId,
    });
    if (!result.success) return sendFailure(reply, result);
    return reply.send({
      purchase_id: result.purchaseId,
      checkout_url: result.checkoutUrl,
      checkout_session_id: result.checkoutSessionId,
      reused: result.reused,
    });
  });

  app.get('/guest/upgrades/purchase-status', async (request, reply) => {
    const query = purchaseStatusQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }

    const result = await getPurchaseStatus(query.data.purchase_id, query.data.session_id);
    if (!result.success) return sendFailure(reply, result);
    return reply.send(purchaseView(result.purchase));
  });
}

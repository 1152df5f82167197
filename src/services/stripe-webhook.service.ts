import Stripe from 'stripe';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { AnalyticsEventDal } from '../dal/analytics-event.dal';
import { PmcDal, type PmcPatch } from '../dal/pmc.dal';
import { PurchaseDal } from '../dal/purchase.dal';
import { StripeEventDal } from '../dal/stripe-event.dal';
import { db } from '../db/client';
import type { Pmc } from '../db/schema';
import { fail, type ServiceResult } from '../types/common';
import { ACTIVATION_CHECKOUT_TYPE } from './billing.service';
import { notifyUpgradePurchased, notifyUpgradeRefunded } from './pmc-message.service';
import { logEvent } from './telemetry.service';

const stripeEventDal = new StripeEventDal(db);
const purchaseDal = new PurchaseDal(db);
const pmcDal = new PmcDal(db);
const analyticsDal = new AnalyticsEventDal(db);

/** Checkout `metadata.type` values that pay for a PMC account. */
const ACTIVATING_CHECKOUT_TYPES = new Set([
  ACTIVATION_CHECKOUT_TYPE,
  'pmc_setup_plus_property_subscription',
  'pmc_signup_onetime',
]);
const PMC_CHECKOUT_TYPES = new Set([...ACTIVATING_CHECKOUT_TYPES, 'pmc_property_subscription']);

export interface WebhookOutcome {
  duplicate: boolean;
  handled: boolean;
}

export type WebhookResult = ServiceResult<
  WebhookOutcome,
  'webhook_not_configured' | 'invalid_signature'
>;

function refId(value: string | { id: string } | null | undefined): string | null {
  if (!value) return null;
  return typeof value === 'string' ? value : value.id;
}

/** Verifies the signature header against the raw request body. */
export function verifyStripeEvent(rawBody: Buffer | string, signature: string): Stripe.Event | null {
  try {
    return Stripe.webhooks.constructEvent(rawBody, signature, env.STRIPE_WEBHOOK_SECRET);
  } catch (err) {
    logger.warn({ err }, 'Stripe webhook signature rejected');
    return null;
  }
}

interface PmcHints {
  pmcId?: string | null;
  customerId?: string | null;
  subscriptionId?: string | null;
  email?: string | null;
}

/** PMC lookup order: metadata pmc_id, customer id, subscription id, email. */
async function findPmc(hints: PmcHints): Promise<Pmc | undefined> {
  if (hints.pmcId) {
    const pmc = await pmcDal.findById(hints.pmcId);
    if (pmc) return pmc;
  }
  if (hints.customerId) {
    const pmc = await pmcDal.findByStripeCustomerId(hints.customerId);
    if (pmc) return pmc;
  }
  if (hints.subscriptionId?.startsWith('sub_')) {
    const pmc = await pmcDal.findByStripeSubscriptionId(hints.subscriptionId);
    if (pmc) return pmc;
  }
  if (hints.email) return pmcDal.findByEmail(hints.email);
  return undefined;
}

async function updatePmcBilling(hints: PmcHints, patch: PmcPatch, eventType: string): Promise<boolean> {
  const pmc = await findPmc(hints);
  if (!pmc) {
    logger.warn({ eventType }, 'Stripe event matched no PMC');
    return false;
  }
  await pmcDal.update(pmc.id, patch);
  await logEvent({
    pmcId: pmc.id,
    type: 'billing.updated',
    payload: { eventType, billingStatus: patch.billingStatus ?? pmc.billingStatus },
  });
  return true;
}

async function handleUpgradePaid(session: Stripe.Checkout.Session): Promise<boolean> {
  if (session.payment_status === 'unpaid') {
    logger.info({ checkoutSessionId: session.id }, 'Checkout completed without payment yet');
    return false;
  }

  const purchaseId = session.metadata?.purchase_id;
  const purchase =
    (purchaseId ? await purchaseDal.findById(purchaseId) : undefined) ??
    (await purchaseDal.findByCheckoutSessionId(session.id));
  if (!purchase) {
    logger.warn({ checkoutSessionId: session.id, purchaseId }, 'Paid checkout matched no purchase');
    return false;
  }

  const paid = await purchaseDal.markPaid(purchase.id, {
    checkoutSessionId: session.id,
    paymentIntentId: refId(session.payment_intent),
  });
  if (!paid) return true;

  await notifyUpgradePurchased(paid);
  await analyticsDal.create({
    pmcId: paid.pmcId,
    propertyId: paid.propertyId,
    sessionId: paid.guestSessionId,
    eventName: 'upgrade_purchased',
    data: { purchaseId: paid.id, upgradeId: paid.upgradeId, amountCents: paid.amountCents },
  });
  await logEvent({
    pmcId: paid.pmcId,
    type: 'upgrade.purchased',
    entityType: 'upgrade_purchase',
    entityId: paid.id,
    payload: { amountCents: paid.amountCents, platformFeeCents: paid.platformFeeCents },
  });
  return true;
}

async function handlePmcCheckout(session: Stripe.Checkout.Session, checkoutType: string): Promise<boolean> {
  if (checkoutType && !PMC_CHECKOUT_TYPES.has(checkoutType)) return false;

  const customerId = refId(session.customer);
  const subscriptionId = refId(session.subscription);
  const patch: PmcPatch = {
    ...(customerId ? { stripeCustomerId: customerId } : {}),
    ...(subscriptionId ? { stripeSubscriptionId: subscriptionId } : {}),
  };
  if (ACTIVATING_CHECKOUT_TYPES.has(checkoutType)) {
    Object.assign(patch, {
      billingStatus: 'active',
      active: true,
      syncEnabled: true,
      signupPaidAt: new Date(),
    } satisfies PmcPatch);
  }

  return updatePmcBilling(
    {
      pmcId: session.metadata?.pmc_id,
      customerId,
      subscriptionId,
      email: session.customer_details?.email ?? session.customer_email,
    },
    patch,
    'checkout.session.completed',
  );
}

async function handleCheckoutCompleted(session: Stripe.Checkout.Session): Promise<boolean> {
  const checkoutType = session.metadata?.type?.trim() ?? '';
  if (checkoutType === 'upgrade_purchase') return handleUpgradePaid(session);
  return handlePmcCheckout(session, checkoutType);
}

async function handleCheckoutExpired(session: Stripe.Checkout.Session): Promise<boolean> {
  const purchase = await purchaseDal.findByCheckoutSessionId(session.id);
  if (!purchase || purchase.status !== 'pending') return false;
  await purchaseDal.update(purchase.id, { status: 'canceled', checkoutUrl: null });
  return true;
}

async function handleChargeRefunded(charge: Stripe.Charge): Promise<boolean> {
  const paymentIntentId = refId(charge.payment_intent);
  if (!paymentIntentId) return false;
  const purchase = await purchaseDal.findByPaymentIntentId(paymentIntentId);
  if (!purchase) return false;

  const fullyRefunded = charge.refunded || charge.amount_refunded >= purchase.amountCents;
  const updated = await purchaseDal.update(purchase.id, {
    status: fullyRefunded ? 'refunded' : purchase.status,
    refundedAmountCents: charge.amount_refunded,
    refundedAt: new Date(),
  });
  if (updated) await notifyUpgradeRefunded(updated);
  return true;
}

function billingFromSubscription(status: Stripe.Subscription.Status): PmcPatch | null {
  switch (status) {
    case 'active':
    case 'trialing':
      return { billingStatus: 'active', active: true };
    case 'past_due':
    case 'unpaid':
    case 'incomplete':
    case 'incomplete_expired':
      return { billingStatus: 'past_due', active: false };
    case 'canceled':
      return { billingStatus: 'canceled', active: false };
    default:
      return null;
  }
}

async function dispatch(event: Stripe.Event): Promise<boolean> {
  switch (event.type) {
    case 'checkout.session.completed':
    case 'checkout.session.async_payment_succeeded':
      return handleCheckoutCompleted(event.data.object);
    case 'checkout.session.expired':
      return handleCheckoutExpired(event.data.object);
    case 'charge.refunded':
      return handleChargeRefunded(event.data.object);
    case 'invoice.payment_failed':
    case 'invoice.payment_action_required': {
      const invoice = event.data.object;
      return updatePmcBilling(
        {
          pmcId: invoice.metadata?.pmc_id,
          customerId: refId(invoice.customer),
          subscriptionId: refId(invoice.subscription),
          email: invoice.customer_email,
        },
        { billingStatus: 'past_due', active: false },
        event.type,
      );
    }
    case 'customer.subscription.updated':
    case 'customer.subscription.deleted': {
      const subscription = event.data.object;
      const patch =
        event.type === 'customer.subscription.deleted'
          ? { billingStatus: 'canceled' as const, active: false }
          : billingFromSubscription(subscription.status);
      if (!patch) return false;
      return updatePmcBilling(
        {
          pmcId: subscription.metadata.pmc_id,
          customerId: refId(subscription.customer),
          subscriptionId: subscription.id,
        },
        patch,
        event.type,
      );
    }
    default:
      return false;
  }
}

/**
 * Applies a verified event at most once. The event id is recorded first;
 * if handling throws, the record is dropped so Stripe's retry runs again.
 */
export async function processStripeEvent(event: Stripe.Event): Promise<WebhookOutcome> {
  const fresh = await stripeEventDal.record(event.id, event.type);
  if (!fresh) {
    logger.info({ eventId: event.id, type: event.type }, 'Duplicate Stripe event ignored');
    return { duplicate: true, handled: false };
  }

  try {
    const handled = await dispatch(event);
    logger.info({ eventId: event.id, type: event.type, handled }, 'Stripe event processed');
    return { duplicate: false, handled };
  } catch (err) {
    await stripeEventDal.forget(event.id);
    throw err;
  }
}

export async function handleStripeWebhook(
  rawBody: Buffer | string,
  signature: string | undefined,
): Promise<WebhookResult> {
  if (!env.STRIPE_WEBHOOK_SECRET) {
    logger.error('STRIPE_WEBHOOK_SECRET is not set; rejecting webhook');
    return fail('webhook_not_configured');
  }
  if (!signature) return fail('invalid_signature', 'Missing Stripe signature header');

  const event = verifyStripeEvent(rawBody, signature);
  if (!event) return fail('invalid_signature', 'Invalid Stripe signature');

  return { success: true, ...(await processStripeEvent(event)) };
}

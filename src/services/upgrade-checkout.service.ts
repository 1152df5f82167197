import { checkoutConfig } from '../config/concierge';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { IntegrationDal } from '../dal/integration.dal';
import { PurchaseDal } from '../dal/purchase.dal';
import { UpgradeDal } from '../dal/upgrade.dal';
import { db } from '../db/client';
import { isUniqueViolation } from '../db/errors';
import type { UpgradePurchase } from '../db/schema';
import { getIntegrations } from '../integrations/registry';
import { startTimer } from '../telemetry/timing';
import { fail, type ServiceResult } from '../types/common';
import { buildStayContext, type GuestStay } from './guest-upgrades.service';
import { logEvent, logSpan } from './telemetry.service';
import { evaluateUpgrade } from './upgrade-rules.service';

const upgradeDal = new UpgradeDal(db);
const purchaseDal = new PurchaseDal(db);
const integrationDal = new IntegrationDal(db);

/** Platform cut of an upgrade sale: percent plus flat, always leaving the host at least 1 cent. */
export function platformFee(amountCents: number): number {
  const fee = Math.max(
    0,
    Math.round((amountCents * env.PLATFORM_FEE_PERCENT) / 100) + env.PLATFORM_FEE_FLAT_CENTS,
  );
  return fee >= amountCents ? Math.max(0, amountCents - 1) : fee;
}

export type CheckoutError =
  | 'upgrade_not_found'
  | 'forbidden'
  | 'not_eligible'
  | 'invalid_price'
  | 'payments_not_enabled'
  | 'already_purchased'
  | 'checkout_in_progress'
  | 'payments_unavailable';

export type CheckoutResult = ServiceResult<
  { purchaseId: string; checkoutUrl: string; checkoutSessionId: string; reused: boolean },
  CheckoutError
>;

function checkoutUrls(propertyId: string, purchaseId: string, upgradeId: string) {
  const base = `${env.APP_BASE_URL.replace(/\/+$/, '')}/guest/${propertyId}?screen=upgrades`;
  const ids = `&purchase_id=${purchaseId}&upgrade_id=${upgradeId}`;
  return {
    successUrl: `${base}&upgrade=success${ids}&session_id={CHECKOUT_SESSION_ID}`,
    cancelUrl: `${base}&upgrade=cancel${ids}`,
  };
}

function isReusable(purchase: UpgradePurchase, now: Date): boolean {
  if (purchase.status !== 'pending' || !purchase.checkoutCreatedAt) return false;
  const ageMs = now.getTime() - purchase.checkoutCreatedAt.getTime();
  return ageMs < checkoutConfig.REUSE_PENDING_MINUTES * 60 * 1000;
}

function reuseCheckout(purchase: UpgradePurchase, now: Date): CheckoutResult | null {
  if (!isReusable(purchase, now) || !purchase.checkoutUrl || !purchase.stripeCheckoutSessionId) {
    return null;
  }
  return {
    success: true,
    purchaseId: purchase.id,
    checkoutUrl: purchase.checkoutUrl,
    checkoutSessionId: purchase.stripeCheckoutSessionId,
    reused: true,
  };
}

// Checkouts being opened in this process, keyed by guest session and upgrade.
const opening = new Map<string, Promise<CheckoutResult>>();

/**
 * Opens (or hands back) a hosted checkout for one upgrade of the guest's
 * stay. The charge goes to the PMC's connected account minus the
 * platform fee. A second click while the first checkout is still being
 * opened waits for it and gets the same checkout back.
 */
export async function startUpgradeCheckout(
  stay: GuestStay,
  upgradeId: string,
  opts: { now?: Date; requestId?: string } = {},
): Promise<CheckoutResult> {
  const key = `${stay.session.id}:${upgradeId}`;
  const pending = opening.get(key);
  if (pending) {
    const result = await pending;
    return result.success ? { ...result, reused: true } : result;
  }

  const started = openCheckout(stay, upgradeId, opts);
  opening.set(key, started);
  try {
    return await started;
  } finally {
    opening.delete(key);
  }
}

async function openCheckout(
  stay: GuestStay,
  upgradeId: string,
  opts: { now?: Date; requestId?: string },
): Promise<CheckoutResult> {
  const timer = startTimer('startUpgradeCheckout');
  const now = opts.now ?? new Date();
  const { property, session } = stay;

  try {
    const upgrade = await upgradeDal.findById(upgradeId);
    if (!upgrade || !upgrade.isActive) return fail('upgrade_not_found');
    if (upgrade.propertyId !== property.id) {
      return fail('forbidden', 'This upgrade is not offered for your stay.');
    }

    const context = await buildStayContext(session, property);
    if (!context) return fail('not_eligible', "We can't verify your stay dates yet.");
    const evaluation = evaluateUpgrade(upgrade, context, now);
    if (!evaluation.eligible) return fail('not_eligible', evaluation.reason);

    const amountCents = upgrade.priceCents;
    const feeCents = platformFee(amountCents);
    if (amountCents <= 0 || amountCents - feeCents <= 0) {
      return fail('invalid_price', 'This upgrade has no valid price.');
    }

    const connect = await integrationDal.findByProvider(property.pmcId, 'stripe_connect');
    if (!connect?.isConnected || !connect.accountId) {
      return fail('payments_not_enabled', 'This property is not accepting upgrade payments yet.');
    }

    const existing = await purchaseDal.findBySessionAndUpgrade(session.id, upgrade.id);
    if (existing?.status === 'paid') {
      return fail('already_purchased', 'This upgrade has already been purchased for this stay.');
    }
    const reusable = existing ? reuseCheckout(existing, now) : null;
    if (reusable) return reusable;

    const pricing = {
      pmcId: property.pmcId,
      propertyId: property.id,
      amountCents,
      platformFeeCents: feeCents,
      netAmountCents: amountCents - feeCents,
      currency: upgrade.currency.toLowerCase(),
      status: 'pending' as const,
      stripeCheckoutSessionId: null,
      checkoutUrl: null,
      checkoutCreatedAt: null,
      stripePaymentIntentId: null,
      stripeDestinationAccountId: connect.accountId,
      paidAt: null,
      refundedAt: null,
      refundedAmountCents: null,
    };
    let purchase: UpgradePurchase | undefined;
    if (existing) {
      purchase = await purchaseDal.update(existing.id, { ...pricing, attempt: existing.attempt + 1 });
    } else {
      try {
        purchase = await purchaseDal.create({
          ...pricing,
          upgradeId: upgrade.id,
          guestSessionId: session.id,
          attempt: 1,
        });
      } catch (err) {
        if (!isUniqueViolation(err)) throw err;
        // Another worker inserted the purchase between our read and write.
        const winner = await purchaseDal.findBySessionAndUpgrade(session.id, upgrade.id);
        if (winner?.status === 'paid') {
          return fail('already_purchased', 'This upgrade has already been purchased for this stay.');
        }
        const reused = winner ? reuseCheckout(winner, now) : null;
        if (reused) return reused;
        return fail('checkout_in_progress', 'Your checkout is still being prepared. Please try again.');
      }
    }
    if (!purchase) return fail('upgrade_not_found');

    const metadata = {
      type: 'upgrade_purchase',
      purchase_id: purchase.id,
      pmc_id: property.pmcId,
      property_id: property.id,
      upgrade_id: upgrade.id,
      guest_session_id: session.id,
    };

    let checkout: { id: string; url: string };
    try {
      checkout = await getIntegrations().payments.createCheckoutSession({
        lineItem: {
          priceId: upgrade.stripePriceId,
          name: upgrade.title,
          description: upgrade.shortDescription,
          amountCents,
          currency: pricing.currency,
        },
        metadata,
        applicationFeeCents: feeCents,
        destinationAccountId: connect.accountId,
        ...checkoutUrls(property.id, purchase.id, upgrade.id),
        idempotencyKey: `upgrade-checkout-${purchase.id}-${purchase.attempt}`,
        clientReferenceId: purchase.id,
      });
    } catch (err) {
      logger.error({ err, purchaseId: purchase.id }, 'Checkout session creation failed');
      await logEvent({
        pmcId: property.pmcId,
        type: 'payments.checkout.failed',
        requestId: opts.requestId,
        entityType: 'upgrade_purchase',
        entityId: purchase.id,
        payload: { message: err instanceof Error ? err.message : String(err) },
      });
      return fail('payments_unavailable', 'Payments are unavailable right now. Please try again.');
    }

    await purchaseDal.update(purchase.id, {
      stripeCheckoutSessionId: checkout.id,
      checkoutUrl: checkout.url,
      checkoutCreatedAt: now,
    });
    await logEvent({
      pmcId: property.pmcId,
      type: 'upgrade.checkout.started',
      requestId: opts.requestId,
      entityType: 'upgrade_purchase',
      entityId: purchase.id,
      payload: { upgradeId: upgrade.id, amountCents, platformFeeCents: feeCents },
    });

    return {
      success: true,
      purchaseId: purchase.id,
      checkoutUrl: checkout.url,
      checkoutSessionId: checkout.id,
      reused: false,
    };
  } finally {
    await logSpan(timer.span, timer.stop(), {
      pmcId: property.pmcId,
      requestId: opts.requestId,
    });
  }
}

export type PurchaseStatusResult = ServiceResult<
  { purchase: UpgradePurchase },
  'purchase_not_found' | 'session_mismatch'
>;

/** Purchase lookup for the post-checkout page; the checkout session id must match when given. */
export async function getPurchaseStatus(
  purchaseId: string,
  checkoutSessionId?: string,
): Promise<PurchaseStatusResult> {
  const purchase = await purchaseDal.findById(purchaseId);
  if (!purchase) return fail('purchase_not_found');
  if (checkoutSessionId && purchase.stripeCheckoutSessionId !== checkoutSessionId) {
    return fail('session_mismatch');
  }
  return { success: true, purchase };
}

import { env } from '../config/env';
import { logger } from '../config/logger';
import { PmcDal } from '../dal/pmc.dal';
import { PropertyDal } from '../dal/property.dal';
import { db } from '../db/client';
import { getIntegrations } from '../integrations/registry';
import { fail, toIsoDate, type ServiceResult } from '../types/common';
import { logEvent } from './telemetry.service';

const pmcDal = new PmcDal(db);
const propertyDal = new PropertyDal(db);

/** `metadata.type` the webhook treats as a full account activation. */
export const ACTIVATION_CHECKOUT_TYPE = 'pmc_full_activation';

export type BillingCheckoutResult = ServiceResult<
  { checkoutUrl: string; checkoutSessionId: string; quantity: number },
  'pmc_not_found' | 'already_active' | 'billing_not_configured' | 'payments_unavailable'
>;

function billingUrls(): { successUrl: string; cancelUrl: string } {
  const base = `${env.APP_BASE_URL.replace(/\/+$/, '')}/admin/settings/billing`;
  return { successUrl: `${base}?billing=success`, cancelUrl: `${base}?billing=cancel` };
}

/**
 * Opens the subscription checkout that activates a PMC: one monthly seat
 * per chat-enabled property (at least one) plus the activation fee when
 * configured. The webhook flips the PMC to active once it is paid.
 */
export async function startBillingCheckout(
  pmcId: string,
  opts: { now?: Date; requestId?: string } = {},
): Promise<BillingCheckoutResult> {
  const now = opts.now ?? new Date();
  const pmc = await pmcDal.findById(pmcId);
  if (!pmc) return fail('pmc_not_found');
  if (pmc.billingStatus === 'active' && pmc.active) {
    return fail('already_active', 'Billing is already active for this PMC.');
  }
  if (!env.STRIPE_PRICE_PROPERTY_MONTHLY) {
    logger.error('STRIPE_PRICE_PROPERTY_MONTHLY is not set; cannot open billing checkout');
    return fail('billing_not_configured', 'Billing is not available yet.');
  }

  const properties = await propertyDal.listByPmc(pmc.id);
  const quantity = Math.max(1, properties.filter((p) => p.chatEnabled).length);

  let checkout: { id: string; url: string };
  try {
    checkout = await getIntegrations().payments.createBillingCheckoutSession({
      priceId: env.STRIPE_PRICE_PROPERTY_MONTHLY,
      quantity,
      setupPriceId: env.STRIPE_PRICE_ACTIVATION || null,
      customerId: pmc.stripeCustomerId,
      customerEmail: pmc.email,
      metadata: { type: ACTIVATION_CHECKOUT_TYPE, pmc_id: pmc.id },
      ...billingUrls(),
      // One open checkout per PMC, seat count and day.
      idempotencyKey: `pmc-activation-${pmc.id}-${quantity}-${toIsoDate(now)}`,
      clientReferenceId: pmc.id,
    });
  } catch (err) {
    logger.error({ err, pmcId }, 'Billing checkout creation failed');
    return fail('payments_unavailable', 'Payments are unavailable right now. Please try again.');
  }

  await logEvent({
    pmcId,
    type: 'billing.checkout.started',
    requestId: opts.requestId,
    entityType: 'pmc',
    entityId: pmc.id,
    payload: { quantity, checkoutSessionId: checkout.id },
  });
  return { success: true, checkoutUrl: checkout.url, checkoutSessionId: checkout.id, quantity };
}

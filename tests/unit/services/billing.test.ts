import { describe, it, expect, beforeEach } from 'vitest';
import { startBillingCheckout } from '@/services/billing.service';
import { createPmc, createProperty, useStubIntegrations, type TestIntegrations } from '../../helpers/fixtures';

const NOW = new Date('2026-08-01T10:00:00Z');

describe('startBillingCheckout', () => {
  let stubs: TestIntegrations;

  beforeEach(() => {
    stubs = useStubIntegrations();
  });

  it('opens a subscription checkout with one seat per chat-enabled property', async () => {
    const pmc = await createPmc({ email: 'billing-owner@example.com', billingStatus: 'pending', active: false });
    await createProperty(pmc.id);
    await createProperty(pmc.id);
    await createProperty(pmc.id, { chatEnabled: false });

    const result = await startBillingCheckout(pmc.id, { now: NOW });
    if (!result.success) throw new Error(`unexpected ${result.error}`);

    expect(result.quantity).toBe(2);
    expect(result.checkoutUrl).toBe(`https://checkout.stub.local/subscribe/${result.checkoutSessionId}`);
    expect(stubs.payments.billingSessions.get(result.checkoutSessionId)).toMatchObject({
      priceId: 'price_test_monthly',
      quantity: 2,
      setupPriceId: null,
      customerId: null,
      customerEmail: 'billing-owner@example.com',
      metadata: { type: 'pmc_full_activation', pmc_id: pmc.id },
      successUrl: 'http://concierge.test/admin/settings/billing?billing=success',
      cancelUrl: 'http://concierge.test/admin/settings/billing?billing=cancel',
      idempotencyKey: `pmc-activation-${pmc.id}-2-2026-08-01`,
      clientReferenceId: pmc.id,
    });
  });

  it('bills at least one seat and reuses the known customer', async () => {
    const pmc = await createPmc({ billingStatus: 'past_due', active: false, stripeCustomerId: 'cus_test_known' });

    const result = await startBillingCheckout(pmc.id, { now: NOW });
    if (!result.success) throw new Error(`unexpected ${result.error}`);

    expect(stubs.payments.billingSessions.get(result.checkoutSessionId)).toMatchObject({
      quantity: 1,
      customerId: 'cus_test_known',
    });
  });

  it('hands back the same checkout for a repeated click', async () => {
    const pmc = await createPmc({ billingStatus: 'pending', active: false });
    const first = await startBillingCheckout(pmc.id, { now: NOW });
    const again = await startBillingCheckout(pmc.id, { now: NOW });
    expect(again).toEqual(first);
    expect(stubs.payments.billingSessions.size).toBe(1);
  });

  it('refuses PMCs that already pay', async () => {
    const pmc = await createPmc();
    expect(await startBillingCheckout(pmc.id)).toEqual({
      success: false,
      error: 'already_active',
      message: 'Billing is already active for this PMC.',
    });
  });

  it('reports unknown PMCs and processor failures', async () => {
    expect(await startBillingCheckout('missing')).toEqual({ success: false, error: 'pmc_not_found' });

    const pmc = await createPmc({ billingStatus: 'pending', active: false });
    stubs.payments.failure = new Error('processor down');
    expect(await startBillingCheckout(pmc.id)).toEqual({
      success: false,
      error: 'payments_unavailable',
      message: 'Payments are unavailable right now. Please try again.',
    });
  });
});

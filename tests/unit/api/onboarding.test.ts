import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import Stripe from 'stripe';
import { buildApp } from '@/app';
import { issueAdminToken } from '@/services/auth.service';
import { createPmc, useStubIntegrations, type TestIntegrations } from '../../helpers/fixtures';

function auth(token: string) {
  return { authorization: `Bearer ${token}` };
}

describe('PMC onboarding API', () => {
  let app: FastifyInstance;
  let stubs: TestIntegrations;
  let token: string;
  let pmcId = '';

  beforeAll(async () => {
    stubs = useStubIntegrations();
    token = await issueAdminToken('newcomer@example.com');
    app = buildApp();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('signs up a pending PMC owned by the signed-in admin', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/admin/signup',
      headers: auth(token),
      payload: { pmcName: ' Coastal Keys ', adminName: 'Robin' },
    });
    expect(res.statusCode).toBe(201);

    const body = res.json<{
      pmc: { id: string; name: string; email: string; billingStatus: string };
      owner: { email: string; role: string };
      created: boolean;
    }>();
    pmcId = body.pmc.id;
    expect(body).toMatchObject({
      pmc: { name: 'Coastal Keys', email: 'newcomer@example.com', billingStatus: 'pending' },
      owner: { email: 'newcomer@example.com', role: 'owner' },
      created: true,
    });

    const me = await app.inject({ method: 'GET', url: '/admin/me', headers: auth(token) });
    expect(me.json()).toMatchObject({ pmcId, teamRole: 'owner', billingStatus: 'pending', needsPayment: true });
  });

  it('keeps content writes behind billing until the checkout is paid', async () => {
    const blocked = await app.inject({
      method: 'POST',
      url: `/admin/pmcs/${pmcId}/properties`,
      headers: auth(token),
      payload: { name: 'Dune House' },
    });
    expect(blocked.statusCode).toBe(402);

    const checkout = await app.inject({
      method: 'POST',
      url: `/admin/pmcs/${pmcId}/billing/checkout`,
      headers: auth(token),
    });
    expect(checkout.statusCode).toBe(200);
    const { checkoutSessionId, quantity } = checkout.json<{ checkoutSessionId: string; quantity: number }>();
    expect(quantity).toBe(1);
    const sent = stubs.payments.billingSessions.get(checkoutSessionId);
    expect(sent?.metadata).toEqual({ type: 'pmc_full_activation', pmc_id: pmcId });

    const payload = JSON.stringify({
      id: 'evt_test_activation',
      object: 'event',
      type: 'checkout.session.completed',
      data: {
        object: {
          id: checkoutSessionId,
          object: 'checkout.session',
          payment_status: 'paid',
          customer: 'cus_test_new',
          subscription: 'sub_test_new',
          metadata: sent?.metadata,
        },
      },
    });
    const webhook = await app.inject({
      method: 'POST',
      url: '/stripe/webhook',
      headers: {
        'content-type': 'application/json',
        'stripe-signature': Stripe.webhooks.generateTestHeaderString({ payload, secret: 'whsec_test-secret' }),
      },
      payload,
    });
    expect(webhook.statusCode).toBe(200);

    const created = await app.inject({
      method: 'POST',
      url: `/admin/pmcs/${pmcId}/properties`,
      headers: auth(token),
      payload: { name: 'Dune House' },
    });
    expect(created.statusCode).toBe(201);
  });

  it('refuses a second billing checkout once active', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/admin/pmcs/${pmcId}/billing/checkout`,
      headers: auth(token),
    });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: 'already_active', message: 'Billing is already active for this PMC.' });
  });

  it('refuses to sign up again once active', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/admin/signup',
      headers: auth(token),
      payload: { pmcName: 'Another Name' },
    });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: 'already_registered', message: 'This email already belongs to a PMC.' });
  });

  it('keeps other PMCs out of the billing checkout', async () => {
    const other = await createPmc();
    const res = await app.inject({
      method: 'POST',
      url: `/admin/pmcs/${pmcId}/billing/checkout`,
      headers: auth(await issueAdminToken(other.email)),
    });
    expect(res.statusCode).toBe(403);
  });

  it('returns 400 without a PMC name', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/admin/signup',
      headers: auth(await issueAdminToken('someone-else@example.com')),
      payload: { pmcName: '   ' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json<{ error: string }>().error).toBe('invalid_body');
  });
});

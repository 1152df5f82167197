import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import Stripe from 'stripe';
import { buildApp } from '@/app';
import { issueConnectState } from '@/services/auth.service';
import { getConnectStatus } from '@/services/stripe-connect.service';
import { createPmc, useStubIntegrations } from '../../helpers/fixtures';

const SETTINGS = 'http://concierge.test/admin/settings/integrations';

describe('Stripe routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    useStubIntegrations();
    app = buildApp();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /stripe/webhook', () => {
    const payload = JSON.stringify({
      id: 'evt_route_1',
      object: 'event',
      type: 'customer.created',
      data: { object: { id: 'cus_test_1', object: 'customer' } },
    });

    it('returns 400 without a signature', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/stripe/webhook',
        headers: { 'content-type': 'application/json' },
        payload,
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'invalid_signature', message: 'Missing Stripe signature header' });
    });

    it('accepts a signed event once', async () => {
      const signature = Stripe.webhooks.generateTestHeaderString({ payload, secret: 'whsec_test-secret' });
      const deliver = () =>
        app.inject({
          method: 'POST',
          url: '/stripe/webhook',
          headers: { 'content-type': 'application/json', 'stripe-signature': signature },
          payload,
        });

      const first = await deliver();
      expect(first.statusCode).toBe(200);
      expect(first.json()).toEqual({ ok: true, duplicate: false });

      const second = await deliver();
      expect(second.json()).toEqual({ ok: true, duplicate: true });
    });
  });

  describe('GET /admin/integrations/stripe/oauth/callback', () => {
    it('connects the account and redirects to settings', async () => {
      const pmc = await createPmc();
      const state = await issueConnectState(pmc.id, 'owner@example.com');

      const res = await app.inject({
        method: 'GET',
        url: `/admin/integrations/stripe/oauth/callback?code=xyz&state=${encodeURIComponent(state)}`,
      });
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe(`${SETTINGS}?stripe=connected`);
      expect(await getConnectStatus(pmc.id)).toEqual({ connected: true, accountId: 'acct_stub_xyz' });
    });

    it('redirects with the reason when the owner declines', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/admin/integrations/stripe/oauth/callback?error=access_denied',
      });
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe(`${SETTINGS}?stripe=error&reason=access_denied`);
    });

    it('redirects with missing_code when the code is absent', async () => {
      const pmc = await createPmc();
      const state = await issueConnectState(pmc.id, 'owner@example.com');
      const res = await app.inject({
        method: 'GET',
        url: `/admin/integrations/stripe/oauth/callback?state=${encodeURIComponent(state)}`,
      });
      expect(res.headers.location).toBe(`${SETTINGS}?stripe=error&reason=missing_code`);
    });

    it('returns 400 for a forged state', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/admin/integrations/stripe/oauth/callback?code=xyz&state=forged',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'invalid_state', message: 'Invalid OAuth state' });
    });
  });
});

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '@/app';
import type { Pmc, Property } from '@/db/schema';
import { issueAdminToken } from '@/services/auth.service';
import { chatDal, createPmc, createProperty, useStubIntegrations } from '../../helpers/fixtures';

function auth(token: string) {
  return { authorization: `Bearer ${token}` };
}

describe('Admin API', () => {
  let app: FastifyInstance;
  let pmcA: Pmc;
  let pmcB: Pmc;
  let unpaid: Pmc;
  let propertyA: Property;
  let tokenA: string;
  let tokenUnpaid: string;
  let superToken: string;

  beforeAll(async () => {
    useStubIntegrations();
    pmcA = await createPmc({ name: 'Alpha Stays' });
    pmcB = await createPmc({ name: 'Bravo Rentals' });
    unpaid = await createPmc({ name: 'Unpaid Co', billingStatus: 'past_due' });
    propertyA = await createProperty(pmcA.id, { name: 'Alpha Villa', slug: 'alpha-villa' });
    await createProperty(pmcB.id, { name: 'Bravo Villa' });

    tokenA = await issueAdminToken(pmcA.email);
    tokenUnpaid = await issueAdminToken(unpaid.email);
    superToken = await issueAdminToken('root@example.com');

    app = buildApp();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('authentication', () => {
    it('returns 401 without a token', async () => {
      const res = await app.inject({ method: 'GET', url: `/admin/pmcs/${pmcA.id}/properties` });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'unauthenticated', message: 'Admin sign-in required.' });
    });

    it('returns 401 for an expired token', async () => {
      const expired = await issueAdminToken(pmcA.email, -60);
      const res = await app.inject({ method: 'GET', url: '/admin/me', headers: auth(expired) });
      expect(res.statusCode).toBe(401);
    });

    it('describes the signed-in admin', async () => {
      const res = await app.inject({ method: 'GET', url: '/admin/me', headers: auth(tokenA) });
      expect(res.json()).toEqual({
        email: pmcA.email,
        role: 'pmc',
        pmcId: pmcA.id,
        teamRole: null,
        billingStatus: 'active',
        needsPayment: false,
      });

      const root = await app.inject({ method: 'GET', url: '/admin/me', headers: auth(superToken) });
      expect(root.json()).toMatchObject({ role: 'super', pmcId: null, needsPayment: false });
    });
  });

  describe('tenant isolation', () => {
    it('returns 403 when a PMC admin addresses another PMC', async () => {
      const res = await app.inject({ method: 'GET', url: `/admin/pmcs/${pmcB.id}/properties`, headers: auth(tokenA) });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ error: 'forbidden' });
    });

    it('lets platform admins read any PMC', async () => {
      const res = await app.inject({ method: 'GET', url: `/admin/pmcs/${pmcB.id}/properties`, headers: auth(superToken) });
      expect(res.statusCode).toBe(200);
      expect(res.json<{ properties: { name: string }[] }>().properties.map((p) => p.name)).toEqual(['Bravo Villa']);
    });

    it('returns 404 for a property id of another PMC under the own PMC path', async () => {
      const res = await app.inject({
        method: 'GET',
        url: `/admin/pmcs/${pmcB.id}/properties/${propertyA.id}`,
        headers: auth(superToken),
      });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'property_not_found' });
    });

    it('hides chats of other PMCs', async () => {
      const session = await chatDal.createSession({ propertyId: propertyA.id });
      const res = await app.inject({
        method: 'GET',
        url: `/admin/pmcs/${pmcB.id}/chats/${session.id}`,
        headers: auth(superToken),
      });
      expect(res.statusCode).toBe(404);
    });
  });

  describe('properties', () => {
    it('creates a property', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/admin/pmcs/${pmcA.id}/properties`,
        headers: auth(tokenA),
        payload: { name: 'Cliff House' },
      });
      expect(res.statusCode).toBe(201);
      expect(res.json<{ property: { slug: string; pmcId: string } }>().property).toMatchObject({
        slug: 'cliff-house',
        pmcId: pmcA.id,
      });
    });

    it('returns 409 for a taken slug', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/admin/pmcs/${pmcA.id}/properties`,
        headers: auth(tokenA),
        payload: { name: 'Copy', slug: 'alpha-villa' },
      });
      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        error: 'slug_taken',
        message: 'Slug "alpha-villa" is already used by another property.',
      });
    });

    it('returns 400 for an invalid body', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/admin/pmcs/${pmcA.id}/properties`,
        headers: auth(tokenA),
        payload: { name: '' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json<{ error: string }>().error).toBe('invalid_body');
    });
  });

  describe('billing gate', () => {
    it('returns 402 on content writes while billing is inactive', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/admin/pmcs/${unpaid.id}/properties`,
        headers: auth(tokenUnpaid),
        payload: { name: 'Blocked House' },
      });
      expect(res.statusCode).toBe(402);
      expect(res.json()).toEqual({
        error: 'payment_required',
        message: 'Activate billing to change this content.',
      });
    });

    it('still allows reads', async () => {
      const res = await app.inject({
        method: 'GET',
        url: `/admin/pmcs/${unpaid.id}/properties`,
        headers: auth(tokenUnpaid),
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ properties: [] });
    });
  });

  describe('team', () => {
    it('invites a member and rejects a duplicate', async () => {
      const first = await app.inject({
        method: 'POST',
        url: `/admin/pmcs/${pmcA.id}/team`,
        headers: auth(tokenA),
        payload: { email: 'Helper@Example.com' },
      });
      expect(first.statusCode).toBe(201);
      expect(first.json<{ member: { email: string; role: string } }>().member).toMatchObject({
        email: 'helper@example.com',
        role: 'staff',
      });

      const again = await app.inject({
        method: 'POST',
        url: `/admin/pmcs/${pmcA.id}/team`,
        headers: auth(tokenA),
        payload: { email: 'helper@example.com' },
      });
      expect(again.statusCode).toBe(409);
    });
  });

  describe('integrations', () => {
    it('starts Stripe Connect and reports the status', async () => {
      const start = await app.inject({
        method: 'POST',
        url: `/admin/pmcs/${pmcA.id}/integrations/stripe/connect`,
        headers: auth(tokenA),
      });
      expect(start.statusCode).toBe(200);
      expect(start.json<{ url: string }>().url.startsWith('https://connect.stub.local/oauth/authorize?')).toBe(true);

      const status = await app.inject({
        method: 'GET',
        url: `/admin/pmcs/${pmcA.id}/integrations/stripe`,
        headers: auth(tokenA),
      });
      expect(status.json()).toEqual({ connected: false, accountId: null });
    });

    it('returns 409 when syncing without a PMS connection', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/admin/pmcs/${pmcA.id}/sync`,
        headers: auth(tokenA),
      });
      expect(res.statusCode).toBe(409);
      expect(res.json<{ error: string }>().error).toBe('pms_not_connected');
    });
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { issueConnectState, verifyConnectState } from '@/services/auth.service';
import {
  completeConnect,
  connectRedirectUri,
  disconnect,
  getConnectStatus,
  startConnect,
} from '@/services/stripe-connect.service';
import { connectStripe, createPmc, useStubIntegrations, type TestIntegrations } from '../../helpers/fixtures';

describe('stripe-connect.service', () => {
  let stubs: TestIntegrations;

  beforeEach(() => {
    stubs = useStubIntegrations();
  });

  it('builds the callback URL from the app base URL', () => {
    expect(connectRedirectUri()).toBe('http://concierge.test/admin/integrations/stripe/oauth/callback');
  });

  it('starts OAuth with a signed state naming the PMC', async () => {
    const pmc = await createPmc();
    const { url } = await startConnect(pmc.id, 'owner@example.com');

    const parsed = new URL(url);
    expect(parsed.origin + parsed.pathname).toBe('https://connect.stub.local/oauth/authorize');
    expect(parsed.searchParams.get('redirect_uri')).toBe(connectRedirectUri());
    expect(await verifyConnectState(parsed.searchParams.get('state') ?? '')).toEqual({
      pmcId: pmc.id,
      email: 'owner@example.com',
    });
  });

  it('stores the connected account on callback', async () => {
    const pmc = await createPmc();
    const state = await issueConnectState(pmc.id, 'owner@example.com');

    expect(await completeConnect('abc', state)).toEqual({ success: true, pmcId: pmc.id, accountId: 'acct_stub_abc' });
    expect(await getConnectStatus(pmc.id)).toEqual({ connected: true, accountId: 'acct_stub_abc' });
  });

  it('rejects a missing or forged state before looking at the code', async () => {
    const invalid = { success: false, error: 'invalid_state', message: 'Invalid OAuth state' };
    expect(await completeConnect('abc', undefined)).toEqual(invalid);
    expect(await completeConnect('abc', 'not-a-token')).toEqual(invalid);
  });

  it('requires a code', async () => {
    const pmc = await createPmc();
    const state = await issueConnectState(pmc.id, 'owner@example.com');
    expect(await completeConnect(undefined, state)).toEqual({
      success: false,
      error: 'missing_code',
      message: 'Missing code',
    });
  });

  it('reports a failed code exchange and stays disconnected', async () => {
    const pmc = await createPmc();
    const state = await issueConnectState(pmc.id, 'owner@example.com');
    stubs.payments.failure = new Error('stripe down');

    expect(await completeConnect('abc', state)).toEqual({
      success: false,
      error: 'payments_unavailable',
      message: 'Could not connect the payout account.',
    });
    expect(await getConnectStatus(pmc.id)).toEqual({ connected: false, accountId: null });
  });

  it('disconnects and revokes the account', async () => {
    const pmc = await createPmc();
    await connectStripe(pmc.id, 'acct_test_9');

    await disconnect(pmc.id);

    expect(stubs.payments.deauthorized).toEqual(['acct_test_9']);
    expect(await getConnectStatus(pmc.id)).toEqual({ connected: false, accountId: null });
  });

  it('does nothing when no account is connected', async () => {
    const pmc = await createPmc();
    await disconnect(pmc.id);
    expect(stubs.payments.deauthorized).toEqual([]);
  });
});

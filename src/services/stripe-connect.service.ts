import { env } from '../config/env';
import { logger } from '../config/logger';
import { IntegrationDal } from '../dal/integration.dal';
import { db } from '../db/client';
import { getIntegrations } from '../integrations/registry';
import { fail, type ServiceResult } from '../types/common';
import { issueConnectState, verifyConnectState } from './auth.service';
import { logEvent } from './telemetry.service';

const integrationDal = new IntegrationDal(db);

const PROVIDER = 'stripe_connect';

export function connectRedirectUri(): string {
  return `${env.APP_BASE_URL.replace(/\/+$/, '')}/admin/integrations/stripe/oauth/callback`;
}

export interface ConnectStatus {
  connected: boolean;
  accountId: string | null;
}

export async function getConnectStatus(pmcId: string): Promise<ConnectStatus> {
  const integration = await integrationDal.findByProvider(pmcId, PROVIDER);
  if (!integration?.isConnected || !integration.accountId) {
    return { connected: false, accountId: null };
  }
  return { connected: true, accountId: integration.accountId };
}

/** OAuth URL for connecting the PMC's payout account; `state` is a short-lived signed token. */
export async function startConnect(pmcId: string, adminEmail: string): Promise<{ url: string }> {
  const state = await issueConnectState(pmcId, adminEmail);
  return { url: getIntegrations().payments.buildConnectAuthorizeUrl(state, connectRedirectUri()) };
}

export type ConnectCallbackResult = ServiceResult<
  { pmcId: string; accountId: string },
  'invalid_state' | 'missing_code' | 'payments_unavailable'
>;

export async function completeConnect(
  code: string | undefined,
  state: string | undefined,
): Promise<ConnectCallbackResult> {
  const claims = state ? await verifyConnectState(state) : null;
  if (!claims) return fail('invalid_state', 'Invalid OAuth state');
  if (!code) return fail('missing_code', 'Missing code');

  let accountId: string;
  try {
    ({ accountId } = await getIntegrations().payments.exchangeConnectCode(code));
  } catch (err) {
    logger.error({ err, pmcId: claims.pmcId }, 'Stripe Connect code exchange failed');
    return fail('payments_unavailable', 'Could not connect the payout account.');
  }

  await integrationDal.upsert(claims.pmcId, PROVIDER, {
    accountId,
    isConnected: true,
    lastError: null,
  });
  await logEvent({
    pmcId: claims.pmcId,
    type: 'payments.connected',
    payload: { accountId, by: claims.email },
  });
  return { success: true, pmcId: claims.pmcId, accountId };
}

/** Disconnects locally even when revoking on Stripe's side fails. */
export async function disconnect(pmcId: string): Promise<void> {
  const integration = await integrationDal.findByProvider(pmcId, PROVIDER);
  if (!integration?.accountId) return;

  try {
    await getIntegrations().payments.deauthorizeConnectAccount(integration.accountId);
  } catch (err) {
    logger.warn({ err, pmcId }, 'Stripe Connect deauthorize failed; disconnecting locally');
  }

  await integrationDal.update(integration.id, {
    accountId: null,
    accessToken: null,
    isConnected: false,
  });
  await logEvent({ pmcId, type: 'payments.disconnected' });
}

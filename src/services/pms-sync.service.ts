import { logger } from '../config/logger';
import { IntegrationDal } from '../dal/integration.dal';
import { PmcDal } from '../dal/pmc.dal';
import { PropertyDal } from '../dal/property.dal';
import { ReservationDal } from '../dal/reservation.dal';
import { db } from '../db/client';
import type { PmcIntegration, Property } from '../db/schema';
import type { IPmsAdapter, PmsListing } from '../integrations/interfaces';
import { getIntegrations } from '../integrations/registry';
import { startTimer } from '../telemetry/timing';
import { addDays, fail, slugify, toIsoDate, type ServiceResult } from '../types/common';
import { logEvent, logSpan } from './telemetry.service';

const pmcDal = new PmcDal(db);
const integrationDal = new IntegrationDal(db);
const propertyDal = new PropertyDal(db);
const reservationDal = new ReservationDal(db);

const PROVIDER = 'hostaway';
const WINDOW_DAYS_BACK = 7;
const WINDOW_DAYS_AHEAD = 90;
const TOKEN_REFRESH_MARGIN_MS = 60 * 1000;

export type SyncError =
  | 'pmc_not_found'
  | 'sync_disabled'
  | 'pms_not_connected'
  | 'sync_in_progress'
  | 'pms_unavailable';

export interface SyncCounts {
  propertiesCreated: number;
  propertiesUpdated: number;
  reservations: number;
  syncedAt: Date;
}

export type SyncResult = ServiceResult<SyncCounts, SyncError>;

const inFlight = new Set<string>();

/** First free slug for a property name under the PMC: "beach-house", "beach-house-2", ... */
export async function uniquePropertySlug(
  pmcId: string,
  name: string,
  excludePropertyId?: string,
): Promise<string> {
  const base = slugify(name) || 'property';
  let candidate = base;
  let n = 2;
  while (await propertyDal.slugTaken(pmcId, candidate, excludePropertyId)) {
    candidate = `${base}-${n++}`;
  }
  return candidate;
}

async function accessTokenFor(
  pms: IPmsAdapter,
  integration: PmcIntegration,
  accountId: string,
  apiSecret: string,
): Promise<string> {
  if (
    integration.accessToken &&
    integration.tokenExpiresAt &&
    integration.tokenExpiresAt.getTime() - TOKEN_REFRESH_MARGIN_MS > Date.now()
  ) {
    return integration.accessToken;
  }
  const token = await pms.authenticate({ accountId, apiSecret });
  await integrationDal.update(integration.id, {
    accessToken: token.token,
    tokenExpiresAt: token.expiresAt,
  });
  return token.token;
}

/** PMS-owned fields; chatEnabled, slug, hero image and emergency phone belong to the admin. */
function listingFields(listing: PmsListing) {
  return {
    name: listing.name,
    address: listing.address,
    description: listing.description,
    houseRules: listing.houseRules,
    wifiName: listing.wifiName,
    wifiPassword: listing.wifiPassword,
    checkInTime: listing.checkInTime,
    checkOutTime: listing.checkOutTime,
  };
}

async function upsertProperty(
  pmcId: string,
  integrationId: string,
  listing: PmsListing,
  syncedAt: Date,
): Promise<{ property: Property; created: boolean }> {
  const existing = await propertyDal.findByExternalId(pmcId, PROVIDER, listing.externalId);

  if (!existing) {
    const property = await propertyDal.create({
      pmcId,
      integrationId,
      provider: PROVIDER,
      externalPropertyId: listing.externalId,
      slug: await uniquePropertySlug(pmcId, listing.name),
      ...listingFields(listing),
      lastSyncedAt: syncedAt,
    });
    return { property, created: true };
  }

  // A revived row keeps its slug unless another live property took it meanwhile.
  const slug =
    existing.deletedAt && (await propertyDal.slugTaken(pmcId, existing.slug, existing.id))
      ? await uniquePropertySlug(pmcId, existing.slug, existing.id)
      : existing.slug;

  const property = await propertyDal.update(pmcId, existing.id, {
    integrationId,
    slug,
    ...listingFields(listing),
    deletedAt: null,
    lastSyncedAt: syncedAt,
  });
  return { property: property ?? existing, created: false };
}

/**
 * Pulls listings and reservations for one PMC from Hostaway and upserts
 * them. Reservations are fetched for arrivals from 7 days ago to 90 days
 * ahead.
 */
export async function syncPmc(
  pmcId: string,
  opts: { now?: Date; requestId?: string } = {},
): Promise<SyncResult> {
  const pmc = await pmcDal.findById(pmcId);
  if (!pmc) return fail('pmc_not_found');
  if (!pmc.syncEnabled) return fail('sync_disabled', 'Sync is turned off for this account.');

  const integration = await integrationDal.findByProvider(pmcId, PROVIDER);
  if (!integration?.isConnected || !integration.accountId || !integration.apiSecret) {
    return fail('pms_not_connected', 'Connect Hostaway before syncing.');
  }
  if (inFlight.has(pmcId)) return fail('sync_in_progress', 'A sync is already running.');

  inFlight.add(pmcId);
  const timer = startTimer('syncPmc');
  const now = opts.now ?? new Date();
  const today = toIsoDate(now);
  const from = addDays(today, -WINDOW_DAYS_BACK);
  const to = addDays(today, WINDOW_DAYS_AHEAD);

  try {
    const pms = getIntegrations().pms;
    const token = await accessTokenFor(pms, integration, integration.accountId, integration.apiSecret);
    const listings = await pms.fetchListings(token);

    let propertiesCreated = 0;
    let propertiesUpdated = 0;
    let reservationCount = 0;

    for (const listing of listings) {
      const { property, created } = await upsertProperty(pmcId, integration.id, listing, now);
      if (created) propertiesCreated++;
      else propertiesUpdated++;

      const reservations = await pms.fetchReservations(token, listing.externalId, from, to);
      for (const reservation of reservations) {
        await reservationDal.upsert({
          propertyId: property.id,
          externalReservationId: reservation.externalId,
          guestName: reservation.guestName,
          phoneLast4: reservation.phoneLast4,
          arrivalDate: reservation.arrivalDate,
          departureDate: reservation.departureDate,
          checkInTime: reservation.checkInTime,
          checkOutTime: reservation.checkOutTime,
          status: reservation.status,
          guestCount: reservation.guestCount,
        });
        reservationCount++;
      }
    }

    await pmcDal.update(pmcId, { lastSyncedAt: now });
    await integrationDal.update(integration.id, { lastSyncedAt: now, lastError: null });

    const counts = {
      propertiesCreated,
      propertiesUpdated,
      reservations: reservationCount,
      syncedAt: now,
    };
    logger.info({ pmcId, ...counts }, 'PMS sync completed');
    await logEvent({
      pmcId,
      type: 'pms.sync.completed',
      requestId: opts.requestId,
      payload: { propertiesCreated, propertiesUpdated, reservations: reservationCount },
    });
    return { success: true, ...counts };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ err, pmcId }, 'PMS sync failed');
    await integrationDal.update(integration.id, { lastError: message.slice(0, 500) });
    await logEvent({
      pmcId,
      type: 'pms.sync.failed',
      requestId: opts.requestId,
      payload: { message },
    });
    return fail('pms_unavailable', 'Could not reach the property management system.');
  } finally {
    inFlight.delete(pmcId);
    await logSpan(timer.span, timer.stop(), { pmcId, requestId: opts.requestId });
  }
}

export interface PmcSyncOutcome {
  pmcId: string;
  result: SyncResult;
}

/** Syncs every active, sync-enabled PMC in turn. One failure never stops the rest. */
export async function syncAllPmcs(opts: { now?: Date } = {}): Promise<PmcSyncOutcome[]> {
  const outcomes: PmcSyncOutcome[] = [];
  for (const pmc of await pmcDal.listSyncable()) {
    let result: SyncResult;
    try {
      result = await syncPmc(pmc.id, opts);
    } catch (err) {
      logger.error({ err, pmcId: pmc.id }, 'PMS sync crashed');
      result = fail('pms_unavailable');
    }
    outcomes.push({ pmcId: pmc.id, result });
  }
  return outcomes;
}

export type SaveCredentialsResult = ServiceResult<
  { integration: Pick<PmcIntegration, 'id' | 'accountId' | 'isConnected' | 'lastSyncedAt'> },
  'pmc_not_found' | 'pms_unavailable'
>;

/** Stores Hostaway credentials after checking them against the API. */
export async function saveHostawayCredentials(
  pmcId: string,
  accountId: string,
  apiSecret: string,
): Promise<SaveCredentialsResult> {
  const pmc = await pmcDal.findById(pmcId);
  if (!pmc) return fail('pmc_not_found');

  try {
    const token = await getIntegrations().pms.authenticate({ accountId, apiSecret });
    const integration = await integrationDal.upsert(pmcId, PROVIDER, {
      accountId,
      apiSecret,
      accessToken: token.token,
      tokenExpiresAt: token.expiresAt,
      isConnected: true,
      lastError: null,
    });
    await logEvent({ pmcId, type: 'pms.connected', payload: { provider: PROVIDER } });
    return {
      success: true,
      integration: {
        id: integration.id,
        accountId: integration.accountId,
        isConnected: integration.isConnected,
        lastSyncedAt: integration.lastSyncedAt,
      },
    };
  } catch (err) {
    logger.warn({ err, pmcId }, 'Hostaway credentials rejected');
    await integrationDal.upsert(pmcId, PROVIDER, {
      accountId,
      apiSecret,
      accessToken: null,
      tokenExpiresAt: null,
      isConnected: false,
      lastError: err instanceof Error ? err.message.slice(0, 500) : 'authentication failed',
    });
    return fail('pms_unavailable', 'Hostaway rejected these credentials.');
  }
}

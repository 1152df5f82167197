import axios, { type AxiosInstance } from 'axios';
import { logger } from '../../config/logger';
import {
  hostawayListingSchema,
  hostawayListResponseSchema,
  hostawayReservationSchema,
  hostawayTokenResponseSchema,
  pmsListingSchema,
  pmsReservationSchema,
  type HostawayListing,
  type HostawayReservation,
} from '../validation';
import type {
  IPmsAdapter,
  PmsAccessToken,
  PmsCredentials,
  PmsListing,
  PmsReservation,
} from '../interfaces/pms';

const PAGE_SIZE = 100;
const MAX_PAGES = 20;
// Hostaway tokens are long-lived; refresh a day early.
const DEFAULT_TOKEN_TTL_SECONDS = 60 * 60 * 24 * 30;

const hostawayRecordSchema = hostawayListingSchema.pick({ id: true }).passthrough();

/** Last four digits of a phone number, ignoring formatting. */
export function toPhoneLast4(phone: string | null | undefined): string | null {
  const digits = (phone ?? '').replace(/\D/g, '');
  return digits.length >= 4 ? digits.slice(-4) : null;
}

function hourToTime(hour: number | null | undefined): string | null {
  if (hour === null || hour === undefined) return null;
  return `${String(hour).padStart(2, '0')}:00`;
}

export function normalizeListing(raw: HostawayListing): PmsListing {
  return pmsListingSchema.parse({
    externalId: raw.id,
    name: raw.internalListingName ?? raw.name ?? `Listing ${raw.id}`,
    address: raw.address,
    description: raw.description,
    houseRules: raw.houseRules,
    wifiName: raw.wifiUsername,
    wifiPassword: raw.wifiPassword,
    checkInTime: hourToTime(raw.checkInTimeStart),
    checkOutTime: hourToTime(raw.checkOutTime),
  });
}

export function normalizeReservation(raw: HostawayReservation): PmsReservation {
  return pmsReservationSchema.parse({
    externalId: raw.id,
    listingExternalId: raw.listingMapId,
    guestName: raw.guestName,
    phoneLast4: toPhoneLast4(raw.phone),
    arrivalDate: raw.arrivalDate,
    departureDate: raw.departureDate,
    checkInTime: hourToTime(raw.checkInTime),
    checkOutTime: hourToTime(raw.checkOutTime),
    status: raw.status.toLowerCase(),
    guestCount: raw.numberOfGuests ?? null,
  });
}

/**
 * Hostaway PMS adapter (REST API v1, client-credentials auth).
 */
export class HostawayAdapter implements IPmsAdapter {
  readonly pmsName = 'Hostaway';
  private readonly api: AxiosInstance;

  constructor(baseURL: string, api?: AxiosInstance) {
    this.api = api ?? axios.create({ baseURL, timeout: 30_000 });
  }

  async authenticate(credentials: PmsCredentials): Promise<PmsAccessToken> {
    const params = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: credentials.accountId,
      client_secret: credentials.apiSecret,
      scope: 'general',
    });

    const { data } = await this.api.post<unknown>('/v1/accessTokens', params.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
    const parsed = hostawayTokenResponseSchema.parse(data);
    const ttlSeconds = (parsed.expires_in ?? DEFAULT_TOKEN_TTL_SECONDS) - 60 * 60 * 24;

    return {
      token: parsed.access_token,
      expiresAt: new Date(Date.now() + Math.max(ttlSeconds, 60) * 1000),
    };
  }

  async fetchListings(token: string): Promise<PmsListing[]> {
    const rows = await this.fetchPaged('/v1/listings', token, {}, hostawayListingSchema);
    return rows.map(normalizeListing);
  }

  async fetchReservations(
    token: string,
    listingExternalId: string,
    fromDate: string,
    toDate: string,
  ): Promise<PmsReservation[]> {
    const rows = await this.fetchPaged(
      '/v1/reservations',
      token,
      { listingId: listingExternalId, arrivalStartDate: fromDate, arrivalEndDate: toDate },
      hostawayReservationSchema,
    );
    return rows.map(normalizeReservation);
  }

  private async fetchPaged<T>(
    url: string,
    token: string,
    params: Record<string, string>,
    item: { parse: (value: unknown) => T },
  ): Promise<T[]> {
    const results: T[] = [];
    const pageSchema = hostawayListResponseSchema(hostawayRecordSchema);

    for (let page = 0; page < MAX_PAGES; page++) {
      const { data } = await this.api.get<unknown>(url, {
        headers: { Authorization: `Bearer ${token}` },
        params: { ...params, limit: PAGE_SIZE, offset: page * PAGE_SIZE },
      });
      const pageData = pageSchema.parse(data);

      for (const record of pageData.result) {
        try {
          results.push(item.parse(record));
        } catch (err) {
          logger.warn({ err, url, recordId: record.id }, 'Skipping malformed Hostaway record');
        }
      }

      if (pageData.result.length < PAGE_SIZE) break;
    }

    return results;
  }
}

import { v4 as uuid } from 'uuid';
import { ChatDal } from '@/dal/chat.dal';
import { IntegrationDal } from '@/dal/integration.dal';
import { PmcDal } from '@/dal/pmc.dal';
import { PmcMessageDal } from '@/dal/pmc-message.dal';
import { PropertyDal } from '@/dal/property.dal';
import { PurchaseDal } from '@/dal/purchase.dal';
import { ReservationDal } from '@/dal/reservation.dal';
import { UpgradeDal } from '@/dal/upgrade.dal';
import { db } from '@/db/client';
import type { ChatSession, Pmc, Property, Reservation, Upgrade } from '@/db/schema';
import { StubLlmAdapter } from '@/integrations/adapters/stub-llm';
import { StubPaymentsAdapter } from '@/integrations/adapters/stub-payments';
import { StubPmsAdapter } from '@/integrations/adapters/stub-pms';
import { setIntegrations } from '@/integrations/registry';

export const pmcDal = new PmcDal(db);
export const propertyDal = new PropertyDal(db);
export const reservationDal = new ReservationDal(db);
export const upgradeDal = new UpgradeDal(db);
export const chatDal = new ChatDal(db);
export const integrationDal = new IntegrationDal(db);
export const purchaseDal = new PurchaseDal(db);
export const pmcMessageDal = new PmcMessageDal(db);

export interface TestIntegrations {
  pms: StubPmsAdapter;
  payments: StubPaymentsAdapter;
  llm: StubLlmAdapter;
}

/** Fresh stub adapters wired into the registry. */
export function useStubIntegrations(): TestIntegrations {
  const stubs = {
    pms: new StubPmsAdapter(),
    payments: new StubPaymentsAdapter(),
    llm: new StubLlmAdapter(),
  };
  setIntegrations(stubs);
  return stubs;
}

export async function createPmc(overrides: Partial<Parameters<PmcDal['create']>[0]> = {}): Promise<Pmc> {
  return pmcDal.create({
    name: 'Test Stays',
    email: `owner-${uuid()}@example.com`,
    active: true,
    billingStatus: 'active',
    ...overrides,
  });
}

export async function createProperty(
  pmcId: string,
  overrides: Partial<Parameters<PropertyDal['create']>[0]> = {},
): Promise<Property> {
  const slug = `prop-${uuid().slice(0, 8)}`;
  return propertyDal.create({
    pmcId,
    slug,
    name: 'Seaside House',
    provider: 'manual',
    checkInTime: '16:00',
    checkOutTime: '10:00',
    ...overrides,
  });
}

export async function createReservation(
  propertyId: string,
  overrides: Partial<Parameters<ReservationDal['upsert']>[0]> & {
    arrivalDate: string;
    departureDate: string;
  },
): Promise<Reservation> {
  return reservationDal.upsert({
    propertyId,
    externalReservationId: `res-${uuid().slice(0, 8)}`,
    guestName: 'Jamie Guest',
    phoneLast4: '4321',
    status: 'confirmed',
    ...overrides,
  });
}

export async function createUpgrade(
  propertyId: string,
  overrides: Partial<Parameters<UpgradeDal['create']>[0]> = {},
): Promise<Upgrade> {
  return upgradeDal.create({
    propertyId,
    slug: 'early-check-in',
    title: 'Early check-in',
    priceCents: 5000,
    currency: 'usd',
    ...overrides,
  });
}

/** A verified session for a stay, as the unlock flow would create it. */
export async function createVerifiedSession(
  property: Property,
  stay: { arrivalDate: string; departureDate: string; reservationId?: string },
): Promise<ChatSession> {
  return chatDal.createSession({
    propertyId: property.id,
    reservationId: stay.reservationId ?? null,
    isVerified: true,
    reservationStatus: 'upcoming',
    guestName: 'Jamie Guest',
    arrivalDate: stay.arrivalDate,
    departureDate: stay.departureDate,
    lastActivityAt: new Date(),
  });
}

export async function connectStripe(pmcId: string, accountId = 'acct_test_1'): Promise<void> {
  await integrationDal.upsert(pmcId, 'stripe_connect', { accountId, isConnected: true });
}

export async function connectHostaway(pmcId: string): Promise<void> {
  await integrationDal.upsert(pmcId, 'hostaway', {
    accountId: '12345',
    apiSecret: 'test-secret',
    isConnected: true,
  });
}

import { describe, it, expect } from 'vitest';
import {
  createCheckoutSessionSchema,
  hostawayListingSchema,
  hostawayReservationSchema,
  pmsReservationSchema,
} from '@/integrations/validation';

describe('Hostaway wire schemas', () => {
  it('turns numeric ids into strings and blank text into null', () => {
    const listing = hostawayListingSchema.parse({
      id: 4021,
      name: '  Beach House ',
      internalListingName: '   ',
      wifiPassword: null,
      checkInTimeStart: 16,
    });

    expect(listing).toMatchObject({
      id: '4021',
      name: 'Beach House',
      internalListingName: null,
      wifiPassword: null,
      checkInTimeStart: 16,
    });
  });

  it('rejects an hour of day outside 0-23', () => {
    expect(hostawayListingSchema.safeParse({ id: 1, checkInTimeStart: 24 }).success).toBe(false);
  });

  it('defaults the reservation status and requires ISO dates', () => {
    const reservation = hostawayReservationSchema.parse({
      id: 'r-9',
      listingMapId: 4021,
      arrivalDate: '2026-07-10',
      departureDate: '2026-07-14',
    });
    expect(reservation.status).toBe('new');
    expect(reservation.listingMapId).toBe('4021');

    expect(
      hostawayReservationSchema.safeParse({
        id: 'r-9',
        listingMapId: 1,
        arrivalDate: '07/10/2026',
        departureDate: '2026-07-14',
      }).success,
    ).toBe(false);
  });
});

describe('normalized PMS reservations', () => {
  const base = {
    externalId: 'r1',
    listingExternalId: 'l1',
    guestName: null,
    phoneLast4: '1234',
    arrivalDate: '2026-07-10',
    departureDate: '2026-07-14',
    checkInTime: '16:00',
    checkOutTime: null,
    status: 'new',
    guestCount: 2,
  };

  it('accepts a complete record', () => {
    expect(pmsReservationSchema.safeParse(base).success).toBe(true);
  });

  it('requires exactly four phone digits', () => {
    expect(pmsReservationSchema.safeParse({ ...base, phoneLast4: '123' }).success).toBe(false);
  });

  it('requires HH:mm times', () => {
    expect(pmsReservationSchema.safeParse({ ...base, checkInTime: '4pm' }).success).toBe(false);
  });
});

describe('createCheckoutSessionSchema', () => {
  const input = {
    lineItem: { priceId: null, name: 'Late checkout', description: null, amountCents: 3000, currency: 'usd' },
    metadata: { purchase_id: 'p1' },
    applicationFeeCents: 90,
    destinationAccountId: 'acct_test_1',
    successUrl: 'http://concierge.test/success',
    cancelUrl: 'http://concierge.test/cancel',
    idempotencyKey: 'upgrade-checkout-p1-1',
  };

  it('accepts a valid checkout request', () => {
    expect(createCheckoutSessionSchema.safeParse(input).success).toBe(true);
  });

  it('rejects a non-positive amount', () => {
    expect(
      createCheckoutSessionSchema.safeParse({ ...input, lineItem: { ...input.lineItem, amountCents: 0 } }).success,
    ).toBe(false);
  });

  it('rejects a currency that is not a 3-letter code', () => {
    expect(
      createCheckoutSessionSchema.safeParse({ ...input, lineItem: { ...input.lineItem, currency: 'dollars' } }).success,
    ).toBe(false);
  });

  it('rejects a missing destination account', () => {
    expect(createCheckoutSessionSchema.safeParse({ ...input, destinationAccountId: '' }).success).toBe(false);
  });
});

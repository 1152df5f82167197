import { describe, it, expect, beforeAll } from 'vitest';
import type { Property } from '@/db/schema';
import { createPmc, createProperty, createReservation, reservationDal } from '../../helpers/fixtures';

describe('ReservationDal', () => {
  let property: Property;

  beforeAll(async () => {
    const pmc = await createPmc();
    property = await createProperty(pmc.id);
  });

  it('upserts on the external reservation id', async () => {
    const first = await createReservation(property.id, {
      externalReservationId: 'ext-1',
      arrivalDate: '2026-08-01',
      departureDate: '2026-08-03',
    });
    const second = await createReservation(property.id, {
      externalReservationId: 'ext-1',
      arrivalDate: '2026-08-02',
      departureDate: '2026-08-04',
      status: 'modified',
    });

    expect(second).toMatchObject({ id: first.id, arrivalDate: '2026-08-02', status: 'modified' });
  });

  it('matches phone digits on live reservations only, by arrival', async () => {
    await createReservation(property.id, { phoneLast4: '2468', arrivalDate: '2026-09-10', departureDate: '2026-09-12' });
    await createReservation(property.id, { phoneLast4: '2468', arrivalDate: '2026-09-01', departureDate: '2026-09-03' });
    await createReservation(property.id, {
      phoneLast4: '2468',
      arrivalDate: '2026-08-20',
      departureDate: '2026-08-22',
      status: 'cancelled',
    });

    const matches = await reservationDal.findByPhoneLast4(property.id, '2468');
    expect(matches.map((r) => r.arrivalDate)).toEqual(['2026-09-01', '2026-09-10']);
  });

  it('detects same-day turnovers, ignoring the stay itself', async () => {
    const stay = await createReservation(property.id, { arrivalDate: '2026-10-05', departureDate: '2026-10-08' });

    expect(await reservationDal.hasArrivalOn(property.id, '2026-10-05')).toBe(true);
    expect(await reservationDal.hasArrivalOn(property.id, '2026-10-05', stay.id)).toBe(false);

    await createReservation(property.id, { arrivalDate: '2026-10-01', departureDate: '2026-10-05' });
    expect(await reservationDal.hasDepartureOn(property.id, '2026-10-05', stay.id)).toBe(true);
  });
});

import { GuideDal } from '../dal/guide.dal';
import { PmcUserDal } from '../dal/pmc-user.dal';
import { PmcDal } from '../dal/pmc.dal';
import { PropertyDal } from '../dal/property.dal';
import { ReservationDal } from '../dal/reservation.dal';
import { UpgradeDal } from '../dal/upgrade.dal';
import { db } from './client';
import { logger } from '../config/logger';
import { addDays, toIsoDate } from '../types/common';

const pmcDal = new PmcDal(db);
const pmcUserDal = new PmcUserDal(db);
const propertyDal = new PropertyDal(db);
const reservationDal = new ReservationDal(db);
const guideDal = new GuideDal(db);
const upgradeDal = new UpgradeDal(db);

export const OWNER_EMAIL = 'owner@example.com';

interface PropertyDef {
  name: string;
  slug: string;
  address: string;
  wifiName: string;
  wifiPassword: string;
}

const PROPERTIES: PropertyDef[] = [
  {
    name: 'Harbor View Cottage',
    slug: 'harbor-view-cottage',
    address: '12 Wharf Lane, Portland, ME',
    wifiName: 'HarborView',
    wifiPassword: 'demo-wifi-password',
  },
  {
    name: 'Pine Ridge Cabin',
    slug: 'pine-ridge-cabin',
    address: '4 Summit Road, Bethel, ME',
    wifiName: 'PineRidge',
    wifiPassword: 'demo-wifi-password',
  },
];

/**
 * Demo data: one PMC with an owner, two properties, guides, upgrades and
 * reservations around today. Does nothing when the demo owner exists.
 */
export async function seedDemo(now: Date = new Date()): Promise<{ pmcId: string; created: boolean }> {
  const existing = await pmcDal.findByEmail(OWNER_EMAIL);
  if (existing) {
    logger.info({ pmcId: existing.id }, 'Demo PMC already seeded');
    return { pmcId: existing.id, created: false };
  }

  const today = toIsoDate(now);

  const pmc = await pmcDal.create({
    name: 'Coastline Stays',
    email: OWNER_EMAIL,
    active: true,
    billingStatus: 'active',
    signupPaidAt: now,
  });
  await pmcUserDal.create({ pmcId: pmc.id, email: OWNER_EMAIL, fullName: 'Demo Owner', role: 'owner' });

  for (const [i, def] of PROPERTIES.entries()) {
    const property = await propertyDal.create({
      pmcId: pmc.id,
      provider: 'manual',
      ...def,
      checkInTime: '16:00',
      checkOutTime: '10:00',
      houseRules: 'No smoking. Quiet hours 10pm to 7am.',
      emergencyPhone: '+1 555 0100',
    });

    await guideDal.create({
      propertyId: property.id,
      title: 'Getting in',
      category: 'arrival',
      shortDescription: 'The keypad code is sent on the morning of arrival.',
      sortOrder: 0,
    });
    await guideDal.create({
      propertyId: property.id,
      title: 'Trash and recycling',
      category: 'house',
      shortDescription: 'Bins are by the side door; pickup is Tuesday morning.',
      sortOrder: 1,
    });

    await upgradeDal.create({
      propertyId: property.id,
      slug: 'early-check-in',
      title: 'Early check-in',
      shortDescription: 'Arrive from 12:00 instead of 16:00.',
      priceCents: 4000,
      currency: 'usd',
      sortOrder: 0,
    });
    await upgradeDal.create({
      propertyId: property.id,
      slug: 'late-checkout',
      title: 'Late checkout',
      shortDescription: 'Leave at 13:00 instead of 10:00.',
      priceCents: 3500,
      currency: 'usd',
      sortOrder: 1,
    });

    await reservationDal.upsert({
      propertyId: property.id,
      externalReservationId: `demo-${i + 1}-current`,
      guestName: 'Alex Guest',
      phoneLast4: `100${i + 1}`,
      arrivalDate: addDays(today, -1),
      departureDate: addDays(today, 2),
      status: 'confirmed',
      guestCount: 2,
    });
    await reservationDal.upsert({
      propertyId: property.id,
      externalReservationId: `demo-${i + 1}-upcoming`,
      guestName: 'Sam Visitor',
      phoneLast4: `200${i + 1}`,
      arrivalDate: addDays(today, 5),
      departureDate: addDays(today, 9),
      status: 'confirmed',
      guestCount: 4,
    });
  }

  logger.info({ pmcId: pmc.id, ownerEmail: OWNER_EMAIL }, 'Seeded demo PMC');
  return { pmcId: pmc.id, created: true };
}


import { describe, it, expect, beforeAll } from 'vitest';
import type { ChatSession, Pmc, Property } from '@/db/schema';
import {
  buildStayContext,
  listGuestUpgrades,
  loadVerifiedStay,
  recommendationFor,
  type GuestStay,
} from '@/services/guest-upgrades.service';
import {
  chatDal,
  createPmc,
  createProperty,
  createReservation,
  createUpgrade,
  createVerifiedSession,
  purchaseDal,
} from '../../helpers/fixtures';

const NOW = new Date('2026-07-09T12:00:00Z');

describe('guest-upgrades.service', () => {
  let pmc: Pmc;
  let property: Property;
  let session: ChatSession;
  let stay: GuestStay;

  beforeAll(async () => {
    pmc = await createPmc();
    property = await createProperty(pmc.id, { name: 'Harbor Loft' });
    session = await createVerifiedSession(property, { arrivalDate: '2026-07-10', departureDate: '2026-07-14' });
    stay = { property, session };
  });

  describe('loadVerifiedStay', () => {
    it('returns the stay for a matching verified session', async () => {
      const result = await loadVerifiedStay({ sessionId: session.id, propertyId: property.id }, property.id);
      if (!result.success) throw new Error('expected stay');
      expect(result.session.id).toBe(session.id);
    });

    it('rejects a token for another property', async () => {
      expect(await loadVerifiedStay({ sessionId: session.id, propertyId: 'elsewhere' }, property.id)).toEqual({
        success: false,
        error: 'session_mismatch',
      });
    });

    it('rejects an unverified session', async () => {
      const anonymous = await chatDal.createSession({ propertyId: property.id });
      expect(await loadVerifiedStay({ sessionId: anonymous.id, propertyId: property.id }, property.id)).toEqual({
        success: false,
        error: 'not_verified',
        message: 'Please unlock your stay first.',
      });
    });

    it('rejects an unknown session', async () => {
      expect(await loadVerifiedStay({ sessionId: 'missing', propertyId: property.id }, property.id)).toEqual({
        success: false,
        error: 'session_not_found',
      });
    });
  });

  describe('listGuestUpgrades', () => {
    it('evaluates each active upgrade and marks purchases', async () => {
      const early = await createUpgrade(property.id, { slug: 'early-check-in', title: 'Early check-in', sortOrder: 0 });
      await createUpgrade(property.id, { slug: 'late-checkout', title: 'Late checkout', sortOrder: 1 });
      const basket = await createUpgrade(property.id, { slug: 'welcome-basket', title: 'Welcome basket', sortOrder: 2 });
      await createUpgrade(property.id, { slug: 'boat-tour', title: 'Boat tour', isActive: false, sortOrder: 3 });

      await purchaseDal.create({
        pmcId: pmc.id,
        propertyId: property.id,
        upgradeId: basket.id,
        guestSessionId: session.id,
        amountCents: 5000,
        platformFeeCents: 130,
        netAmountCents: 4870,
        currency: 'usd',
        status: 'paid',
      });

      const views = await listGuestUpgrades(stay, NOW);

      expect(
        views.map((v) => ({
          slug: v.upgrade.slug,
          eligible: v.eligible,
          reason: v.reason,
          opensAt: v.opensAt,
          purchased: v.purchased,
        })),
      ).toEqual([
        { slug: 'early-check-in', eligible: true, reason: '', opensAt: null, purchased: false },
        {
          slug: 'late-checkout',
          eligible: false,
          reason: 'Late checkout opens 2 days before departure.',
          opensAt: new Date('2026-07-12T10:00:00Z'),
          purchased: false,
        },
        { slug: 'welcome-basket', eligible: true, reason: '', opensAt: null, purchased: true },
      ]);
      expect(views[0]?.upgrade.id).toBe(early.id);
    });

    it('marks everything ineligible when the stay dates are unknown', async () => {
      const undated = await chatDal.createSession({ propertyId: property.id, isVerified: true });
      const views = await listGuestUpgrades({ property, session: undated }, NOW);

      expect(views.length).toBe(3);
      expect(views.every((v) => !v.eligible && v.reason === "We can't verify your stay dates yet.")).toBe(true);
    });
  });

  describe('buildStayContext', () => {
    it('falls back to the reservation and detects turnovers', async () => {
      const own = await createProperty(pmc.id, { checkInTime: '15:00', checkOutTime: '11:00' });
      const reservation = await createReservation(own.id, {
        arrivalDate: '2026-08-10',
        departureDate: '2026-08-12',
        checkInTime: '14:00',
      });
      await createReservation(own.id, { arrivalDate: '2026-08-12', departureDate: '2026-08-15' });
      const linked = await chatDal.createSession({ propertyId: own.id, reservationId: reservation.id });

      expect(await buildStayContext(linked, own)).toEqual({
        propertyId: own.id,
        arrivalDate: '2026-08-10',
        departureDate: '2026-08-12',
        checkInTime: '14:00',
        checkOutTime: '11:00',
        sameDayTurnoverOnArrival: false,
        sameDayTurnoverOnDeparture: true,
      });
    });
  });

  describe('recommendationFor', () => {
    it('suggests when a not-yet-open upgrade becomes available', async () => {
      const late = (await listGuestUpgrades(stay, NOW)).find((v) => v.upgrade.slug === 'late-checkout');
      if (!late) throw new Error('expected late checkout');

      expect(await recommendationFor(stay, late.upgrade.id, NOW)).toEqual({
        success: true,
        eligible: false,
        reason: 'Late checkout opens 2 days before departure.',
        nextEligibleDate: '2026-07-12',
        suggestedMessage: "You'll be eligible on 2026-07-12 (if the home stays vacant).",
        arrivalDate: '2026-07-10',
        departureDate: '2026-07-14',
      });
    });

    it('does not recommend inactive or foreign upgrades', async () => {
      const other = await createProperty(pmc.id);
      const foreign = await createUpgrade(other.id);
      expect(await recommendationFor(stay, foreign.id, NOW)).toEqual({ success: false, error: 'upgrade_not_found' });
    });
  });
});

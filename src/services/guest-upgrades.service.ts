import { ChatDal } from '../dal/chat.dal';
import { PropertyDal } from '../dal/property.dal';
import { PurchaseDal } from '../dal/purchase.dal';
import { ReservationDal } from '../dal/reservation.dal';
import { UpgradeDal } from '../dal/upgrade.dal';
import { db } from '../db/client';
import type { ChatSession, Property, Upgrade } from '../db/schema';
import { fail, type ServiceResult } from '../types/common';
import type { GuestIdentity } from './auth.service';
import {
  evaluateUpgrade,
  recommendUpgrade,
  type StayContext,
  type UpgradeRecommendation,
} from './upgrade-rules.service';

const chatDal = new ChatDal(db);
const propertyDal = new PropertyDal(db);
const reservationDal = new ReservationDal(db);
const upgradeDal = new UpgradeDal(db);
const purchaseDal = new PurchaseDal(db);

export type GuestSessionError =
  | 'property_not_found'
  | 'session_not_found'
  | 'session_mismatch'
  | 'not_verified';

export interface GuestStay {
  property: Property;
  session: ChatSession;
}

/** The verified session behind a guest token, checked against the property in the URL. */
export async function loadVerifiedStay(
  identity: GuestIdentity,
  propertyId: string,
): Promise<ServiceResult<GuestStay, GuestSessionError>> {
  if (identity.propertyId !== propertyId) return fail('session_mismatch');

  const property = await propertyDal.findLiveById(propertyId);
  if (!property) return fail('property_not_found');

  const session = await chatDal.findSession(identity.sessionId);
  if (!session || session.propertyId !== propertyId) return fail('session_not_found');
  if (!session.isVerified) return fail('not_verified', 'Please unlock your stay first.');

  return { success: true, property, session };
}

/**
 * Stay dates come from the session, falling back to its reservation.
 * Returns null when neither knows the dates.
 */
export async function buildStayContext(
  session: ChatSession,
  property: Pick<Property, 'checkInTime' | 'checkOutTime'>,
): Promise<StayContext | null> {
  const reservation = session.reservationId
    ? await reservationDal.findById(session.reservationId)
    : undefined;

  const arrivalDate = session.arrivalDate ?? reservation?.arrivalDate;
  const departureDate = session.departureDate ?? reservation?.departureDate;
  if (!arrivalDate || !departureDate) return null;

  const excludeId = reservation?.id;
  const [sameDayTurnoverOnArrival, sameDayTurnoverOnDeparture] = await Promise.all([
    reservationDal.hasDepartureOn(session.propertyId, arrivalDate, excludeId),
    reservationDal.hasArrivalOn(session.propertyId, departureDate, excludeId),
  ]);

  return {
    propertyId: session.propertyId,
    arrivalDate,
    departureDate,
    checkInTime: reservation?.checkInTime ?? property.checkInTime,
    checkOutTime: reservation?.checkOutTime ?? property.checkOutTime,
    sameDayTurnoverOnArrival,
    sameDayTurnoverOnDeparture,
  };
}

export interface GuestUpgradeView {
  upgrade: Upgrade;
  eligible: boolean;
  reason: string;
  opensAt: Date | null;
  purchased: boolean;
}

const UNKNOWN_STAY_REASON = "We can't verify your stay dates yet.";

/** Active upgrades of the property, each evaluated for the guest's stay. */
export async function listGuestUpgrades(
  stay: GuestStay,
  now: Date = new Date(),
): Promise<GuestUpgradeView[]> {
  const [upgrades, paidIds, context] = await Promise.all([
    upgradeDal.listByProperty(stay.property.id, { activeOnly: true }),
    purchaseDal.listPaidUpgradeIds(stay.session.id),
    buildStayContext(stay.session, stay.property),
  ]);

  return upgrades.map((upgrade) => {
    const purchased = paidIds.includes(upgrade.id);
    if (!context) {
      return { upgrade, eligible: false, reason: UNKNOWN_STAY_REASON, opensAt: null, purchased };
    }
    const evaluation = evaluateUpgrade(upgrade, context, now);
    return { upgrade, ...evaluation, purchased };
  });
}

export async function listPaidUpgradeIds(stay: GuestStay): Promise<string[]> {
  return purchaseDal.listPaidUpgradeIds(stay.session.id);
}

export type RecommendationResult = ServiceResult<
  UpgradeRecommendation & { arrivalDate: string | null; departureDate: string | null },
  'upgrade_not_found'
>;

export async function recommendationFor(
  stay: GuestStay,
  upgradeId: string,
  now: Date = new Date(),
): Promise<RecommendationResult> {
  const upgrade = await upgradeDal.findForProperty(stay.property.id, upgradeId);
  if (!upgrade || !upgrade.isActive) return fail('upgrade_not_found');

  const context = await buildStayContext(stay.session, stay.property);
  if (!context) {
    return {
      success: true,
      eligible: false,
      reason: UNKNOWN_STAY_REASON,
      nextEligibleDate: null,
      suggestedMessage: 'Try again later, or message your host for availability.',
      arrivalDate: null,
      departureDate: null,
    };
  }

  return {
    success: true,
    ...recommendUpgrade(evaluateUpgrade(upgrade, context, now), now),
    arrivalDate: context.arrivalDate,
    departureDate: context.departureDate,
  };
}

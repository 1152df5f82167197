import { logger } from '../config/logger';
import { AnalyticsEventDal } from '../dal/analytics-event.dal';
import { ChatDal } from '../dal/chat.dal';
import { PropertyDal } from '../dal/property.dal';
import { ReservationDal } from '../dal/reservation.dal';
import { db } from '../db/client';
import type { Reservation } from '../db/schema';
import { fail, toIsoDate, type ServiceResult } from '../types/common';
import { issueGuestToken } from './auth.service';
import { logEvent } from './telemetry.service';

const propertyDal = new PropertyDal(db);
const reservationDal = new ReservationDal(db);
const chatDal = new ChatDal(db);
const analyticsDal = new AnalyticsEventDal(db);

export interface UnlockedStay {
  sessionId: string;
  guestToken: string;
  guestName: string | null;
  arrivalDate: string;
  departureDate: string;
  checkInTime: string | null;
  checkOutTime: string | null;
}

export type UnlockResult = ServiceResult<
  UnlockedStay,
  'invalid_code' | 'property_not_found' | 'code_mismatch'
>;

/**
 * The stay a code should unlock: the one in progress today, else the
 * nearest upcoming one. Expects rows sorted by arrival date.
 */
export function pickStay(candidates: Reservation[], today: string): Reservation | undefined {
  const current = candidates.find((r) => r.arrivalDate <= today && today <= r.departureDate);
  return current ?? candidates.find((r) => r.arrivalDate >= today);
}

/**
 * Verifies a guest by the last four digits of the booking phone and opens
 * a verified chat session for their stay, or resumes the newest one
 * already opened for it.
 */
export async function unlockStay(
  propertyId: string,
  code: string,
  opts: { now?: Date; requestId?: string } = {},
): Promise<UnlockResult> {
  const last4 = code.trim();
  if (!/^\d{4}$/.test(last4)) return fail('invalid_code', 'Enter the last 4 digits of your phone.');

  const property = await propertyDal.findLiveById(propertyId);
  if (!property) return fail('property_not_found');

  const today = toIsoDate(opts.now ?? new Date());
  const candidates = await reservationDal.findByPhoneLast4(propertyId, last4);
  const stay = pickStay(candidates, today);

  if (!stay) {
    logger.info({ propertyId }, 'Stay unlock rejected: no matching reservation');
    return fail('code_mismatch', "That code doesn't match a current or upcoming stay.");
  }

  const isCurrent = stay.arrivalDate <= today && today <= stay.departureDate;
  const reservationStatus = isCurrent ? 'checked_in' : 'upcoming';
  const previous = await chatDal.findLatestVerifiedForReservation(propertyId, stay.id);

  // Unlocking the same stay again picks up the existing conversation.
  const session = previous
    ? ((await chatDal.updateSession(previous.id, {
        reservationStatus,
        phoneLast4: last4,
        guestName: stay.guestName,
        arrivalDate: stay.arrivalDate,
        departureDate: stay.departureDate,
        lastActivityAt: new Date(),
      })) ?? previous)
    : await chatDal.createSession({
        propertyId,
        reservationId: stay.id,
        source: 'guest_web',
        reservationStatus,
        isVerified: true,
        phoneLast4: last4,
        externalReservationId: stay.externalReservationId,
        guestName: stay.guestName,
        arrivalDate: stay.arrivalDate,
        departureDate: stay.departureDate,
        lastActivityAt: new Date(),
      });

  if (!previous) {
    await analyticsDal.create({
      pmcId: property.pmcId,
      propertyId,
      sessionId: session.id,
      eventName: 'chat_session_created',
      data: { verified: true },
    });
  }
  await logEvent({
    pmcId: property.pmcId,
    type: 'guest.stay.unlocked',
    requestId: opts.requestId,
    entityType: 'chat_session',
    entityId: session.id,
    payload: { resumed: previous !== undefined },
  });

  return {
    success: true,
    sessionId: session.id,
    guestToken: await issueGuestToken(session.id, propertyId),
    guestName: stay.guestName,
    arrivalDate: stay.arrivalDate,
    departureDate: stay.departureDate,
    checkInTime: stay.checkInTime ?? property.checkInTime,
    checkOutTime: stay.checkOutTime ?? property.checkOutTime,
  };
}

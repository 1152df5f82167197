import { upgradeRules } from '../config/concierge';
import type { Upgrade } from '../db/schema';
import { toIsoDate } from '../types/common';

export type UpgradeKind = 'EARLY_CHECKIN' | 'LATE_CHECKOUT';

/** What eligibility rules need to know about a guest's stay. */
export interface StayContext {
  propertyId: string;
  arrivalDate: string;
  departureDate: string;
  checkInTime: string | null;
  checkOutTime: string | null;
  /** Another reservation departs on the arrival day. */
  sameDayTurnoverOnArrival: boolean;
  /** Another reservation arrives on the departure day. */
  sameDayTurnoverOnDeparture: boolean;
}

export interface UpgradeEvaluation {
  eligible: boolean;
  reason: string;
  opensAt: Date | null;
}

export type EvaluableUpgrade = Pick<Upgrade, 'propertyId' | 'slug' | 'isActive'>;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export function slugToKind(slug: string): UpgradeKind | null {
  const s = slug.trim().toLowerCase();
  if (s.includes('early') && (s.includes('check') || s.includes('arrival'))) return 'EARLY_CHECKIN';
  if (s.includes('late') && (s.includes('check') || s.includes('depart'))) return 'LATE_CHECKOUT';
  return null;
}

/**
 * Parses a time of day into { hours, minutes }.
 * Accepts "15:00", "15:00:00", "4:00 PM" and "4pm". Returns null when unreadable.
 */
export function parseTimeOfDay(raw: string | null | undefined): { hours: number; minutes: number } | null {
  if (!raw) return null;
  const match = /^(\d{1,2})(?::(\d{2}))?(?::\d{2})?\s*([ap]\.?m\.?)?$/i.exec(raw.trim());
  if (!match) return null;

  let hours = Number(match[1]);
  const minutes = match[2] === undefined ? 0 : Number(match[2]);
  const meridiem = match[3]?.toLowerCase().replace(/\./g, '');

  if (meridiem) {
    if (hours < 1 || hours > 12) return null;
    if (meridiem === 'am' && hours === 12) hours = 0;
    if (meridiem === 'pm' && hours !== 12) hours += 12;
  }
  if (hours > 23 || minutes > 59) return null;
  return { hours, minutes };
}

/** A stay date plus a time of day as a UTC instant; unreadable times use the fallback. */
export function stayInstant(isoDate: string, time: string | null, fallback: string): Date {
  const parsed = parseTimeOfDay(time) ?? parseTimeOfDay(fallback) ?? { hours: 0, minutes: 0 };
  const midnight = Date.parse(`${isoDate}T00:00:00Z`);
  return new Date(midnight + parsed.hours * HOUR_MS + parsed.minutes * 60 * 1000);
}

function ineligible(reason: string, opensAt: Date | null = null): UpgradeEvaluation {
  return { eligible: false, reason, opensAt };
}

const ELIGIBLE: UpgradeEvaluation = { eligible: true, reason: '', opensAt: null };

function evaluateEarlyCheckin(stay: StayContext, now: Date): UpgradeEvaluation {
  const rule = upgradeRules.EARLY_CHECKIN;
  const arrival = stayInstant(stay.arrivalDate, stay.checkInTime, upgradeRules.DEFAULT_CHECK_IN_TIME);

  const opensAt = new Date(arrival.getTime() - rule.daysPriorWindowOpen * DAY_MS);
  if (now < opensAt) {
    return ineligible(
      `Early check-in opens ${rule.daysPriorWindowOpen} days before arrival.`,
      opensAt,
    );
  }

  const cutoff = new Date(arrival.getTime() - rule.cutoffHoursBefore * HOUR_MS);
  if (now > cutoff) return ineligible("It's too close to check-in to purchase early check-in.");

  if (rule.requiresNoTurnover && stay.sameDayTurnoverOnArrival) {
    return ineligible('Not available due to same-day turnover.');
  }
  if (now >= arrival) return ineligible('Arrival has already started.');

  return ELIGIBLE;
}

function evaluateLateCheckout(stay: StayContext, now: Date): UpgradeEvaluation {
  const rule = upgradeRules.LATE_CHECKOUT;
  const departure = stayInstant(
    stay.departureDate,
    stay.checkOutTime,
    upgradeRules.DEFAULT_CHECK_OUT_TIME,
  );

  const opensAt = new Date(departure.getTime() - rule.daysPriorWindowOpen * DAY_MS);
  if (now < opensAt) {
    return ineligible(
      `Late checkout opens ${rule.daysPriorWindowOpen} days before departure.`,
      opensAt,
    );
  }

  const cutoff = new Date(departure.getTime() - rule.cutoffHoursBefore * HOUR_MS);
  if (now > cutoff) return ineligible("It's too close to checkout to purchase late checkout.");

  if (rule.requiresNoTurnover && stay.sameDayTurnoverOnDeparture) {
    return ineligible('Not available due to same-day turnover.');
  }
  if (now >= departure) return ineligible('Checkout has already started.');

  return ELIGIBLE;
}

/**
 * Whether a guest may buy `upgrade` for `stay` at `now`.
 * Upgrades that are neither early check-in nor late checkout are always
 * eligible while active.
 */
export function evaluateUpgrade(
  upgrade: EvaluableUpgrade,
  stay: StayContext,
  now: Date = new Date(),
): UpgradeEvaluation {
  if (!upgrade.isActive) return ineligible('Not available for this stay.');
  if (upgrade.propertyId !== stay.propertyId) return ineligible('Invalid upgrade for this property.');

  switch (slugToKind(upgrade.slug)) {
    case 'EARLY_CHECKIN':
      return evaluateEarlyCheckin(stay, now);
    case 'LATE_CHECKOUT':
      return evaluateLateCheckout(stay, now);
    default:
      return ELIGIBLE;
  }
}

export interface UpgradeRecommendation {
  eligible: boolean;
  reason: string;
  nextEligibleDate: string | null;
  suggestedMessage: string;
}

/** Guest-facing copy built on top of an evaluation. */
export function recommendUpgrade(evaluation: UpgradeEvaluation, now: Date = new Date()): UpgradeRecommendation {
  const nextEligibleDate = evaluation.opensAt ? toIsoDate(evaluation.opensAt) : null;

  let suggestedMessage: string;
  if (evaluation.eligible) {
    suggestedMessage = "You're eligible now.";
  } else if (nextEligibleDate) {
    const tomorrow = toIsoDate(new Date(now.getTime() + DAY_MS));
    suggestedMessage =
      nextEligibleDate === tomorrow
        ? "You'll be eligible tomorrow (if the home stays vacant)."
        : `You'll be eligible on ${nextEligibleDate} (if the home stays vacant).`;
  } else {
    suggestedMessage = evaluation.reason || 'Not available right now.';
  }

  return {
    eligible: evaluation.eligible,
    reason: evaluation.reason,
    nextEligibleDate,
    suggestedMessage,
  };
}

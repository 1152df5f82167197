/**
 * Concierge domain configuration.
 * Upgrade windows, chat limits and heat-score weights.
 */

export const upgradeRules = {
  EARLY_CHECKIN: {
    /** Sales open this many days before the arrival datetime. */
    daysPriorWindowOpen: 2,
    /** Sales close this many hours before check-in. */
    cutoffHoursBefore: 6,
    requiresNoTurnover: true,
  },
  LATE_CHECKOUT: {
    daysPriorWindowOpen: 2,
    cutoffHoursBefore: 2,
    requiresNoTurnover: true,
  },

  // Used when neither the reservation nor the property sets a time. Interpreted as UTC.
  DEFAULT_CHECK_IN_TIME: '16:00',
  DEFAULT_CHECK_OUT_TIME: '10:00',
} as const;

export const chatConfig = {
  MAX_MESSAGE_LENGTH: 2000,

  /** Recent turns shown to the sentiment classifier. */
  SENTIMENT_CONTEXT_TURNS: 12,
  SENTIMENT_LINE_CHARS: 280,

  /** Messages fed to the session summarizer. */
  SUMMARY_MESSAGE_LIMIT: 60,

  EMOTIONAL_SIGNALS_KEPT: 10,
} as const;

export const heatConfig = {
  MOOD_WEIGHTS: {
    angry: 40,
    upset: 30,
    anxious: 25,
    confused: 15,
    calm: 0,
    happy: 0,
    playful: 0,
  },
  NEGATIVE_BONUS: 10,
  URGENT_BONUS: 30,
  ESCALATION_BONUS: 20,

  /** Previous heat is multiplied by this before comparing with the new reading. */
  DECAY: 0.7,

  HIGH_THRESHOLD: 70,
  MEDIUM_THRESHOLD: 40,
} as const;

export const checkoutConfig = {
  /** A pending checkout younger than this is handed back instead of creating a new one. */
  REUSE_PENDING_MINUTES: 30,
} as const;

export const analyticsConfig = {
  /** Guest→assistant gaps longer than this are not counted as response time. */
  RESPONSE_GAP_CAP_SECONDS: 1800,
} as const;

export type Mood = keyof typeof heatConfig.MOOD_WEIGHTS;

import lexicon from '../config/lexicon.json';

export type MessageCategory =
  | 'wifi'
  | 'tv'
  | 'fridge request'
  | 'check-in'
  | 'cleaning'
  | 'maintenance'
  | 'urgent'
  | 'general';

export type LogType =
  | 'Fridge Request'
  | 'Early Access'
  | 'Cleaning'
  | 'Maintenance'
  | 'Urgent'
  | 'General';

const CATEGORIES: ReadonlyArray<{ category: MessageCategory; terms: string[] }> = [
  { category: 'wifi', terms: termsFor('wifi') },
  { category: 'tv', terms: termsFor('tv') },
  { category: 'fridge request', terms: termsFor('fridge request') },
  { category: 'check-in', terms: termsFor('check-in') },
  { category: 'cleaning', terms: termsFor('cleaning') },
  { category: 'maintenance', terms: termsFor('maintenance') },
  { category: 'urgent', terms: termsFor('urgent') },
];

const LOG_TYPES: ReadonlyArray<{ logType: LogType; terms: string[] }> = [
  { logType: 'Fridge Request', terms: termsFor('fridge request') },
  { logType: 'Early Access', terms: termsFor('check-in') },
  { logType: 'Cleaning', terms: termsFor('cleaning') },
  { logType: 'Maintenance', terms: termsFor('maintenance') },
  { logType: 'Urgent', terms: termsFor('urgent') },
];

function termsFor(category: MessageCategory): string[] {
  return lexicon.categories.find((entry) => entry.category === category)?.terms ?? [];
}

// Single words must start a word: "clean" matches "cleaning", "tv" does not match "activities".
function mentions(text: string, term: string): boolean {
  if (term.includes(' ') || term.includes('-')) return text.includes(term);
  return new RegExp(`\\b${term}`).test(text);
}

/** Keyword category of a guest message; first matching category wins. */
export function classifyCategory(message: string): MessageCategory {
  const text = message.toLowerCase();
  for (const { category, terms } of CATEGORIES) {
    if (terms.some((term) => mentions(text, term))) return category;
  }
  return 'general';
}

/** Operations log bucket for the admin inbox. */
export function detectLogType(message: string): LogType {
  const text = message.toLowerCase();
  for (const { logType, terms } of LOG_TYPES) {
    if (terms.some((term) => mentions(text, term))) return logType;
  }
  return 'General';
}

/** Canned reply used when the assistant is unavailable. */
export function fallbackReply(category: MessageCategory, emergencyPhone: string | null): string {
  switch (category) {
    case 'wifi':
      return "Try restarting the router. If that doesn't work, I'll notify the host for you.";
    case 'tv':
      return "Please check that the remote has batteries and the TV is set to HDMI. Need more help? I'll alert the host.";
    case 'fridge request':
      return 'Got it. Do you want me to pass this to the host to stock the fridge for you?';
    case 'check-in':
      return "Let me check with the host about check-in. I'll get back to you shortly.";
    case 'cleaning':
      return "Noted! I'll forward your request to the host right away.";
    case 'maintenance':
      return "Thanks for letting us know. I'll alert the host and get someone to assist.";
    case 'urgent':
      return emergencyPhone
        ? `If this is an emergency, please call ${emergencyPhone}. I'm also alerting the host.`
        : "If this is an emergency, please call your local emergency number. I'm also alerting the host.";
    case 'general':
      return "Thanks for your message! I'll pass this along to the host and reply soon.";
  }
}

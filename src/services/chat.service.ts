import { chatConfig } from '../config/concierge';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { AnalyticsEventDal } from '../dal/analytics-event.dal';
import { ChatDal } from '../dal/chat.dal';
import { GuideDal } from '../dal/guide.dal';
import { PropertyDal } from '../dal/property.dal';
import { UpgradeDal } from '../dal/upgrade.dal';
import { db } from '../db/client';
import type { ChatMessage, ChatSession, Guide, Property, Upgrade } from '../db/schema';
import type { LlmMessage } from '../integrations/interfaces';
import { getIntegrations } from '../integrations/registry';
import { startTimer } from '../telemetry/timing';
import { fail, type ServiceResult } from '../types/common';
import { verifyGuestToken } from './auth.service';
import {
  classifyCategory,
  detectLogType,
  fallbackReply,
  type MessageCategory,
} from './message-classifier.service';
import {
  classifyGuestSentiment,
  computeHeatScore,
  escalationFromHeat,
  priorityFor,
  type SentimentResult,
} from './sentiment.service';
import { generateSessionSummary } from './summary.service';
import { logEvent, logSpan } from './telemetry.service';

const propertyDal = new PropertyDal(db);
const chatDal = new ChatDal(db);
const guideDal = new GuideDal(db);
const upgradeDal = new UpgradeDal(db);
const analyticsDal = new AnalyticsEventDal(db);

export interface GuestMessageInput {
  propertyId: string;
  message: string;
  sessionId?: string;
  guestToken?: string;
  language?: string;
  clientMessageId?: string;
  threadId?: string;
  parentId?: string;
  requestId?: string;
}

export type GuestMessageError =
  | 'invalid_message'
  | 'property_not_found'
  | 'chat_disabled'
  | 'session_not_found'
  | 'session_mismatch'
  | 'unauthenticated';

export type GuestMessageResult = ServiceResult<
  {
    sessionId: string;
    response: string;
    /** Id of the guest message this reply answers. */
    replyTo: number;
    category: MessageCategory;
    degraded: boolean;
  },
  GuestMessageError
>;

export interface PromptContext {
  property: Property;
  session: Pick<ChatSession, 'isVerified' | 'guestName' | 'arrivalDate' | 'departureDate'>;
  guides: Guide[];
  upgrades: Upgrade[];
  language?: string | null;
}

export function formatPrice(priceCents: number, currency: string): string {
  return `${(priceCents / 100).toFixed(2)} ${currency.toUpperCase()}`;
}

/**
 * System prompt for the guest assistant. Wifi credentials and booking
 * details are only included once the guest has unlocked their stay.
 */
export function buildSystemPrompt(ctx: PromptContext): string {
  const { property, session } = ctx;
  const lines: string[] = [
    `You are the friendly virtual concierge for "${property.name}", a vacation rental.`,
    'Answer guest questions briefly and warmly, using only the facts below.',
    'If you do not know something, say you will check with the host.',
    '',
    'Property:',
    `- Name: ${property.name}`,
  ];
  if (property.address) lines.push(`- Address: ${property.address}`);
  lines.push(`- Check-in time: ${property.checkInTime ?? 'not set'}`);
  lines.push(`- Check-out time: ${property.checkOutTime ?? 'not set'}`);
  if (property.houseRules) lines.push(`- House rules: ${property.houseRules}`);
  if (property.emergencyPhone) lines.push(`- Emergency phone: ${property.emergencyPhone}`);

  if (session.isVerified) {
    lines.push('', 'Verified guest stay:');
    lines.push(`- Guest name: ${session.guestName ?? 'unknown'}`);
    lines.push(`- Arrival: ${session.arrivalDate ?? 'unknown'}`);
    lines.push(`- Departure: ${session.departureDate ?? 'unknown'}`);
    if (property.wifiName) lines.push(`- Wifi network: ${property.wifiName}`);
    if (property.wifiPassword) lines.push(`- Wifi password: ${property.wifiPassword}`);
  } else {
    lines.push(
      '',
      'This guest has not unlocked their stay yet.',
      'Do not share wifi details, door codes or booking details.',
      'If they ask for them, tell them to unlock their stay with the last 4 digits of the phone on the booking.',
    );
  }

  if (ctx.guides.length > 0) {
    lines.push('', 'Guides:');
    for (const guide of ctx.guides) {
      lines.push(`- ${guide.title}${guide.shortDescription ? `: ${guide.shortDescription}` : ''}`);
    }
  }

  if (ctx.upgrades.length > 0) {
    lines.push('', 'Upgrades guests can buy:');
    for (const upgrade of ctx.upgrades) {
      lines.push(`- ${upgrade.title} (${formatPrice(upgrade.priceCents, upgrade.currency)})`);
    }
  }

  lines.push(
    '',
    ctx.language
      ? `Always reply in this language: ${ctx.language}.`
      : "Reply in the same language as the guest's last message.",
  );
  return lines.join('\n');
}

/** Chat history as model messages; system rows are internal and left out. */
export function toLlmHistory(messages: ChatMessage[]): LlmMessage[] {
  const history: LlmMessage[] = [];
  for (const m of messages) {
    if (m.sender === 'guest') history.push({ role: 'user', content: m.content });
    else if (m.sender === 'assistant') history.push({ role: 'assistant', content: m.content });
    else if (m.sender === 'host') history.push({ role: 'assistant', content: `(Host) ${m.content}` });
  }
  return history;
}

/** Adds the signals of a reading to the session list, most recent last, deduped. */
export function mergeEmotionalSignals(existing: string[], result: SentimentResult): string[] {
  const incoming = [
    result.mood,
    ...Object.entries(result.flags)
      .filter(([, on]) => on)
      .map(([flag]) => flag),
  ];
  const merged = existing.filter((signal) => !incoming.includes(signal));
  merged.push(...incoming);
  return merged.slice(-chatConfig.EMOTIONAL_SIGNALS_KEPT);
}

async function resolveSession(
  property: Property,
  input: GuestMessageInput,
): Promise<ServiceResult<{ session: ChatSession }, GuestMessageError>> {
  if (input.guestToken) {
    const identity = await verifyGuestToken(input.guestToken);
    if (!identity) return fail('unauthenticated', 'Your stay session has expired. Unlock it again.');
    if (identity.propertyId !== property.id) return fail('session_mismatch');
    const session = await chatDal.findSession(identity.sessionId);
    if (!session) return fail('session_not_found');
    return { success: true, session };
  }

  if (input.sessionId) {
    const session = await chatDal.findSession(input.sessionId);
    if (!session || session.propertyId !== property.id) return fail('session_not_found');
    // A verified session carries private details and is only reachable with its token.
    if (session.isVerified) return fail('unauthenticated');
    return { success: true, session };
  }

  const session = await chatDal.createSession({
    propertyId: property.id,
    source: 'guest_web',
    reservationStatus: 'pre_booking',
    language: input.language ?? null,
    lastActivityAt: new Date(),
  });
  await analyticsDal.create({
    pmcId: property.pmcId,
    propertyId: property.id,
    sessionId: session.id,
    threadId: input.threadId ?? null,
    eventName: 'chat_session_created',
    data: { verified: false },
  });
  return { success: true, session };
}

/**
 * Handles one guest message end to end: stores it with its category and
 * sentiment, updates the session's mood and heat, asks the model for a
 * reply (falling back to a canned one) and refreshes the summary.
 */
export async function handleGuestMessage(input: GuestMessageInput): Promise<GuestMessageResult> {
  const timer = startTimer('handleGuestMessage');
  const receivedAt = new Date();
  const text = input.message.trim();
  let pmcId: string | undefined;

  try {
    if (!text) return fail('invalid_message', 'Message must not be empty.');
    if (text.length > chatConfig.MAX_MESSAGE_LENGTH) {
      return fail('invalid_message', `Message must be at most ${chatConfig.MAX_MESSAGE_LENGTH} characters.`);
    }

    const property = await propertyDal.findLiveById(input.propertyId);
    if (!property) return fail('property_not_found');
    pmcId = property.pmcId;
    if (!property.chatEnabled) return fail('chat_disabled', 'Chat is not available for this property.');

    const resolved = await resolveSession(property, input);
    if (!resolved.success) return resolved;
    const session = resolved.session;

    const history = await chatDal.listMessages(session.id, env.CHAT_HISTORY_LIMIT);
    const category = classifyCategory(text);
    const logType = detectLogType(text);
    const sentiment = await classifyGuestSentiment(history, text);

    const guestMessage = await chatDal.addMessage({
      sessionId: session.id,
      sender: 'guest',
      content: text,
      clientMessageId: input.clientMessageId ?? null,
      category,
      logType,
      sentiment: sentiment.sentiment,
      sentimentData: {
        mood: sentiment.mood,
        confidence: sentiment.confidence,
        source: sentiment.source,
        flags: sentiment.flags,
      },
    });

    const trackMessage = (message: ChatMessage, parentId: string | null, createdAt?: Date) =>
      analyticsDal.create({
        pmcId: property.pmcId,
        propertyId: property.id,
        sessionId: session.id,
        threadId: input.threadId ?? null,
        messageId: String(message.id),
        parentId,
        eventName: 'message_sent',
        sender: message.sender,
        length: message.content.length,
        ...(createdAt ? { createdAt } : {}),
      });
    // Stamped with the arrival time so response times cover the model calls.
    await trackMessage(guestMessage, input.parentId ?? null, receivedAt);

    const heatScore = computeHeatScore(session.heatScore, sentiment, category);
    const current = await chatDal.updateSession(session.id, {
      guestMood: sentiment.mood,
      guestMoodConfidence: sentiment.confidence,
      emotionalSignals: mergeEmotionalSignals(session.emotionalSignals, sentiment),
      heatScore,
      escalationLevel: escalationFromHeat(heatScore),
      actionPriority: priorityFor(heatScore, sentiment, category),
      language: input.language ?? session.language,
      isResolved: false,
      resolvedAt: null,
      lastActivityAt: new Date(),
    });

    const [guides, upgrades, transcript] = await Promise.all([
      guideDal.listByProperty(property.id, { activeOnly: true }),
      upgradeDal.listByProperty(property.id, { activeOnly: true }),
      chatDal.listMessages(session.id, env.CHAT_HISTORY_LIMIT),
    ]);
    const systemPrompt = buildSystemPrompt({
      property,
      session: current ?? session,
      guides,
      upgrades,
      language: input.language ?? session.language,
    });

    let response: string;
    let degraded = false;
    try {
      response = await getIntegrations().llm.complete({
        purpose: 'chat',
        messages: [{ role: 'system', content: systemPrompt }, ...toLlmHistory(transcript)],
      });
    } catch (err) {
      logger.warn({ err, sessionId: session.id }, 'Chat model failed, sending fallback reply');
      await logEvent({
        pmcId,
        type: 'llm.chat.failed',
        requestId: input.requestId,
        entityType: 'chat_session',
        entityId: session.id,
        payload: { message: err instanceof Error ? err.message : String(err) },
      });
      response = fallbackReply(category, property.emergencyPhone);
      degraded = true;
    }

    const assistantMessage = await chatDal.addMessage({
      sessionId: session.id,
      sender: 'assistant',
      content: response,
      category,
    });

    await trackMessage(assistantMessage, String(guestMessage.id));

    const summary = await generateSessionSummary(session.id);
    if (!summary.success) {
      logger.warn({ sessionId: session.id, error: summary.error }, 'Summary refresh skipped');
    }

    return {
      success: true,
      sessionId: session.id,
      response,
      replyTo: guestMessage.id,
      category,
      degraded,
    };
  } finally {
    await logSpan(timer.span, timer.stop(), {
      pmcId,
      requestId: input.requestId,
    });
  }
}

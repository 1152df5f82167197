import { chatConfig } from '../config/concierge';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { ChatDal } from '../dal/chat.dal';
import { PropertyDal } from '../dal/property.dal';
import { db } from '../db/client';
import type { ChatMessage, ChatSession, Property } from '../db/schema';
import { getIntegrations } from '../integrations/registry';
import { startTimer } from '../telemetry/timing';
import { fail, type ServiceResult } from '../types/common';
import { logEvent, logSpan } from './telemetry.service';

const chatDal = new ChatDal(db);
const propertyDal = new PropertyDal(db);

export const EMPTY_TRANSCRIPT_SUMMARY = '**What the guest wants**\n- (No message content)\n';
const EMPTY_MODEL_SUMMARY = '**What the guest wants**\n- (No summary generated)\n';

export type SummaryResult = ServiceResult<
  { ran: boolean; summary: string },
  'session_not_found' | 'llm_unavailable'
>;

/**
 * Whether the summarizer should run again. Forced runs always do;
 * otherwise only unresolved sessions with new messages since the last
 * summary, and no more often than SUMMARY_THROTTLE_MINUTES.
 */
export function shouldRefreshSummary(
  session: Pick<ChatSession, 'isResolved' | 'aiSummaryUpdatedAt'>,
  lastMessageAt: Date | null,
  force = false,
  now: Date = new Date(),
): boolean {
  if (force) return true;
  if (session.isResolved) return false;
  if (!lastMessageAt) return false;

  const summarizedAt = session.aiSummaryUpdatedAt;
  if (!summarizedAt) return true;
  if (lastMessageAt <= summarizedAt) return false;

  const throttleMs = env.SUMMARY_THROTTLE_MINUTES * 60 * 1000;
  return now.getTime() - summarizedAt.getTime() >= throttleMs;
}

export function buildSummaryPrompt(session: ChatSession, property: Property | undefined): string {
  return [
    'You are an operations assistant for a short-term rental host.',
    '',
    'Context (booking + account):',
    `- Property: ${property?.name ?? 'Unknown property'}`,
    `- Guest name: ${session.guestName ?? '(unknown)'}`,
    `- Reservation stage: ${session.reservationStatus}`,
    `- Source: ${session.source}`,
    `- Arrival date: ${session.arrivalDate ?? '(unknown)'}`,
    `- Departure date: ${session.departureDate ?? '(unknown)'}`,
    '',
    'Task:',
    'Summarize the conversation for an admin dashboard.',
    '',
    'Return **markdown** with exactly these sections:',
    '1) **What the guest wants**',
    '2) **Key facts** (dates, unit details, constraints)',
    '3) **Risks / sentiment** (urgent/unhappy signals)',
    '4) **Recommended next action** (clear steps)',
    '',
    'Rules:',
    '- Keep it short, scannable, and operational.',
    '- If dates/times are mentioned, repeat them clearly.',
    '- If missing info blocks action, say what to ask the guest for.',
  ].join('\n');
}

export function transcriptText(messages: ChatMessage[]): string {
  return messages
    .filter((m) => m.content.trim().length > 0)
    .map((m) => `${m.sender.toUpperCase()}: ${m.content.trim()}`)
    .join('\n');
}

/**
 * Regenerates the stored AI summary of a session when the refresh policy
 * allows it. A model failure keeps the previous summary.
 */
export async function generateSessionSummary(
  sessionId: string,
  opts: { force?: boolean; now?: Date } = {},
): Promise<SummaryResult> {
  const timer = startTimer('generateSessionSummary');
  const force = opts.force ?? false;

  try {
    const session = await chatDal.findSession(sessionId);
    if (!session) return fail('session_not_found');

    const messages = await chatDal.listMessages(sessionId, chatConfig.SUMMARY_MESSAGE_LIMIT);
    const lastMessageAt = messages.at(-1)?.createdAt ?? null;

    if (!shouldRefreshSummary(session, lastMessageAt, force, opts.now)) {
      return { success: true, ran: false, summary: session.aiSummary ?? '' };
    }

    const transcript = transcriptText(messages);
    if (!transcript) {
      await chatDal.updateSession(sessionId, {
        aiSummary: EMPTY_TRANSCRIPT_SUMMARY,
        aiSummaryUpdatedAt: new Date(),
      });
      return { success: true, ran: true, summary: EMPTY_TRANSCRIPT_SUMMARY };
    }

    const property = await propertyDal.findLiveById(session.propertyId);

    let summary: string;
    try {
      const output = await getIntegrations().llm.complete({
        purpose: 'summary',
        temperature: 0.2,
        messages: [
          { role: 'system', content: buildSummaryPrompt(session, property) },
          { role: 'user', content: transcript },
        ],
      });
      summary = output.trim() || EMPTY_MODEL_SUMMARY;
    } catch (err) {
      logger.error({ err, sessionId }, 'Session summarization failed');
      await logEvent({
        pmcId: property?.pmcId,
        type: 'llm.summary.failed',
        entityType: 'chat_session',
        entityId: sessionId,
        payload: { message: err instanceof Error ? err.message : String(err) },
      });
      return fail('llm_unavailable', 'Summary could not be generated right now.');
    }

    await chatDal.updateSession(sessionId, { aiSummary: summary, aiSummaryUpdatedAt: new Date() });
    return { success: true, ran: true, summary };
  } finally {
    await logSpan(timer.span, timer.stop(), {
      entityType: 'chat_session',
      entityId: sessionId,
    });
  }
}

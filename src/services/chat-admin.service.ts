import { logger } from '../config/logger';
import {
  ChatDal,
  type ChatSessionListItem,
  type ChatSessionPatch,
  type ListChatSessionsInput,
} from '../dal/chat.dal';
import { db } from '../db/client';
import type { ChatMessage, ChatSession, EscalationLevel } from '../db/schema';
import { fail, type ServiceResult } from '../types/common';
import { generateSessionSummary } from './summary.service';
import { logEvent } from './telemetry.service';

const chatDal = new ChatDal(db);

export const MAX_SESSIONS_PAGE = 100;

type SessionResult = ServiceResult<{ session: ChatSession }, 'session_not_found'>;

export async function listChatSessions(
  input: Omit<ListChatSessionsInput, 'limit' | 'offset'> & { limit?: number; offset?: number },
): Promise<{ sessions: ChatSessionListItem[]; total: number; limit: number; offset: number }> {
  const limit = Math.min(Math.max(input.limit ?? 25, 1), MAX_SESSIONS_PAGE);
  const offset = Math.max(input.offset ?? 0, 0);
  const { sessions, total } = await chatDal.listSessions({
    ...input,
    q: input.q?.trim() || undefined,
    limit,
    offset,
  });
  return { sessions, total, limit, offset };
}

export async function getChatDetail(
  pmcId: string,
  sessionId: string,
): Promise<ServiceResult<{ session: ChatSession; messages: ChatMessage[] }, 'session_not_found'>> {
  const session = await chatDal.findSessionForPmc(pmcId, sessionId);
  if (!session) return fail('session_not_found');
  return { success: true, session, messages: await chatDal.listMessages(sessionId) };
}

async function patchSession(
  pmcId: string,
  sessionId: string,
  patch: ChatSessionPatch,
  eventType: string,
): Promise<SessionResult> {
  const existing = await chatDal.findSessionForPmc(pmcId, sessionId);
  if (!existing) return fail('session_not_found');
  const session = await chatDal.updateSession(sessionId, patch);
  if (!session) return fail('session_not_found');
  await logEvent({ pmcId, type: eventType, entityType: 'chat_session', entityId: sessionId });
  return { success: true, session };
}

export async function resolveChat(pmcId: string, sessionId: string): Promise<SessionResult> {
  return patchSession(pmcId, sessionId, { isResolved: true, resolvedAt: new Date() }, 'chat.resolved');
}

export async function unresolveChat(pmcId: string, sessionId: string): Promise<SessionResult> {
  return patchSession(pmcId, sessionId, { isResolved: false, resolvedAt: null }, 'chat.unresolved');
}

/** Sets or clears the escalation level by hand. */
export async function escalateChat(
  pmcId: string,
  sessionId: string,
  level: EscalationLevel | null,
): Promise<SessionResult> {
  return patchSession(pmcId, sessionId, { escalationLevel: level }, 'chat.escalation.set');
}

export async function assignChat(
  pmcId: string,
  sessionId: string,
  assignee: string | null,
): Promise<SessionResult> {
  return patchSession(pmcId, sessionId, { assignedTo: assignee }, 'chat.assigned');
}

export async function setChatNote(
  pmcId: string,
  sessionId: string,
  note: string | null,
): Promise<SessionResult> {
  return patchSession(pmcId, sessionId, { internalNote: note }, 'chat.note.updated');
}

export async function summarizeChat(
  pmcId: string,
  sessionId: string,
): Promise<ServiceResult<{ summary: string }, 'session_not_found' | 'llm_unavailable'>> {
  if (!(await chatDal.findSessionForPmc(pmcId, sessionId))) return fail('session_not_found');
  const result = await generateSessionSummary(sessionId, { force: true });
  if (!result.success) return result;
  return { success: true, summary: result.summary };
}

/** Appends a host-written message to the guest conversation. */
export async function hostReply(
  pmcId: string,
  sessionId: string,
  content: string,
): Promise<ServiceResult<{ message: ChatMessage }, 'session_not_found'>> {
  const session = await chatDal.findSessionForPmc(pmcId, sessionId);
  if (!session) return fail('session_not_found');

  const message = await chatDal.addMessage({ sessionId, sender: 'host', content: content.trim() });
  await chatDal.updateSession(sessionId, { lastActivityAt: new Date() });
  logger.info({ pmcId, sessionId }, 'Host replied to guest chat');
  await logEvent({ pmcId, type: 'chat.host_reply', entityType: 'chat_session', entityId: sessionId });
  return { success: true, message };
}

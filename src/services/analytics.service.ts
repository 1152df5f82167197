import { analyticsConfig } from '../config/concierge';
import { AnalyticsEventDal } from '../dal/analytics-event.dal';
import { ChatDal } from '../dal/chat.dal';
import { PropertyDal } from '../dal/property.dal';
import { db } from '../db/client';
import type { AnalyticsEvent } from '../db/schema';
import { fail, toIsoDate, type ServiceResult } from '../types/common';
import type { AdminScope, GuestIdentity } from './auth.service';

const analyticsDal = new AnalyticsEventDal(db);
const chatDal = new ChatDal(db);
const propertyDal = new PropertyDal(db);

const GUEST_SENDERS = new Set(['guest', 'user']);
const ASSISTANT_SENDERS = new Set(['assistant', 'bot']);

export interface AnalyticsEventInput {
  eventName: string;
  pmcId?: string;
  propertyId?: string;
  sessionId?: string;
  threadId?: string;
  messageId?: string;
  parentId?: string;
  sender?: string;
  variant?: string;
  length?: number;
  data?: Record<string, unknown>;
}

export type IngestScope = { kind: 'guest'; identity: GuestIdentity } | { kind: 'admin'; scope: AdminScope };

export type IngestResult = ServiceResult<{ id: number }, 'session_not_found' | 'pmc_required' | 'forbidden'>;

/**
 * Stores a client analytics event. Tenant fields come from the caller's
 * credentials, never from the payload, except for super admins.
 */
export async function ingestEvent(caller: IngestScope, input: AnalyticsEventInput): Promise<IngestResult> {
  let pmcId: string;
  let propertyId = input.propertyId ?? null;
  let sessionId = input.sessionId ?? null;

  if (caller.kind === 'guest') {
    const session = await chatDal.findSession(caller.identity.sessionId);
    const property = session ? await propertyDal.findLiveById(session.propertyId) : undefined;
    if (!session || !property) return fail('session_not_found');
    pmcId = property.pmcId;
    propertyId = property.id;
    sessionId = session.id;
  } else if (caller.scope.role === 'super') {
    if (!input.pmcId) return fail('pmc_required', 'pmcId is required for platform admins.');
    pmcId = input.pmcId;
  } else {
    if (!caller.scope.pmcId) return fail('forbidden');
    pmcId = caller.scope.pmcId;
  }

  const event = await analyticsDal.create({
    pmcId,
    propertyId,
    sessionId,
    threadId: input.threadId ?? null,
    messageId: input.messageId ?? null,
    parentId: input.parentId ?? null,
    eventName: input.eventName,
    sender: input.sender ?? null,
    variant: input.variant ?? null,
    length: input.length ?? null,
    data: input.data ?? {},
  });
  return { success: true, id: event.id };
}

export interface ChatSummary {
  sessionsTotal: number;
  guestMessages: number;
  assistantMessages: number;
  followupsShown: number;
  followupClicks: number;
  followupConversionRate: number;
  reactionsUp: number;
  reactionsDown: number;
  avgResponseSeconds: number | null;
  p50ResponseSeconds: number | null;
}

function countWhere(events: AnalyticsEvent[], predicate: (e: AnalyticsEvent) => boolean): number {
  return events.reduce((n, e) => (predicate(e) ? n + 1 : n), 0);
}

/** Linear-interpolated percentile (0..1), matching percentile_cont. */
export function percentile(values: number[], fraction: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (sorted.length - 1) * fraction;
  const lo = sorted[Math.floor(rank)] ?? 0;
  const hi = sorted[Math.ceil(rank)] ?? lo;
  return lo + (hi - lo) * (rank - Math.floor(rank));
}

export function median(values: number[]): number | null {
  return percentile(values, 0.5);
}

function average(values: number[]): number | null {
  return values.length === 0 ? null : values.reduce((a, b) => a + b, 0) / values.length;
}

export interface ResponsePair {
  guest: AnalyticsEvent;
  reply: AnalyticsEvent;
  seconds: number;
}

/**
 * Each guest message paired with the next assistant message in the same
 * session. Gaps over the cap are dropped.
 */
export function responsePairs(events: AnalyticsEvent[]): ResponsePair[] {
  const bySession = new Map<string, AnalyticsEvent[]>();
  for (const e of events) {
    if (e.eventName !== 'message_sent' || !e.sessionId) continue;
    const list = bySession.get(e.sessionId) ?? [];
    list.push(e);
    bySession.set(e.sessionId, list);
  }

  const pairs: ResponsePair[] = [];
  for (const list of bySession.values()) {
    list.forEach((message, i) => {
      if (!GUEST_SENDERS.has(message.sender ?? '')) return;
      const reply = list
        .slice(i + 1)
        .find(
          (next) =>
            ASSISTANT_SENDERS.has(next.sender ?? '') &&
            next.createdAt.getTime() > message.createdAt.getTime(),
        );
      if (!reply) return;
      const gap = (reply.createdAt.getTime() - message.createdAt.getTime()) / 1000;
      if (gap >= 0 && gap <= analyticsConfig.RESPONSE_GAP_CAP_SECONDS) {
        pairs.push({ guest: message, reply, seconds: gap });
      }
    });
  }
  return pairs;
}

/** Seconds from each guest message to its assistant reply. */
export function responseTimes(events: AnalyticsEvent[]): number[] {
  return responsePairs(events).map((pair) => pair.seconds);
}

export function summarizeEvents(events: AnalyticsEvent[]): ChatSummary {
  const named = (name: string) => (e: AnalyticsEvent) => e.eventName === name;
  const reaction = (value: string) => (e: AnalyticsEvent) =>
    e.eventName === 'reaction_set' && e.data.value === value;

  const followupsShown = countWhere(events, named('followups_shown'));
  const followupClicks = countWhere(events, named('followup_click'));
  const times = responseTimes(events);

  return {
    sessionsTotal: countWhere(events, named('chat_session_created')),
    guestMessages: countWhere(
      events,
      (e) => e.eventName === 'message_sent' && GUEST_SENDERS.has(e.sender ?? ''),
    ),
    assistantMessages: countWhere(
      events,
      (e) => e.eventName === 'message_sent' && ASSISTANT_SENDERS.has(e.sender ?? ''),
    ),
    followupsShown,
    followupClicks,
    followupConversionRate: followupsShown === 0 ? 0 : followupClicks / followupsShown,
    reactionsUp: countWhere(events, reaction('up')),
    reactionsDown: countWhere(events, reaction('down')),
    avgResponseSeconds: average(times),
    p50ResponseSeconds: median(times),
  };
}

export async function chatSummary(
  pmcId: string,
  from: Date,
  to: Date,
  propertyId?: string,
): Promise<ChatSummary> {
  return summarizeEvents(await analyticsDal.listInRange(pmcId, from, to, propertyId));
}

export type Bucket = 'day' | 'hour';

export interface ChatTimeseries {
  bucket: Bucket;
  labels: string[];
  series: {
    sessions: number[];
    messages: number[];
    followupClicks: number[];
    followupsShown: number[];
  };
}

const HOUR_MS = 60 * 60 * 1000;

function bucketStart(at: Date, bucket: Bucket): number {
  const ms = at.getTime();
  return bucket === 'hour'
    ? Math.floor(ms / HOUR_MS) * HOUR_MS
    : Date.parse(`${toIsoDate(at)}T00:00:00Z`);
}

function bucketLabel(startMs: number, bucket: Bucket): string {
  const iso = new Date(startMs).toISOString();
  return bucket === 'hour' ? `${iso.slice(0, 13)}:00` : iso.slice(0, 10);
}

/** Per-bucket counts over [from, to), zero-filled, UTC buckets. */
export function bucketEvents(events: AnalyticsEvent[], from: Date, to: Date, bucket: Bucket): ChatTimeseries {
  const step = bucket === 'hour' ? HOUR_MS : 24 * HOUR_MS;
  const starts: number[] = [];
  for (let t = bucketStart(from, bucket); t < to.getTime(); t += step) starts.push(t);

  const index = new Map(starts.map((start, i) => [start, i]));
  const zeros = () => starts.map(() => 0);
  const series = { sessions: zeros(), messages: zeros(), followupClicks: zeros(), followupsShown: zeros() };
  const keyFor: Record<string, keyof typeof series> = {
    chat_session_created: 'sessions',
    message_sent: 'messages',
    followup_click: 'followupClicks',
    followups_shown: 'followupsShown',
  };

  for (const e of events) {
    const key = keyFor[e.eventName];
    const i = index.get(bucketStart(e.createdAt, bucket));
    if (!key || i === undefined) continue;
    series[key][i] = (series[key][i] ?? 0) + 1;
  }

  return { bucket, labels: starts.map((start) => bucketLabel(start, bucket)), series };
}

export async function chatTimeseries(
  pmcId: string,
  from: Date,
  to: Date,
  bucket: Bucket,
  propertyId?: string,
): Promise<ChatTimeseries> {
  return bucketEvents(await analyticsDal.listInRange(pmcId, from, to, propertyId), from, to, bucket);
}

export interface PropertyActivity {
  propertyId: string;
  sessions: number;
  messages: number;
  followupsShown: number;
  followupClicks: number;
  conversionRate: number | null;
}

/** Busiest properties by sessions, then messages. */
export async function topProperties(pmcId: string, from: Date, to: Date, limit = 10): Promise<PropertyActivity[]> {
  const byProperty = new Map<string, PropertyActivity>();
  for (const e of await analyticsDal.listInRange(pmcId, from, to)) {
    if (!e.propertyId) continue;
    const row = byProperty.get(e.propertyId) ?? {
      propertyId: e.propertyId,
      sessions: 0,
      messages: 0,
      followupsShown: 0,
      followupClicks: 0,
      conversionRate: null,
    };
    if (e.eventName === 'chat_session_created') row.sessions++;
    else if (e.eventName === 'message_sent') row.messages++;
    else if (e.eventName === 'followups_shown') row.followupsShown++;
    else if (e.eventName === 'followup_click') row.followupClicks++;
    byProperty.set(e.propertyId, row);
  }

  return [...byProperty.values()]
    .map((row) => ({
      ...row,
      conversionRate: row.followupsShown === 0 ? null : row.followupClicks / row.followupsShown,
    }))
    .sort((a, b) => b.sessions - a.sessions || b.messages - a.messages)
    .slice(0, limit);
}

export interface ResponseTimeReport {
  samples: number;
  avgSeconds: number;
  p50Seconds: number;
  p90Seconds: number;
}

/** Response-time distribution; all zero when there are no samples. */
export function summarizeResponseTimes(events: AnalyticsEvent[]): ResponseTimeReport {
  const times = responseTimes(events);
  return {
    samples: times.length,
    avgSeconds: average(times) ?? 0,
    p50Seconds: percentile(times, 0.5) ?? 0,
    p90Seconds: percentile(times, 0.9) ?? 0,
  };
}

export async function responseTimeReport(
  pmcId: string,
  from: Date,
  to: Date,
  propertyId?: string,
): Promise<ResponseTimeReport> {
  return summarizeResponseTimes(await analyticsDal.listInRange(pmcId, from, to, propertyId));
}

export interface AssistantPerformance {
  assistantKey: string;
  userMessages: number;
  assistantMessages: number;
  responseSamples: number;
  avgResponseSeconds: number;
  p50ResponseSeconds: number;
}

/** Which assistant variant produced a message: `data.assistant`, then the variant, then "default". */
export function assistantKeyOf(event: AnalyticsEvent): string {
  const named = event.data.assistant;
  if (typeof named === 'string' && named) return named;
  return event.variant || 'default';
}

/**
 * Message counts and response times per assistant variant, busiest first.
 * A response is credited to the variant that sent the reply.
 */
export function rankAssistants(events: AnalyticsEvent[], limit = 50): AssistantPerformance[] {
  const rows = new Map<string, { user: number; assistant: number; times: number[] }>();
  const rowFor = (key: string) => {
    const row = rows.get(key) ?? { user: 0, assistant: 0, times: [] };
    rows.set(key, row);
    return row;
  };

  for (const e of events) {
    if (e.eventName !== 'message_sent' || !e.sessionId) continue;
    const sender = e.sender ?? '';
    if (GUEST_SENDERS.has(sender)) rowFor(assistantKeyOf(e)).user++;
    else if (ASSISTANT_SENDERS.has(sender)) rowFor(assistantKeyOf(e)).assistant++;
  }
  for (const pair of responsePairs(events)) rowFor(assistantKeyOf(pair.reply)).times.push(pair.seconds);

  return [...rows.entries()]
    .map(([assistantKey, row]) => ({
      assistantKey,
      userMessages: row.user,
      assistantMessages: row.assistant,
      responseSamples: row.times.length,
      avgResponseSeconds: average(row.times) ?? 0,
      p50ResponseSeconds: median(row.times) ?? 0,
    }))
    .sort((a, b) => b.assistantMessages - a.assistantMessages || b.responseSamples - a.responseSamples)
    .slice(0, limit);
}

export async function assistantPerformance(
  pmcId: string,
  from: Date,
  to: Date,
  opts: { propertyId?: string; limit?: number } = {},
): Promise<AssistantPerformance[]> {
  return rankAssistants(await analyticsDal.listInRange(pmcId, from, to, opts.propertyId), opts.limit);
}

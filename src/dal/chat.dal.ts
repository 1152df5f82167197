import { and, asc, count, desc, eq, max, or, sql, type SQL } from 'drizzle-orm';
import type { Db } from '../db/client';
import {
  chatMessages,
  chatSessions,
  properties,
  type ActionPriority,
  type ChatMessage,
  type ChatSession,
  type EscalationLevel,
} from '../db/schema';

export type CreateChatSessionInput = typeof chatSessions.$inferInsert;
export type ChatSessionPatch = Partial<
  Omit<CreateChatSessionInput, 'id' | 'propertyId' | 'createdAt' | 'updatedAt'>
>;
export type CreateChatMessageInput = Omit<typeof chatMessages.$inferInsert, 'id'>;

export interface ListChatSessionsInput {
  pmcId: string;
  propertyId?: string;
  resolved?: boolean;
  priority?: ActionPriority;
  escalation?: EscalationLevel;
  mood?: string;
  q?: string;
  limit: number;
  offset: number;
}

export type ChatSessionListItem = ChatSession & { propertyName: string };

/**
 * Data Access Layer for chat sessions and their messages.
 * Message ids are autoincrement, so ordering by id is insertion order.
 */
export class ChatDal {
  constructor(private readonly db: Db) {}

  async createSession(input: CreateChatSessionInput): Promise<ChatSession> {
    return this.db.insert(chatSessions).values(input).returning().get();
  }

  async findSession(sessionId: string): Promise<ChatSession | undefined> {
    return this.db.select().from(chatSessions).where(eq(chatSessions.id, sessionId)).get();
  }

  /** Newest verified session opened for a reservation, if any. */
  async findLatestVerifiedForReservation(
    propertyId: string,
    reservationId: string,
  ): Promise<ChatSession | undefined> {
    return this.db
      .select()
      .from(chatSessions)
      .where(
        and(
          eq(chatSessions.propertyId, propertyId),
          eq(chatSessions.reservationId, reservationId),
          eq(chatSessions.isVerified, true),
        ),
      )
      .orderBy(desc(chatSessions.createdAt), desc(sql`rowid`))
      .get();
  }

  /** Session lookup scoped to a PMC through the owning property. */
  async findSessionForPmc(pmcId: string, sessionId: string): Promise<ChatSession | undefined> {
    const row = await this.db
      .select({ session: chatSessions })
      .from(chatSessions)
      .innerJoin(properties, eq(properties.id, chatSessions.propertyId))
      .where(and(eq(chatSessions.id, sessionId), eq(properties.pmcId, pmcId)))
      .get();
    return row?.session;
  }

  async updateSession(
    sessionId: string,
    patch: ChatSessionPatch,
  ): Promise<ChatSession | undefined> {
    return this.db
      .update(chatSessions)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(chatSessions.id, sessionId))
      .returning()
      .get();
  }

  async addMessage(input: CreateChatMessageInput): Promise<ChatMessage> {
    return this.db.insert(chatMessages).values(input).returning().get();
  }

  /**
   * Messages in insertion order. With `limit`, only the most recent
   * `limit` messages are returned (still oldest first).
   */
  async listMessages(sessionId: string, limit?: number): Promise<ChatMessage[]> {
    if (limit === undefined) {
      return this.db
        .select()
        .from(chatMessages)
        .where(eq(chatMessages.sessionId, sessionId))
        .orderBy(asc(chatMessages.id))
        .all();
    }

    const latest = await this.db
      .select()
      .from(chatMessages)
      .where(eq(chatMessages.sessionId, sessionId))
      .orderBy(desc(chatMessages.id))
      .limit(limit)
      .all();
    return latest.reverse();
  }

  async lastMessageAt(sessionId: string): Promise<Date | null> {
    const row = await this.db
      .select({ at: max(chatMessages.createdAt) })
      .from(chatMessages)
      .where(eq(chatMessages.sessionId, sessionId))
      .get();
    return row?.at ?? null;
  }

  async listSessions(
    input: ListChatSessionsInput,
  ): Promise<{ sessions: ChatSessionListItem[]; total: number }> {
    const filters: Array<SQL | undefined> = [
      eq(properties.pmcId, input.pmcId),
      input.propertyId ? eq(chatSessions.propertyId, input.propertyId) : undefined,
      input.resolved !== undefined ? eq(chatSessions.isResolved, input.resolved) : undefined,
      input.priority ? eq(chatSessions.actionPriority, input.priority) : undefined,
      input.escalation ? eq(chatSessions.escalationLevel, input.escalation) : undefined,
      input.mood ? eq(chatSessions.guestMood, input.mood) : undefined,
    ];
    if (input.q) {
      const pattern = `%${input.q.toLowerCase()}%`;
      filters.push(
        or(
          sql`lower(coalesce(${chatSessions.guestName}, '')) like ${pattern}`,
          sql`lower(coalesce(${chatSessions.aiSummary}, '')) like ${pattern}`,
        ),
      );
    }
    const where = and(...filters);

    const rows = await this.db
      .select({ session: chatSessions, propertyName: properties.name })
      .from(chatSessions)
      .innerJoin(properties, eq(properties.id, chatSessions.propertyId))
      .where(where)
      .orderBy(desc(chatSessions.lastActivityAt), desc(chatSessions.createdAt))
      .limit(input.limit)
      .offset(input.offset)
      .all();

    const totalRow = await this.db
      .select({ total: count() })
      .from(chatSessions)
      .innerJoin(properties, eq(properties.id, chatSessions.propertyId))
      .where(where)
      .get();

    return {
      sessions: rows.map((row) => ({ ...row.session, propertyName: row.propertyName })),
      total: totalRow?.total ?? 0,
    };
  }
}

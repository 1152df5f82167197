import { and, count, desc, eq, or, sql, type SQL } from 'drizzle-orm';
import type { Db } from '../db/client';
import { pmcMessages, type PmcMessage } from '../db/schema';

export type UpsertPmcMessageInput = Omit<
  typeof pmcMessages.$inferInsert,
  'id' | 'status' | 'isRead' | 'createdAt' | 'updatedAt'
>;

export interface ListPmcMessagesInput {
  pmcId: string;
  status?: 'open' | 'resolved';
  type?: string;
  q?: string;
  limit: number;
  offset: number;
}

/**
 * Data Access Layer for the admin inbox. (pmcId, dedupeKey) is unique so
 * repeated notifications for the same thing collapse into one row.
 */
export class PmcMessageDal {
  constructor(private readonly db: Db) {}

  /** Insert, or refresh the existing row for the dedupe key and reopen it as unread. */
  async upsert(input: UpsertPmcMessageInput): Promise<PmcMessage> {
    const now = new Date();
    return this.db
      .insert(pmcMessages)
      .values({ ...input, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [pmcMessages.pmcId, pmcMessages.dedupeKey],
        set: {
          type: input.type,
          subject: input.subject,
          body: input.body,
          severity: input.severity,
          propertyId: input.propertyId,
          upgradePurchaseId: input.upgradePurchaseId,
          upgradeId: input.upgradeId,
          guestSessionId: input.guestSessionId,
          linkUrl: input.linkUrl,
          status: 'open',
          isRead: false,
          updatedAt: now,
        },
      })
      .returning()
      .get();
  }

  async countUnread(pmcId: string): Promise<number> {
    const row = await this.db
      .select({ unread: count() })
      .from(pmcMessages)
      .where(and(eq(pmcMessages.pmcId, pmcId), eq(pmcMessages.isRead, false)))
      .get();
    return row?.unread ?? 0;
  }

  async list(input: ListPmcMessagesInput): Promise<{ messages: PmcMessage[]; total: number }> {
    const filters: Array<SQL | undefined> = [
      eq(pmcMessages.pmcId, input.pmcId),
      input.status ? eq(pmcMessages.status, input.status) : undefined,
      input.type ? eq(pmcMessages.type, input.type) : undefined,
    ];
    if (input.q) {
      const pattern = `%${input.q.toLowerCase()}%`;
      filters.push(
        or(
          sql`lower(${pmcMessages.subject}) like ${pattern}`,
          sql`lower(${pmcMessages.body}) like ${pattern}`,
        ),
      );
    }
    const where = and(...filters);

    const messages = await this.db
      .select()
      .from(pmcMessages)
      .where(where)
      .orderBy(desc(pmcMessages.createdAt), desc(pmcMessages.id))
      .limit(input.limit)
      .offset(input.offset)
      .all();
    const totalRow = await this.db.select({ total: count() }).from(pmcMessages).where(where).get();

    return { messages, total: totalRow?.total ?? 0 };
  }

  async markRead(pmcId: string, messageId: string): Promise<PmcMessage | undefined> {
    return this.db
      .update(pmcMessages)
      .set({ isRead: true, updatedAt: new Date() })
      .where(and(eq(pmcMessages.pmcId, pmcId), eq(pmcMessages.id, messageId)))
      .returning()
      .get();
  }

  async resolve(pmcId: string, messageId: string): Promise<PmcMessage | undefined> {
    return this.db
      .update(pmcMessages)
      .set({ status: 'resolved', isRead: true, updatedAt: new Date() })
      .where(and(eq(pmcMessages.pmcId, pmcId), eq(pmcMessages.id, messageId)))
      .returning()
      .get();
  }

  async resolveByDedupeKey(pmcId: string, dedupeKey: string): Promise<PmcMessage | undefined> {
    return this.db
      .update(pmcMessages)
      .set({ status: 'resolved', updatedAt: new Date() })
      .where(and(eq(pmcMessages.pmcId, pmcId), eq(pmcMessages.dedupeKey, dedupeKey)))
      .returning()
      .get();
  }
}

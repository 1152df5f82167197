import { and, asc, eq, gte, lt } from 'drizzle-orm';
import type { Db } from '../db/client';
import { analyticsEvents, type AnalyticsEvent } from '../db/schema';

export type CreateAnalyticsEventInput = Omit<typeof analyticsEvents.$inferInsert, 'id'>;

/**
 * Append-only store for chat analytics events.
 */
export class AnalyticsEventDal {
  constructor(private readonly db: Db) {}

  async create(input: CreateAnalyticsEventInput): Promise<AnalyticsEvent> {
    return this.db.insert(analyticsEvents).values(input).returning().get();
  }

  /** Events for a PMC with createdAt in [from, to), oldest first. */
  async listInRange(
    pmcId: string,
    from: Date,
    to: Date,
    propertyId?: string,
  ): Promise<AnalyticsEvent[]> {
    return this.db
      .select()
      .from(analyticsEvents)
      .where(
        and(
          eq(analyticsEvents.pmcId, pmcId),
          gte(analyticsEvents.createdAt, from),
          lt(analyticsEvents.createdAt, to),
          propertyId ? eq(analyticsEvents.propertyId, propertyId) : undefined,
        ),
      )
      .orderBy(asc(analyticsEvents.createdAt), asc(analyticsEvents.id))
      .all();
  }
}

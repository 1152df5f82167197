import { asc, desc, eq } from 'drizzle-orm';
import type { Db } from '../db/client';
import { events, type TelemetryEvent } from '../db/schema';

export interface CreateEventInput {
  pmcId?: string | null;
  type: string;
  payload: string;
  requestId?: string;
  span?: string;
  durationMs?: number;
  entityType?: string;
  entityId?: string;
}

/**
 * Data Access Layer for the events table.
 * Accepts a drizzle database so it can be tested with isolated DBs.
 */
export class EventsDal {
  constructor(private readonly db: Db) {}

  async create(data: CreateEventInput): Promise<TelemetryEvent> {
    return this.db.insert(events).values(data).returning().get();
  }

  async findByType(type: string, limit = 100): Promise<TelemetryEvent[]> {
    return this.db
      .select()
      .from(events)
      .where(eq(events.type, type))
      .orderBy(desc(events.createdAt))
      .limit(limit)
      .all();
  }

  async findByPmc(pmcId: string, limit = 100): Promise<TelemetryEvent[]> {
    return this.db
      .select()
      .from(events)
      .where(eq(events.pmcId, pmcId))
      .orderBy(desc(events.createdAt))
      .limit(limit)
      .all();
  }

  async findByRequestId(requestId: string): Promise<TelemetryEvent[]> {
    return this.db
      .select()
      .from(events)
      .where(eq(events.requestId, requestId))
      .orderBy(asc(events.createdAt))
      .all();
  }
}

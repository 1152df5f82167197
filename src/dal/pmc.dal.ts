import { and, asc, eq, sql } from 'drizzle-orm';
import type { Db } from '../db/client';
import { pmcs, type Pmc } from '../db/schema';

export type CreatePmcInput = typeof pmcs.$inferInsert;
export type PmcPatch = Partial<Omit<CreatePmcInput, 'id' | 'createdAt'>>;

/**
 * Data Access Layer for PMCs (tenants).
 */
export class PmcDal {
  constructor(private readonly db: Db) {}

  async create(input: CreatePmcInput): Promise<Pmc> {
    return this.db.insert(pmcs).values(input).returning().get();
  }

  async findById(pmcId: string): Promise<Pmc | undefined> {
    return this.db.select().from(pmcs).where(eq(pmcs.id, pmcId)).get();
  }

  async findByEmail(email: string): Promise<Pmc | undefined> {
    return this.db
      .select()
      .from(pmcs)
      .where(sql`lower(${pmcs.email}) = ${email.trim().toLowerCase()}`)
      .orderBy(asc(pmcs.createdAt))
      .get();
  }

  async findByStripeCustomerId(customerId: string): Promise<Pmc | undefined> {
    return this.db.select().from(pmcs).where(eq(pmcs.stripeCustomerId, customerId)).get();
  }

  async findByStripeSubscriptionId(subscriptionId: string): Promise<Pmc | undefined> {
    return this.db
      .select()
      .from(pmcs)
      .where(eq(pmcs.stripeSubscriptionId, subscriptionId))
      .get();
  }

  /** Active PMCs with sync switched on, oldest first. */
  async listSyncable(): Promise<Pmc[]> {
    return this.db
      .select()
      .from(pmcs)
      .where(and(eq(pmcs.active, true), eq(pmcs.syncEnabled, true)))
      .orderBy(asc(pmcs.createdAt))
      .all();
  }

  async update(pmcId: string, patch: PmcPatch): Promise<Pmc | undefined> {
    return this.db
      .update(pmcs)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(pmcs.id, pmcId))
      .returning()
      .get();
  }
}

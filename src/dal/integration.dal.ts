import { and, eq } from 'drizzle-orm';
import type { Db } from '../db/client';
import { pmcIntegrations, type IntegrationProvider, type PmcIntegration } from '../db/schema';

export type IntegrationPatch = Partial<
  Omit<typeof pmcIntegrations.$inferInsert, 'id' | 'pmcId' | 'provider' | 'createdAt'>
>;

/**
 * Data Access Layer for per-PMC provider credentials (Hostaway, Stripe Connect).
 * One row per (pmcId, provider).
 */
export class IntegrationDal {
  constructor(private readonly db: Db) {}

  async findByProvider(
    pmcId: string,
    provider: IntegrationProvider,
  ): Promise<PmcIntegration | undefined> {
    return this.db
      .select()
      .from(pmcIntegrations)
      .where(and(eq(pmcIntegrations.pmcId, pmcId), eq(pmcIntegrations.provider, provider)))
      .get();
  }

  async upsert(
    pmcId: string,
    provider: IntegrationProvider,
    patch: IntegrationPatch,
  ): Promise<PmcIntegration> {
    const now = new Date();
    return this.db
      .insert(pmcIntegrations)
      .values({ pmcId, provider, ...patch, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [pmcIntegrations.pmcId, pmcIntegrations.provider],
        set: { ...patch, updatedAt: now },
      })
      .returning()
      .get();
  }

  async update(integrationId: string, patch: IntegrationPatch): Promise<void> {
    this.db
      .update(pmcIntegrations)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(pmcIntegrations.id, integrationId))
      .run();
  }
}

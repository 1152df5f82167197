import { and, asc, eq, ne } from 'drizzle-orm';
import type { Db } from '../db/client';
import { upgrades, type Upgrade } from '../db/schema';

export type CreateUpgradeInput = typeof upgrades.$inferInsert;
export type UpgradePatch = Partial<
  Omit<CreateUpgradeInput, 'id' | 'propertyId' | 'createdAt' | 'updatedAt'>
>;

/**
 * Data Access Layer for paid upgrades. Slugs are unique per property.
 */
export class UpgradeDal {
  constructor(private readonly db: Db) {}

  async create(input: CreateUpgradeInput): Promise<Upgrade> {
    return this.db.insert(upgrades).values(input).returning().get();
  }

  async listByProperty(
    propertyId: string,
    opts: { activeOnly?: boolean } = {},
  ): Promise<Upgrade[]> {
    return this.db
      .select()
      .from(upgrades)
      .where(
        and(
          eq(upgrades.propertyId, propertyId),
          opts.activeOnly ? eq(upgrades.isActive, true) : undefined,
        ),
      )
      .orderBy(asc(upgrades.sortOrder), asc(upgrades.createdAt))
      .all();
  }

  async findById(upgradeId: string): Promise<Upgrade | undefined> {
    return this.db.select().from(upgrades).where(eq(upgrades.id, upgradeId)).get();
  }

  async findForProperty(propertyId: string, upgradeId: string): Promise<Upgrade | undefined> {
    return this.db
      .select()
      .from(upgrades)
      .where(and(eq(upgrades.propertyId, propertyId), eq(upgrades.id, upgradeId)))
      .get();
  }

  async slugTaken(propertyId: string, slug: string, excludeUpgradeId?: string): Promise<boolean> {
    const row = await this.db
      .select({ id: upgrades.id })
      .from(upgrades)
      .where(
        and(
          eq(upgrades.propertyId, propertyId),
          eq(upgrades.slug, slug),
          excludeUpgradeId ? ne(upgrades.id, excludeUpgradeId) : undefined,
        ),
      )
      .get();
    return row !== undefined;
  }

  async nextSortOrder(propertyId: string): Promise<number> {
    const rows = await this.listByProperty(propertyId);
    return rows.reduce((max, row) => Math.max(max, row.sortOrder + 1), 0);
  }

  async update(
    propertyId: string,
    upgradeId: string,
    patch: UpgradePatch,
  ): Promise<Upgrade | undefined> {
    return this.db
      .update(upgrades)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(upgrades.propertyId, propertyId), eq(upgrades.id, upgradeId)))
      .returning()
      .get();
  }

  async delete(propertyId: string, upgradeId: string): Promise<boolean> {
    const row = await this.db
      .delete(upgrades)
      .where(and(eq(upgrades.propertyId, propertyId), eq(upgrades.id, upgradeId)))
      .returning({ id: upgrades.id })
      .get();
    return row !== undefined;
  }

  async reorder(propertyId: string, orderedIds: string[]): Promise<void> {
    const now = new Date();
    this.db.transaction((tx) => {
      orderedIds.forEach((upgradeId, position) => {
        tx.update(upgrades)
          .set({ sortOrder: position, updatedAt: now })
          .where(and(eq(upgrades.propertyId, propertyId), eq(upgrades.id, upgradeId)))
          .run();
      });
    });
  }
}

import { and, asc, eq } from 'drizzle-orm';
import type { Db } from '../db/client';
import { guides, type Guide } from '../db/schema';

export type CreateGuideInput = typeof guides.$inferInsert;
export type GuidePatch = Partial<
  Omit<CreateGuideInput, 'id' | 'propertyId' | 'createdAt' | 'updatedAt'>
>;

/**
 * Data Access Layer for host-authored guides.
 * Callers check property ownership before reaching this layer.
 */
export class GuideDal {
  constructor(private readonly db: Db) {}

  async create(input: CreateGuideInput): Promise<Guide> {
    return this.db.insert(guides).values(input).returning().get();
  }

  async listByProperty(propertyId: string, opts: { activeOnly?: boolean } = {}): Promise<Guide[]> {
    return this.db
      .select()
      .from(guides)
      .where(
        and(
          eq(guides.propertyId, propertyId),
          opts.activeOnly ? eq(guides.isActive, true) : undefined,
        ),
      )
      .orderBy(asc(guides.sortOrder), asc(guides.createdAt))
      .all();
  }

  async findById(propertyId: string, guideId: string): Promise<Guide | undefined> {
    return this.db
      .select()
      .from(guides)
      .where(and(eq(guides.propertyId, propertyId), eq(guides.id, guideId)))
      .get();
  }

  async nextSortOrder(propertyId: string): Promise<number> {
    const rows = await this.listByProperty(propertyId);
    return rows.reduce((max, row) => Math.max(max, row.sortOrder + 1), 0);
  }

  async update(propertyId: string, guideId: string, patch: GuidePatch): Promise<Guide | undefined> {
    return this.db
      .update(guides)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(guides.propertyId, propertyId), eq(guides.id, guideId)))
      .returning()
      .get();
  }

  async delete(propertyId: string, guideId: string): Promise<boolean> {
    const row = await this.db
      .delete(guides)
      .where(and(eq(guides.propertyId, propertyId), eq(guides.id, guideId)))
      .returning({ id: guides.id })
      .get();
    return row !== undefined;
  }

  /** Rewrites sortOrder to match the position of each id in `orderedIds`. */
  async reorder(propertyId: string, orderedIds: string[]): Promise<void> {
    const now = new Date();
    this.db.transaction((tx) => {
      orderedIds.forEach((guideId, position) => {
        tx.update(guides)
          .set({ sortOrder: position, updatedAt: now })
          .where(and(eq(guides.propertyId, propertyId), eq(guides.id, guideId)))
          .run();
      });
    });
  }
}

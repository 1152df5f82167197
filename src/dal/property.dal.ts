import { and, asc, eq, isNull, ne } from 'drizzle-orm';
import type { Db } from '../db/client';
import { properties, type Property } from '../db/schema';

export type CreatePropertyInput = typeof properties.$inferInsert;
export type PropertyPatch = Partial<
  Omit<CreatePropertyInput, 'id' | 'pmcId' | 'createdAt' | 'updatedAt'>
>;

/**
 * Data Access Layer for properties.
 * All admin queries are scoped by pmcId; soft-deleted rows are hidden
 * unless a method says otherwise.
 */
export class PropertyDal {
  constructor(private readonly db: Db) {}

  async create(input: CreatePropertyInput): Promise<Property> {
    return this.db.insert(properties).values(input).returning().get();
  }

  async findById(pmcId: string, propertyId: string): Promise<Property | undefined> {
    return this.db
      .select()
      .from(properties)
      .where(
        and(
          eq(properties.id, propertyId),
          eq(properties.pmcId, pmcId),
          isNull(properties.deletedAt),
        ),
      )
      .get();
  }

  /** Guest-facing lookup: no tenant in the URL, only the property id. */
  async findLiveById(propertyId: string): Promise<Property | undefined> {
    return this.db
      .select()
      .from(properties)
      .where(and(eq(properties.id, propertyId), isNull(properties.deletedAt)))
      .get();
  }

  /** Includes soft-deleted rows so a re-synced listing revives its old record. */
  async findByExternalId(
    pmcId: string,
    provider: string,
    externalPropertyId: string,
  ): Promise<Property | undefined> {
    return this.db
      .select()
      .from(properties)
      .where(
        and(
          eq(properties.pmcId, pmcId),
          eq(properties.provider, provider),
          eq(properties.externalPropertyId, externalPropertyId),
        ),
      )
      .get();
  }

  async listByPmc(pmcId: string): Promise<Property[]> {
    return this.db
      .select()
      .from(properties)
      .where(and(eq(properties.pmcId, pmcId), isNull(properties.deletedAt)))
      .orderBy(asc(properties.name))
      .all();
  }

  async slugTaken(pmcId: string, slug: string, excludePropertyId?: string): Promise<boolean> {
    const row = await this.db
      .select({ id: properties.id })
      .from(properties)
      .where(
        and(
          eq(properties.pmcId, pmcId),
          eq(properties.slug, slug),
          isNull(properties.deletedAt),
          excludePropertyId ? ne(properties.id, excludePropertyId) : undefined,
        ),
      )
      .get();
    return row !== undefined;
  }

  async update(
    pmcId: string,
    propertyId: string,
    patch: PropertyPatch,
  ): Promise<Property | undefined> {
    return this.db
      .update(properties)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(properties.id, propertyId), eq(properties.pmcId, pmcId)))
      .returning()
      .get();
  }

  async softDelete(pmcId: string, propertyId: string): Promise<boolean> {
    const row = await this.db
      .update(properties)
      .set({ deletedAt: new Date(), chatEnabled: false, updatedAt: new Date() })
      .where(
        and(
          eq(properties.id, propertyId),
          eq(properties.pmcId, pmcId),
          isNull(properties.deletedAt),
        ),
      )
      .returning({ id: properties.id })
      .get();
    return row !== undefined;
  }
}

import { and, asc, eq, sql } from 'drizzle-orm';
import type { Db } from '../db/client';
import { pmcUsers, type PmcUser } from '../db/schema';

export type CreatePmcUserInput = typeof pmcUsers.$inferInsert;
export type PmcUserPatch = Partial<
  Pick<CreatePmcUserInput, 'fullName' | 'role' | 'isActive' | 'notificationPrefs' | 'timezone'>
>;

/**
 * Data Access Layer for team members. Emails are stored lower-cased.
 */
export class PmcUserDal {
  constructor(private readonly db: Db) {}

  async create(input: CreatePmcUserInput): Promise<PmcUser> {
    return this.db
      .insert(pmcUsers)
      .values({ ...input, email: input.email.trim().toLowerCase() })
      .returning()
      .get();
  }

  /** First active membership for an email, across all PMCs. */
  async findActiveByEmail(email: string): Promise<PmcUser | undefined> {
    return this.db
      .select()
      .from(pmcUsers)
      .where(
        and(
          sql`lower(${pmcUsers.email}) = ${email.trim().toLowerCase()}`,
          eq(pmcUsers.isActive, true),
        ),
      )
      .orderBy(asc(pmcUsers.createdAt))
      .get();
  }

  async findByEmail(pmcId: string, email: string): Promise<PmcUser | undefined> {
    return this.db
      .select()
      .from(pmcUsers)
      .where(and(eq(pmcUsers.pmcId, pmcId), eq(pmcUsers.email, email.trim().toLowerCase())))
      .get();
  }

  async findById(pmcId: string, userId: string): Promise<PmcUser | undefined> {
    return this.db
      .select()
      .from(pmcUsers)
      .where(and(eq(pmcUsers.pmcId, pmcId), eq(pmcUsers.id, userId)))
      .get();
  }

  async listByPmc(pmcId: string): Promise<PmcUser[]> {
    return this.db
      .select()
      .from(pmcUsers)
      .where(eq(pmcUsers.pmcId, pmcId))
      .orderBy(asc(pmcUsers.createdAt))
      .all();
  }

  async update(pmcId: string, userId: string, patch: PmcUserPatch): Promise<PmcUser | undefined> {
    return this.db
      .update(pmcUsers)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(pmcUsers.pmcId, pmcId), eq(pmcUsers.id, userId)))
      .returning()
      .get();
  }

  async touchLogin(userId: string): Promise<void> {
    this.db
      .update(pmcUsers)
      .set({ lastLoginAt: new Date() })
      .where(eq(pmcUsers.id, userId))
      .run();
  }
}

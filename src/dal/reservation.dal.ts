import { and, asc, eq, ne } from 'drizzle-orm';
import type { Db } from '../db/client';
import { reservations, type Reservation } from '../db/schema';

export type UpsertReservationInput = Omit<
  typeof reservations.$inferInsert,
  'id' | 'createdAt' | 'updatedAt'
>;

/**
 * Data Access Layer for reservations synced from the PMS.
 */
export class ReservationDal {
  constructor(private readonly db: Db) {}

  /** Last write wins on (propertyId, externalReservationId). */
  async upsert(input: UpsertReservationInput): Promise<Reservation> {
    const now = new Date();
    const { propertyId: _propertyId, externalReservationId: _externalId, ...fields } = input;
    return this.db
      .insert(reservations)
      .values({ ...input, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [reservations.propertyId, reservations.externalReservationId],
        set: { ...fields, updatedAt: now },
      })
      .returning()
      .get();
  }

  async findById(reservationId: string): Promise<Reservation | undefined> {
    return this.db.select().from(reservations).where(eq(reservations.id, reservationId)).get();
  }

  /** Non-cancelled reservations of a property whose booking phone ends in `last4`. */
  async findByPhoneLast4(propertyId: string, last4: string): Promise<Reservation[]> {
    return this.db
      .select()
      .from(reservations)
      .where(
        and(
          eq(reservations.propertyId, propertyId),
          eq(reservations.phoneLast4, last4),
          ne(reservations.status, 'cancelled'),
        ),
      )
      .orderBy(asc(reservations.arrivalDate))
      .all();
  }

  async listByProperty(propertyId: string): Promise<Reservation[]> {
    return this.db
      .select()
      .from(reservations)
      .where(eq(reservations.propertyId, propertyId))
      .orderBy(asc(reservations.arrivalDate))
      .all();
  }

  /** Another live reservation that departs on `date` (same-day turnover before arrival). */
  async hasDepartureOn(propertyId: string, date: string, excludeId?: string): Promise<boolean> {
    const row = await this.db
      .select({ id: reservations.id })
      .from(reservations)
      .where(
        and(
          eq(reservations.propertyId, propertyId),
          eq(reservations.departureDate, date),
          ne(reservations.status, 'cancelled'),
          excludeId ? ne(reservations.id, excludeId) : undefined,
        ),
      )
      .get();
    return row !== undefined;
  }

  /** Another live reservation that arrives on `date` (same-day turnover after departure). */
  async hasArrivalOn(propertyId: string, date: string, excludeId?: string): Promise<boolean> {
    const row = await this.db
      .select({ id: reservations.id })
      .from(reservations)
      .where(
        and(
          eq(reservations.propertyId, propertyId),
          eq(reservations.arrivalDate, date),
          ne(reservations.status, 'cancelled'),
          excludeId ? ne(reservations.id, excludeId) : undefined,
        ),
      )
      .get();
    return row !== undefined;
  }
}

import { eq } from 'drizzle-orm';
import type { Db } from '../db/client';
import { stripeEvents } from '../db/schema';

/**
 * Ledger of processed Stripe webhook events, keyed by Stripe's event id.
 */
export class StripeEventDal {
  constructor(private readonly db: Db) {}

  /** Returns false when the event id was already recorded. */
  async record(eventId: string, type: string): Promise<boolean> {
    const row = await this.db
      .insert(stripeEvents)
      .values({ id: eventId, type })
      .onConflictDoNothing()
      .returning({ id: stripeEvents.id })
      .get();
    return row !== undefined;
  }

  /** Drops a recorded event so a redelivery is processed again. */
  async forget(eventId: string): Promise<void> {
    this.db.delete(stripeEvents).where(eq(stripeEvents.id, eventId)).run();
  }
}

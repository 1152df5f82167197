import { and, asc, eq, inArray } from 'drizzle-orm';
import type { Db } from '../db/client';
import { upgradePurchases, type PurchaseStatus, type UpgradePurchase } from '../db/schema';

export type CreatePurchaseInput = typeof upgradePurchases.$inferInsert;
export type PurchasePatch = Partial<
  Omit<CreatePurchaseInput, 'id' | 'guestSessionId' | 'upgradeId' | 'createdAt' | 'updatedAt'>
>;

const PAYABLE_STATUSES: PurchaseStatus[] = ['pending', 'canceled', 'failed'];

/**
 * Data Access Layer for upgrade purchases.
 * (guestSessionId, upgradeId) is unique: one purchase row per guest and upgrade.
 */
export class PurchaseDal {
  constructor(private readonly db: Db) {}

  async create(input: CreatePurchaseInput): Promise<UpgradePurchase> {
    return this.db.insert(upgradePurchases).values(input).returning().get();
  }

  async findById(purchaseId: string): Promise<UpgradePurchase | undefined> {
    return this.db
      .select()
      .from(upgradePurchases)
      .where(eq(upgradePurchases.id, purchaseId))
      .get();
  }

  async findBySessionAndUpgrade(
    guestSessionId: string,
    upgradeId: string,
  ): Promise<UpgradePurchase | undefined> {
    return this.db
      .select()
      .from(upgradePurchases)
      .where(
        and(
          eq(upgradePurchases.guestSessionId, guestSessionId),
          eq(upgradePurchases.upgradeId, upgradeId),
        ),
      )
      .get();
  }

  async findByCheckoutSessionId(checkoutSessionId: string): Promise<UpgradePurchase | undefined> {
    return this.db
      .select()
      .from(upgradePurchases)
      .where(eq(upgradePurchases.stripeCheckoutSessionId, checkoutSessionId))
      .get();
  }

  async findByPaymentIntentId(paymentIntentId: string): Promise<UpgradePurchase | undefined> {
    return this.db
      .select()
      .from(upgradePurchases)
      .where(eq(upgradePurchases.stripePaymentIntentId, paymentIntentId))
      .get();
  }

  async countByUpgrade(upgradeId: string): Promise<number> {
    const rows = await this.db
      .select({ id: upgradePurchases.id })
      .from(upgradePurchases)
      .where(eq(upgradePurchases.upgradeId, upgradeId))
      .all();
    return rows.length;
  }

  async listPaidUpgradeIds(guestSessionId: string): Promise<string[]> {
    const rows = await this.db
      .select({ upgradeId: upgradePurchases.upgradeId })
      .from(upgradePurchases)
      .where(
        and(
          eq(upgradePurchases.guestSessionId, guestSessionId),
          eq(upgradePurchases.status, 'paid'),
        ),
      )
      .orderBy(asc(upgradePurchases.upgradeId))
      .all();
    return rows.map((row) => row.upgradeId);
  }

  async update(purchaseId: string, patch: PurchasePatch): Promise<UpgradePurchase | undefined> {
    return this.db
      .update(upgradePurchases)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(upgradePurchases.id, purchaseId))
      .returning()
      .get();
  }

  /**
   * Flips an open purchase (pending, canceled or failed) to paid. Returns
   * the updated row, or undefined when it was already paid or refunded, so
   * callers can skip side effects on replays and late events.
   */
  async markPaid(
    purchaseId: string,
    data: { checkoutSessionId: string | null; paymentIntentId: string | null },
  ): Promise<UpgradePurchase | undefined> {
    const now = new Date();
    return this.db
      .update(upgradePurchases)
      .set({
        status: 'paid',
        paidAt: now,
        updatedAt: now,
        ...(data.checkoutSessionId ? { stripeCheckoutSessionId: data.checkoutSessionId } : {}),
        ...(data.paymentIntentId ? { stripePaymentIntentId: data.paymentIntentId } : {}),
      })
      .where(and(eq(upgradePurchases.id, purchaseId), inArray(upgradePurchases.status, PAYABLE_STATUSES)))
      .returning()
      .get();
  }
}

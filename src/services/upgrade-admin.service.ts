import { PropertyDal } from '../dal/property.dal';
import { PurchaseDal } from '../dal/purchase.dal';
import { UpgradeDal, type UpgradePatch } from '../dal/upgrade.dal';
import { db } from '../db/client';
import { isUniqueViolation } from '../db/errors';
import type { Upgrade } from '../db/schema';
import { fail, slugify, type ServiceResult } from '../types/common';

const upgradeDal = new UpgradeDal(db);
const purchaseDal = new PurchaseDal(db);
const propertyDal = new PropertyDal(db);

export interface UpgradeFields {
  slug?: string;
  title?: string;
  shortDescription?: string | null;
  longDescription?: string | null;
  priceCents?: number;
  currency?: string;
  imageUrl?: string | null;
  stripePriceId?: string | null;
  isActive?: boolean;
}

export type UpgradeError =
  | 'property_not_found'
  | 'upgrade_not_found'
  | 'slug_taken'
  | 'invalid_slug'
  | 'invalid_order'
  | 'upgrade_has_purchases';

type UpgradeResult = ServiceResult<{ upgrade: Upgrade }, UpgradeError>;

async function ownsProperty(pmcId: string, propertyId: string): Promise<boolean> {
  return (await propertyDal.findById(pmcId, propertyId)) !== undefined;
}

export async function listUpgrades(
  pmcId: string,
  propertyId: string,
): Promise<ServiceResult<{ upgrades: Upgrade[] }, UpgradeError>> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');
  return { success: true, upgrades: await upgradeDal.listByProperty(propertyId) };
}

export async function createUpgrade(
  pmcId: string,
  propertyId: string,
  input: UpgradeFields & { title: string; priceCents: number },
): Promise<UpgradeResult> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');

  const slug = slugify(input.slug ?? input.title);
  if (!slug) return fail('invalid_slug', 'Slug must contain letters or digits.');
  if (await upgradeDal.slugTaken(propertyId, slug)) {
    return fail('slug_taken', `Slug "${slug}" is already used by another upgrade of this property.`);
  }

  try {
    const upgrade = await upgradeDal.create({
      ...input,
      propertyId,
      slug,
      currency: (input.currency ?? 'usd').toLowerCase(),
      sortOrder: await upgradeDal.nextSortOrder(propertyId),
    });
    return { success: true, upgrade };
  } catch (err) {
    if (isUniqueViolation(err)) return fail('slug_taken');
    throw err;
  }
}

export async function updateUpgrade(
  pmcId: string,
  propertyId: string,
  upgradeId: string,
  input: UpgradeFields,
): Promise<UpgradeResult> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');

  const patch: UpgradePatch = { ...input };
  if (input.currency !== undefined) patch.currency = input.currency.toLowerCase();
  if (input.slug !== undefined) {
    const slug = slugify(input.slug);
    if (!slug) return fail('invalid_slug', 'Slug must contain letters or digits.');
    if (await upgradeDal.slugTaken(propertyId, slug, upgradeId)) {
      return fail('slug_taken', `Slug "${slug}" is already used by another upgrade of this property.`);
    }
    patch.slug = slug;
  }

  try {
    const upgrade = await upgradeDal.update(propertyId, upgradeId, patch);
    return upgrade ? { success: true, upgrade } : fail('upgrade_not_found');
  } catch (err) {
    if (isUniqueViolation(err)) return fail('slug_taken');
    throw err;
  }
}

/** Upgrades that were ever bought keep their purchase history and can only be deactivated. */
export async function deleteUpgrade(
  pmcId: string,
  propertyId: string,
  upgradeId: string,
): Promise<ServiceResult<object, UpgradeError>> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');
  const upgrade = await upgradeDal.findForProperty(propertyId, upgradeId);
  if (!upgrade) return fail('upgrade_not_found');

  if ((await purchaseDal.countByUpgrade(upgradeId)) > 0) {
    return fail('upgrade_has_purchases', 'This upgrade has purchases. Deactivate it instead.');
  }
  await upgradeDal.delete(propertyId, upgradeId);
  return { success: true };
}

export async function reorderUpgrades(
  pmcId: string,
  propertyId: string,
  orderedIds: string[],
): Promise<ServiceResult<{ upgrades: Upgrade[] }, UpgradeError>> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');

  const known = new Set((await upgradeDal.listByProperty(propertyId)).map((u) => u.id));
  if (new Set(orderedIds).size !== orderedIds.length || orderedIds.some((id) => !known.has(id))) {
    return fail('invalid_order', 'ids must be distinct upgrades of this property.');
  }

  await upgradeDal.reorder(propertyId, orderedIds);
  return { success: true, upgrades: await upgradeDal.listByProperty(propertyId) };
}

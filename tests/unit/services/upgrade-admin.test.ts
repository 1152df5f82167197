import { describe, it, expect, beforeAll } from 'vitest';
import type { Pmc, Property } from '@/db/schema';
import {
  createUpgrade,
  deleteUpgrade,
  listUpgrades,
  reorderUpgrades,
  updateUpgrade,
} from '@/services/upgrade-admin.service';
import {
  chatDal,
  createPmc,
  createProperty,
  purchaseDal,
} from '../../helpers/fixtures';

describe('upgrade-admin.service', () => {
  let pmc: Pmc;
  let other: Pmc;
  let property: Property;

  beforeAll(async () => {
    pmc = await createPmc();
    other = await createPmc();
    property = await createProperty(pmc.id);
  });

  it('derives the slug from the title and appends to the end of the list', async () => {
    const first = await createUpgrade(pmc.id, property.id, {
      title: 'Early Check-In!',
      priceCents: 4000,
      currency: 'USD',
    });
    const second = await createUpgrade(pmc.id, property.id, { title: 'Late checkout', priceCents: 3000 });

    if (!first.success || !second.success) throw new Error('expected upgrades to be created');
    expect(first.upgrade).toMatchObject({ slug: 'early-check-in', currency: 'usd', sortOrder: 0, isActive: true });
    expect(second.upgrade).toMatchObject({ slug: 'late-checkout', currency: 'usd', sortOrder: 1 });
  });

  it('rejects a slug already used on the property', async () => {
    const result = await createUpgrade(pmc.id, property.id, {
      title: 'Another',
      slug: 'Late Checkout',
      priceCents: 100,
    });
    expect(result).toEqual({
      success: false,
      error: 'slug_taken',
      message: 'Slug "late-checkout" is already used by another upgrade of this property.',
    });
  });

  it('rejects a slug without letters or digits', async () => {
    const result = await createUpgrade(pmc.id, property.id, { title: '!!!', priceCents: 100 });
    expect(result).toEqual({ success: false, error: 'invalid_slug', message: 'Slug must contain letters or digits.' });
  });

  it('refuses a property of another PMC', async () => {
    expect(await listUpgrades(other.id, property.id)).toEqual({ success: false, error: 'property_not_found' });
    expect(await createUpgrade(other.id, property.id, { title: 'Bikes', priceCents: 100 })).toEqual({
      success: false,
      error: 'property_not_found',
    });
  });

  it('updates fields and keeps its own slug', async () => {
    const created = await createUpgrade(pmc.id, property.id, { title: 'Beach chairs', priceCents: 1500 });
    if (!created.success) throw new Error('expected upgrade');

    const updated = await updateUpgrade(pmc.id, property.id, created.upgrade.id, {
      slug: 'beach-chairs',
      priceCents: 1800,
      isActive: false,
    });
    if (!updated.success) throw new Error('expected update');
    expect(updated.upgrade).toMatchObject({ slug: 'beach-chairs', priceCents: 1800, isActive: false });

    expect(await updateUpgrade(pmc.id, property.id, 'missing', { priceCents: 1 })).toEqual({
      success: false,
      error: 'upgrade_not_found',
    });
  });

  it('reorders upgrades and rejects unknown or repeated ids', async () => {
    const listed = await listUpgrades(pmc.id, property.id);
    if (!listed.success) throw new Error('expected list');
    const ids = listed.upgrades.map((u) => u.id);
    const reversed = [...ids].reverse();

    const result = await reorderUpgrades(pmc.id, property.id, reversed);
    if (!result.success) throw new Error('expected reorder');
    expect(result.upgrades.map((u) => u.id)).toEqual(reversed);
    expect(result.upgrades.map((u) => u.sortOrder)).toEqual(reversed.map((_, i) => i));

    const invalid = { success: false, error: 'invalid_order', message: 'ids must be distinct upgrades of this property.' };
    expect(await reorderUpgrades(pmc.id, property.id, ['nope'])).toEqual(invalid);
    expect(await reorderUpgrades(pmc.id, property.id, [reversed[0] ?? '', reversed[0] ?? ''])).toEqual(invalid);
  });

  it('deletes unsold upgrades and keeps sold ones', async () => {
    const unsold = await createUpgrade(pmc.id, property.id, { title: 'Firewood', priceCents: 900 });
    const sold = await createUpgrade(pmc.id, property.id, { title: 'Kayak rental', priceCents: 6000 });
    if (!unsold.success || !sold.success) throw new Error('expected upgrades');

    const session = await chatDal.createSession({ propertyId: property.id });
    await purchaseDal.create({
      pmcId: pmc.id,
      propertyId: property.id,
      upgradeId: sold.upgrade.id,
      guestSessionId: session.id,
      amountCents: 6000,
      platformFeeCents: 150,
      netAmountCents: 5850,
      currency: 'usd',
      status: 'paid',
    });

    expect(await deleteUpgrade(pmc.id, property.id, unsold.upgrade.id)).toEqual({ success: true });
    expect(await deleteUpgrade(pmc.id, property.id, unsold.upgrade.id)).toEqual({
      success: false,
      error: 'upgrade_not_found',
    });
    expect(await deleteUpgrade(pmc.id, property.id, sold.upgrade.id)).toEqual({
      success: false,
      error: 'upgrade_has_purchases',
      message: 'This upgrade has purchases. Deactivate it instead.',
    });
  });
});

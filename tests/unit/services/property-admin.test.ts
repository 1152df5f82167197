import { describe, it, expect, beforeAll } from 'vitest';
import { EventsDal } from '@/dal/events.dal';
import { db } from '@/db/client';
import type { Pmc } from '@/db/schema';
import {
  createProperty,
  deleteProperty,
  getProperty,
  listProperties,
  setChatEnabled,
  updateProperty,
} from '@/services/property-admin.service';
import { createPmc } from '../../helpers/fixtures';

const eventsDal = new EventsDal(db);

describe('property-admin.service', () => {
  let pmc: Pmc;

  beforeAll(async () => {
    pmc = await createPmc();
  });

  it('suffixes derived slugs and rejects taken explicit ones', async () => {
    const first = await createProperty(pmc.id, { name: 'Harbor Loft' });
    const second = await createProperty(pmc.id, { name: 'Harbor Loft' });
    if (!first.success || !second.success) throw new Error('expected properties');

    expect(first.property).toMatchObject({ slug: 'harbor-loft', provider: 'manual', chatEnabled: true });
    expect(second.property.slug).toBe('harbor-loft-2');

    expect(await createProperty(pmc.id, { name: 'Copy', slug: 'Harbor Loft' })).toEqual({
      success: false,
      error: 'slug_taken',
      message: 'Slug "harbor-loft" is already used by another property.',
    });
  });

  it('records a telemetry event for each new property', async () => {
    const created = await createProperty(pmc.id, { name: 'Pine Cabin' });
    if (!created.success) throw new Error('expected property');

    const events = await eventsDal.findByPmc(pmc.id);
    expect(events.some((e) => e.type === 'property.created' && e.entityId === created.property.id)).toBe(true);
  });

  it('updates fields, slug and chat flag', async () => {
    const created = await createProperty(pmc.id, { name: 'Lake House' });
    if (!created.success) throw new Error('expected property');
    const id = created.property.id;

    const updated = await updateProperty(pmc.id, id, { slug: 'lake-house', wifiName: 'LakeNet' });
    if (!updated.success) throw new Error('expected update');
    expect(updated.property).toMatchObject({ slug: 'lake-house', wifiName: 'LakeNet' });

    expect(await updateProperty(pmc.id, id, { slug: 'harbor-loft' })).toEqual({
      success: false,
      error: 'slug_taken',
      message: 'Slug "harbor-loft" is already used by another property.',
    });

    const disabled = await setChatEnabled(pmc.id, id, false);
    if (!disabled.success) throw new Error('expected update');
    expect(disabled.property.chatEnabled).toBe(false);
  });

  it('soft-deletes and hides the property', async () => {
    const created = await createProperty(pmc.id, { name: 'Old Barn' });
    if (!created.success) throw new Error('expected property');

    expect(await deleteProperty(pmc.id, created.property.id)).toEqual({ success: true });
    expect(await getProperty(pmc.id, created.property.id)).toEqual({ success: false, error: 'property_not_found' });
    expect((await listProperties(pmc.id)).map((p) => p.name)).not.toContain('Old Barn');
    expect(await deleteProperty(pmc.id, created.property.id)).toEqual({ success: false, error: 'property_not_found' });
  });

  it('keeps other PMCs out', async () => {
    const other = await createPmc();
    const created = await createProperty(pmc.id, { name: 'Private Villa' });
    if (!created.success) throw new Error('expected property');

    expect(await getProperty(other.id, created.property.id)).toEqual({ success: false, error: 'property_not_found' });
    expect(await updateProperty(other.id, created.property.id, { name: 'x' })).toEqual({
      success: false,
      error: 'property_not_found',
    });
  });
});

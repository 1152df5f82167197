import { PropertyDal, type PropertyPatch } from '../dal/property.dal';
import { db } from '../db/client';
import { isUniqueViolation } from '../db/errors';
import type { Property } from '../db/schema';
import { fail, slugify, type ServiceResult } from '../types/common';
import { uniquePropertySlug } from './pms-sync.service';
import { logEvent } from './telemetry.service';

const propertyDal = new PropertyDal(db);

export interface PropertyFields {
  name?: string;
  slug?: string;
  address?: string | null;
  description?: string | null;
  houseRules?: string | null;
  wifiName?: string | null;
  wifiPassword?: string | null;
  checkInTime?: string | null;
  checkOutTime?: string | null;
  emergencyPhone?: string | null;
  heroImageUrl?: string | null;
  chatEnabled?: boolean;
}

export type PropertyError = 'property_not_found' | 'slug_taken' | 'invalid_slug';
export type PropertyResult = ServiceResult<{ property: Property }, PropertyError>;

export async function listProperties(pmcId: string): Promise<Property[]> {
  return propertyDal.listByPmc(pmcId);
}

export async function getProperty(pmcId: string, propertyId: string): Promise<PropertyResult> {
  const property = await propertyDal.findById(pmcId, propertyId);
  return property ? { success: true, property } : fail('property_not_found');
}

/** Manual (non-PMS) property. Without a slug one is derived from the name. */
export async function createProperty(
  pmcId: string,
  input: PropertyFields & { name: string },
): Promise<PropertyResult> {
  let slug: string;
  if (input.slug !== undefined) {
    slug = slugify(input.slug);
    if (!slug) return fail('invalid_slug', 'Slug must contain letters or digits.');
    if (await propertyDal.slugTaken(pmcId, slug)) {
      return fail('slug_taken', `Slug "${slug}" is already used by another property.`);
    }
  } else {
    slug = await uniquePropertySlug(pmcId, input.name);
  }

  try {
    const property = await propertyDal.create({ ...input, pmcId, slug, provider: 'manual' });
    await logEvent({ pmcId, type: 'property.created', entityType: 'property', entityId: property.id });
    return { success: true, property };
  } catch (err) {
    if (isUniqueViolation(err)) return fail('slug_taken');
    throw err;
  }
}

export async function updateProperty(
  pmcId: string,
  propertyId: string,
  input: PropertyFields,
): Promise<PropertyResult> {
  const existing = await propertyDal.findById(pmcId, propertyId);
  if (!existing) return fail('property_not_found');

  const patch: PropertyPatch = { ...input };
  if (input.slug !== undefined) {
    const slug = slugify(input.slug);
    if (!slug) return fail('invalid_slug', 'Slug must contain letters or digits.');
    if (slug !== existing.slug && (await propertyDal.slugTaken(pmcId, slug, propertyId))) {
      return fail('slug_taken', `Slug "${slug}" is already used by another property.`);
    }
    patch.slug = slug;
  }

  try {
    const property = await propertyDal.update(pmcId, propertyId, patch);
    return property ? { success: true, property } : fail('property_not_found');
  } catch (err) {
    if (isUniqueViolation(err)) return fail('slug_taken');
    throw err;
  }
}

export async function setChatEnabled(
  pmcId: string,
  propertyId: string,
  enabled: boolean,
): Promise<PropertyResult> {
  return updateProperty(pmcId, propertyId, { chatEnabled: enabled });
}

export async function deleteProperty(
  pmcId: string,
  propertyId: string,
): Promise<ServiceResult<object, 'property_not_found'>> {
  const deleted = await propertyDal.softDelete(pmcId, propertyId);
  if (!deleted) return fail('property_not_found');
  await logEvent({ pmcId, type: 'property.deleted', entityType: 'property', entityId: propertyId });
  return { success: true };
}

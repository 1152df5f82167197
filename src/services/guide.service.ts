import { GuideDal } from '../dal/guide.dal';
import { PropertyDal } from '../dal/property.dal';
import { db } from '../db/client';
import type { Guide } from '../db/schema';
import { fail, type ServiceResult } from '../types/common';

const guideDal = new GuideDal(db);
const propertyDal = new PropertyDal(db);

export interface GuideFields {
  title?: string;
  category?: string | null;
  shortDescription?: string | null;
  longDescription?: string | null;
  bodyHtml?: string | null;
  imageUrl?: string | null;
  isActive?: boolean;
}

export type GuideError = 'property_not_found' | 'guide_not_found' | 'invalid_order';

/** Active guides for the guest app, in display order. */
export async function listGuestGuides(
  propertyId: string,
): Promise<ServiceResult<{ guides: Guide[] }, 'property_not_found'>> {
  const property = await propertyDal.findLiveById(propertyId);
  if (!property) return fail('property_not_found');
  return { success: true, guides: await guideDal.listByProperty(propertyId, { activeOnly: true }) };
}

async function ownsProperty(pmcId: string, propertyId: string): Promise<boolean> {
  return (await propertyDal.findById(pmcId, propertyId)) !== undefined;
}

export async function listGuides(
  pmcId: string,
  propertyId: string,
): Promise<ServiceResult<{ guides: Guide[] }, GuideError>> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');
  return { success: true, guides: await guideDal.listByProperty(propertyId) };
}

export async function createGuide(
  pmcId: string,
  propertyId: string,
  input: GuideFields & { title: string },
): Promise<ServiceResult<{ guide: Guide }, GuideError>> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');
  const guide = await guideDal.create({
    ...input,
    propertyId,
    sortOrder: await guideDal.nextSortOrder(propertyId),
  });
  return { success: true, guide };
}

export async function updateGuide(
  pmcId: string,
  propertyId: string,
  guideId: string,
  input: GuideFields,
): Promise<ServiceResult<{ guide: Guide }, GuideError>> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');
  const guide = await guideDal.update(propertyId, guideId, input);
  return guide ? { success: true, guide } : fail('guide_not_found');
}

export async function deleteGuide(
  pmcId: string,
  propertyId: string,
  guideId: string,
): Promise<ServiceResult<object, GuideError>> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');
  return (await guideDal.delete(propertyId, guideId)) ? { success: true } : fail('guide_not_found');
}

/** Sets sortOrder 0..n-1 in the order given. Every id must be a guide of the property. */
export async function reorderGuides(
  pmcId: string,
  propertyId: string,
  orderedIds: string[],
): Promise<ServiceResult<{ guides: Guide[] }, GuideError>> {
  if (!(await ownsProperty(pmcId, propertyId))) return fail('property_not_found');

  const known = new Set((await guideDal.listByProperty(propertyId)).map((g) => g.id));
  if (new Set(orderedIds).size !== orderedIds.length || orderedIds.some((id) => !known.has(id))) {
    return fail('invalid_order', 'ids must be distinct guides of this property.');
  }

  await guideDal.reorder(propertyId, orderedIds);
  return { success: true, guides: await guideDal.listByProperty(propertyId) };
}

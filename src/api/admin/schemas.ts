import { z } from 'zod';
import { entityIdSchema, pmcIdSchema } from '../../types/common';

export const pmcParamSchema = z.object({
  pmcId: pmcIdSchema,
});

export const propertyParamSchema = pmcParamSchema.extend({
  propertyId: entityIdSchema,
});

export const reorderBodySchema = z.object({
  ids: z.array(entityIdSchema).max(500),
});

/** Optional free text that may be cleared with null. */
export const nullableText = (max: number) => z.string().max(max).nullable().optional();

/** "true"/"false" in a query string. */
export const queryBoolean = z.enum(['true', 'false']).transform((v) => v === 'true');

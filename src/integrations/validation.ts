/**
 * Zod schemas for validating integration payloads.
 * Every payload that enters or leaves the system goes through these schemas.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

const isoDateField = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be ISO YYYY-MM-DD');
const timeField = z.string().regex(/^\d{2}:\d{2}$/, 'Must be HH:mm');
const externalId = z.union([z.number(), z.string().min(1)]).transform(String);
const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));
// Hostaway sends check-in/out as an hour of day (0-23).
const hourOfDay = z.number().int().min(0).max(23).nullish();

// ---------------------------------------------------------------------------
// Hostaway wire format
// ---------------------------------------------------------------------------

export const hostawayTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
});

export const hostawayListingSchema = z.object({
  id: externalId,
  name: optionalText,
  internalListingName: optionalText,
  address: optionalText,
  description: optionalText,
  houseRules: optionalText,
  wifiUsername: optionalText,
  wifiPassword: optionalText,
  checkInTimeStart: hourOfDay,
  checkOutTime: hourOfDay,
});

export const hostawayReservationSchema = z.object({
  id: externalId,
  listingMapId: externalId,
  guestName: optionalText,
  phone: optionalText,
  arrivalDate: isoDateField,
  departureDate: isoDateField,
  status: z.string().default('new'),
  numberOfGuests: z.number().int().nullish(),
  checkInTime: hourOfDay,
  checkOutTime: hourOfDay,
});

export function hostawayListResponseSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    status: z.string().optional(),
    result: z.array(item),
  });
}

export type HostawayListing = z.infer<typeof hostawayListingSchema>;
export type HostawayReservation = z.infer<typeof hostawayReservationSchema>;

// ---------------------------------------------------------------------------
// Normalized PMS records
// ---------------------------------------------------------------------------

export const pmsListingSchema = z.object({
  externalId: z.string().min(1),
  name: z.string().min(1),
  address: z.string().nullable(),
  description: z.string().nullable(),
  houseRules: z.string().nullable(),
  wifiName: z.string().nullable(),
  wifiPassword: z.string().nullable(),
  checkInTime: timeField.nullable(),
  checkOutTime: timeField.nullable(),
});

export const pmsReservationSchema = z.object({
  externalId: z.string().min(1),
  listingExternalId: z.string().min(1),
  guestName: z.string().nullable(),
  phoneLast4: z
    .string()
    .regex(/^\d{4}$/)
    .nullable(),
  arrivalDate: isoDateField,
  departureDate: isoDateField,
  checkInTime: timeField.nullable(),
  checkOutTime: timeField.nullable(),
  status: z.string().min(1),
  guestCount: z.number().int().nonnegative().nullable(),
});

// ---------------------------------------------------------------------------
// Payments
// ---------------------------------------------------------------------------

export const createBillingCheckoutSchema = z.object({
  priceId: z.string().min(1),
  quantity: z.number().int().positive(),
  setupPriceId: z.string().min(1).nullable(),
  customerId: z.string().min(1).nullable(),
  customerEmail: z.string().email(),
  metadata: z.record(z.string()),
  successUrl: z.string().url(),
  cancelUrl: z.string().url(),
  idempotencyKey: z.string().min(1),
  clientReferenceId: z.string().optional(),
});

export const createCheckoutSessionSchema = z.object({
  lineItem: z.object({
    priceId: z.string().min(1).nullable(),
    name: z.string().min(1),
    description: z.string().nullable(),
    amountCents: z.number().int().positive(),
    currency: z.string().length(3),
  }),
  metadata: z.record(z.string()),
  applicationFeeCents: z.number().int().nonnegative(),
  destinationAccountId: z.string().min(1),
  successUrl: z.string().url(),
  cancelUrl: z.string().url(),
  idempotencyKey: z.string().min(1),
  clientReferenceId: z.string().optional(),
});

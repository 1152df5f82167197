import { z } from 'zod';

/**
 * Tenant context extracted from the request path and the admin token.
 * Every tenant-scoped query and service call receives this.
 */
export interface TenantContext {
  /** The PMC (property management company) identifier. */
  pmcId: string;
}

export const pmcIdSchema = z
  .string()
  .min(1, 'pmcId must not be empty')
  .max(64, 'pmcId too long');

/**
 * Zod schema for entity IDs (propertyId, upgradeId, sessionId, etc.).
 */
export const entityIdSchema = z
  .string()
  .min(1, 'ID must not be empty')
  .max(64, 'ID too long');

/** Calendar date of a stay, `YYYY-MM-DD`. */
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export function buildTenantContext(pmcId: string): TenantContext {
  return { pmcId };
}

/**
 * Standard API error response shape.
 */
export interface ApiError {
  error: string;
  message?: string;
}

/** Failed service call. `error` is a stable code; `message` is safe to show. */
export interface ServiceFailure<E extends string = string> {
  success: false;
  error: E;
  message?: string;
}

export type ServiceResult<T extends object = object, E extends string = string> =
  | ({ success: true } & T)
  | ServiceFailure<E>;

export function fail<E extends string>(error: E, message?: string): ServiceFailure<E> {
  return message === undefined ? { success: false, error } : { success: false, error, message };
}

/**
 * Maximum allowed date range span in days.
 * Prevents unbounded analytics queries.
 */
export const MAX_DATE_RANGE_DAYS = 366;

/**
 * Validate a [from, to) range of epoch milliseconds. Rejects ranges
 * longer than MAX_DATE_RANGE_DAYS and requires from < to.
 */
export function validateDateRange(
  fromMs: number,
  toMs: number,
): { valid: true; from: Date; to: Date } | { valid: false; error: string } {
  const from = new Date(fromMs);
  const to = new Date(toMs);

  if (isNaN(from.getTime())) return { valid: false, error: 'from is not a valid timestamp' };
  if (isNaN(to.getTime())) return { valid: false, error: 'to is not a valid timestamp' };
  if (from >= to) return { valid: false, error: 'from must be before to' };

  const diffDays = (to.getTime() - from.getTime()) / (1000 * 60 * 60 * 24);
  if (diffDays > MAX_DATE_RANGE_DAYS) {
    return {
      valid: false,
      error: `Date range exceeds maximum of ${MAX_DATE_RANGE_DAYS} days (got ${Math.round(diffDays)})`,
    };
  }

  return { valid: true, from, to };
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC calendar date of an instant, `YYYY-MM-DD`. */
export function toIsoDate(at: Date): string {
  return at.toISOString().slice(0, 10);
}

/** Shifts a `YYYY-MM-DD` date by whole days. */
export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS));
}

/** Lowercase-kebab slug: "Ocean View #2" → "ocean-view-2". */
export function slugify(raw: string): string {
  return raw
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

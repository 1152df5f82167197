import { jwtVerify, SignJWT } from 'jose';
import { z } from 'zod';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { PmcDal } from '../dal/pmc.dal';
import { PmcUserDal } from '../dal/pmc-user.dal';
import { db } from '../db/client';
import type { BillingStatus, PmcUser } from '../db/schema';

const pmcDal = new PmcDal(db);
const pmcUserDal = new PmcUserDal(db);

const ISSUER = 'stayhost-concierge';
const secretKey = new TextEncoder().encode(env.SESSION_SECRET);

type TokenAudience = 'guest' | 'admin' | 'connect-state';

async function sign(
  claims: Record<string, string>,
  audience: TokenAudience,
  ttlSeconds: number,
): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: 'HS256' })
    .setIssuer(ISSUER)
    .setAudience(audience)
    .setIssuedAt()
    .setExpirationTime(Math.floor(Date.now() / 1000) + ttlSeconds)
    .sign(secretKey);
}

async function verify<T>(
  token: string,
  audience: TokenAudience,
  schema: z.ZodType<T>,
): Promise<T | null> {
  try {
    const { payload } = await jwtVerify(token, secretKey, {
      issuer: ISSUER,
      audience,
      algorithms: ['HS256'],
    });
    const parsed = schema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  } catch (err) {
    logger.debug({ err, audience }, 'Token rejected');
    return null;
  }
}

// ── Guest tokens ──

const guestClaimsSchema = z.object({ sid: z.string().min(1), pid: z.string().min(1) });

export interface GuestIdentity {
  sessionId: string;
  propertyId: string;
}

/** Bearer token handed to a guest after they unlock their stay. */
export async function issueGuestToken(sessionId: string, propertyId: string): Promise<string> {
  return sign({ sid: sessionId, pid: propertyId }, 'guest', env.GUEST_TOKEN_TTL_HOURS * 3600);
}

export async function verifyGuestToken(token: string): Promise<GuestIdentity | null> {
  const claims = await verify(token, 'guest', guestClaimsSchema);
  return claims ? { sessionId: claims.sid, propertyId: claims.pid } : null;
}

// ── Admin tokens ──

const adminClaimsSchema = z.object({ email: z.string().email() });
const ADMIN_TOKEN_TTL_SECONDS = 12 * 3600;

export async function issueAdminToken(
  email: string,
  ttlSeconds = ADMIN_TOKEN_TTL_SECONDS,
): Promise<string> {
  return sign({ email: email.trim().toLowerCase() }, 'admin', ttlSeconds);
}

/** Returns the lower-cased admin email, or null when the token is invalid or expired. */
export async function verifyAdminToken(token: string): Promise<string | null> {
  const claims = await verify(token, 'admin', adminClaimsSchema);
  return claims ? claims.email.toLowerCase() : null;
}

// ── Stripe Connect OAuth state ──

const connectStateSchema = z.object({ pmcId: z.string().min(1), email: z.string() });
const CONNECT_STATE_TTL_SECONDS = 15 * 60;

export async function issueConnectState(pmcId: string, email: string): Promise<string> {
  return sign({ pmcId, email }, 'connect-state', CONNECT_STATE_TTL_SECONDS);
}

export async function verifyConnectState(
  state: string,
): Promise<{ pmcId: string; email: string } | null> {
  return verify(state, 'connect-state', connectStateSchema);
}

// ── Admin scope ──

export interface AdminScope {
  email: string;
  role: 'super' | 'pmc';
  /** The PMC a `pmc` admin belongs to; null for super admins and unknown emails. */
  pmcId: string | null;
  user: PmcUser | null;
  billingStatus: BillingStatus | null;
  needsPayment: boolean;
}

export function isSuperAdminEmail(email: string): boolean {
  return env.ADMIN_EMAILS.includes(email.trim().toLowerCase());
}

/**
 * Works out what an authenticated admin email may see: everything
 * (super), one PMC through team membership, or one PMC through its
 * owner email.
 */
export async function resolveAdminScope(email: string): Promise<AdminScope> {
  const normalized = email.trim().toLowerCase();

  if (isSuperAdminEmail(normalized)) {
    return { email: normalized, role: 'super', pmcId: null, user: null, billingStatus: null, needsPayment: false };
  }

  const user = (await pmcUserDal.findActiveByEmail(normalized)) ?? null;
  if (user?.isSuperuser) {
    return { email: normalized, role: 'super', pmcId: null, user, billingStatus: null, needsPayment: false };
  }

  const pmc = user ? await pmcDal.findById(user.pmcId) : await pmcDal.findByEmail(normalized);
  if (!pmc) {
    return { email: normalized, role: 'pmc', pmcId: null, user, billingStatus: null, needsPayment: false };
  }

  if (user) await pmcUserDal.touchLogin(user.id);

  return {
    email: normalized,
    role: 'pmc',
    pmcId: pmc.id,
    user,
    billingStatus: pmc.billingStatus,
    needsPayment: !(pmc.billingStatus === 'active' && pmc.active),
  };
}

export function canAccessPmc(scope: AdminScope, pmcId: string): boolean {
  return scope.role === 'super' || scope.pmcId === pmcId;
}

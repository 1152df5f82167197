import type { FastifyRequest } from 'fastify';
import { verifyGuestToken, type GuestIdentity } from '../../services/auth.service';

export function bearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match?.[1] ?? null;
}

/** Guest identity from the bearer token; null when absent or invalid. */
export async function guestIdentity(request: FastifyRequest): Promise<GuestIdentity | null> {
  const token = bearerToken(request);
  return token ? verifyGuestToken(token) : null;
}

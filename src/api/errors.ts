import type { FastifyReply } from 'fastify';
import type { ServiceFailure } from '../types/common';

const STATUS_BY_CODE: Record<string, number> = {
  forbidden: 403,
  code_mismatch: 403,
  chat_disabled: 403,
  not_eligible: 403,
  payments_not_enabled: 403,
  session_mismatch: 403,
  not_verified: 401,
  unauthenticated: 401,
  already_purchased: 409,
  checkout_in_progress: 409,
  already_registered: 409,
  already_active: 409,
  slug_taken: 409,
  email_taken: 409,
  upgrade_has_purchases: 409,
  sync_disabled: 409,
  pms_not_connected: 409,
  sync_in_progress: 409,
  payment_required: 402,
  pms_unavailable: 502,
  payments_unavailable: 502,
  llm_unavailable: 502,
  missing_code: 400,
  invalid_state: 400,
  invalid_signature: 400,
  pmc_required: 400,
  webhook_not_configured: 503,
  billing_not_configured: 503,
};

/** HTTP status for a service error code. Unknown codes are treated as bad input. */
export function statusForError(code: string): number {
  const mapped = STATUS_BY_CODE[code];
  if (mapped !== undefined) return mapped;
  if (code.endsWith('_not_found')) return 404;
  return 400;
}

export function sendFailure(reply: FastifyReply, failure: ServiceFailure): FastifyReply {
  return reply.status(statusForError(failure.error)).send(
    failure.message === undefined
      ? { error: failure.error }
      : { error: failure.error, message: failure.message },
  );
}

import { logger } from '../config/logger';
import { db } from '../db/client';
import { EventsDal } from '../dal/events.dal';

const eventsDal = new EventsDal(db);

export interface LogEventInput {
  pmcId?: string;
  type: string;
  payload?: Record<string, unknown>;
  requestId?: string;
  span?: string;
  durationMs?: number;
  entityType?: string;
  entityId?: string;
}

/**
 * Service layer for telemetry events.
 * Business logic lives here; DB access is delegated to the DAL.
 *
 * Never throws — if the write fails, logs the error and returns null.
 */
export async function logEvent(input: LogEventInput): Promise<string | null> {
  try {
    const event = await eventsDal.create({
      pmcId: input.pmcId ?? null,
      type: input.type,
      payload: JSON.stringify(input.payload ?? {}),
      requestId: input.requestId,
      span: input.span,
      durationMs: input.durationMs,
      entityType: input.entityType,
      entityId: input.entityId,
    });

    logger.debug({ eventId: event.id, type: input.type }, 'Telemetry event recorded');
    return event.id;
  } catch (err) {
    logger.error({ err, eventType: input.type }, 'Failed to write telemetry event');
    return null;
  }
}

/** Records a timed service span. */
export async function logSpan(
  span: string,
  durationMs: number,
  ctx: { pmcId?: string; requestId?: string; entityType?: string; entityId?: string } = {},
): Promise<void> {
  await logEvent({ type: 'service.span', span, durationMs, ...ctx });
}

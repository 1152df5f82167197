import { env } from '../config/env';
import { logger } from '../config/logger';
import { syncAllPmcs, type PmcSyncOutcome } from '../services/pms-sync.service';
import { logEvent } from '../services/telemetry.service';

let timer: NodeJS.Timeout | null = null;
let running: Promise<PmcSyncOutcome[]> | null = null;

/**
 * One scheduler tick. A tick that starts while the previous one is still
 * running is skipped and returns null.
 */
export async function runSyncTick(now: Date = new Date()): Promise<PmcSyncOutcome[] | null> {
  if (running) {
    logger.warn('Previous PMS sync run still in progress; skipping tick');
    return null;
  }

  running = syncAllPmcs({ now });
  try {
    const outcomes = await running;
    const failed = outcomes.filter((o) => !o.result.success).length;
    logger.info({ pmcs: outcomes.length, failed }, 'Scheduled PMS sync finished');
    await logEvent({
      type: 'pms.sync.scheduled_run',
      payload: { pmcs: outcomes.length, failed },
    });
    return outcomes;
  } finally {
    running = null;
  }
}

export function startSyncScheduler(intervalHours: number = env.SYNC_INTERVAL_HOURS): void {
  if (timer) return;
  const intervalMs = Math.round(intervalHours * 60 * 60 * 1000);
  timer = setInterval(() => {
    runSyncTick().catch((err: unknown) => {
      logger.error({ err }, 'Scheduled PMS sync failed');
    });
  }, intervalMs);
  timer.unref();
  logger.info({ intervalHours }, 'PMS sync scheduler started');
}

export function stopSyncScheduler(): void {
  if (!timer) return;
  clearInterval(timer);
  timer = null;
}

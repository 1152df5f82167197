import { logger } from '../config/logger';

export interface SpanTimer {
  readonly span: string;
  /** Milliseconds since the timer started; logged at debug. */
  stop(): number;
}

/**
 * Times a service span. The duration is what `logSpan` records:
 *   const timer = startTimer('syncPmc');
 *   ...
 *   await logSpan(timer.span, timer.stop(), { pmcId });
 */
export function startTimer(span: string): SpanTimer {
  const start = performance.now();

  return {
    span,
    stop(): number {
      const durationMs = Math.round(performance.now() - start);
      logger.debug({ span, durationMs }, 'Span finished');
      return durationMs;
    },
  };
}

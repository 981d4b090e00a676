/**
 * Progress sinks: where queue progress ends up.
 */

import { createLogger, type Logger } from '../logging';

export interface ProgressSink {
  beginProgress(label: string): void;
  /** Advance by `delta` percentage points. */
  step(delta: number): void;
  endProgress(): void;
}

export interface ProgressSnapshot {
  label: string | null;
  percent: number;
  active: boolean;
}

export interface TrackingProgressSink extends ProgressSink {
  snapshot(): ProgressSnapshot;
}

/**
 * Keeps the latest progress in memory for the status route and logs
 * begin/end at debug level.
 */
export function createTrackingProgressSink(
  logger: Logger = createLogger('Progress'),
): TrackingProgressSink {
  let label: string | null = null;
  let percent = 0;
  let active = false;

  return {
    beginProgress(newLabel: string): void {
      label = newLabel;
      percent = 0;
      active = true;
      logger.debug(`Begin "${newLabel}"`);
    },

    step(delta: number): void {
      percent = Math.min(100, Math.max(0, percent + delta));
    },

    endProgress(): void {
      logger.debug(`End "${label ?? ''}" at ${percent}%`);
      active = false;
    },

    snapshot(): ProgressSnapshot {
      return { label, percent, active };
    },
  };
}

/**
 * JobQueue: serial FIFO of named jobs with progress reporting.
 *
 * @deprecated Kept for existing engine consumers. Every `enqueue` and `drain`
 * logs a deprecation warning; behavior is unchanged.
 *
 * `drain()` runs synchronously on the caller until the queue is empty. There is
 * no timeout or cancellation. A failing job is logged and the next one runs.
 */

import { JobError } from '../errors';
import { createLogger, type Logger } from '../logging';
import type { ProgressSink } from './progress';

// ── Types ───────────────────────────────────────────────────────────

/** Reserved argument key under which `drain()` injects the progress callback. */
export const PROGRESS_CALLBACK_KEY = 'reportProgress';

export type ReportProgress = (percent: number) => void;

export type JobArgs = Record<string, unknown>;

export type JobInvocationArgs<A extends JobArgs = JobArgs> = A & {
  [PROGRESS_CALLBACK_KEY]: ReportProgress;
};

export type JobAction<A extends JobArgs = JobArgs> = (args: JobInvocationArgs<A>) => void;

export interface Job {
  readonly name: string;
  readonly args: JobArgs;
  /** Runs the action with the given progress callback injected. */
  invoke(reportProgress: ReportProgress): void;
}

export interface DrainSummary {
  executed: number;
  /** Names of jobs whose action threw, in execution order */
  failed: string[];
}

export interface JobQueueOptions {
  progress: ProgressSink;
  logger?: Logger;
}

export interface JobQueue {
  enqueue<A extends JobArgs>(name: string, action: JobAction<A>, args: A): void;
  drain(): DrainSummary;
  size(): number;
  pendingNames(): string[];
  /** Drop every pending job without running it. Returns how many were dropped. */
  clear(): number;
}

const DEPRECATION_WARNING = 'The engine job queue is deprecated and will be removed in a future release.';

// ── Job Queue ───────────────────────────────────────────────────────

function createJob<A extends JobArgs>(name: string, action: JobAction<A>, args: A): Job {
  return {
    name,
    args,
    invoke(reportProgress: ReportProgress): void {
      // The reserved key always wins over a caller-supplied value
      const invocationArgs: JobInvocationArgs<A> = {
        ...args,
        [PROGRESS_CALLBACK_KEY]: reportProgress,
      };
      action(invocationArgs);
    },
  };
}

export function createJobQueue(options: JobQueueOptions): JobQueue {
  const { progress } = options;
  const logger = options.logger ?? createLogger('JobQueue');
  let pending: Job[] = [];

  function runJob(job: Job): boolean {
    let currentProgress = 0;
    const reportProgress: ReportProgress = (percent) => {
      const delta = percent - currentProgress;
      currentProgress = percent;
      progress.step(delta);
    };

    try {
      progress.beginProgress(job.name);
      job.invoke(reportProgress);
      return true;
    } catch (err) {
      const error = new JobError(job.name, err);
      logger.error(`${error.message} (args: ${Object.keys(job.args).join(', ') || 'none'})`, err);
      return false;
    } finally {
      try {
        progress.endProgress();
      } catch (err) {
        logger.error(`Failed to end progress for job "${job.name}":`, err);
      }
    }
  }

  return {
    enqueue<A extends JobArgs>(name: string, action: JobAction<A>, args: A): void {
      logger.warn(DEPRECATION_WARNING);
      pending.push(createJob(name, action, args));
    },

    drain(): DrainSummary {
      logger.warn(DEPRECATION_WARNING);
      const summary: DrainSummary = { executed: 0, failed: [] };

      // Jobs enqueued by a running job are picked up in the same drain
      let job = pending.shift();
      while (job !== undefined) {
        summary.executed++;
        if (!runJob(job)) {
          summary.failed.push(job.name);
        }
        job = pending.shift();
      }

      return summary;
    },

    size(): number {
      return pending.length;
    },

    pendingNames(): string[] {
      return pending.map((job) => job.name);
    },

    clear(): number {
      const dropped = pending.length;
      pending = [];
      return dropped;
    },
  };
}

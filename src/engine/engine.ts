/**
 * Engine: the integration instance bound to one context.
 *
 * Created only through an EngineFactory; the coordinator owns the single live
 * instance and is the only caller of `destroy()`.
 */

import type { Context, Workspace } from '../context';
import { formatContext } from '../context';
import { createLogger, type Logger } from '../logging';
import {
  createJobQueue,
  createTrackingProgressSink,
  type JobQueue,
  type ProgressSink,
} from '../queue';

// ── Types ───────────────────────────────────────────────────────────

export interface EngineSettings {
  /** Emit `logDebug` output (off by default) */
  debugLogging: boolean;
}

export interface EngineInit {
  name: string;
  instanceId: number;
  workspace: Workspace;
  context: Context;
  settings: EngineSettings;
  progress?: ProgressSink;
  logger?: Logger;
}

export interface Engine {
  readonly name: string;
  /** Increments for every engine constructed in this process */
  readonly instanceId: number;
  readonly context: Context;
  readonly workspace: Workspace;
  /** @deprecated See JobQueue. */
  readonly queue: JobQueue;
  isDestroyed(): boolean;
  /** Tear down the engine. Idempotent. */
  destroy(): void;
  logDebug(message: string): void;
  logInfo(message: string): void;
  logWarning(message: string): void;
  logError(message: string, err?: unknown): void;
}

// ── Engine ──────────────────────────────────────────────────────────

export function createEngine(init: EngineInit): Engine {
  const { name, instanceId, workspace, context, settings } = init;
  const logger = init.logger ?? createLogger(`Engine ${name}#${instanceId}`);
  const queue = createJobQueue({
    progress: init.progress ?? createTrackingProgressSink(logger.child('Progress')),
    logger: logger.child('Queue'),
  });
  let destroyed = false;

  const engine: Engine = {
    name,
    instanceId,
    context,
    workspace,
    queue,

    isDestroyed(): boolean {
      return destroyed;
    },

    destroy(): void {
      if (destroyed) return;
      destroyed = true;

      engine.logDebug('Destroying...');
      const dropped = queue.clear();
      if (dropped > 0) {
        engine.logWarning(`Dropped ${dropped} queued job(s) on destroy`);
      }
    },

    logDebug(message: string): void {
      if (settings.debugLogging) {
        logger.info(`DEBUG: ${message}`);
      }
    },

    logInfo(message: string): void {
      logger.info(message);
    },

    logWarning(message: string): void {
      logger.warn(message);
    },

    logError(message: string, err?: unknown): void {
      if (err === undefined) {
        logger.error(message);
      } else {
        logger.error(message, err);
      }
    },
  };

  engine.logDebug(`Initializing for ${formatContext(context)}...`);
  return engine;
}

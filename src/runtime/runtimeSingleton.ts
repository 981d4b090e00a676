/**
 * Runtime singleton: process-wide access to the wired shim.
 *
 * Call `initRuntime(config)` once at startup, then `getRuntime()` from routes.
 * The engine itself is owned by the coordinator; this only holds the wiring.
 */

import type { ValidatedConfig } from '../config/schema';
import { createContextResolver, createWorkspaceProvider } from '../context';
import { createEngineCoordinator, type EngineCoordinator } from '../coordinator';
import { createEngineFactory } from '../engine';
import { DOCUMENT_EVENT_KINDS, createHostBridge, type DocumentEventKind, type HostBridge } from '../host';
import { createLogger } from '../logging';
import { createTrackingProgressSink, type TrackingProgressSink } from '../queue';
import { createStatusIndicator, type StatusIndicator } from '../ui';

// ── Types ───────────────────────────────────────────────────────────

export interface Runtime {
  host: HostBridge;
  coordinator: EngineCoordinator;
  indicator: StatusIndicator;
  progress: TrackingProgressSink;
}

// ── Module-level singleton ──────────────────────────────────────────

let runtime: Runtime | null = null;

const logger = createLogger('Runtime');

function documentEvents(config: ValidatedConfig): DocumentEventKind[] {
  return DOCUMENT_EVENT_KINDS.filter((kind) => config.engine.watchEvents.includes(kind));
}

// ── Public API ──────────────────────────────────────────────────────

/**
 * Wire and start the shim. Throws if already initialized.
 */
export function initRuntime(config: ValidatedConfig, host: HostBridge = createHostBridge()): Runtime {
  if (runtime !== null) {
    throw new Error('Runtime is already initialized. Restart the shim to re-initialize.');
  }

  const indicator = createStatusIndicator();
  const progress = createTrackingProgressSink();

  const coordinator = createEngineCoordinator({
    engineName: config.engine.name,
    host,
    resolver: createContextResolver(createWorkspaceProvider(config.workspaces)),
    engineFactory: createEngineFactory({
      engines: config.engines,
      settings: { debugLogging: config.engine.debugLogging },
      progress,
    }),
    indicator,
    watchEvents: documentEvents(config),
  });

  runtime = { host, coordinator, indicator, progress };
  coordinator.start();

  logger.info(`Initialized: engine "${config.engine.name}", ${config.derived.workspaceCount} workspace(s)`);

  return runtime;
}

/**
 * Get the current runtime. Returns null if not initialized.
 */
export function getRuntime(): Runtime | null {
  return runtime;
}

/**
 * Shut the coordinator down and forget the runtime. No-op if not initialized.
 */
export function shutdownRuntime(): void {
  if (runtime !== null) {
    runtime.coordinator.shutdown();
    runtime = null;
  }
}

/**
 * Reset runtime state. Intended for testing only.
 * @internal
 */
export function _resetRuntimeSingleton(): void {
  shutdownRuntime();
}

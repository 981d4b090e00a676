/**
 * EngineCoordinator: keeps the single engine instance in step with the
 * document open in the host.
 *
 * Every watched host event runs one refresh:
 *   1. resolve the current document against the engine's context
 *   2. keep, rebuild (destroy first, then start) or disable
 *   3. re-arm the watcher
 *
 * Nothing thrown during a refresh escapes it. Whatever happens, the watcher
 * stays armed until the host exits or `shutdown()` is called.
 */

import {
  type Context,
  type ContextResolver,
  type ResolveOutcomeKind,
  type Workspace,
  formatContext,
} from '../context';
import type { Engine, EngineFactory } from '../engine';
import {
  EngineInitError,
  UnresolvableContextError,
  describeError,
  errorMessage,
} from '../errors';
import { DOCUMENT_EVENT_KINDS, type DocumentEventKind, type HostDocumentApi } from '../host';
import { createLogger, type Logger } from '../logging';
import type { DisabledIndicator } from '../ui';
import { createEventWatcher, type EventWatcher } from '../watcher';

// ── Types ───────────────────────────────────────────────────────────

export type CoordinatorState =
  | { readonly kind: 'no-engine' }
  | { readonly kind: 'running'; readonly engine: Engine; readonly context: Context }
  /**
   * Integration disabled. `retainedEngine` is an engine that was running when
   * the document became unresolvable; it is left alive on purpose.
   */
  | { readonly kind: 'disabled'; readonly reason: string; readonly retainedEngine: Engine | null };

export type CoordinatorStateKind = CoordinatorState['kind'];

export interface CoordinatorOptions {
  engineName: string;
  host: HostDocumentApi;
  resolver: ContextResolver;
  engineFactory: EngineFactory;
  indicator: DisabledIndicator;
  /** Events that trigger a refresh (default: opened, saved, created) */
  watchEvents?: readonly DocumentEventKind[];
  /** Defaults to a watcher on `host` */
  watcher?: EventWatcher;
  logger?: Logger;
}

export interface WatchStatus {
  watching: boolean;
  runOnce: boolean;
  subscriptions: number;
}

export interface EngineCoordinator {
  /** Initial refresh against the current document, then arm the watcher. */
  start(): Engine | null;
  /** Re-resolve the current document. Returns the active engine. */
  refresh(): Engine | null;
  /** The live engine, including one retained while disabled. */
  getActiveEngine(): Engine | null;
  getState(): CoordinatorState;
  getContext(): Context | null;
  getLastOutcome(): ResolveOutcomeKind | null;
  getWatchStatus(): WatchStatus;
  /** Stop watching and destroy the engine. Also runs when the host exits. */
  shutdown(): void;
  isStopped(): boolean;
}

const NO_ENGINE: CoordinatorState = Object.freeze({ kind: 'no-engine' });

function liveEngine(state: CoordinatorState): Engine | null {
  switch (state.kind) {
    case 'running':
      return state.engine;
    case 'disabled':
      return state.retainedEngine;
    default:
      return null;
  }
}

// ── Coordinator ─────────────────────────────────────────────────────

export function createEngineCoordinator(options: CoordinatorOptions): EngineCoordinator {
  const { engineName, host, resolver, engineFactory, indicator } = options;
  const watchEvents = options.watchEvents ?? DOCUMENT_EVENT_KINDS;
  const logger = options.logger ?? createLogger('Coordinator');
  const watcher = options.watcher ?? createEventWatcher(host, logger.child('Watcher'));

  let state: CoordinatorState = NO_ENGINE;
  let lastOutcome: ResolveOutcomeKind | null = null;
  let refreshing = false;
  let rerunRequested = false;
  let stopped = false;

  function disable(reason: string, retainedEngine: Engine | null): void {
    indicator.showDisabledIndicator(reason);
    state = { kind: 'disabled', reason, retainedEngine };
  }

  function destroyEngine(engine: Engine): void {
    try {
      engine.destroy();
    } catch (err) {
      // Recovered: the rebuild goes ahead and the old instance is dropped
      logger.error(`Destroying engine #${engine.instanceId} failed, continuing:`, err);
    }
  }

  function rebuild(previous: Engine | null, workspace: Workspace, context: Context): void {
    if (previous) {
      previous.logDebug('Ready to switch context because of a host event');
      previous.logDebug(`Prev context: ${formatContext(previous.context)}`);
      previous.logDebug(`New context: ${formatContext(context)}`);
      destroyEngine(previous);
    }
    state = NO_ENGINE;

    try {
      const engine = engineFactory.startEngine(engineName, workspace, context);
      engine.logDebug('Launched new engine for context!');
      state = { kind: 'running', engine, context };
    } catch (err) {
      if (!(err instanceof EngineInitError)) throw err;
      logger.info(`Engine cannot be started: ${err.message}`);
      disable(err.message, null);
    }
  }

  function resolveAndApply(): void {
    indicator.clearDisabledIndicator();

    const engine = liveEngine(state);
    const documentPath = host.currentDocumentPath();
    const outcome = resolver.resolve(documentPath, engine?.context ?? null);
    lastOutcome = outcome.kind;

    switch (outcome.kind) {
      case 'unchanged':
        if (state.kind === 'disabled') {
          indicator.showDisabledIndicator(state.reason);
        }
        return;

      case 'unresolvable': {
        const error = new UnresolvableContextError(documentPath, outcome.reason);
        logger.info(`Engine cannot be started: ${error.message}`);
        disable(error.message, engine);
        return;
      }

      case 'same':
        if (engine) {
          state = { kind: 'running', engine, context: engine.context };
          return;
        }
        break;

      case 'changed':
        break;
    }

    rebuild(engine, outcome.workspace, outcome.context);
  }

  function rearm(): void {
    if (stopped) return;

    const persistent = state.kind === 'running';
    if (persistent && watcher.isWatching() && !watcher.isRunOnce()) return;

    watcher.start({
      events: watchEvents,
      runOnce: !persistent,
      callback: onHostEvent,
      onExit: onHostExit,
    });
  }

  function refreshOnce(): void {
    try {
      resolveAndApply();
    } catch (err) {
      logger.error(describeError(err));
      const survivor = liveEngine(state);
      disable(errorMessage(err), survivor && !survivor.isDestroyed() ? survivor : null);
    }
    rearm();
  }

  function refresh(): Engine | null {
    if (stopped) return null;

    if (refreshing) {
      // An event raised while a refresh is running is handled right after it
      rerunRequested = true;
      logger.debug('Refresh requested during refresh, deferring');
      return liveEngine(state);
    }

    refreshing = true;
    try {
      do {
        rerunRequested = false;
        refreshOnce();
      } while (rerunRequested && !stopped);
    } finally {
      refreshing = false;
    }

    return liveEngine(state);
  }

  function onHostEvent(): void {
    refresh();
  }

  function shutdown(): void {
    if (stopped) return;
    stopped = true;

    watcher.stop();
    const engine = liveEngine(state);
    if (engine) {
      destroyEngine(engine);
    }
    indicator.clearDisabledIndicator();
    state = NO_ENGINE;
    logger.info('Shut down');
  }

  function onHostExit(): void {
    logger.info('Host is exiting');
    shutdown();
  }

  return {
    start(): Engine | null {
      stopped = false;
      const engine = refresh();
      logger.info(`Started in state "${state.kind}" for ${formatContext(engine?.context ?? null)}`);
      return engine;
    },

    refresh,

    getActiveEngine(): Engine | null {
      return liveEngine(state);
    },

    getState(): CoordinatorState {
      return state;
    },

    getContext(): Context | null {
      return liveEngine(state)?.context ?? null;
    },

    getLastOutcome(): ResolveOutcomeKind | null {
      return lastOutcome;
    },

    getWatchStatus(): WatchStatus {
      return {
        watching: watcher.isWatching(),
        runOnce: watcher.isRunOnce(),
        subscriptions: watcher.activeSubscriptionCount(),
      };
    },

    shutdown,

    isStopped(): boolean {
      return stopped;
    },
  };
}

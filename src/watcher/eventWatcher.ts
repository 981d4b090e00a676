/**
 * EventWatcher: funnels several host lifecycle events into one callback.
 *
 * `start()` always replaces the previous registration set, and `host-exiting`
 * is always watched so subscriptions are released when the host shuts down.
 * With `runOnce`, the watcher stops itself before the callback runs, which lets
 * the callback arm a fresh watcher without racing the cleanup.
 */

import { SubscriptionError } from '../errors';
import { createLogger, type Logger } from '../logging';
import type { HostDocumentApi, HostEventKind, SubscriptionHandle } from '../host';

// ── Types ───────────────────────────────────────────────────────────

export interface WatchOptions {
  /** Event kinds that trigger the callback. `host-exiting` is implied. */
  events: readonly HostEventKind[];
  /** Stop after the first triggering event. */
  runOnce: boolean;
  /** Called with no arguments on each triggering event. */
  callback: () => void;
  /** Called after the watcher has stopped because the host is exiting. */
  onExit?: () => void;
}

export interface EventWatcher {
  /** Replace any current registrations with the given set. */
  start(options: WatchOptions): void;
  /** Release every registration. No-op when already stopped. */
  stop(): void;
  isWatching(): boolean;
  isRunOnce(): boolean;
  activeSubscriptionCount(): number;
}

// ── Event Watcher ───────────────────────────────────────────────────

export function createEventWatcher(
  host: HostDocumentApi,
  logger: Logger = createLogger('Watcher'),
): EventWatcher {
  let handles: SubscriptionHandle[] = [];
  let runOnce = false;

  function stop(): void {
    // Detach first: a nested or racing stop() then sees an empty set.
    const released = handles;
    handles = [];

    for (const handle of released) {
      try {
        host.unsubscribe(handle);
      } catch (err) {
        logger.warn(`Failed to remove "${handle.eventKind}" subscription #${handle.id}:`, err);
      }
    }
  }

  function trySubscribe(eventKind: HostEventKind, handler: () => void): void {
    try {
      handles.push(host.subscribe(eventKind, handler));
    } catch (err) {
      logger.warn(new SubscriptionError(eventKind, err).message);
    }
  }

  return {
    start(options: WatchOptions): void {
      stop();
      runOnce = options.runOnce;

      const onEvent = (eventKind: HostEventKind) => (): void => {
        if (options.runOnce) {
          stop();
        }
        try {
          options.callback();
        } catch (err) {
          logger.error(`Callback for "${eventKind}" threw:`, err);
        }
      };

      const onExit = (): void => {
        stop();
        if (options.onExit) {
          try {
            options.onExit();
          } catch (err) {
            logger.error('Exit handler threw:', err);
          }
        }
      };

      for (const eventKind of new Set(options.events)) {
        if (eventKind === 'host-exiting') continue;
        trySubscribe(eventKind, onEvent(eventKind));
      }
      trySubscribe('host-exiting', onExit);

      logger.debug(
        `Watching ${handles.length} subscription(s)${options.runOnce ? ' (run once)' : ''}`
      );
    },

    stop,

    isWatching(): boolean {
      return handles.length > 0;
    },

    isRunOnce(): boolean {
      return runOnce;
    },

    activeSubscriptionCount(): number {
      return handles.length;
    },
  };
}

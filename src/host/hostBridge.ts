/**
 * HostBridge: in-process stand-in for the host application.
 *
 * The host plugin forwards its lifecycle events to the shim; the bridge keeps
 * the reported document path and dispatches each event to the subscribers
 * registered through the HostDocumentApi.
 */

import { createLogger, type Logger } from '../logging';
import type {
  HostDocumentApi,
  HostEventHandler,
  HostEventKind,
  SubscriptionHandle,
} from './types';

export interface HostBridge extends HostDocumentApi {
  /** Record the document path the host reports. "" means a new, unsaved document. */
  setDocumentPath(path: string): void;
  /**
   * Deliver an event to every subscriber of that kind. Handlers removed during
   * dispatch (including by an earlier handler) are not called.
   * Returns the number of handlers invoked.
   */
  dispatch(eventKind: HostEventKind): number;
  /** Number of live subscriptions, optionally for one kind. */
  subscriptionCount(eventKind?: HostEventKind): number;
  /** Refuse future subscriptions to a kind (host without that event). */
  setUnsupported(eventKind: HostEventKind, unsupported: boolean): void;
}

interface Subscription {
  handle: SubscriptionHandle;
  handler: HostEventHandler;
}

export function createHostBridge(logger: Logger = createLogger('Host')): HostBridge {
  let documentPath = '';
  let nextId = 1;
  const subscriptions: Map<number, Subscription> = new Map();
  const unsupported: Set<HostEventKind> = new Set();

  return {
    currentDocumentPath(): string {
      return documentPath;
    },

    subscribe(eventKind: HostEventKind, handler: HostEventHandler): SubscriptionHandle {
      if (unsupported.has(eventKind)) {
        throw new Error(`Host does not support the "${eventKind}" event`);
      }
      const handle: SubscriptionHandle = Object.freeze({ id: nextId++, eventKind });
      subscriptions.set(handle.id, { handle, handler });
      return handle;
    },

    unsubscribe(handle: SubscriptionHandle): void {
      subscriptions.delete(handle.id);
    },

    setDocumentPath(path: string): void {
      documentPath = path;
    },

    dispatch(eventKind: HostEventKind): number {
      const targets = [...subscriptions.values()].filter((s) => s.handle.eventKind === eventKind);
      let invoked = 0;

      for (const sub of targets) {
        if (!subscriptions.has(sub.handle.id)) continue;
        invoked++;
        try {
          sub.handler();
        } catch (err) {
          logger.error(`Handler for "${eventKind}" threw:`, err);
        }
      }

      logger.debug(`Dispatched "${eventKind}" to ${invoked} handler(s)`);
      return invoked;
    },

    subscriptionCount(eventKind?: HostEventKind): number {
      if (eventKind === undefined) return subscriptions.size;
      let count = 0;
      for (const sub of subscriptions.values()) {
        if (sub.handle.eventKind === eventKind) count++;
      }
      return count;
    },

    setUnsupported(eventKind: HostEventKind, value: boolean): void {
      if (value) {
        unsupported.add(eventKind);
      } else {
        unsupported.delete(eventKind);
      }
    },
  };
}

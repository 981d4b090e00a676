/**
 * Host document API: the part of the host application the shim talks to.
 */

export const HOST_EVENT_KINDS = [
  'document-opened',
  'document-saved',
  'document-created',
  'host-exiting',
] as const;

export type HostEventKind = (typeof HOST_EVENT_KINDS)[number];

/** Events that describe a document change (everything but host exit). */
export type DocumentEventKind = Exclude<HostEventKind, 'host-exiting'>;

export const DOCUMENT_EVENT_KINDS: readonly DocumentEventKind[] = [
  'document-opened',
  'document-saved',
  'document-created',
];

/**
 * Opaque token returned by `subscribe`. Each subscription gets its own
 * token, so removing one never affects another.
 */
export interface SubscriptionHandle {
  readonly id: number;
  readonly eventKind: HostEventKind;
}

export type HostEventHandler = () => void;

export interface HostDocumentApi {
  /** Absolute path of the open document, or "" for an unsaved new document. */
  currentDocumentPath(): string;
  /** Throws if the host refuses the subscription. */
  subscribe(eventKind: HostEventKind, handler: HostEventHandler): SubscriptionHandle;
  /** Safe to call from inside the handler being removed. */
  unsubscribe(handle: SubscriptionHandle): void;
}

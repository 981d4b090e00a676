export {
  HOST_EVENT_KINDS,
  DOCUMENT_EVENT_KINDS,
  type HostEventKind,
  type DocumentEventKind,
  type SubscriptionHandle,
  type HostEventHandler,
  type HostDocumentApi,
} from './types';

export { type HostBridge, createHostBridge } from './hostBridge';

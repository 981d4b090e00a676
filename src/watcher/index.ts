export {
  type WatchOptions,
  type EventWatcher,
  createEventWatcher,
} from './eventWatcher';

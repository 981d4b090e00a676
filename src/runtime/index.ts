export {
  type Runtime,
  initRuntime,
  getRuntime,
  shutdownRuntime,
  _resetRuntimeSingleton,
} from './runtimeSingleton';

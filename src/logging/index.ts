export {
  type LogLevel,
  type Logger,
  createLogger,
  setLogLevel,
} from './logger';

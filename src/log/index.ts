export {
  type Logger,
  createLogger,
  setLogLevel,
} from './logger';

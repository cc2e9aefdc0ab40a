export {
  createLogger,
  createLoggerFromConfig,
  type Logger,
  type LoggerOptions,
  type LogFields,
  type EntryLevel,
} from './logger.js';

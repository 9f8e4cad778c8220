export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  logCredentialsInvalid,
  logGiveUp,
  logOperation,
  logRetry,
  type LogContext,
  type LogLevel,
  type Logger,
} from './logging.js';

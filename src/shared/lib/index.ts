export { logger, setLoggerOptions, createLogger } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';
export {
  GapflowError,
  ConfigNotFoundError,
  ValidationError,
  MissingInputError,
  BackendUnavailableError,
  BackendTimeoutError,
  StageExecutionError,
  StorageError,
  SessionPersistenceError,
  SessionNotFoundError,
  SessionBusyError,
  StageNotFoundError,
  ContextCollisionError,
  isRecoverableBackendError,
} from './errors.js';
export type { RecoverableBackendError } from './errors.js';

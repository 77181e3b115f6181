/**
 * @plenar/shared
 *
 * Shared utilities for Plenar.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './logging/logger.js';
export {
  PlenarError,
  RequiredElementMissingError,
  MalformedDateError,
  EmptyInputError,
  MarkupSyntaxError,
  StreamConsumedError,
  UnknownSchemaError,
  ConfigurationError,
  StoreError,
} from './errors/errors.js';
export { generateRunId, workerId } from './utils/ids.js';

/**
 * Logging Module Index
 */

export {
  WrapperLogger,
  getWrapperLogger,
  resetWrapperLogger,
  isConsoleLogLevel,
  type WrapperLogLevel,
  type ConsoleLogLevel,
  type WrapperLogCategory,
  type WrapperLogEntry,
  type WrapperLogSubscriber,
  type WrapperLoggerOptions,
} from './wrapper-logger';

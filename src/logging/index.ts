/**
 * Logging module
 */

export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';
export { Logger, registerSecret, clearSecrets, redact } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  getRegisteredComponents,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export {
  getLoggingConfig,
  applyLoggingOverrides,
  resetLoggingConfig,
} from './config.js';
export type { LoggingConfiguration } from './config.js';
export { ConsoleTransport, FileTransport, formatLocalTimestamp, formatTextLine } from './transports.js';
export type { LogTransport } from './transports.js';

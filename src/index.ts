/**
 * facetkit
 *
 * The top-level `initialize` is gated on the process's capabilities
 * (FACETKIT_FEATURES / FACETKIT_PROFILE); use `defineFeatures` for a kit with an
 * explicit capability set.
 *
 * @example
 * ```typescript
 * import { initialize, log, shutdown } from 'facetkit';
 *
 * await initialize({ level: 'info', target: 'console' });
 * log('warn', 'disk almost full', { free: '2%' });
 * await shutdown();
 * ```
 */

export {
  BuildError,
  ConfigurationError,
  FacetkitError,
  LogIOError,
  ValidationError,
  getErrorMessage,
  type ConfigurationErrorDetails,
} from './errors.js';

export * from './features/index.js';

export {
  LOG_LEVELS,
  LogCat,
  LogConfigBuilder,
  compareLevels,
  errorSerializer,
  flushSync,
  formatLogCatLine,
  getInstalledLevel,
  getLoggerStats,
  isInitialized,
  isLevelAtLeast,
  isLogLevel,
  log,
  loggerConfigFromEnv,
  registerExitHandlers,
  shutdown,
  type DocumentLoggerConfig,
  type FileLoggerConfig,
  type InitializeOptions,
  type InitializeResult,
  type InlineLoggerConfig,
  type LogCatOptions,
  type LogContext,
  type LogLevel,
  type LogSink,
  type LoggerConfig,
  type LoggerStats,
  type ShutdownResult,
} from './logging/index.js';

export {
  checkLoggingDocument,
  loadLoggingDocument,
  type LoggingDocument,
  type LoggingDocumentInput,
} from './config/index.js';

export * from './macros/index.js';
export * from './types/index.js';

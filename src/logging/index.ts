/**
 * Logging facade: one process-wide pino logger behind `initialize`/`log`/`shutdown`.
 */

export {
  flushSync,
  getInstalledLevel,
  getLoggerStats,
  initialize,
  inlineToDocument,
  isInitialized,
  log,
  loggerConfigFromEnv,
  registerExitHandlers,
  resolveLoggerConfig,
  shutdown,
  type DocumentLoggerConfig,
  type FileLoggerConfig,
  type InitializeOptions,
  type InitializeResult,
  type InlineLoggerConfig,
  type LevelInput,
  type LogContext,
  type LoggerConfig,
  type LoggerStats,
  type ShutdownResult,
} from './facade.js';

export {
  LOG_LEVELS,
  compareLevels,
  isLevelAtLeast,
  isLogLevel,
  lowestLevel,
  type LogLevel,
} from './levels.js';

export { LogConfigBuilder, type Installer } from './builder.js';
export { LogCat, formatLogCatLine, type LogCatOptions, type LogSink } from './log-cat.js';
export { errorSerializer } from './serializers.js';
export type { Appender } from './appenders.js';

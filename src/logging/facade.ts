/**
 * Process-wide logging facade.
 *
 * One logger per process, installed by `initialize` and released by `shutdown`:
 *
 *   Uninitialized --initialize--> Installed --shutdown--> Uninitialized
 *
 * `log` is valid in both states and never throws; before installation (and after
 * shutdown) it does nothing. A second `initialize` never replaces the installed
 * logger: it resolves `{ status: 'already-initialized' }`.
 *
 * @example
 * ```typescript
 * import { initialize, log, shutdown } from 'facetkit';
 *
 * await initialize({ level: 'info', target: 'console' });
 * log('info', 'Server started', { port: 8080 });
 * await shutdown();
 * ```
 */

import { getEnv } from '../config/env.js';
import { loadLoggingDocument, validateLoggingDocument } from '../config/loader.js';
import {
  InlineTargetSchema,
  LogLevelSchema,
  type LoggingDocument,
  type LoggingDocumentInput,
} from '../config/schema.js';
import { ValidationError, getErrorMessage } from '../errors.js';
import { closeAppenders, type Appender } from './appenders.js';
import { createBackend, type Logger } from './backend.js';
import { registerExitHandlers as registerProcessHooks } from './exit-handlers.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from './levels.js';

export type LogContext = Record<string, unknown>;

/** A level name; anything outside LOG_LEVELS is rejected at run time. */
export type LevelInput = LogLevel | (string & {});

/**
 * Inline parameters: a minimum level and one output target.
 */
export interface InlineLoggerConfig {
  level: LevelInput;
  /** `'console'` (stderr), `{ file: path }` or `'file:<path>'` */
  target: 'console' | { file: string } | `file:${string}`;
}

/**
 * Path to a TOML logging document, passed through unmodified.
 */
export interface FileLoggerConfig {
  configFile: string;
}

/**
 * An in-memory logging document, e.g. from `LogConfigBuilder`.
 */
export interface DocumentLoggerConfig {
  document: LoggingDocumentInput;
}

export type LoggerConfig = InlineLoggerConfig | FileLoggerConfig | DocumentLoggerConfig;

export interface InitializeOptions {
  /** Flush on process exit and termination signals (default: true) */
  exitHandlers?: boolean;
  /** Bound on how long `shutdown` waits for buffered output */
  shutdownTimeoutMs?: number;
}

export type InitializeResult =
  | { status: 'installed'; level: LogLevel; appenders: string[] }
  | { status: 'already-initialized' }
  | { status: 'disabled' };

export interface ShutdownResult {
  /** Every appender flushed and closed */
  flushed: boolean;
  /** The flush bound elapsed first */
  timedOut: boolean;
}

export interface LoggerStats {
  /** Messages handed to the backend */
  forwarded: number;
  /** Messages below the installed minimum */
  dropped: number;
  /** Backend or appender failures, counted instead of thrown */
  failed: number;
  lastFailure?: string;
}

interface InstalledLogger {
  logger: Logger;
  appenders: Appender[];
  level: LogLevel;
  shutdownTimeoutMs: number;
}

type FacadeState =
  | { phase: 'uninitialized' }
  | { phase: 'installing'; gate: Promise<InstalledLogger | null> }
  | { phase: 'installed'; installed: InstalledLogger };

let state: FacadeState = { phase: 'uninitialized' };
let stats: LoggerStats = { forwarded: 0, dropped: 0, failed: 0 };

function currentState(): FacadeState {
  return state;
}

function recordFailure(error: unknown): void {
  stats.failed++;
  stats.lastFailure = getErrorMessage(error);
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return `"${value}"`;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Turn inline parameters into the equivalent single-appender document.
 *
 * @throws ValidationError naming the offending value
 */
export function inlineToDocument(config: InlineLoggerConfig): LoggingDocument {
  const level = LogLevelSchema.safeParse(config.level);
  if (!level.success) {
    throw new ValidationError(
      `Invalid log level ${describeValue(config.level)}. Expected one of: ${LOG_LEVELS.join(', ')}`,
      'level',
      config.level
    );
  }

  const target = InlineTargetSchema.safeParse(config.target);
  if (!target.success) {
    throw new ValidationError(
      `Invalid log target ${describeValue(config.target)}. Expected "console", { file: path } or "file:<path>"`,
      'target',
      config.target
    );
  }

  const appender =
    target.data === 'console'
      ? { kind: 'console' as const, level: level.data, target: 'stderr' as const }
      : { kind: 'file' as const, level: level.data, path: target.data.file, append: true };

  return {
    root: { level: level.data, appenders: ['main'] },
    appenders: { main: appender },
  };
}

/**
 * Resolve whichever configuration form was given into a validated document.
 */
export function resolveLoggerConfig(config: LoggerConfig): LoggingDocument {
  const forms = [
    'configFile' in config,
    'document' in config,
    'level' in config || 'target' in config,
  ].filter(Boolean).length;

  if (forms !== 1) {
    throw new ValidationError(
      'Logger configuration must use exactly one form: inline { level, target }, { configFile } or { document }',
      'config',
      config
    );
  }

  if ('configFile' in config) {
    return loadLoggingDocument(config.configFile);
  }
  if ('document' in config) {
    return validateLoggingDocument(config.document);
  }
  return inlineToDocument(config);
}

/**
 * Logger configuration from the environment: the FACETKIT_LOG_CONFIG document
 * when set, otherwise console output at FACETKIT_LOG_LEVEL.
 */
export function loggerConfigFromEnv(): LoggerConfig {
  const env = getEnv();
  if (env.FACETKIT_LOG_CONFIG) {
    return { configFile: env.FACETKIT_LOG_CONFIG };
  }
  return { level: env.FACETKIT_LOG_LEVEL, target: 'console' };
}

async function install(
  config: LoggerConfig,
  options: InitializeOptions
): Promise<InstalledLogger> {
  const document = resolveLoggerConfig(config);
  const backend = await createBackend(document, (appender, error) => {
    recordFailure(new Error(`appender "${appender}": ${error.message}`));
  });

  return {
    logger: backend.logger,
    appenders: backend.appenders,
    level: backend.level,
    shutdownTimeoutMs:
      options.shutdownTimeoutMs ??
      document.shutdown_timeout_ms ??
      getEnv().FACETKIT_SHUTDOWN_TIMEOUT_MS,
  };
}

/**
 * Install the process-wide logger.
 *
 * Exactly one caller installs; every other caller, concurrent or later, gets
 * `already-initialized`. If the installing call fails, waiting callers retry
 * through the same gate.
 *
 * @throws ConfigurationError | ValidationError | LogIOError (as a rejection);
 *   the facade stays uninitialized
 */
export async function initialize(
  config: LoggerConfig,
  options: InitializeOptions = {}
): Promise<InitializeResult> {
  for (let current = currentState(); current.phase !== 'uninitialized'; current = currentState()) {
    if (current.phase === 'installed') {
      return { status: 'already-initialized' };
    }
    const winner = await current.gate;
    if (winner) {
      return { status: 'already-initialized' };
    }
  }

  const attempt = install(config, options);
  const gate = attempt.then(
    (installed) => {
      state = { phase: 'installed', installed };
      stats = { forwarded: 0, dropped: 0, failed: 0 };
      return installed;
    },
    () => {
      state = { phase: 'uninitialized' };
      return null;
    }
  );
  state = { phase: 'installing', gate };

  const installed = await attempt;

  if (options.exitHandlers ?? true) {
    registerExitHandlers();
  }

  return {
    status: 'installed',
    level: installed.level,
    appenders: installed.appenders.map((appender) => `${appender.name} (${appender.description})`),
  };
}

/**
 * Log a message through the installed logger.
 *
 * Returns `true` when the message was handed to the backend, `false` when there is
 * no logger, the level is below the installed minimum, or the backend failed.
 * Never throws.
 */
export function log(level: LogLevel, message: string, context?: LogContext): boolean {
  const current = currentState();
  if (current.phase !== 'installed') {
    return false;
  }

  const { logger } = current.installed;
  if (!isLogLevel(level) || !logger.isLevelEnabled(level)) {
    stats.dropped++;
    return false;
  }

  try {
    if (context) {
      logger[level](context, message);
    } else {
      logger[level](message);
    }
    stats.forwarded++;
    return true;
  } catch (error) {
    recordFailure(error);
    return false;
  }
}

/**
 * Detach the process-wide logger and flush its appenders.
 *
 * `log` becomes a no-op immediately. Waits for buffered output at most the
 * configured bound, then resolves regardless.
 */
export async function shutdown(): Promise<ShutdownResult> {
  const pending = currentState();
  if (pending.phase === 'installing') {
    await pending.gate;
  }

  const current = currentState();
  if (current.phase !== 'installed') {
    return { flushed: true, timedOut: false };
  }

  state = { phase: 'uninitialized' };
  const { appenders, shutdownTimeoutMs } = current.installed;
  return closeAppenders(appenders, shutdownTimeoutMs);
}

/**
 * Synchronously flush buffered output, for `exit` handlers.
 */
export function flushSync(): void {
  const current = currentState();
  if (current.phase !== 'installed') {
    return;
  }

  for (const appender of current.installed.appenders) {
    try {
      appender.flushSync();
    } catch (error) {
      recordFailure(error);
    }
  }
}

/**
 * Shut the logger down on `beforeExit`, SIGINT and SIGTERM, and flush synchronously
 * on `exit`. Registers once per process; `initialize` calls this by default.
 */
export function registerExitHandlers(): void {
  registerProcessHooks({ shutdown, flushSync });
}

export function isInitialized(): boolean {
  return currentState().phase === 'installed';
}

/**
 * Minimum level of the installed logger, or null when none is installed.
 */
export function getInstalledLevel(): LogLevel | null {
  const current = currentState();
  return current.phase === 'installed' ? current.installed.level : null;
}

export function getLoggerStats(): LoggerStats {
  return { ...stats };
}

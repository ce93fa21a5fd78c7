import {
  assertLoggingEnabled,
  type BuildProfile,
  type ResolvedFeatures,
} from '../features/capabilities.js';
import { getProcessFeatures } from '../features/process.js';
import { log, type LogContext } from './facade.js';
import type { LogLevel } from './levels.js';

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[95m', // magenta
  debug: '\x1b[96m', // bright cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};
const RESET = '\x1b[0m';

/**
 * Leveled logging methods bound to one source.
 */
export interface LogSink {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LogCatOptions {
  /** Capability set to check against; the process features by default */
  features?: ResolvedFeatures;
  /** Defaults to the profile of `features` */
  profile?: BuildProfile;
}

/**
 * Format a development console line, e.g. `[  INFO] - APP - started`.
 */
export function formatLogCatLine(
  level: LogLevel,
  tag: string,
  message: string,
  context?: LogContext
): string {
  const label = level.toUpperCase().padStart(6);
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  return `${LEVEL_COLORS[level]}[${label}] - ${tag} - ${message}${contextStr}${RESET}`;
}

/**
 * Tagged logger.
 *
 * In a debug build every message is printed to stdout in colour, whether or not a
 * logger is installed. In a release build messages go through the facade as
 * `"<tag> - <message>"` and follow its level and no-op rules. A release `LogCat`
 * cannot be created without a logging capability.
 *
 * @example
 * ```typescript
 * const cat = new LogCat('APP');
 * cat.info('Application started successfully.');
 * cat.warn('This might cause an issue', { disk: 'low' });
 * ```
 */
export class LogCat implements LogSink {
  readonly tag: string;
  readonly profile: BuildProfile;

  /**
   * @throws BuildError in a release build without a logging capability
   */
  constructor(tag: string, options: LogCatOptions = {}) {
    const features = options.features ?? getProcessFeatures();
    this.tag = tag;
    this.profile = options.profile ?? features.profile;
    assertLoggingEnabled({ capabilities: features.capabilities, profile: this.profile });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (this.profile === 'debug') {
      // eslint-disable-next-line no-console
      console.log(formatLogCatLine(level, this.tag, message, context));
      return;
    }
    log(level, `${this.tag} - ${message}`, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }
}

import type { AppenderConfig, LoggingDocument } from '../config/schema.js';
import {
  initialize,
  type InitializeOptions,
  type InitializeResult,
  type LoggerConfig,
} from './facade.js';
import type { LogLevel } from './levels.js';

/**
 * Fluent builder for the common console-plus-file setup.
 *
 * Always logs to the console; adds a timestamped file appender once a filename is
 * set (`<filepath>/<filename>-<yyyy-MM-dd HH_mm_ss>.log`, directory created on demand).
 *
 * Defaults: root level `trace`, console and file thresholds `debug`, console on
 * stderr, file directory `logs`.
 *
 * @example
 * ```typescript
 * await new LogConfigBuilder()
 *   .setRootLevel('info')
 *   .setConsoleLevel('warn')
 *   .setFileLevel('trace')
 *   .setFilename('myapp')
 *   .setFilepath('logs')
 *   .initialize();
 * ```
 */
export type Installer = (
  config: LoggerConfig,
  options?: InitializeOptions
) => Promise<InitializeResult>;

export class LogConfigBuilder {
  private rootLevel: LogLevel = 'trace';
  private consoleLevel: LogLevel = 'debug';
  private consoleTarget: 'stdout' | 'stderr' = 'stderr';
  private encoder?: 'json' | 'pretty';
  private fileLevel: LogLevel = 'debug';
  private filename?: string;
  private filepath = 'logs';
  private shutdownTimeoutMs?: number;

  /**
   * @param install - Installs the built document; the process-wide facade by default
   */
  constructor(private readonly install: Installer = initialize) {}

  setRootLevel(level: LogLevel): this {
    this.rootLevel = level;
    return this;
  }

  setConsoleLevel(level: LogLevel): this {
    this.consoleLevel = level;
    return this;
  }

  setConsoleTarget(target: 'stdout' | 'stderr'): this {
    this.consoleTarget = target;
    return this;
  }

  /** Console encoding; by default pretty on a TTY, JSON otherwise */
  setEncoder(encoder: 'json' | 'pretty'): this {
    this.encoder = encoder;
    return this;
  }

  setFileLevel(level: LogLevel): this {
    this.fileLevel = level;
    return this;
  }

  /** Log file name without extension or timestamp */
  setFilename(filename: string): this {
    this.filename = filename;
    return this;
  }

  /** Directory for log files */
  setFilepath(filepath: string): this {
    this.filepath = filepath;
    return this;
  }

  setShutdownTimeout(ms: number): this {
    this.shutdownTimeoutMs = ms;
    return this;
  }

  build(): LoggingDocument {
    const appenders: Record<string, AppenderConfig> = {
      console: {
        kind: 'console',
        level: this.consoleLevel,
        target: this.consoleTarget,
        ...(this.encoder && { encoder: this.encoder }),
      },
    };

    if (this.filename !== undefined) {
      appenders.file = {
        kind: 'file',
        level: this.fileLevel,
        directory: this.filepath,
        filename: this.filename,
        append: false,
      };
    }

    return {
      ...(this.shutdownTimeoutMs !== undefined && { shutdown_timeout_ms: this.shutdownTimeoutMs }),
      root: { level: this.rootLevel, appenders: Object.keys(appenders) },
      appenders,
    };
  }

  /**
   * Build the document and install it as the process-wide logger.
   */
  initialize(options?: InitializeOptions): Promise<InitializeResult> {
    return this.install({ document: this.build() }, options);
  }
}

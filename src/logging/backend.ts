/**
 * Pino-based logging backend.
 *
 * Turns a validated logging document into a pino logger fanned out over its
 * appenders with `pino.multistream`. Output is structured JSON with ISO
 * timestamps and level labels; pid and hostname are left out.
 */

import { pino, type Logger as PinoLogger, type LoggerOptions, type StreamEntry } from 'pino';
import type { LoggingDocument } from '../config/schema.js';
import { ConfigurationError } from '../errors.js';
import { createAppender, type Appender, type StreamErrorHandler } from './appenders.js';
import { compareLevels, lowestLevel, type LogLevel } from './levels.js';
import { errorSerializer } from './serializers.js';

export type Logger = PinoLogger;

export interface Backend {
  logger: PinoLogger;
  appenders: Appender[];
  /** Minimum severity the logger forwards */
  level: LogLevel;
}

/**
 * The level pino filters at: the root level, raised to the lowest appender
 * threshold so nothing is forwarded that no appender would write.
 */
export function effectiveLevel(root: LogLevel, appenders: readonly Appender[]): LogLevel {
  const floor = lowestLevel(
    appenders.map((appender) => appender.level),
    root
  );
  return compareLevels(floor, root) > 0 ? floor : root;
}

function createPinoInstance(level: LogLevel, appenders: readonly Appender[]): PinoLogger {
  const options: LoggerOptions = {
    level,
    // Remove default fields we don't need
    base: undefined,
    // ISO timestamps
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Custom serializers
    serializers: {
      err: errorSerializer,
      error: errorSerializer,
    },
  };

  const streams: StreamEntry[] = appenders.map((appender) => ({
    level: appender.level,
    stream: appender.stream,
  }));

  return pino(options, pino.multistream(streams));
}

/**
 * Open every appender the root routes to and build the logger over them.
 * If one appender fails to open, the ones already opened are closed again.
 */
export async function createBackend(
  document: LoggingDocument,
  onStreamError: StreamErrorHandler
): Promise<Backend> {
  const appenders: Appender[] = [];

  try {
    for (const name of new Set(document.root.appenders)) {
      const config = document.appenders[name];
      if (!config) {
        throw new ConfigurationError(`Root routes to unknown appender "${name}"`);
      }
      appenders.push(await createAppender(name, config, onStreamError));
    }
  } catch (error) {
    await Promise.allSettled(appenders.map((appender) => appender.close()));
    throw error;
  }

  const level = effectiveLevel(document.root.level, appenders);
  return {
    logger: createPinoInstance(level, appenders),
    appenders,
    level,
  };
}

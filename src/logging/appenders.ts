/**
 * Appenders: the named output destinations a logger fans out to.
 *
 * Console appenders write JSON lines straight to the process stream, or go through
 * a pino-pretty transport on a TTY. File appenders use an asynchronous
 * `pino.destination`, so writes are buffered and `close()` waits for them.
 */

import { mkdir, open } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname } from 'node:path';
import { pino, type DestinationStream } from 'pino';
import type { AppenderConfig, ConsoleAppenderConfig, FileAppenderConfig } from '../config/schema.js';
import { getDisplayPath, resolveFileTarget } from '../config/paths.js';
import { LogIOError, getErrorMessage } from '../errors.js';
import type { LogLevel } from './levels.js';

export interface Appender {
  readonly name: string;
  readonly kind: AppenderConfig['kind'];
  /** Threshold: messages below it are not written here */
  readonly level: LogLevel;
  readonly stream: DestinationStream;
  /** Human-readable destination, e.g. `stderr` or a file path */
  readonly description: string;
  /** Write out anything buffered; safe to call from an `exit` handler */
  flushSync(): void;
  /** Flush and release the destination */
  close(): Promise<void>;
}

export type StreamErrorHandler = (appender: string, error: Error) => void;

/**
 * Stream the appender opened itself and must end on close.
 */
interface OwnedStream extends DestinationStream {
  flushSync(): void;
  end(): void;
  once(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Check if pino-pretty is available (it's a dev dependency).
 */
function isPinoPrettyAvailable(): boolean {
  try {
    const require = createRequire(import.meta.url);
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

function ownedAppender(
  name: string,
  config: AppenderConfig,
  description: string,
  stream: OwnedStream,
  onError: StreamErrorHandler
): Appender {
  stream.on('error', (error) => onError(name, error));

  return {
    name,
    kind: config.kind,
    level: config.level,
    stream,
    description,
    flushSync: () => stream.flushSync(),
    close: () =>
      new Promise<void>((resolve) => {
        stream.once('close', () => resolve());
        stream.end();
      }),
  };
}

function createConsoleAppender(
  name: string,
  config: ConsoleAppenderConfig,
  onError: StreamErrorHandler
): Appender {
  const target = config.target === 'stdout' ? process.stdout : process.stderr;
  const encoder = config.encoder ?? (target.isTTY ? 'pretty' : 'json');

  // Use pino-pretty for human-readable output, but only if available
  if (encoder === 'pretty' && isPinoPrettyAvailable()) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: config.target === 'stdout' ? 1 : 2,
      },
    });
    return ownedAppender(name, config, config.target, transport, onError);
  }

  // JSON lines go straight to the process stream, which outlives the logger
  return {
    name,
    kind: config.kind,
    level: config.level,
    stream: target,
    description: config.target,
    flushSync: () => undefined,
    close: () => Promise.resolve(),
  };
}

/**
 * Make sure the file can be created and written before handing it to pino,
 * so an unwritable target fails `initialize` instead of the first write.
 */
async function probeWritable(path: string, append: boolean): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    const handle = await open(path, append ? 'a' : 'w');
    await handle.close();
  } catch (error) {
    throw new LogIOError(
      `Cannot write log file ${getDisplayPath(path)}: ${getErrorMessage(error)}`,
      path,
      error
    );
  }
}

async function createFileAppender(
  name: string,
  config: FileAppenderConfig,
  onError: StreamErrorHandler
): Promise<Appender> {
  const { path, append } = resolveFileTarget(config);
  await probeWritable(path, append);

  const destination = pino.destination({ dest: path, append, mkdir: true, sync: false });
  return ownedAppender(name, config, path, destination, onError);
}

/**
 * Open the destination described by an appender config.
 *
 * @throws LogIOError when a file target cannot be written
 */
export async function createAppender(
  name: string,
  config: AppenderConfig,
  onError: StreamErrorHandler
): Promise<Appender> {
  switch (config.kind) {
    case 'console':
      return createConsoleAppender(name, config, onError);
    case 'file':
      return createFileAppender(name, config, onError);
  }
}

export interface CloseOutcome {
  /** Every appender flushed and closed in time */
  flushed: boolean;
  /** The bound elapsed before the appenders finished */
  timedOut: boolean;
}

/**
 * Close appenders, waiting at most `timeoutMs`. Never rejects.
 */
export async function closeAppenders(
  appenders: readonly Appender[],
  timeoutMs: number
): Promise<CloseOutcome> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
    timer.unref();
  });

  const closing = Promise.allSettled(appenders.map((appender) => appender.close())).then(
    (results) => (results.every((r) => r.status === 'fulfilled') ? 'closed' : 'failed')
  );

  try {
    const outcome = await Promise.race([closing, timeout]);
    return { flushed: outcome === 'closed', timedOut: outcome === 'timeout' };
  } finally {
    clearTimeout(timer);
  }
}

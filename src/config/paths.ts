import { homedir } from 'node:os';
import { join, sep } from 'node:path';
import { DateTime } from 'luxon';
import type { FileAppenderConfig } from './schema.js';

const DEFAULT_LOG_DIR = 'logs';
const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH_mm_ss';

/**
 * Resolved destination of a file appender.
 */
export interface FileTarget {
  path: string;
  append: boolean;
}

/**
 * Name a timestamped log file: `<directory>/<filename>-<yyyy-MM-dd HH_mm_ss>.log`.
 */
export function timestampedLogPath(
  filename: string,
  directory: string = DEFAULT_LOG_DIR,
  now: DateTime = DateTime.local()
): string {
  return join(directory, `${filename}-${now.toFormat(TIMESTAMP_FORMAT)}.log`);
}

/**
 * Work out where a file appender writes.
 *
 * A fixed `path` appends by default; a timestamped `filename` starts a new file.
 * Paths are used as given (relative ones resolve against the working directory).
 */
export function resolveFileTarget(appender: FileAppenderConfig, now?: DateTime): FileTarget {
  if (appender.path !== undefined) {
    return { path: appender.path, append: appender.append ?? true };
  }

  const filename = appender.filename ?? 'app';
  return {
    path: timestampedLogPath(filename, appender.directory, now),
    append: appender.append ?? false,
  };
}

/**
 * Get a user-friendly display path (with ~ for home directory).
 */
export function getDisplayPath(path: string): string {
  const home = homedir();
  if (path === home || path.startsWith(home + sep)) {
    return '~' + path.slice(home.length);
  }
  return path;
}

/**
 * Fixed, ordered severity levels: trace < debug < info < warn < error.
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Negative when `a` is less severe than `b`, zero when equal.
 */
export function compareLevels(a: LogLevel, b: LogLevel): number {
  return LEVEL_RANK[a] - LEVEL_RANK[b];
}

/**
 * Whether a message at `level` passes a `minimum` threshold.
 */
export function isLevelAtLeast(level: LogLevel, minimum: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minimum];
}

/**
 * The least severe of the given levels, or `fallback` when there are none.
 */
export function lowestLevel(levels: Iterable<LogLevel>, fallback: LogLevel): LogLevel {
  let lowest: LogLevel | null = null;
  for (const level of levels) {
    if (lowest === null || LEVEL_RANK[level] < LEVEL_RANK[lowest]) {
      lowest = level;
    }
  }
  return lowest ?? fallback;
}

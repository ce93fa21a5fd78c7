/**
 * Error classes surfaced by facetkit.
 *
 * Every error carries a stable `code` for programmatic handling. Configuration,
 * validation and I/O errors are returned from `initialize` (as a rejected promise);
 * `BuildError` marks a capability inconsistency and has no run-time fallback.
 */

import type { Capability } from './features/capabilities.js';

/**
 * Base class for all facetkit errors.
 */
export abstract class FacetkitError extends Error {
  abstract readonly code: string;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export interface ConfigurationErrorDetails {
  /** Config document the error refers to, when there is one */
  path?: string;
  /** 1-based line of a parse failure */
  line?: number;
  /** 1-based column of a parse failure */
  column?: number;
}

/**
 * Malformed or missing configuration input.
 *
 * Examples:
 * - Config file does not exist
 * - TOML syntax error (line/column set)
 * - Document fails schema validation
 */
export class ConfigurationError extends FacetkitError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly path?: string;
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, details: ConfigurationErrorDetails = {}, cause?: unknown) {
    super(message, cause);
    this.path = details.path;
    this.line = details.line;
    this.column = details.column;
  }
}

/**
 * An inline parameter is outside its fixed set of values.
 */
export class ValidationError extends FacetkitError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly field: string,
    readonly value: unknown
  ) {
    super(message);
  }
}

/**
 * An appender target cannot be created or opened for writing.
 */
export class LogIOError extends FacetkitError {
  readonly code = 'IO_ERROR';

  constructor(
    message: string,
    readonly path: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/**
 * The enabled capability set cannot satisfy a call site.
 *
 * Stands in for a build failure: raised at startup or at the gated call site,
 * never swallowed.
 */
export class BuildError extends FacetkitError {
  readonly code = 'BUILD_ERROR';

  constructor(
    message: string,
    readonly capability: Capability | string
  ) {
    super(message);
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { existsSync, readFileSync } from 'node:fs';
import TOML from '@iarna/toml';
import {
  LoggingDocumentSchema,
  formatIssues,
  type LoggingDocument,
} from './schema.js';
import { getDisplayPath } from './paths.js';
import { ConfigurationError, getErrorMessage } from '../errors.js';

interface ParseLocation {
  line?: number;
  column?: number;
}

/**
 * Pull the 1-based location out of a TOML parser error, when it has one.
 */
function getParseLocation(error: unknown): ParseLocation {
  if (!(error instanceof Error)) {
    return {};
  }

  const location: ParseLocation = {};
  if ('line' in error && typeof error.line === 'number') {
    location.line = error.line + 1;
  }
  if ('col' in error && typeof error.col === 'number') {
    location.column = error.col + 1;
  }
  return location;
}

function describeSource(path?: string): string {
  return path ? ` (${getDisplayPath(path)})` : '';
}

/**
 * Load and parse a TOML logging document.
 * The path is used exactly as given.
 *
 * @throws ConfigurationError when the file is missing, unreadable, not TOML or invalid
 */
export function loadLoggingDocument(path: string): LoggingDocument {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Logging config file not found: ${getDisplayPath(path)}`, {
      path,
    });
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read logging config${describeSource(path)}: ${getErrorMessage(error)}`,
      { path },
      error
    );
  }

  return parseLoggingDocument(content, path);
}

/**
 * Parse TOML text into a validated logging document.
 * Parser messages are passed through verbatim.
 */
export function parseLoggingDocument(content: string, path?: string): LoggingDocument {
  let parsed: unknown;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse logging config${describeSource(path)}:\n${getErrorMessage(error)}`,
      { path, ...getParseLocation(error) },
      error
    );
  }

  return validateLoggingDocument(parsed, path);
}

/**
 * Validate an already-parsed document and apply defaults.
 */
export function validateLoggingDocument(input: unknown, path?: string): LoggingDocument {
  const result = checkLoggingDocument(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid logging config${describeSource(path)}:\n${result.errors.join('\n')}`,
      { path }
    );
  }
  return result.data;
}

/**
 * Validate a document without throwing.
 * Useful for tooling that reports every problem at once.
 */
export function checkLoggingDocument(
  input: unknown
): { success: true; data: LoggingDocument } | { success: false; errors: string[] } {
  const result = LoggingDocumentSchema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

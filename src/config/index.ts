/**
 * Configuration for facetkit.
 *
 * Two sources:
 *
 * 1. Environment variables (process.env, `.env` loaded through dotenv)
 * 2. TOML logging documents, validated against `LoggingDocumentSchema`
 *
 * @example
 * ```typescript
 * import { loadLoggingDocument } from './config/index.js';
 *
 * const document = loadLoggingDocument('config/logging.toml');
 * console.log(document.root.appenders);
 * ```
 */

export { getEnv, getBuildProfile, resetEnvCache, type Env } from './env.js';

export {
  checkLoggingDocument,
  loadLoggingDocument,
  parseLoggingDocument,
  validateLoggingDocument,
} from './loader.js';

export {
  AppenderSchema,
  ConsoleAppenderSchema,
  FileAppenderSchema,
  InlineTargetSchema,
  LogLevelSchema,
  LoggingDocumentSchema,
  formatIssues,
  type AppenderConfig,
  type ConsoleAppenderConfig,
  type FileAppenderConfig,
  type InlineTarget,
  type LoggingDocument,
  type LoggingDocumentInput,
} from './schema.js';

export { getDisplayPath, resolveFileTarget, timestampedLogPath, type FileTarget } from './paths.js';

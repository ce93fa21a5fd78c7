import { loadLoggingDocument } from '../../config/loader.js';
import { getDisplayPath, resolveFileTarget } from '../../config/paths.js';
import type { AppenderConfig } from '../../config/schema.js';
import { ConfigurationError, getErrorMessage } from '../../errors.js';
import { output } from '../output.js';

interface CheckConfigOptions {
  json?: boolean;
}

export function describeAppender(appender: AppenderConfig): string {
  if (appender.kind === 'console') {
    return `console → ${appender.target} (${appender.level}${appender.encoder ? `, ${appender.encoder}` : ''})`;
  }
  const target = resolveFileTarget(appender);
  return `file → ${getDisplayPath(target.path)} (${appender.level}, ${target.append ? 'append' : 'truncate'})`;
}

export function checkConfigCommand(file: string, options: CheckConfigOptions = {}): void {
  try {
    const document = loadLoggingDocument(file);

    if (options.json) {
      output.json(document);
      return;
    }

    output.success(`${getDisplayPath(file)} is a valid logging config`);
    output.header('Root');
    output.stat('Level', document.root.level);
    if (document.shutdown_timeout_ms !== undefined) {
      output.stat('Shutdown timeout', `${document.shutdown_timeout_ms} ms`);
    }

    output.header('Appenders');
    for (const name of document.root.appenders) {
      output.appender(name, describeAppender(document.appenders[name]));
    }

    const unused = Object.keys(document.appenders).filter(
      (name) => !document.root.appenders.includes(name)
    );
    if (unused.length > 0) {
      output.warn(`Defined but not routed: ${unused.join(', ')}`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      output.error('Invalid logging config', error.message);
      if (error.line !== undefined) {
        output.stat('Line', error.line);
        output.stat('Column', error.column ?? '?');
      }
    } else {
      output.error('Failed to check logging config', getErrorMessage(error));
    }
    process.exitCode = 1;
  }
}

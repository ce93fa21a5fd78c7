import { z } from 'zod';
import { LOG_LEVELS } from '../logging/levels.js';

// Log level enum
export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Inline output target: `'console'`, `{ file: path }` or the `'file:<path>'` shorthand.
 */
export const InlineTargetSchema = z.union([
  z.literal('console'),
  z.object({ file: z.string().min(1) }).strict(),
  z
    .string()
    .regex(/^file:.+/)
    .transform((target) => ({ file: target.slice('file:'.length) })),
]);
export type InlineTarget = z.output<typeof InlineTargetSchema>;

export const ConsoleAppenderSchema = z
  .object({
    kind: z.literal('console'),
    level: LogLevelSchema.default('debug'),
    target: z.enum(['stdout', 'stderr']).default('stderr'),
    encoder: z.enum(['json', 'pretty']).optional(),
  })
  .strict();
export type ConsoleAppenderConfig = z.output<typeof ConsoleAppenderSchema>;

export const FileAppenderSchema = z
  .object({
    kind: z.literal('file'),
    level: LogLevelSchema.default('debug'),
    path: z.string().min(1).optional(),
    directory: z.string().min(1).optional(),
    filename: z.string().min(1).optional(),
    append: z.boolean().optional(),
  })
  .strict();
export type FileAppenderConfig = z.output<typeof FileAppenderSchema>;

export const AppenderSchema = z.discriminatedUnion('kind', [
  ConsoleAppenderSchema,
  FileAppenderSchema,
]);
export type AppenderConfig = z.output<typeof AppenderSchema>;

/**
 * Schema for a logging document (TOML file or builder output).
 * Uses snake_case keys and named appender tables.
 */
export const LoggingDocumentSchema = z
  .object({
    shutdown_timeout_ms: z.number().int().positive().optional(),
    root: z
      .object({
        level: LogLevelSchema.default('trace'),
        appenders: z.array(z.string().min(1)).min(1, 'root needs at least one appender'),
      })
      .strict(),
    appenders: z.record(z.string(), AppenderSchema),
  })
  .strict()
  .superRefine((doc, ctx) => {
    doc.root.appenders.forEach((name, index) => {
      if (!Object.hasOwn(doc.appenders, name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['root', 'appenders', index],
          message: `unknown appender "${name}"`,
        });
      }
    });

    for (const [name, appender] of Object.entries(doc.appenders)) {
      if (appender.kind !== 'file') continue;

      if (appender.path === undefined && appender.filename === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['appenders', name],
          message: 'file appender needs "path" or "filename"',
        });
      }
      if (
        appender.path !== undefined &&
        (appender.filename !== undefined || appender.directory !== undefined)
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['appenders', name],
          message: 'use either "path" or "directory"/"filename", not both',
        });
      }
    }
  });

export type LoggingDocument = z.output<typeof LoggingDocumentSchema>;
export type LoggingDocumentInput = z.input<typeof LoggingDocumentSchema>;

/**
 * Format zod issues the way every facetkit error lists them.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`);
}

/**
 * Custom Pino serializers for structured logging.
 */

/**
 * Error serializer that captures full error details including stack traces
 * and any custom properties attached to the error object.
 * Values that are not errors pass through unchanged.
 */
export function errorSerializer(value: unknown): unknown {
  if (!(value instanceof Error)) {
    return value;
  }

  return {
    type: value.constructor.name,
    message: value.message,
    stack: value.stack,
    // Include any custom properties (e.g., `code`, `path`, etc.)
    ...Object.fromEntries(Object.entries(value)),
  };
}

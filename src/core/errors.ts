/**
 * SDK error types
 *
 * Only configuration errors escape to the caller. Everything else
 * is logged and degrades tracing instead of failing the host app.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

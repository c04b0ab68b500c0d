/**
 * Shared types for framework integrations
 */

/**
 * The part of a Tracer the integrations rely on
 */
export interface FlushableTracer {
  withContext<T>(fn: () => T): T;
  forceFlush(timeoutMs?: number): Promise<boolean>;
}

export interface FlushOptions {
  /** Flush deadline in ms (default: 30000) */
  timeoutMs?: number;
}

/**
 * Centralized Logger
 *
 * Provides consistent debug logging across the SDK.
 * Enable via: new Tracer({ debug: true }) or BEACON_DEBUG=true
 */

// ─────────────────────────────────────────────────────────────
// State
// ─────────────────────────────────────────────────────────────

// Open tracers created with debug: true
let debugHolders = 0;

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

/**
 * Turn debug logging on until the returned release is called.
 * The logger is shared, so output stays on while any holder is open.
 */
export function holdDebug(): () => void {
  debugHolders += 1;
  let released = false;

  return () => {
    if (released) return;
    released = true;
    debugHolders -= 1;
  };
}

/**
 * Check if debug mode is enabled
 */
export function isDebugEnabled(): boolean {
  if (debugHolders > 0) return true;
  return process.env.BEACON_DEBUG === 'true';
}

// ─────────────────────────────────────────────────────────────
// Logging Functions
// ─────────────────────────────────────────────────────────────

const PREFIX = '[Beacon]';

/**
 * Log debug message (only when debug enabled)
 */
export function debug(message: string, data?: unknown): void {
  if (!isDebugEnabled()) return;
  logWithPrefix('debug', message, data);
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string, data?: unknown): void {
  logWithPrefix('warn', message, data);
}

// ─────────────────────────────────────────────────────────────
// Tracer lifecycle logging
// ─────────────────────────────────────────────────────────────

/**
 * Log provider acquisition
 */
export function providerAcquired(strategy: string, isOwner: boolean): void {
  if (!isDebugEnabled()) return;
  console.log(`${PREFIX} Provider acquired: strategy=${strategy} owner=${isOwner}`);
}

/**
 * Log session creation
 */
export function sessionCreated(sessionId: string, project: string): void {
  if (!isDebugEnabled()) return;
  console.log(`${PREFIX} Session created: id=${sessionId} project=${project}`);
}

/**
 * Log session creation failure (always visible - tracing continues without a session)
 */
export function sessionFailed(project: string, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.warn(`${PREFIX} Failed to create session: project=${project} error=${message}`);
}

/**
 * Log flush result
 */
export function flushResult(success: boolean, durationMs: number): void {
  if (success) {
    if (!isDebugEnabled()) return;
    console.log(`${PREFIX} Flush completed: duration=${durationMs}ms`);
    return;
  }
  console.warn(`${PREFIX} Flush failed or timed out: duration=${durationMs}ms`);
}

/**
 * Log request details (for deep debugging)
 */
export function requestDetails(method: string, url: string, bodySize: number): void {
  if (!isDebugEnabled()) return;
  console.log(`${PREFIX} Request: ${method} ${url} (${bodySize} bytes)`);
}

/**
 * Log response details
 */
export function responseDetails(status: number, durationMs: number): void {
  if (!isDebugEnabled()) return;
  console.log(`${PREFIX} Response: status=${status} duration=${durationMs}ms`);
}

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

function logWithPrefix(level: 'debug' | 'warn', message: string, data?: unknown): void {
  const logFn = level === 'warn' ? console.warn : console.log;

  if (data !== undefined) {
    logFn(`${PREFIX} ${message}`, data);
  } else {
    logFn(`${PREFIX} ${message}`);
  }
}

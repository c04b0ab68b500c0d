/**
 * Context Propagator
 *
 * Tracer identifiers ride on OpenTelemetry baggage attached to the active
 * context. Contexts are immutable: every write returns a new context, and
 * child contexts inherit their parent's entries.
 *
 * @example
 * ```typescript
 * import { withBaggage, runInContext, captureContext } from '@beacontrace/sdk';
 *
 * const ctx = withBaggage(captureContext(), 'session_id', 'sess-1');
 * await runInContext(ctx, async () => {
 *   // spans started here carry beacon.session_id = sess-1
 * });
 * ```
 */

import {
  context,
  createContextKey,
  defaultTextMapGetter,
  defaultTextMapSetter,
  propagation,
  ROOT_CONTEXT,
  type Context,
} from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import { CompositePropagator, W3CBaggagePropagator, W3CTraceContextPropagator } from '@opentelemetry/core';
import { debug } from './logger';

// ─────────────────────────────────────────────────────────────
// Baggage keys
// ─────────────────────────────────────────────────────────────

export const BAGGAGE_KEYS = {
  sessionId: 'session_id',
  project: 'project',
  source: 'source',
  parentId: 'parent_id',
  experimentId: 'experiment_id',
  experimentName: 'experiment_name',
  experimentVariant: 'experiment_variant',
  experimentGroup: 'experiment_group',
  tracerId: 'beacon_tracer_id',
} as const;

export const EXPERIMENT_METADATA_PREFIX = 'experiment_metadata.';

// ─────────────────────────────────────────────────────────────
// ID Generation
// ─────────────────────────────────────────────────────────────

/**
 * Generate a unique id
 * Uses crypto.randomUUID if available, falls back to timestamp-based ID
 */
export function generateId(): string {
  if (typeof crypto !== 'undefined' && crypto.randomUUID) {
    return crypto.randomUUID();
  }
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 11)}`;
}

// ─────────────────────────────────────────────────────────────
// Baggage API
// ─────────────────────────────────────────────────────────────

/**
 * Return a new context with one baggage entry set
 */
export function withBaggage(ctx: Context, key: string, value: string): Context {
  const baggage = propagation.getBaggage(ctx) ?? propagation.createBaggage();
  return propagation.setBaggage(ctx, baggage.setEntry(key, { value }));
}

/**
 * Return a new context with several entries set; undefined values are skipped
 */
export function withBaggageEntries(ctx: Context, entries: Record<string, string | undefined>): Context {
  let baggage = propagation.getBaggage(ctx) ?? propagation.createBaggage();
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      baggage = baggage.setEntry(key, { value });
    }
  }
  return propagation.setBaggage(ctx, baggage);
}

/**
 * Return a new context without the given entries
 */
export function withoutBaggage(ctx: Context, keys: readonly string[]): Context {
  const baggage = propagation.getBaggage(ctx);
  if (!baggage) return ctx;
  return propagation.setBaggage(ctx, baggage.removeEntries(...keys));
}

/**
 * Read a baggage entry
 */
export function getBaggage(ctx: Context, key: string): string | undefined;
export function getBaggage(ctx: Context, key: string, defaultValue: string): string;
export function getBaggage(ctx: Context, key: string, defaultValue?: string): string | undefined {
  return propagation.getBaggage(ctx)?.getEntry(key)?.value ?? defaultValue;
}

/**
 * Read every baggage entry as a plain record
 */
export function getAllBaggage(ctx: Context): Record<string, string> {
  const result: Record<string, string> = {};
  const baggage = propagation.getBaggage(ctx);
  if (!baggage) return result;

  for (const [key, entry] of baggage.getAllEntries()) {
    result[key] = entry.value;
  }
  return result;
}

// ─────────────────────────────────────────────────────────────
// Async hops
// ─────────────────────────────────────────────────────────────

/**
 * Capture the active context for a later hop
 */
export function captureContext(): Context {
  return context.active();
}

/**
 * Bind a callback to a context (defaults to the active one)
 */
export function bindContext<F extends (...args: never[]) => unknown>(fn: F, ctx: Context = context.active()): F {
  return context.bind(ctx, fn);
}

/**
 * Run a function with the given context active
 */
export function runInContext<T>(ctx: Context, fn: () => T): T {
  return context.with(ctx, fn);
}

// ─────────────────────────────────────────────────────────────
// Carriers (worker threads, other processes)
// ─────────────────────────────────────────────────────────────

const carrierPropagator = new CompositePropagator({
  propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
});

/**
 * Write trace context and baggage into a carrier (traceparent, baggage)
 */
export function injectContext<C extends Record<string, string>>(carrier: C, ctx: Context = context.active()): C {
  carrierPropagator.inject(ctx, carrier, defaultTextMapSetter);
  return carrier;
}

/**
 * Rebuild a context from a carrier written by injectContext
 */
export function extractContext(carrier: Record<string, string>, base: Context = context.active()): Context {
  return carrierPropagator.extract(base, carrier, defaultTextMapGetter);
}

// ─────────────────────────────────────────────────────────────
// Context manager
// ─────────────────────────────────────────────────────────────

const CHECK_KEY = createContextKey('beacon.context-check');

/**
 * Check whether a working context manager is registered
 */
export function hasContextManager(): boolean {
  const marked = ROOT_CONTEXT.setValue(CHECK_KEY, true);
  return context.with(marked, () => context.active().getValue(CHECK_KEY) === true);
}

/**
 * Install an AsyncLocalStorage context manager when none is registered,
 * so baggage survives await boundaries. Returns true when one was installed.
 */
export function ensureContextManager(): boolean {
  if (hasContextManager()) return false;

  const manager = new AsyncLocalStorageContextManager();
  manager.enable();
  const installed = context.setGlobalContextManager(manager);
  if (installed) {
    debug('Installed AsyncLocalStorage context manager');
  }
  return installed;
}

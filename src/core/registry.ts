/**
 * Tracer Instance Registry
 *
 * Live tracers keyed by id. There is no default tracer: code that is not
 * handed a tracer finds one through the beacon_tracer_id baggage entry.
 */

import { context, type Context } from '@opentelemetry/api';
import type { Tracer } from './tracer';
import { BAGGAGE_KEYS, getBaggage } from './baggage';
import { debug } from './logger';

// ─────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────

// Global symbol so every entry point (index, express, lambda) shares one registry
const REGISTRY_KEY = Symbol.for('@beacontrace/sdk:tracerRegistry');

function getRegistryStore(): Map<string, Tracer> {
  const globalObj = globalThis as Record<symbol, Map<string, Tracer> | undefined>;
  let store = globalObj[REGISTRY_KEY];
  if (!store) {
    store = new Map();
    globalObj[REGISTRY_KEY] = store;
  }
  return store;
}

export interface RegistryStats {
  activeTracers: number;
  tracerIds: string[];
}

// ─────────────────────────────────────────────────────────────
// Registration
// ─────────────────────────────────────────────────────────────

export function registerTracer(tracer: Tracer): void {
  getRegistryStore().set(tracer.id, tracer);
  debug(`Tracer registered: ${tracer.id}`);
}

/**
 * Remove a tracer; true when it was registered
 */
export function unregisterTracer(tracerOrId: Tracer | string): boolean {
  const id = typeof tracerOrId === 'string' ? tracerOrId : tracerOrId.id;
  const removed = getRegistryStore().delete(id);
  if (removed) {
    debug(`Tracer unregistered: ${id}`);
  }
  return removed;
}

// ─────────────────────────────────────────────────────────────
// Discovery
// ─────────────────────────────────────────────────────────────

export function getTracerById(id: string): Tracer | undefined {
  return getRegistryStore().get(id);
}

/**
 * Tracer named by the context's baggage, if it is still live
 */
export function getTracerFromBaggage(ctx: Context = context.active()): Tracer | undefined {
  const id = getBaggage(ctx, BAGGAGE_KEYS.tracerId);
  return id ? getTracerById(id) : undefined;
}

/**
 * Explicit tracer first, then baggage
 */
export function discoverTracer(explicit?: Tracer, ctx: Context = context.active()): Tracer | undefined {
  if (explicit) return explicit;
  return getTracerFromBaggage(ctx);
}

export function getRegistryStats(): RegistryStats {
  const store = getRegistryStore();
  return {
    activeTracers: store.size,
    tracerIds: [...store.keys()],
  };
}

/**
 * Forget every tracer (tests, hot reload). Does not close them.
 */
export function clearRegistry(): void {
  getRegistryStore().clear();
}

/**
 * Beacon SDK
 * Session-aware tracing on OpenTelemetry
 *
 * @example Simple usage
 * ```typescript
 * import { Tracer, traceAsync, enrichSpan } from '@beacontrace/sdk';
 *
 * const tracer = await Tracer.init({ apiKey: process.env.BEACON_API_KEY, project: 'support-bot' });
 *
 * const answer = traceAsync(async (question: string) => {
 *   enrichSpan({ metadata: { model: 'small' } });
 *   return generateAnswer(question);
 * }, { tracer, eventType: 'chain' });
 *
 * await answer('How do refunds work?');
 * await tracer.forceFlush();
 * ```
 *
 * @example Several tracers in one process
 * ```typescript
 * const evalTracer = new Tracer({ project: 'evals', source: 'ci' });
 * const prodTracer = new Tracer({ project: 'support-bot', source: 'production' });
 *
 * // Spans inside each context carry only that tracer's session and project
 * await evalTracer.withContext(() => runEvaluation());
 * await prodTracer.withContext(() => serveRequest());
 * ```
 */

// ─────────────────────────────────────────────────────────────
// Main API
// ─────────────────────────────────────────────────────────────

// Tracer
export { Tracer, createTracer } from './core/tracer';

// Decorators
export { traceSync, traceAsync, traceOperation, trace, traceClass, TracedCall } from './core/decorators';

// Enrichment
export {
  enrichSpanDirect,
  enrichSpanDirect as enrichSpan,
  enrichSpanScoped,
  withEnrichedSpan,
  enrichSession,
  SpanEnrichmentScope,
} from './core/enrichment';

// Context propagation
export {
  BAGGAGE_KEYS,
  withBaggage,
  withBaggageEntries,
  withoutBaggage,
  getBaggage,
  getAllBaggage,
  captureContext,
  bindContext,
  runInContext,
  injectContext,
  extractContext,
  ensureContextManager,
} from './core/baggage';

// Registry
export {
  registerTracer,
  unregisterTracer,
  getTracerById,
  getTracerFromBaggage,
  discoverTracer,
  getRegistryStats,
  clearRegistry,
} from './core/registry';

// Provider and flush (lower-level API)
export { acquireProvider, detectProviderStrategy, NoopSpanExporter } from './core/provider';
export { forceFlush, DEFAULT_FLUSH_TIMEOUT_MS } from './core/flush';
export { EnrichmentProcessor, ATTRIBUTE_NAMESPACE, LEGACY_ATTRIBUTE_NAMESPACE } from './core/processor';
export { startSession } from './core/session';

// Configuration and transport
export { resolveConfig, detectExperimentContext } from './core/config';
export { ApiClient, ApiError } from './core/transport';
export { ConfigurationError } from './core/errors';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export type {
  TracerOptions,
  ResolvedConfig,
  ExperimentContext,
  RedactionConfig,
  ServiceConfig,
  BackendClient,
  StartSessionRequest,
  StartSessionResponse,
  SessionEnrichment,
  EnrichSessionResponse,
  SpanEnrichment,
} from './core/types';

export type { TraceOptions, TraceClassOptions, SyncOperation, AsyncOperation, Operation, CallState } from './core/decorators';
export type { EnrichSpanOptions, EnrichSessionOptions } from './core/enrichment';
export type { ProviderHandle, ProviderStrategy, AcquireProviderOptions } from './core/provider';
export type { RegistryStats } from './core/registry';
export type { SessionParams } from './core/session';

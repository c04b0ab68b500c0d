/**
 * Provider Adapter
 *
 * Finds the process-wide TracerProvider and either attaches to it as a
 * secondary contributor or creates one this SDK owns. Each acquisition
 * takes a lease; a provider this SDK created is shut down when its last
 * lease is released.
 */

import { ProxyTracerProvider, trace, type TracerProvider } from '@opentelemetry/api';
import { ExportResultCode, type ExportResult } from '@opentelemetry/core';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { registerInstrumentations, type Instrumentation } from '@opentelemetry/instrumentation';
import { HttpInstrumentation } from '@opentelemetry/instrumentation-http';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  SimpleSpanProcessor,
  type ReadableSpan,
  type SpanExporter,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import type { ResolvedConfig, ServiceConfig } from './types';
import { EnrichmentProcessor } from './processor';
import { buildResource } from './telemetry';
import { toError } from './errors';
import { debug, providerAcquired, warn } from './logger';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

/**
 * - main: no provider registered yet; create, own and register one
 * - secondary: a registered provider accepts processors; attach to it
 * - local: a registered provider cannot take processors; create one privately
 * - degraded: provider setup failed; enrichment-only fallback
 */
export type ProviderStrategy = 'main' | 'secondary' | 'local' | 'degraded';

export interface ProcessorHost extends TracerProvider {
  addSpanProcessor(processor: SpanProcessor): void;
}

export interface AcquireProviderOptions {
  tracerId: string;
  config: ResolvedConfig;
  spanExporter?: SpanExporter;
  instrumentations?: Instrumentation[];
  service?: ServiceConfig;
}

export interface ProviderHandle {
  readonly provider: TracerProvider;
  readonly isOwner: boolean;
  readonly strategy: ProviderStrategy;
  readonly processor: EnrichmentProcessor;
  release(): Promise<void>;
}

export const OTLP_TRACES_PATH = '/opentelemetry/v1/traces';

// ─────────────────────────────────────────────────────────────
// Detection
// ─────────────────────────────────────────────────────────────

// A fresh proxy has no delegate and hands back the API's no-op provider
const NOOP_PROVIDER = new ProxyTracerProvider().getDelegate();

export function canAddSpanProcessor(provider: TracerProvider): provider is ProcessorHost {
  return 'addSpanProcessor' in provider && typeof provider.addSpanProcessor === 'function';
}

/**
 * Unwrap the global proxy to the provider actually doing the work
 */
export function getGlobalDelegate(): TracerProvider {
  const globalProvider = trace.getTracerProvider();
  return globalProvider instanceof ProxyTracerProvider ? globalProvider.getDelegate() : globalProvider;
}

function isNoopProvider(provider: TracerProvider): boolean {
  return provider === NOOP_PROVIDER || provider.constructor.name === 'NoopTracerProvider';
}

export function detectProviderStrategy(): { strategy: Exclude<ProviderStrategy, 'degraded'>; existing: TracerProvider } {
  const existing = getGlobalDelegate();

  if (canAddSpanProcessor(existing)) {
    return { strategy: 'secondary', existing };
  }
  if (isNoopProvider(existing)) {
    return { strategy: 'main', existing };
  }
  return { strategy: 'local', existing };
}

// ─────────────────────────────────────────────────────────────
// Export pipeline
// ─────────────────────────────────────────────────────────────

/**
 * Exporter that drops everything (test mode, OTLP disabled)
 */
export class NoopSpanExporter implements SpanExporter {
  export(_spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  shutdown(): Promise<void> {
    return Promise.resolve();
  }
}

export function createExporter(config: ResolvedConfig, spanExporter?: SpanExporter): SpanExporter {
  if (spanExporter) return spanExporter;

  if (config.otlpEnabled && !config.testMode) {
    return new OTLPTraceExporter({
      url: `${config.serverUrl}${OTLP_TRACES_PATH}`,
      headers: {
        'Authorization': `Bearer ${config.apiKey}`,
        'X-Project': config.project,
        'X-Source': config.source,
      },
    });
  }

  return new NoopSpanExporter();
}

function createExportProcessor(config: ResolvedConfig, spanExporter?: SpanExporter): SpanProcessor {
  const exporter = createExporter(config, spanExporter);
  return config.testMode ? new SimpleSpanProcessor(exporter) : new BatchSpanProcessor(exporter);
}

// ─────────────────────────────────────────────────────────────
// Leases
// ─────────────────────────────────────────────────────────────

const leases = new Map<TracerProvider, number>();
const createdProviders = new WeakSet<TracerProvider>();

function takeLease(provider: TracerProvider): void {
  leases.set(provider, (leases.get(provider) ?? 0) + 1);
}

/**
 * Drop one lease. True when it was the last one.
 */
function dropLease(provider: TracerProvider): boolean {
  const count = (leases.get(provider) ?? 1) - 1;
  if (count <= 0) {
    leases.delete(provider);
    return true;
  }
  leases.set(provider, count);
  return false;
}

export function getLeaseCount(provider: TracerProvider): number {
  return leases.get(provider) ?? 0;
}

// ─────────────────────────────────────────────────────────────
// Acquisition
// ─────────────────────────────────────────────────────────────

/**
 * Attach to or create a provider for one tracer
 */
export function acquireProvider(options: AcquireProviderOptions): ProviderHandle {
  const processor = new EnrichmentProcessor(options.tracerId);

  let provider: TracerProvider;
  let strategy: ProviderStrategy;
  let isOwner: boolean;

  try {
    const detected = detectProviderStrategy();
    strategy = detected.strategy;

    if (detected.strategy === 'secondary' && canAddSpanProcessor(detected.existing)) {
      if (options.spanExporter) {
        debug('Attaching to an existing provider; spanExporter option ignored');
      }
      detected.existing.addSpanProcessor(processor);
      provider = detected.existing;
      isOwner = false;
    } else {
      const created = new NodeTracerProvider({
        resource: buildResource(options.service),
        spanProcessors: [processor, createExportProcessor(options.config, options.spanExporter)],
      });
      if (detected.strategy === 'main') {
        created.register();
      }
      createdProviders.add(created);
      provider = created;
      isOwner = true;
    }
  } catch (err) {
    warn('Tracer provider setup failed, continuing without export', toError(err).message);
    const fallback = new BasicTracerProvider({ spanProcessors: [processor] });
    createdProviders.add(fallback);
    provider = fallback;
    strategy = 'degraded';
    isOwner = false;
  }

  takeLease(provider);
  providerAcquired(strategy, isOwner);

  const disableInstrumentations = registerTracerInstrumentations(provider, options);

  let released = false;
  return {
    provider,
    isOwner,
    strategy,
    processor,
    async release(): Promise<void> {
      if (released) return;
      released = true;

      processor.deactivate();
      disableInstrumentations();

      if (!dropLease(provider) || !createdProviders.has(provider)) return;

      if (getGlobalDelegate() === provider) {
        trace.disable();
      }
      if (isShutdownable(provider)) {
        try {
          await provider.shutdown();
        } catch (err) {
          warn('Tracer provider shutdown failed', toError(err).message);
        }
      }
      debug(`Provider released: strategy=${strategy}`);
    },
  };
}

function registerTracerInstrumentations(provider: TracerProvider, options: AcquireProviderOptions): () => void {
  const instrumentations: Instrumentation[] = [...(options.instrumentations ?? [])];
  if (options.config.httpTracingEnabled) {
    instrumentations.push(new HttpInstrumentation());
  }
  if (instrumentations.length === 0) {
    return () => undefined;
  }

  debug(`Registering ${instrumentations.length} instrumentation(s)`);
  return registerInstrumentations({ tracerProvider: provider, instrumentations });
}

function isShutdownable(provider: TracerProvider): provider is TracerProvider & { shutdown(): Promise<void> } {
  return 'shutdown' in provider && typeof provider.shutdown === 'function';
}

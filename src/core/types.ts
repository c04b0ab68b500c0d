/**
 * Core types for Beacon SDK
 */

import type { Instrumentation } from '@opentelemetry/instrumentation';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

export interface ServiceConfig {
  /** Service name (e.g., "my-ai-chatbot") */
  name?: string;
  /** Service version (e.g., "1.2.3") */
  version?: string;
  /** Deployment environment (e.g., "production", "staging", "development") */
  environment?: string;
}

export interface RedactionConfig {
  /** Extra key fragments to redact (case-insensitive) */
  keys?: string[];
  /** Patterns replaced with [REDACTED] inside string values */
  patterns?: RegExp[];
  /** Replace email addresses with [EMAIL] */
  emails?: boolean;
}

export interface TracerOptions {
  /** API key (or set BEACON_API_KEY env var) */
  apiKey?: string;
  /** Project name (or BEACON_PROJECT, default: "default") */
  project?: string;
  /** Source label, e.g. "production" (or BEACON_SOURCE, default: "dev") */
  source?: string;
  /** Name for the session created on construction */
  sessionName?: string;
  /** Reuse an existing session instead of creating one */
  sessionId?: string;
  /** Backend URL override (or BEACON_API_URL) */
  serverUrl?: string;
  /** Test mode: spans go to a no-op sink unless spanExporter is given */
  testMode?: boolean;
  /** Disable HTTP auto-instrumentation (default: true) */
  disableHttpTracing?: boolean;
  /** Enable OTLP export to the backend (default: true) */
  otlpEnabled?: boolean;
  /** Enable debug logging */
  debug?: boolean;
  /** Exporter used instead of the OTLP exporter when this tracer owns the provider */
  spanExporter?: SpanExporter;
  /** Instrumentations registered against the tracer's provider */
  instrumentations?: Instrumentation[];
  /** API client override (defaults to the HTTP ApiClient) */
  client?: BackendClient;
  /** Redaction applied to serialized inputs/outputs */
  redaction?: RedactionConfig;
  /** Service metadata for the OpenTelemetry resource */
  service?: ServiceConfig;
  /** Backend request timeout in ms (default: 10000) */
  requestTimeoutMs?: number;
  /** Flush once when the process is about to exit */
  flushOnExit?: boolean;
}

export interface ResolvedConfig {
  readonly apiKey: string;
  readonly project: string;
  readonly source: string;
  readonly sessionName: string;
  readonly sessionId: string | null;
  readonly serverUrl: string;
  readonly testMode: boolean;
  readonly httpTracingEnabled: boolean;
  readonly otlpEnabled: boolean;
  readonly debug: boolean;
  readonly requestTimeoutMs: number;
  readonly flushOnExit: boolean;
  readonly experiment: ExperimentContext;
}

// ─────────────────────────────────────────────────────────────
// Experiment Context
// ─────────────────────────────────────────────────────────────

export interface ExperimentContext {
  experimentId?: string;
  experimentName?: string;
  experimentVariant?: string;
  experimentGroup?: string;
  experimentMetadata?: Record<string, unknown>;
}

// ─────────────────────────────────────────────────────────────
// SDK Telemetry
// ─────────────────────────────────────────────────────────────

export interface SDKTelemetry {
  /** SDK name */
  'telemetry.sdk.name': string;
  /** SDK version */
  'telemetry.sdk.version': string;
  /** SDK language */
  'telemetry.sdk.language': string;
  /** Runtime name */
  'process.runtime.name'?: string;
  /** Runtime version */
  'process.runtime.version'?: string;
  /** OS type (linux, darwin, windows) */
  'os.type'?: string;
  /** Service name */
  'service.name'?: string;
  /** Service version */
  'service.version'?: string;
  /** Deployment environment */
  'deployment.environment'?: string;
}

// ─────────────────────────────────────────────────────────────
// Backend API
// ─────────────────────────────────────────────────────────────

export interface StartSessionRequest {
  project: string;
  sessionName: string;
  source: string;
  sessionId?: string;
  inputs?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export interface StartSessionResponse {
  sessionId: string;
}

export interface SessionEnrichment {
  metadata?: Record<string, unknown>;
  metrics?: Record<string, unknown>;
  config?: Record<string, unknown>;
  inputs?: Record<string, unknown>;
  outputs?: Record<string, unknown>;
  feedback?: Record<string, unknown>;
  userProperties?: Record<string, unknown>;
}

export interface EnrichSessionResponse {
  ok: boolean;
}

/**
 * The two backend calls the tracer depends on.
 * Retry, pooling and transport details belong to the implementation.
 */
export interface BackendClient {
  startSession(request: StartSessionRequest): Promise<StartSessionResponse>;
  enrichSession(sessionId: string, payload: SessionEnrichment): Promise<EnrichSessionResponse>;
}

// ─────────────────────────────────────────────────────────────
// Enrichment
// ─────────────────────────────────────────────────────────────

export interface SpanEnrichment {
  metadata?: Record<string, unknown>;
  metrics?: Record<string, unknown>;
  /** Attributes written verbatim */
  attributes?: Record<string, unknown>;
  /** Config data; experiment_* keys also set experiment attributes */
  config?: Record<string, unknown>;
  feedback?: Record<string, unknown>;
  /** e.g. 'model', 'tool', 'chain' */
  eventType?: string;
  eventName?: string;
  inputs?: unknown;
  outputs?: unknown;
  error?: unknown;
  /** Free-form keys, written under beacon.extra.* */
  extra?: Record<string, unknown>;
}

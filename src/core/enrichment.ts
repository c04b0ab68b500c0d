/**
 * Enrichment API
 *
 * Adds metadata, metrics, inputs/outputs and errors to the active span,
 * or to the tracer's remote session.
 *
 * @example
 * ```typescript
 * import { enrichSpan, enrichSession } from '@beacontrace/sdk';
 *
 * enrichSpan({ metadata: { user_tier: 'pro' }, metrics: { score: 0.92 } });
 * await enrichSession({ feedback: { rating: 5 } });
 * ```
 */

import { SpanStatusCode, trace, type Attributes, type Span } from '@opentelemetry/api';
import type { RedactionConfig, SessionEnrichment, SpanEnrichment } from './types';
import type { Tracer } from './tracer';
import { flattenAttributes, sanitize, serializeValue, toAttributeValue, redactString } from './attributes';
import { ATTRIBUTE_NAMESPACE, associationAttributes } from './processor';
import { BAGGAGE_KEYS, EXPERIMENT_METADATA_PREFIX } from './baggage';
import { discoverTracer } from './registry';
import { withTimeout } from './flush';
import { isRecord } from './config';
import { toError } from './errors';
import { debug, warn } from './logger';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface EnrichSpanOptions extends SpanEnrichment {
  /** Tracer to enrich through; defaults to baggage discovery */
  tracer?: Tracer;
}

export interface EnrichSessionOptions extends SessionEnrichment {
  /** Session to enrich; defaults to the tracer's session */
  sessionId?: string;
  tracer?: Tracer;
}

// ─────────────────────────────────────────────────────────────
// Attribute writers
// ─────────────────────────────────────────────────────────────

const EXPERIMENT_CONFIG_KEYS = [
  BAGGAGE_KEYS.experimentId,
  BAGGAGE_KEYS.experimentName,
  BAGGAGE_KEYS.experimentVariant,
  BAGGAGE_KEYS.experimentGroup,
];

function attributeKey(name: string): string {
  return `${ATTRIBUTE_NAMESPACE}.${name}`;
}

function stringifyValue(value: unknown): string {
  return typeof value === 'string' ? value : serializeValue(value);
}

/**
 * Experiment fields carried inside a config record
 */
function experimentAttributes(config: Record<string, unknown>): Attributes {
  const attributes: Attributes = {};

  for (const key of EXPERIMENT_CONFIG_KEYS) {
    const value = config[key];
    if (value !== undefined && value !== null) {
      Object.assign(attributes, associationAttributes(key, stringifyValue(value)));
    }
  }

  const metadata = config.experiment_metadata;
  if (isRecord(metadata)) {
    for (const [key, value] of Object.entries(metadata)) {
      Object.assign(attributes, associationAttributes(`${EXPERIMENT_METADATA_PREFIX}${key}`, stringifyValue(value)));
    }
  }

  return attributes;
}

/**
 * Mark a span as failed: beacon.error, an exception event and error status
 */
export function recordSpanError(span: Span, value: unknown, redaction: RedactionConfig = {}): void {
  const error = toError(value);
  const message = redactString(error.message, redaction);

  span.setAttribute(attributeKey('error'), message);
  span.recordException(error);
  span.setStatus({ code: SpanStatusCode.ERROR, message });
}

/**
 * Write an enrichment payload onto a span
 */
export function applySpanEnrichment(span: Span, enrichment: SpanEnrichment, redaction: RedactionConfig = {}): void {
  const attributes: Attributes = {};

  if (enrichment.metadata) {
    Object.assign(attributes, flattenAttributes(attributeKey('metadata'), enrichment.metadata, redaction));
  }
  if (enrichment.metrics) {
    Object.assign(attributes, flattenAttributes(attributeKey('metrics'), enrichment.metrics, redaction));
  }
  if (enrichment.config) {
    Object.assign(attributes, flattenAttributes(attributeKey('config'), enrichment.config, redaction));
    Object.assign(attributes, experimentAttributes(enrichment.config));
  }
  if (enrichment.feedback) {
    Object.assign(attributes, flattenAttributes(attributeKey('feedback'), enrichment.feedback, redaction));
  }
  if (enrichment.extra) {
    Object.assign(attributes, flattenAttributes(attributeKey('extra'), enrichment.extra, redaction));
  }
  if (enrichment.attributes) {
    for (const [key, value] of Object.entries(enrichment.attributes)) {
      const attributeValue = toAttributeValue(value, redaction);
      if (attributeValue !== undefined) attributes[key] = attributeValue;
    }
  }
  if (enrichment.eventType) {
    attributes[attributeKey('event_type')] = enrichment.eventType;
  }
  if (enrichment.eventName) {
    attributes[attributeKey('event_name')] = enrichment.eventName;
  }
  if (enrichment.inputs !== undefined) {
    attributes[attributeKey('inputs')] = serializeValue(enrichment.inputs, redaction);
  }
  if (enrichment.outputs !== undefined) {
    attributes[attributeKey('outputs')] = serializeValue(enrichment.outputs, redaction);
  }

  span.setAttributes(attributes);

  if (enrichment.error !== undefined && enrichment.error !== null) {
    recordSpanError(span, enrichment.error, redaction);
  }
}

// ─────────────────────────────────────────────────────────────
// enrichSpan - direct
// ─────────────────────────────────────────────────────────────

/**
 * Enrich the active span right away.
 * False when no tracer can be found or no span is recording.
 */
export function enrichSpanDirect(options: EnrichSpanOptions = {}): boolean {
  const { tracer: explicit, ...enrichment } = options;
  const tracer = discoverTracer(explicit);
  if (!tracer) {
    debug('enrichSpan: no tracer in scope');
    return false;
  }

  const span = trace.getActiveSpan();
  if (!span || !span.isRecording()) {
    debug('enrichSpan: no recording span in scope');
    return false;
  }

  try {
    applySpanEnrichment(span, enrichment, tracer.redaction);
    return true;
  } catch (err) {
    debug('enrichSpan failed', err);
    return false;
  }
}

// ─────────────────────────────────────────────────────────────
// enrichSpan - scoped
// ─────────────────────────────────────────────────────────────

/**
 * Accumulates enrichment for the span that was active when the scope opened.
 * close() writes it; later calls are ignored.
 */
export class SpanEnrichmentScope {
  private pending: SpanEnrichment = {};
  private readonly pendingAttributes: Record<string, unknown> = {};
  private closed = false;

  constructor(
    readonly span: Span | undefined,
    private readonly redaction: RedactionConfig = {}
  ) {}

  /** True when a tracer and a recording span were found at entry */
  get isActive(): boolean {
    return this.span !== undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  setMetadata(metadata: Record<string, unknown>): this {
    this.pending.metadata = { ...this.pending.metadata, ...metadata };
    return this;
  }

  setMetrics(metrics: Record<string, unknown>): this {
    this.pending.metrics = { ...this.pending.metrics, ...metrics };
    return this;
  }

  setOutputs(outputs: unknown): this {
    this.pending.outputs = outputs;
    return this;
  }

  setError(error: unknown): this {
    this.pending.error = error;
    return this;
  }

  setAttribute(key: string, value: unknown): this {
    this.pendingAttributes[key] = value;
    return this;
  }

  /**
   * Write accumulated fields; false when there is nothing to write to
   */
  close(): boolean {
    if (this.closed) return false;
    this.closed = true;

    if (!this.span || !this.span.isRecording()) return false;

    try {
      applySpanEnrichment(
        this.span,
        { ...this.pending, attributes: { ...this.pending.attributes, ...this.pendingAttributes } },
        this.redaction
      );
      return true;
    } catch (err) {
      debug('Scoped enrichment failed', err);
      return false;
    }
  }
}

/**
 * Open a scope over the active span and apply the initial fields
 */
export function enrichSpanScoped(options: EnrichSpanOptions = {}): SpanEnrichmentScope {
  const { tracer: explicit, ...enrichment } = options;
  const tracer = discoverTracer(explicit);
  const span = trace.getActiveSpan();

  if (!tracer || !span || !span.isRecording()) {
    debug('enrichSpanScoped: no tracer or recording span, scope is inert');
    return new SpanEnrichmentScope(undefined);
  }

  try {
    applySpanEnrichment(span, enrichment, tracer.redaction);
  } catch (err) {
    debug('enrichSpanScoped failed', err);
  }
  return new SpanEnrichmentScope(span, tracer.redaction);
}

/**
 * Run fn with an enrichment scope that closes when fn finishes.
 * A thrown error is recorded on the span and re-thrown unchanged.
 */
export function withEnrichedSpan<T>(options: EnrichSpanOptions, fn: (scope: SpanEnrichmentScope) => Promise<T>): Promise<T>;
export function withEnrichedSpan<T>(options: EnrichSpanOptions, fn: (scope: SpanEnrichmentScope) => T): T;
export function withEnrichedSpan(options: EnrichSpanOptions, fn: (scope: SpanEnrichmentScope) => unknown): unknown {
  const scope = enrichSpanScoped(options);

  let result: unknown;
  try {
    result = fn(scope);
  } catch (err) {
    scope.setError(err).close();
    throw err;
  }

  if (result instanceof Promise) {
    return result.then(
      (value: unknown) => {
        scope.close();
        return value;
      },
      (err: unknown) => {
        scope.setError(err).close();
        throw err;
      }
    );
  }

  scope.close();
  return result;
}

// ─────────────────────────────────────────────────────────────
// enrichSession
// ─────────────────────────────────────────────────────────────

/**
 * Send session-level enrichment to the backend.
 * False without a session id or tracer, or when the backend call fails.
 */
export async function enrichSession(options: EnrichSessionOptions = {}): Promise<boolean> {
  const { tracer: explicit, sessionId: explicitSessionId, ...payload } = options;
  const tracer = discoverTracer(explicit);
  if (!tracer) {
    debug('enrichSession: no tracer in scope');
    return false;
  }

  const sessionId = explicitSessionId ?? tracer.sessionId;
  if (!sessionId) {
    debug('enrichSession: no session id');
    return false;
  }

  try {
    const response = await withTimeout(
      tracer.client.enrichSession(sessionId, sanitizeSessionPayload(payload, tracer.redaction)),
      tracer.config.requestTimeoutMs,
      'Session enrichment'
    );
    return response.ok;
  } catch (err) {
    warn(`Failed to enrich session ${sessionId}`, toError(err).message);
    return false;
  }
}

function sanitizeSessionPayload(payload: SessionEnrichment, redaction: RedactionConfig): SessionEnrichment {
  const result: SessionEnrichment = {};
  for (const key of ['metadata', 'metrics', 'config', 'inputs', 'outputs', 'feedback', 'userProperties'] as const) {
    const value = payload[key];
    if (value === undefined) continue;
    const sanitized = sanitize(value, redaction);
    if (isRecord(sanitized)) result[key] = sanitized;
  }
  return result;
}

/**
 * Tracer
 *
 * One independent tracing instance: its own configuration, session,
 * enrichment processor and provider lease. Several tracers can live in one
 * process; the beacon_tracer_id baggage entry keeps their spans apart.
 *
 * @example
 * ```typescript
 * import { Tracer } from '@beacontrace/sdk';
 *
 * const tracer = await Tracer.init({ apiKey: process.env.BEACON_API_KEY, project: 'support-bot' });
 *
 * await tracer.withContext(async () => {
 *   await answerQuestion(question); // spans carry session, project and source
 * });
 *
 * await tracer.close();
 * ```
 */

import {
  context,
  trace,
  type Context,
  type Span,
  type SpanOptions,
  type Tracer as OtelTracer,
  type TracerProvider,
} from '@opentelemetry/api';
import type {
  BackendClient,
  RedactionConfig,
  ResolvedConfig,
  SpanEnrichment,
  SessionEnrichment,
  TracerOptions,
} from './types';
import { resolveConfig } from './config';
import {
  BAGGAGE_KEYS,
  EXPERIMENT_METADATA_PREFIX,
  ensureContextManager,
  generateId,
  getAllBaggage,
  getBaggage,
  withBaggageEntries,
  withoutBaggage,
} from './baggage';
import { acquireProvider, type ProviderHandle, type ProviderStrategy } from './provider';
import { startSession } from './session';
import { DEFAULT_FLUSH_TIMEOUT_MS, forceFlush } from './flush';
import { registerTracer, unregisterTracer } from './registry';
import { enrichSession, enrichSpanDirect } from './enrichment';
import { serializeValue } from './attributes';
import { ApiClient } from './transport';
import { SDK_NAME, buildTelemetry } from './telemetry';
import { debug, holdDebug } from './logger';

// Baggage entries a tracer writes; replaced wholesale when entering another tracer's context
const TRACER_OWNED_KEYS: readonly string[] = [
  BAGGAGE_KEYS.tracerId,
  BAGGAGE_KEYS.sessionId,
  BAGGAGE_KEYS.project,
  BAGGAGE_KEYS.source,
  BAGGAGE_KEYS.experimentId,
  BAGGAGE_KEYS.experimentName,
  BAGGAGE_KEYS.experimentVariant,
  BAGGAGE_KEYS.experimentGroup,
];

export class Tracer {
  readonly id: string;
  readonly config: ResolvedConfig;
  readonly client: BackendClient;
  readonly redaction: RedactionConfig;
  /** Resolves with the session id (or null) once session creation settles */
  readonly ready: Promise<string | null>;

  private sessionIdValue: string | null;
  private closed = false;
  private readonly handle: ProviderHandle;
  private readonly otelTracer: OtelTracer;
  private readonly exitHandler: (() => void) | null = null;
  private readonly releaseDebug: (() => void) | null = null;

  /**
   * Create a tracer; the session starts in the background (see `ready`).
   * Throws ConfigurationError when no API key is available outside test mode.
   */
  constructor(options: TracerOptions = {}) {
    this.config = resolveConfig(options);
    if (this.config.debug) {
      this.releaseDebug = holdDebug();
    }

    this.id = generateId();
    this.redaction = options.redaction ?? {};
    this.sessionIdValue = this.config.sessionId;
    this.client =
      options.client ??
      new ApiClient({
        apiKey: this.config.apiKey,
        serverUrl: this.config.serverUrl,
        requestTimeoutMs: this.config.requestTimeoutMs,
      });

    this.handle = acquireProvider({
      tracerId: this.id,
      config: this.config,
      spanExporter: options.spanExporter,
      instrumentations: options.instrumentations,
      service: options.service,
    });
    ensureContextManager();

    this.otelTracer = this.handle.provider.getTracer(SDK_NAME, buildTelemetry()['telemetry.sdk.version']);

    registerTracer(this);
    this.ready = this.initializeSession(options.client !== undefined);

    if (this.config.flushOnExit) {
      this.exitHandler = () => {
        // forceFlush never rejects
        void this.forceFlush();
      };
      process.once('beforeExit', this.exitHandler);
    }

    debug(`Tracer created: id=${this.id} project=${this.config.project} strategy=${this.handle.strategy}`);
  }

  /**
   * Create a tracer and wait for its session before returning
   */
  static async init(options: TracerOptions = {}): Promise<Tracer> {
    const tracer = new Tracer(options);
    await tracer.ready;
    return tracer;
  }

  // ─────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────

  get sessionId(): string | null {
    return this.sessionIdValue;
  }

  get project(): string {
    return this.config.project;
  }

  get source(): string {
    return this.config.source;
  }

  get sessionName(): string {
    return this.config.sessionName;
  }

  get apiKey(): string {
    return this.config.apiKey;
  }

  get serverUrl(): string {
    return this.config.serverUrl;
  }

  get testMode(): boolean {
    return this.config.testMode;
  }

  get httpTracingEnabled(): boolean {
    return this.config.httpTracingEnabled;
  }

  get otlpEnabled(): boolean {
    return this.config.otlpEnabled;
  }

  get provider(): TracerProvider {
    return this.handle.provider;
  }

  get isProviderOwner(): boolean {
    return this.handle.isOwner;
  }

  get providerStrategy(): ProviderStrategy {
    return this.handle.strategy;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ─────────────────────────────────────────────────────────────
  // Context
  // ─────────────────────────────────────────────────────────────

  /**
   * Baggage this tracer attaches to contexts it runs in
   */
  baggageEntries(): Record<string, string | undefined> {
    const { experiment } = this.config;
    const entries: Record<string, string | undefined> = {
      [BAGGAGE_KEYS.tracerId]: this.id,
      [BAGGAGE_KEYS.sessionId]: this.sessionIdValue ?? undefined,
      [BAGGAGE_KEYS.project]: this.config.project,
      [BAGGAGE_KEYS.source]: this.config.source,
      [BAGGAGE_KEYS.experimentId]: experiment.experimentId,
      [BAGGAGE_KEYS.experimentName]: experiment.experimentName,
      [BAGGAGE_KEYS.experimentVariant]: experiment.experimentVariant,
      [BAGGAGE_KEYS.experimentGroup]: experiment.experimentGroup,
    };

    for (const [key, value] of Object.entries(experiment.experimentMetadata ?? {})) {
      entries[`${EXPERIMENT_METADATA_PREFIX}${key}`] = typeof value === 'string' ? value : serializeValue(value);
    }

    return entries;
  }

  /**
   * Derive a context carrying this tracer's baggage.
   * Inside another tracer's context its identifiers are replaced;
   * otherwise only missing entries are filled, so caller-set values win.
   */
  seedContext(ctx: Context = context.active()): Context {
    const entries = this.baggageEntries();
    const owner = getBaggage(ctx, BAGGAGE_KEYS.tracerId);

    if (owner !== undefined && owner !== this.id) {
      const stale = Object.keys(getAllBaggage(ctx)).filter(
        (key) => TRACER_OWNED_KEYS.includes(key) || key.startsWith(EXPERIMENT_METADATA_PREFIX)
      );
      return withBaggageEntries(withoutBaggage(ctx, stale), entries);
    }

    const existing = getAllBaggage(ctx);
    const missing: Record<string, string | undefined> = {};
    for (const [key, value] of Object.entries(entries)) {
      if (existing[key] === undefined) missing[key] = value;
    }
    return withBaggageEntries(ctx, missing);
  }

  /**
   * Run fn inside this tracer's context
   */
  withContext<T>(fn: () => T): T {
    return context.with(this.seedContext(context.active()), fn);
  }

  // ─────────────────────────────────────────────────────────────
  // Spans
  // ─────────────────────────────────────────────────────────────

  /**
   * Start a span derived from ctx (default: the active context).
   * The caller ends it.
   */
  startSpan(name: string, options: SpanOptions = {}, ctx: Context = context.active()): Span {
    return this.otelTracer.startSpan(name, options, this.seedContext(ctx));
  }

  /**
   * Start a span and run fn with it active. The caller ends it.
   */
  startActiveSpan<T>(name: string, fn: (span: Span) => T, options: SpanOptions = {}): T {
    const ctx = this.seedContext(context.active());
    const span = this.otelTracer.startSpan(name, options, ctx);
    return context.with(trace.setSpan(ctx, span), () => fn(span));
  }

  // ─────────────────────────────────────────────────────────────
  // Enrichment
  // ─────────────────────────────────────────────────────────────

  enrichSpan(options: SpanEnrichment): boolean {
    return enrichSpanDirect({ ...options, tracer: this });
  }

  enrichSession(options: SessionEnrichment & { sessionId?: string }): Promise<boolean> {
    return enrichSession({ ...options, tracer: this });
  }

  // ─────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────

  /**
   * Flush every processor on this tracer's provider. Never throws.
   */
  forceFlush(timeoutMs: number = DEFAULT_FLUSH_TIMEOUT_MS): Promise<boolean> {
    return forceFlush(this.handle.provider, timeoutMs);
  }

  /**
   * Flush, unregister and release the provider lease and debug logging. Idempotent.
   */
  async close(timeoutMs: number = DEFAULT_FLUSH_TIMEOUT_MS): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    unregisterTracer(this);
    if (this.exitHandler) {
      process.removeListener('beforeExit', this.exitHandler);
    }

    await this.forceFlush(timeoutMs);
    await this.handle.release();
    debug(`Tracer closed: id=${this.id}`);
    this.releaseDebug?.();
  }

  private async initializeSession(hasInjectedClient: boolean): Promise<string | null> {
    if (this.sessionIdValue !== null) {
      debug(`Reusing session ${this.sessionIdValue}`);
      return this.sessionIdValue;
    }

    if (this.config.testMode && !hasInjectedClient) {
      debug('Test mode: skipping session creation');
      return null;
    }

    const sessionId = await startSession(
      this.client,
      {
        project: this.config.project,
        source: this.config.source,
        sessionName: this.config.sessionName,
      },
      this.config.requestTimeoutMs
    );

    if (sessionId !== null && this.sessionIdValue === null) {
      this.sessionIdValue = sessionId;
    }
    return this.sessionIdValue;
  }
}

/**
 * Create a tracer without waiting for its session
 */
export function createTracer(options: TracerOptions = {}): Tracer {
  return new Tracer(options);
}

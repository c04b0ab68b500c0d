/**
 * Decorator Dispatch Layer
 *
 * Wraps functions so each call runs inside a span. The sync or async
 * strategy is picked once at wrap time; the tracer is resolved per call
 * (explicit option, else baggage). Without a tracer the call runs untraced.
 *
 * @example
 * ```typescript
 * import { traceAsync, trace } from '@beacontrace/sdk';
 *
 * const retrieve = traceAsync(async (query: string) => search(query), {
 *   name: 'retrieve',
 *   eventType: 'tool',
 * });
 *
 * await trace('answer', async () => {
 *   const docs = await retrieve('refund policy');
 *   return summarize(docs);
 * });
 * ```
 */

import { types } from 'node:util';
import { SpanKind, type Span } from '@opentelemetry/api';
import type { Tracer } from './tracer';
import type { RedactionConfig } from './types';
import { applySpanEnrichment, recordSpanError } from './enrichment';
import { serializeValue } from './attributes';
import { discoverTracer } from './registry';
import { debug } from './logger';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface TraceOptions {
  /** Span name (default: the function's name) */
  name?: string;
  /** Tracer to use; defaults to baggage discovery */
  tracer?: Tracer;
  /** e.g. 'tool', 'chain', 'model' */
  eventType?: string;
  kind?: SpanKind;
  metadata?: Record<string, unknown>;
  config?: Record<string, unknown>;
  attributes?: Record<string, unknown>;
  /** Serialize arguments to beacon.inputs (default: true) */
  captureInputs?: boolean;
  /** Serialize the result to beacon.outputs (default: true) */
  captureOutputs?: boolean;
}

export interface SyncOperation<TArgs extends unknown[], TResult> {
  kind: 'sync';
  fn: (...args: TArgs) => TResult;
  options?: TraceOptions;
}

export interface AsyncOperation<TArgs extends unknown[], TResult> {
  kind: 'async';
  fn: (...args: TArgs) => Promise<TResult>;
  options?: TraceOptions;
}

export type Operation<TArgs extends unknown[], TResult> =
  | SyncOperation<TArgs, TResult>
  | AsyncOperation<TArgs, TResult>;

export type CallState = 'pending' | 'span_started' | 'success' | 'error' | 'span_ended';

export interface TraceClassOptions extends Omit<TraceOptions, 'name'> {
  /** Span name prefix (default: the class name) */
  eventName?: string;
}

type Method = (this: unknown, ...args: unknown[]) => unknown;

// ─────────────────────────────────────────────────────────────
// Call lifecycle
// ─────────────────────────────────────────────────────────────

const NEXT_STATES: Record<CallState, readonly CallState[]> = {
  pending: ['span_started'],
  span_started: ['success', 'error'],
  success: ['span_ended'],
  error: ['span_ended'],
  span_ended: [],
};

/**
 * One traced invocation: pending → span_started → success | error → span_ended
 */
export class TracedCall {
  private current: CallState = 'pending';
  private span: Span | undefined;

  constructor(
    private readonly options: TraceOptions,
    private readonly redaction: RedactionConfig
  ) {}

  get state(): CallState {
    return this.current;
  }

  start(span: Span, args: unknown[]): void {
    if (!this.transition('span_started')) return;
    this.span = span;

    // Attribute failures stay in the tracer; the wrapped call still runs
    try {
      applySpanEnrichment(
        span,
        {
          eventType: this.options.eventType,
          metadata: this.options.metadata,
          config: this.options.config,
          attributes: this.options.attributes,
          inputs: this.options.captureInputs === false ? undefined : argsToInputs(args),
        },
        this.redaction
      );
    } catch (err) {
      debug('Failed to record call inputs', err);
    }
  }

  succeed(result: unknown): void {
    if (!this.span || !this.transition('success')) return;
    if (this.options.captureOutputs === false || result === undefined) return;

    try {
      this.span.setAttribute('beacon.outputs', serializeValue(result, this.redaction));
    } catch (err) {
      debug('Failed to record call output', err);
    }
  }

  fail(error: unknown): void {
    if (!this.span || !this.transition('error')) return;

    try {
      recordSpanError(this.span, error, this.redaction);
    } catch (err) {
      debug('Failed to record call error', err);
    }
  }

  end(): void {
    if (!this.span || !this.transition('span_ended')) return;
    this.span.end();
  }

  private transition(next: CallState): boolean {
    if (!NEXT_STATES[this.current].includes(next)) {
      debug(`Ignoring call transition ${this.current} -> ${next}`);
      return false;
    }
    this.current = next;
    return true;
  }
}

function argsToInputs(args: unknown[]): unknown {
  if (args.length === 0) return undefined;
  return args.length === 1 ? args[0] : args;
}

function spanName(fn: { name: string }, options: TraceOptions): string {
  return options.name || fn.name || 'anonymous';
}

// ─────────────────────────────────────────────────────────────
// Wrappers
// ─────────────────────────────────────────────────────────────

/**
 * Trace a synchronous function
 */
export function traceSync<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => TResult,
  options: TraceOptions = {}
): (...args: TArgs) => TResult {
  const name = spanName(fn, options);

  return function traced(this: unknown, ...args: TArgs): TResult {
    const tracer = discoverTracer(options.tracer);
    if (!tracer) return fn.apply(this, args);

    const call = new TracedCall(options, tracer.redaction);
    return tracer.startActiveSpan(
      name,
      (span) => {
        call.start(span, args);
        try {
          const result = fn.apply(this, args);
          call.succeed(result);
          return result;
        } catch (err) {
          call.fail(err);
          throw err;
        } finally {
          call.end();
        }
      },
      { kind: options.kind ?? SpanKind.INTERNAL }
    );
  };
}

/**
 * Trace an async function; the span ends when the promise settles
 */
export function traceAsync<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  options: TraceOptions = {}
): (...args: TArgs) => Promise<TResult> {
  const name = spanName(fn, options);

  return async function traced(this: unknown, ...args: TArgs): Promise<TResult> {
    const tracer = discoverTracer(options.tracer);
    if (!tracer) return fn.apply(this, args);

    const call = new TracedCall(options, tracer.redaction);
    return tracer.startActiveSpan(
      name,
      async (span) => {
        call.start(span, args);
        try {
          const result = await fn.apply(this, args);
          call.succeed(result);
          return result;
        } catch (err) {
          call.fail(err);
          throw err;
        } finally {
          call.end();
        }
      },
      { kind: options.kind ?? SpanKind.INTERNAL }
    );
  };
}

/**
 * Wrap an operation, dispatching on its kind once
 */
export function traceOperation<TArgs extends unknown[], TResult>(
  operation: SyncOperation<TArgs, TResult>
): (...args: TArgs) => TResult;
export function traceOperation<TArgs extends unknown[], TResult>(
  operation: AsyncOperation<TArgs, TResult>
): (...args: TArgs) => Promise<TResult>;
export function traceOperation<TArgs extends unknown[], TResult>(
  operation: Operation<TArgs, TResult>
): (...args: TArgs) => TResult | Promise<TResult> {
  switch (operation.kind) {
    case 'sync':
      return traceSync(operation.fn, operation.options);
    case 'async':
      return traceAsync(operation.fn, operation.options);
  }
}

// ─────────────────────────────────────────────────────────────
// trace() - run now
// ─────────────────────────────────────────────────────────────

/**
 * Run an async function inside a new span right away
 *
 * @example
 * await trace({ name: 'agent', tracer }, async () => runAgent(input));
 */
export function trace<T>(nameOrOptions: string | TraceOptions, fn: () => Promise<T>): Promise<T> {
  const options: TraceOptions = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions;
  return traceAsync(fn, { captureInputs: false, ...options })();
}

// ─────────────────────────────────────────────────────────────
// traceClass - every public method
// ─────────────────────────────────────────────────────────────

/**
 * Trace every public prototype method of a class, in place.
 * Spans are named `<eventName or class name>.<method>`. Methods whose name
 * starts with `_`, accessors and the constructor are left alone. Each method
 * is wrapped sync or async once, here.
 *
 * @example
 * class Retriever {
 *   async search(query: string) { ... }
 * }
 * traceClass(Retriever, { eventType: 'tool' });
 */
export function traceClass<C extends abstract new (...args: never[]) => unknown>(
  cls: C,
  options: TraceClassOptions = {}
): C {
  const prototype: unknown = cls.prototype;
  if (typeof prototype !== 'object' || prototype === null) return cls;

  const { eventName, ...traceOptions } = options;
  const prefix = eventName || cls.name;

  for (const key of publicMethodNames(prototype)) {
    const descriptor = findDescriptor(prototype, key);
    if (!descriptor || typeof descriptor.value !== 'function') continue;

    const method: Method = descriptor.value;
    const methodOptions: TraceOptions = { ...traceOptions, name: `${prefix}.${key}` };
    const traced = types.isAsyncFunction(method)
      ? traceAsync(function (this: unknown, ...args: unknown[]): Promise<unknown> {
          return Promise.resolve(method.apply(this, args));
        }, methodOptions)
      : traceSync(method, methodOptions);

    Object.defineProperty(prototype, key, { ...descriptor, value: traced });
  }

  return cls;
}

/**
 * Public method names on a prototype and its ancestors, nearest first
 */
function publicMethodNames(prototype: object): string[] {
  const names = new Set<string>();
  let current: object | null = prototype;

  while (current && current !== Object.prototype) {
    for (const key of Object.getOwnPropertyNames(current)) {
      if (key !== 'constructor' && !key.startsWith('_')) names.add(key);
    }
    current = Object.getPrototypeOf(current);
  }

  return [...names];
}

function findDescriptor(prototype: object, key: string): PropertyDescriptor | undefined {
  let current: object | null = prototype;

  while (current && current !== Object.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) return descriptor;
    current = Object.getPrototypeOf(current);
  }

  return undefined;
}

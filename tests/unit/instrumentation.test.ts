import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  register: vi.fn(),
  disable: vi.fn(),
}));

vi.mock('@opentelemetry/instrumentation', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@opentelemetry/instrumentation')>();
  return { ...actual, registerInstrumentations: mocks.register };
});

// Keep the real http module unpatched
vi.mock('@opentelemetry/instrumentation-http', () => ({
  HttpInstrumentation: class {
    readonly instrumentationName = '@opentelemetry/instrumentation-http';
  },
}));

// Import after mock setup
import { HttpInstrumentation } from '@opentelemetry/instrumentation-http';
import { createTestTracer, resetTracing } from '../helpers/otel';

describe('Instrumentation registration', () => {
  beforeEach(() => {
    mocks.register.mockReturnValue(mocks.disable);
  });

  afterEach(async () => {
    await resetTracing();
  });

  it('should register nothing by default', () => {
    createTestTracer();
    expect(mocks.register).not.toHaveBeenCalled();
  });

  it('should register HTTP instrumentation when HTTP tracing is enabled', () => {
    const { tracer } = createTestTracer({ disableHttpTracing: false });

    expect(tracer.httpTracingEnabled).toBe(true);
    expect(mocks.register).toHaveBeenCalledTimes(1);
    const [{ tracerProvider, instrumentations }] = mocks.register.mock.calls[0];
    expect(tracerProvider).toBe(tracer.provider);
    expect(instrumentations).toHaveLength(1);
    expect(instrumentations[0]).toBeInstanceOf(HttpInstrumentation);
  });

  it('should register user instrumentations against the tracer provider', () => {
    const custom = new HttpInstrumentation();
    const { tracer } = createTestTracer({ instrumentations: [custom] });

    expect(mocks.register).toHaveBeenCalledWith({ tracerProvider: tracer.provider, instrumentations: [custom] });
  });

  it('should disable instrumentations when the tracer closes', async () => {
    const { tracer } = createTestTracer({ instrumentations: [new HttpInstrumentation()] });

    await tracer.close();
    await tracer.close();

    expect(mocks.disable).toHaveBeenCalledTimes(1);
  });
});

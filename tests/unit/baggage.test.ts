import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { context, ROOT_CONTEXT, trace, TraceFlags } from '@opentelemetry/api';
import {
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
  hasContextManager,
  generateId,
} from '../../src/core/baggage';

describe('Context Propagator', () => {
  afterEach(() => {
    context.disable();
  });

  describe('generateId', () => {
    it('should generate unique UUIDs', () => {
      const id1 = generateId();
      const id2 = generateId();

      expect(id1).not.toBe(id2);
      expect(id1).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i);
    });
  });

  describe('baggage helpers', () => {
    it('should return a new context and leave the original untouched', () => {
      const child = withBaggage(ROOT_CONTEXT, 'session_id', 'sess-1');

      expect(getBaggage(child, 'session_id')).toBe('sess-1');
      expect(getBaggage(ROOT_CONTEXT, 'session_id')).toBeUndefined();
    });

    it('should inherit parent entries unless overwritten', () => {
      const parent = withBaggageEntries(ROOT_CONTEXT, { project: 'demo', source: 'dev' });
      const child = withBaggage(parent, 'source', 'prod');

      expect(getAllBaggage(child)).toEqual({ project: 'demo', source: 'prod' });
      expect(getAllBaggage(parent)).toEqual({ project: 'demo', source: 'dev' });
    });

    it('should skip undefined values', () => {
      const ctx = withBaggageEntries(ROOT_CONTEXT, { project: 'demo', session_id: undefined });
      expect(getAllBaggage(ctx)).toEqual({ project: 'demo' });
    });

    it('should remove entries', () => {
      const ctx = withBaggageEntries(ROOT_CONTEXT, { project: 'demo', source: 'dev' });
      expect(getAllBaggage(withoutBaggage(ctx, ['source']))).toEqual({ project: 'demo' });
      expect(withoutBaggage(ROOT_CONTEXT, ['source'])).toBe(ROOT_CONTEXT);
    });

    it('should fall back to the default value', () => {
      expect(getBaggage(ROOT_CONTEXT, 'project', 'none')).toBe('none');
      expect(getAllBaggage(ROOT_CONTEXT)).toEqual({});
    });
  });

  describe('context manager', () => {
    it('should install a context manager when none is registered', () => {
      expect(hasContextManager()).toBe(false);
      expect(ensureContextManager()).toBe(true);
      expect(hasContextManager()).toBe(true);
      expect(ensureContextManager()).toBe(false);
    });
  });

  describe('async hops', () => {
    beforeEach(() => {
      ensureContextManager();
    });

    it('should keep baggage across await', async () => {
      const ctx = withBaggage(ROOT_CONTEXT, 'session_id', 'sess-async');

      const seen = await runInContext(ctx, async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return getBaggage(captureContext(), 'session_id');
      });

      expect(seen).toBe('sess-async');
    });

    it('should bind a callback to a captured context', async () => {
      const ctx = withBaggage(ROOT_CONTEXT, 'project', 'bound');
      const callback = runInContext(ctx, () => bindContext(() => getBaggage(captureContext(), 'project')));

      const seen = await new Promise<string | undefined>((resolve) => {
        setTimeout(() => resolve(callback()), 0);
      });

      expect(seen).toBe('bound');
      expect(getBaggage(captureContext(), 'project')).toBeUndefined();
    });
  });

  describe('carriers', () => {
    it('should inject and extract trace context and baggage', () => {
      const spanContext = {
        traceId: '0af7651916cd43dd8448eb211c80319c',
        spanId: 'b7ad6b7169203331',
        traceFlags: TraceFlags.SAMPLED,
      };
      const ctx = withBaggage(trace.setSpanContext(ROOT_CONTEXT, spanContext), 'session_id', 'sess-worker');

      const carrier: Record<string, string> = {};
      injectContext(carrier, ctx);

      expect(carrier.traceparent).toBe('00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01');
      expect(carrier.baggage).toBe('session_id=sess-worker');

      const extracted = extractContext(carrier, ROOT_CONTEXT);
      expect(getBaggage(extracted, 'session_id')).toBe('sess-worker');
      expect(trace.getSpanContext(extracted)?.traceId).toBe(spanContext.traceId);
    });
  });
});

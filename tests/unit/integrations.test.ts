import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { createMiddleware } from '../../src/integrations/express';
import { flushDeadline, withTracing, type LambdaContext } from '../../src/integrations/lambda';
import { getTracerFromBaggage } from '../../src/core/registry';
import { createTestTracer, resetTracing } from '../helpers/otel';

function createLambdaContext(remainingMs: number): LambdaContext {
  return {
    functionName: 'answer',
    functionVersion: '$LATEST',
    invokedFunctionArn: 'arn:aws:lambda:us-east-1:000000000000:function:answer',
    memoryLimitInMB: '128',
    awsRequestId: 'req-1',
    logGroupName: '/aws/lambda/answer',
    logStreamName: 'stream',
    getRemainingTimeInMillis: () => remainingMs,
  };
}

class FakeResponse extends EventEmitter {
  [key: string]: unknown;
}

describe('Integrations', () => {
  afterEach(async () => {
    await resetTracing();
  });

  describe('express', () => {
    it('should run the chain inside the tracer context', () => {
      const { tracer } = createTestTracer();
      const middleware = createMiddleware(tracer);
      let seen: unknown;

      middleware({}, new FakeResponse(), () => {
        seen = getTracerFromBaggage();
      });

      expect(seen).toBe(tracer);
    });

    it('should flush when the response finishes', () => {
      const { tracer } = createTestTracer();
      const flushSpy = vi.spyOn(tracer, 'forceFlush');
      const res = new FakeResponse();

      createMiddleware(tracer, { timeoutMs: 2000 })({}, res, () => undefined);
      expect(flushSpy).not.toHaveBeenCalled();

      res.emit('finish');
      res.emit('finish');
      expect(flushSpy).toHaveBeenCalledTimes(1);
      expect(flushSpy).toHaveBeenCalledWith(2000);
    });
  });

  describe('lambda', () => {
    it('should fit the flush inside the remaining time', () => {
      expect(flushDeadline(createLambdaContext(3000))).toBe(2500);
      expect(flushDeadline(createLambdaContext(60000), 5000)).toBe(5000);
      expect(flushDeadline(createLambdaContext(100))).toBe(0);
    });

    it('should run the handler in context and flush before returning', async () => {
      const { tracer } = createTestTracer();
      const flushSpy = vi.spyOn(tracer, 'forceFlush');

      const handler = withTracing(tracer, async (event: { question: string }) => ({
        statusCode: 200,
        body: event.question,
        traced: getTracerFromBaggage() === tracer,
      }));

      const result = await handler({ question: 'refunds?' }, createLambdaContext(10000));

      expect(result).toEqual({ statusCode: 200, body: 'refunds?', traced: true });
      expect(flushSpy).toHaveBeenCalledWith(9500);
    });

    it('should flush when the handler throws', async () => {
      const { tracer } = createTestTracer();
      const flushSpy = vi.spyOn(tracer, 'forceFlush');

      const handler = withTracing(tracer, async () => {
        throw new Error('handler failed');
      });

      await expect(handler({}, createLambdaContext(10000))).rejects.toThrow('handler failed');
      expect(flushSpy).toHaveBeenCalledTimes(1);
    });
  });
});

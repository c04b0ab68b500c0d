import { describe, it, expect, vi } from 'vitest';
import { trace, type TracerProvider } from '@opentelemetry/api';
import { MAX_TIMER_DELAY_MS, forceFlush, withTimeout } from '../../src/core/flush';

function providerWith(flush?: () => Promise<void>): TracerProvider {
  const base: TracerProvider = { getTracer: (name: string) => trace.getTracer(name) };
  return flush ? Object.assign(base, { forceFlush: flush }) : base;
}

describe('Flush Coordinator', () => {
  describe('withTimeout', () => {
    it('should resolve with the value when in time', async () => {
      await expect(withTimeout(Promise.resolve(7), 50, 'Op')).resolves.toBe(7);
    });

    it('should reject after the deadline', async () => {
      await expect(withTimeout(new Promise(() => undefined), 10, 'Op')).rejects.toThrow('Op timed out after 10ms');
    });

    it('should cap deadlines longer than a timer can hold', async () => {
      const timeoutSpy = vi.spyOn(globalThis, 'setTimeout');

      await expect(withTimeout(Promise.resolve('done'), 2 ** 40, 'Flush')).resolves.toBe('done');

      expect(timeoutSpy).toHaveBeenCalledWith(expect.any(Function), MAX_TIMER_DELAY_MS);
    });
  });

  describe('forceFlush', () => {
    it('should return true when the provider flushes', async () => {
      const flush = vi.fn(() => Promise.resolve());
      expect(await forceFlush(providerWith(flush), 100)).toBe(true);
      expect(flush).toHaveBeenCalledTimes(1);
    });

    it('should return false when the provider fails', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const provider = providerWith(() => Promise.reject(new Error('exporter down')));

      expect(await forceFlush(provider, 100)).toBe(false);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should return false when the deadline passes', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const provider = providerWith(() => new Promise(() => undefined));

      expect(await forceFlush(provider, 10)).toBe(false);
    });

    it('should be repeatable after a failure', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      let calls = 0;
      const provider = providerWith(() => {
        calls += 1;
        return calls === 1 ? Promise.reject(new Error('once')) : Promise.resolve();
      });

      expect(await forceFlush(provider, 100)).toBe(false);
      expect(await forceFlush(provider, 100)).toBe(true);
    });

    it('should treat a provider without forceFlush as drained', async () => {
      expect(await forceFlush(providerWith(), 100)).toBe(true);
    });
  });
});

/**
 * Flush Coordinator
 *
 * Drains every processor attached to a provider within a caller deadline.
 * Never throws: the result is a boolean so shutdown paths can keep going.
 */

import type { TracerProvider } from '@opentelemetry/api';
import { debug, flushResult } from './logger';
import { toError } from './errors';

export const DEFAULT_FLUSH_TIMEOUT_MS = 30000;
// Largest delay setTimeout honours; longer ones fire after 1ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface FlushableProvider extends TracerProvider {
  forceFlush(): Promise<void>;
}

export function isFlushable(provider: TracerProvider): provider is FlushableProvider {
  return 'forceFlush' in provider && typeof provider.forceFlush === 'function';
}

/**
 * Reject when the promise does not settle within timeoutMs
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`${label} timed out after ${timeoutMs}ms`)),
      Math.min(timeoutMs, MAX_TIMER_DELAY_MS)
    );
    timer.unref?.();
  });

  return Promise.race([promise, deadline]).finally(() => {
    if (timer !== undefined) clearTimeout(timer);
  });
}

/**
 * Flush all processors on the provider.
 * True only if every processor flushed before the deadline.
 */
export async function forceFlush(
  provider: TracerProvider,
  timeoutMs: number = DEFAULT_FLUSH_TIMEOUT_MS
): Promise<boolean> {
  const startTime = Date.now();

  if (!isFlushable(provider)) {
    debug('Provider has no forceFlush, nothing to drain');
    return true;
  }

  let success = true;
  try {
    await withTimeout(provider.forceFlush(), timeoutMs, 'Flush');
  } catch (err) {
    success = false;
    debug('Flush error', toError(err).message);
  }

  flushResult(success, Date.now() - startTime);
  return success;
}

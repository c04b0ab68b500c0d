/**
 * Express Integration
 *
 * Middleware that runs the rest of the chain inside a tracer's context
 * and flushes spans when the response finishes.
 *
 * @example
 * import express from 'express';
 * import { Tracer } from '@beacontrace/sdk';
 * import { createMiddleware } from '@beacontrace/sdk/express';
 *
 * const tracer = new Tracer({ project: 'support-bot' });
 * const app = express();
 * app.use(createMiddleware(tracer));
 */

import type { FlushableTracer, FlushOptions } from './types';

// ─────────────────────────────────────────────────────────────
// Types (minimal to avoid requiring express as dependency)
// ─────────────────────────────────────────────────────────────

interface ExpressRequest {
  [key: string]: unknown;
}

interface ExpressResponse {
  once(event: 'finish' | 'close', listener: () => void): this;
  [key: string]: unknown;
}

type NextFunction = (error?: unknown) => void;

type ExpressMiddleware = (
  req: ExpressRequest,
  res: ExpressResponse,
  next: NextFunction
) => void;

// ─────────────────────────────────────────────────────────────
// Middleware
// ─────────────────────────────────────────────────────────────

/**
 * Create Express middleware for tracer context and flushing
 *
 * The flush does not block the response.
 *
 * @example
 * // Per-route middleware
 * app.post('/chat', createMiddleware(tracer, { timeoutMs: 5000 }), async (req, res) => {
 *   res.json({ ok: true });
 * });
 */
export function createMiddleware(tracer: FlushableTracer, options: FlushOptions = {}): ExpressMiddleware {
  return (_req, res, next) => {
    res.once('finish', () => {
      // forceFlush never rejects
      void tracer.forceFlush(options.timeoutMs);
    });

    tracer.withContext(() => next());
  };
}

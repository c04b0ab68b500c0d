/**
 * AWS Lambda Integration
 *
 * Wraps Lambda handlers so they run inside a tracer's context and flush
 * spans before the function returns.
 *
 * @example
 * import { Tracer } from '@beacontrace/sdk';
 * import { withTracing } from '@beacontrace/sdk/lambda';
 *
 * const tracer = new Tracer({ project: 'support-bot' });
 *
 * export const handler = withTracing(tracer, async (event) => {
 *   const answer = await answerQuestion(event.body);
 *   return { statusCode: 200, body: JSON.stringify(answer) };
 * });
 */

import type { FlushableTracer, FlushOptions } from './types';

// ─────────────────────────────────────────────────────────────
// Types (minimal to avoid requiring @types/aws-lambda)
// ─────────────────────────────────────────────────────────────

/**
 * AWS Lambda Context object
 */
export interface LambdaContext {
  functionName: string;
  functionVersion: string;
  invokedFunctionArn: string;
  memoryLimitInMB: string;
  awsRequestId: string;
  logGroupName: string;
  logStreamName: string;
  getRemainingTimeInMillis(): number;
  [key: string]: unknown;
}

/**
 * Generic AWS Lambda handler type
 *
 * @typeParam TEvent - The event type (e.g., APIGatewayProxyEvent)
 * @typeParam TResult - The result type (e.g., APIGatewayProxyResult)
 */
export type LambdaHandler<TEvent = unknown, TResult = unknown> = (
  event: TEvent,
  context: LambdaContext
) => Promise<TResult>;

const DEFAULT_FLUSH_TIMEOUT_MS = 30000;
// Time left for the runtime after the flush
const REMAINING_TIME_MARGIN_MS = 500;

/**
 * Flush deadline that fits inside the invocation's remaining time
 */
export function flushDeadline(context: LambdaContext, timeoutMs: number = DEFAULT_FLUSH_TIMEOUT_MS): number {
  const remaining = context.getRemainingTimeInMillis() - REMAINING_TIME_MARGIN_MS;
  return Math.max(0, Math.min(timeoutMs, remaining));
}

// ─────────────────────────────────────────────────────────────
// Wrapper
// ─────────────────────────────────────────────────────────────

/**
 * Wrap an AWS Lambda handler with tracer context and flushing
 *
 * Always flushes before returning - Lambda freezes the container
 * immediately after the handler returns.
 *
 * @example
 * // With typed events
 * import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
 *
 * export const handler = withTracing<APIGatewayProxyEvent, APIGatewayProxyResult>(
 *   tracer,
 *   async (event, context) => {
 *     return { statusCode: 200, body: 'OK' };
 *   }
 * );
 */
export function withTracing<TEvent = unknown, TResult = unknown>(
  tracer: FlushableTracer,
  handler: LambdaHandler<TEvent, TResult>,
  options: FlushOptions = {}
): LambdaHandler<TEvent, TResult> {
  return async (event: TEvent, context: LambdaContext): Promise<TResult> => {
    try {
      return await tracer.withContext(() => handler(event, context));
    } finally {
      await tracer.forceFlush(flushDeadline(context, options.timeoutMs));
    }
  };
}

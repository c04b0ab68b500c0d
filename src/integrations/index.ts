/**
 * Framework Integrations
 *
 * Re-exports for convenience. Individual imports are recommended.
 *
 * @example
 * // Recommended: import from specific integration
 * import { withTracing } from '@beacontrace/sdk/lambda';
 *
 * // Alternative: import from integrations
 * import { lambda, express } from '@beacontrace/sdk/integrations';
 */

export * as lambda from './lambda';
export * as express from './express';
export type { FlushableTracer, FlushOptions } from './types';

/**
 * Configuration
 *
 * Resolves tracer options against BEACON_* environment variables
 * and detects the experiment context of the current run.
 */

import type { ExperimentContext, ResolvedConfig, TracerOptions } from './types';
import { ConfigurationError } from './errors';

// ─────────────────────────────────────────────────────────────
// Defaults
// ─────────────────────────────────────────────────────────────

export const DEFAULT_SERVER_URL = 'https://api.beacontrace.dev';
export const DEFAULT_PROJECT = 'default';
export const DEFAULT_SOURCE = 'dev';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;
export const TEST_MODE_API_KEY = 'test-api-key';

type Env = Record<string, string | undefined>;

// ─────────────────────────────────────────────────────────────
// Experiment detection
// ─────────────────────────────────────────────────────────────

// First variable present wins. Order within each list decides ties between harnesses.
const EXPERIMENT_ENV = {
  experimentId: ['BEACON_EXPERIMENT_ID', 'EXPERIMENT_ID', 'MLFLOW_EXPERIMENT_ID', 'WANDB_RUN_ID', 'COMET_EXPERIMENT_KEY'],
  experimentName: ['BEACON_EXPERIMENT_NAME', 'EXPERIMENT_NAME', 'MLFLOW_EXPERIMENT_NAME', 'WANDB_PROJECT', 'COMET_PROJECT_NAME'],
  experimentVariant: ['BEACON_EXPERIMENT_VARIANT', 'EXPERIMENT_VARIANT', 'VARIANT', 'AB_TEST_VARIANT', 'TREATMENT'],
  experimentGroup: ['BEACON_EXPERIMENT_GROUP', 'EXPERIMENT_GROUP', 'GROUP', 'AB_TEST_GROUP', 'COHORT'],
} as const;

const EXPERIMENT_METADATA_ENV = [
  'BEACON_EXPERIMENT_METADATA',
  'EXPERIMENT_METADATA',
  'MLFLOW_TAGS',
  'WANDB_TAGS',
  'COMET_TAGS',
] as const;

/**
 * Detect experiment identifiers from the environment
 */
export function detectExperimentContext(env: Env = process.env): ExperimentContext {
  const context: ExperimentContext = {};

  const id = firstEnv(env, EXPERIMENT_ENV.experimentId);
  if (id) context.experimentId = id;

  const name = firstEnv(env, EXPERIMENT_ENV.experimentName);
  if (name) context.experimentName = name;

  const variant = firstEnv(env, EXPERIMENT_ENV.experimentVariant);
  if (variant) context.experimentVariant = variant;

  const group = firstEnv(env, EXPERIMENT_ENV.experimentGroup);
  if (group) context.experimentGroup = group;

  for (const key of EXPERIMENT_METADATA_ENV) {
    const metadata = getEnvJson(env, key);
    if (metadata) {
      context.experimentMetadata = metadata;
      break;
    }
  }

  return Object.freeze(context);
}

// ─────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────

/**
 * Merge explicit options over environment over defaults.
 * Throws ConfigurationError when no API key is available outside test mode.
 */
export function resolveConfig(options: TracerOptions = {}, env: Env = process.env): ResolvedConfig {
  const testMode = options.testMode ?? getEnvBool(env, 'BEACON_TEST_MODE') ?? false;
  const envApiKey = env.BEACON_API_KEY;
  const apiKey = options.apiKey || envApiKey;

  if (!apiKey && !testMode) {
    throw new ConfigurationError(
      'API key is required. Pass apiKey to the tracer or set BEACON_API_KEY.'
    );
  }

  const disableHttpTracing =
    options.disableHttpTracing ?? getEnvBool(env, 'BEACON_DISABLE_HTTP_TRACING') ?? true;

  return Object.freeze({
    apiKey: apiKey || TEST_MODE_API_KEY,
    project: options.project || env.BEACON_PROJECT || DEFAULT_PROJECT,
    source: options.source || env.BEACON_SOURCE || DEFAULT_SOURCE,
    sessionName:
      options.sessionName || env.BEACON_SESSION_NAME || `tracer_session_${Math.floor(Date.now() / 1000)}`,
    sessionId: options.sessionId ?? null,
    serverUrl: stripTrailingSlash(options.serverUrl || env.BEACON_API_URL || DEFAULT_SERVER_URL),
    testMode,
    httpTracingEnabled: !disableHttpTracing,
    otlpEnabled: options.otlpEnabled ?? getEnvBool(env, 'BEACON_OTLP_ENABLED') ?? true,
    debug: options.debug ?? getEnvBool(env, 'BEACON_DEBUG') ?? false,
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    flushOnExit: options.flushOnExit ?? false,
    experiment: detectExperimentContext(env),
  });
}

// ─────────────────────────────────────────────────────────────
// Environment helpers
// ─────────────────────────────────────────────────────────────

/**
 * Parse a boolean env var; undefined when unset or unrecognized
 */
export function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = env[name]?.trim().toLowerCase();
  if (value === undefined) return undefined;
  if (['true', '1', 'yes', 'on'].includes(value)) return true;
  if (['false', '0', 'no', 'off'].includes(value)) return false;
  return undefined;
}

/**
 * Parse a JSON object env var; undefined when unset, invalid or not an object
 */
export function getEnvJson(env: Env, name: string): Record<string, unknown> | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function firstEnv(env: Env, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value) return value;
  }
  return undefined;
}

function stripTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

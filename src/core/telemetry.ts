/**
 * SDK Telemetry
 *
 * Auto-detects runtime environment and SDK metadata and exposes it
 * as the OpenTelemetry resource of providers this SDK creates.
 */

import { Resource } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
  ATTR_TELEMETRY_SDK_LANGUAGE,
  ATTR_TELEMETRY_SDK_NAME,
  ATTR_TELEMETRY_SDK_VERSION,
} from '@opentelemetry/semantic-conventions';
import type { SDKTelemetry, ServiceConfig } from './types';
import { isRecord } from './config';

export const SDK_NAME = '@beacontrace/sdk';
const SDK_LANGUAGE = 'nodejs';
const DEFAULT_SERVICE_NAME = 'beacon-traced-app';

// ─────────────────────────────────────────────────────────────
// Runtime Detection
// ─────────────────────────────────────────────────────────────

function detectOS(): string {
  switch (process.platform) {
    case 'darwin':
      return 'darwin';
    case 'win32':
      return 'windows';
    case 'linux':
      return 'linux';
    default:
      return process.platform;
  }
}

// Defined by tsup at build time
declare const __SDK_VERSION__: string | undefined;

function getSDKVersion(): string {
  if (typeof __SDK_VERSION__ === 'string') {
    return __SDK_VERSION__;
  }

  // Running from source
  try {
    // eslint-disable-next-line @typescript-eslint/no-require-imports
    const pkg: unknown = require('../../package.json');
    if (isRecord(pkg) && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // package.json not available
  }
  return 'unknown';
}

// ─────────────────────────────────────────────────────────────
// Telemetry Builder
// ─────────────────────────────────────────────────────────────

let cachedTelemetry: SDKTelemetry | null = null;

/**
 * Build SDK telemetry object with auto-detected values
 */
export function buildTelemetry(service?: ServiceConfig): SDKTelemetry {
  if (!cachedTelemetry) {
    cachedTelemetry = {
      'telemetry.sdk.name': SDK_NAME,
      'telemetry.sdk.version': getSDKVersion(),
      'telemetry.sdk.language': SDK_LANGUAGE,
      'process.runtime.name': 'nodejs',
      'process.runtime.version': process.versions.node,
      'os.type': detectOS(),
    };
  }

  const telemetry: SDKTelemetry = { ...cachedTelemetry };

  if (service?.name) {
    telemetry['service.name'] = service.name;
  }
  if (service?.version) {
    telemetry['service.version'] = service.version;
  }
  if (service?.environment) {
    telemetry['deployment.environment'] = service.environment;
  }

  return telemetry;
}

/**
 * Build the Resource attached to SDK-created providers
 */
export function buildResource(service?: ServiceConfig): Resource {
  const telemetry = buildTelemetry(service);

  return new Resource({
    ...telemetry,
    [ATTR_SERVICE_NAME]: telemetry['service.name'] ?? DEFAULT_SERVICE_NAME,
    [ATTR_SERVICE_VERSION]: telemetry['service.version'] ?? telemetry['telemetry.sdk.version'],
    [ATTR_TELEMETRY_SDK_NAME]: telemetry['telemetry.sdk.name'],
    [ATTR_TELEMETRY_SDK_VERSION]: telemetry['telemetry.sdk.version'],
    [ATTR_TELEMETRY_SDK_LANGUAGE]: telemetry['telemetry.sdk.language'],
  });
}

/**
 * Reset cached telemetry (for testing)
 */
export function resetTelemetryCache(): void {
  cachedTelemetry = null;
}

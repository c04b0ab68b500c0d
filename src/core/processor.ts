/**
 * Enrichment Processor
 *
 * A SpanProcessor that copies tracer identifiers from baggage onto every
 * span at start. Each key is written twice: under the stable beacon.*
 * namespace and under the legacy association-properties namespace that
 * older backends query.
 */

import type { Attributes, Context } from '@opentelemetry/api';
import type { ReadableSpan, Span, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { BAGGAGE_KEYS, EXPERIMENT_METADATA_PREFIX, getAllBaggage } from './baggage';
import { debug } from './logger';

export const ATTRIBUTE_NAMESPACE = 'beacon';
export const LEGACY_ATTRIBUTE_NAMESPACE = 'traceloop.association.properties';

// Baggage keys copied onto spans, in write order
export const ENRICHED_BAGGAGE_KEYS: readonly string[] = [
  BAGGAGE_KEYS.sessionId,
  BAGGAGE_KEYS.project,
  BAGGAGE_KEYS.source,
  BAGGAGE_KEYS.parentId,
  BAGGAGE_KEYS.experimentId,
  BAGGAGE_KEYS.experimentName,
  BAGGAGE_KEYS.experimentVariant,
  BAGGAGE_KEYS.experimentGroup,
];

/**
 * Attributes for one association key in both namespaces
 */
export function associationAttributes(key: string, value: string): Attributes {
  return {
    [`${ATTRIBUTE_NAMESPACE}.${key}`]: value,
    [`${LEGACY_ATTRIBUTE_NAMESPACE}.${key}`]: value,
  };
}

/**
 * Build the enrichment attribute set from a baggage snapshot
 */
export function buildEnrichmentAttributes(entries: Record<string, string>): Attributes {
  const attributes: Attributes = {};

  for (const key of ENRICHED_BAGGAGE_KEYS) {
    const value = entries[key];
    if (value !== undefined && value !== '') {
      Object.assign(attributes, associationAttributes(key, value));
    }
  }

  for (const [key, value] of Object.entries(entries)) {
    if (key.startsWith(EXPERIMENT_METADATA_PREFIX)) {
      Object.assign(attributes, associationAttributes(key, value));
    }
  }

  return attributes;
}

export class EnrichmentProcessor implements SpanProcessor {
  private active = true;

  constructor(readonly tracerId: string) {}

  get isActive(): boolean {
    return this.active;
  }

  /**
   * Stop enriching. Processors cannot be removed from a shared provider,
   * so a released tracer's processor stays attached and inert.
   */
  deactivate(): void {
    this.active = false;
  }

  onStart(span: Span, parentContext: Context): void {
    if (!this.active) return;

    try {
      const entries = getAllBaggage(parentContext);
      const owner = entries[BAGGAGE_KEYS.tracerId];

      // Span belongs to another tracer's processor
      if (owner !== undefined && owner !== this.tracerId) return;

      const attributes = buildEnrichmentAttributes(entries);
      if (Object.keys(attributes).length > 0) {
        span.setAttributes(attributes);
      }
    } catch (err) {
      debug('Span enrichment failed', err);
    }
  }

  onEnd(_span: ReadableSpan): void {
    // Attributes are frozen once a span ends
  }

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    this.active = false;
    return Promise.resolve();
  }
}

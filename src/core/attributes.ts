/**
 * Attribute Serialization
 *
 * Turns arbitrary values into OpenTelemetry attribute values.
 * Credential-like keys are redacted and long strings truncated
 * before anything reaches a span.
 */

import type { AttributeValue, Attributes } from '@opentelemetry/api';
import type { RedactionConfig } from './types';

// ─────────────────────────────────────────────────────────────
// Sanitization (security)
// ─────────────────────────────────────────────────────────────

export const MAX_STRING_LENGTH = 100_000;
const MAX_DEPTH = 10;

// Authentication-related keys
const SENSITIVE_KEYS = ['api_key', 'apikey', 'password', 'secret', 'authorization'];
const SENSITIVE_TOKEN_PATTERNS = ['access_token', 'auth_token', 'bearer_token', 'refresh_token', 'id_token', 'session_token'];

// Contain "token" but carry usage counts
const SAFE_TOKEN_KEYS = ['inputtokens', 'outputtokens', 'totaltokens', 'prompttokens', 'completiontokens', 'reasoningtokens'];

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Check if a key should be redacted
 */
export function isSensitiveKey(key: string, redaction: RedactionConfig = {}): boolean {
  const lowerKey = key.toLowerCase();

  if (SAFE_TOKEN_KEYS.includes(lowerKey)) {
    return false;
  }

  if (SENSITIVE_KEYS.some((k) => lowerKey.includes(k))) {
    return true;
  }

  if (SENSITIVE_TOKEN_PATTERNS.some((k) => lowerKey.includes(k))) {
    return true;
  }

  const customKeys = redaction.keys ?? [];
  return customKeys.some((k) => lowerKey.includes(k.toLowerCase()));
}

/**
 * Apply redaction patterns to a string value and truncate it
 */
export function redactString(value: string, redaction: RedactionConfig = {}): string {
  let result = value;

  for (const pattern of redaction.patterns ?? []) {
    // Reset lastIndex for global patterns
    pattern.lastIndex = 0;
    result = result.replace(pattern, '[REDACTED]');
  }

  if (redaction.emails) {
    result = result.replace(EMAIL_PATTERN, '[EMAIL]');
  }

  if (result.length > MAX_STRING_LENGTH) {
    result = result.slice(0, MAX_STRING_LENGTH) + '...[truncated]';
  }

  return result;
}

/**
 * Deep-copy a value with sensitive keys redacted and strings truncated
 */
export function sanitize(value: unknown, redaction: RedactionConfig = {}, depth = 0): unknown {
  if (depth > MAX_DEPTH) return '[max depth exceeded]';

  if (value === null || value === undefined) return value;

  if (typeof value === 'string') {
    return redactString(value, redaction);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message, redaction) };
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item, redaction, depth + 1));
  }

  if (typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};

    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key, redaction) ? '[REDACTED]' : sanitize(val, redaction, depth + 1);
    }

    return sanitized;
  }

  // Functions, symbols
  return String(value);
}

// ─────────────────────────────────────────────────────────────
// Attribute conversion
// ─────────────────────────────────────────────────────────────

/**
 * Serialize a value for a single string attribute (inputs, outputs)
 */
export function serializeValue(value: unknown, redaction: RedactionConfig = {}): string {
  const sanitized = sanitize(value, redaction);
  if (typeof sanitized === 'string') return sanitized;

  try {
    return JSON.stringify(sanitized) ?? String(sanitized);
  } catch {
    return String(sanitized);
  }
}

/**
 * Convert a value into an attribute value.
 * Primitives pass through, homogeneous primitive arrays stay arrays,
 * everything else becomes a JSON string. Undefined for null/undefined.
 */
export function toAttributeValue(value: unknown, redaction: RedactionConfig = {}): AttributeValue | undefined {
  if (value === null || value === undefined) return undefined;

  if (typeof value === 'string') return redactString(value, redaction);
  if (typeof value === 'number' || typeof value === 'boolean') return value;

  if (Array.isArray(value)) {
    if (value.every((item): item is string => typeof item === 'string')) {
      return value.map((item) => redactString(item, redaction));
    }
    if (value.every((item): item is number => typeof item === 'number')) {
      return value;
    }
    if (value.every((item): item is boolean => typeof item === 'boolean')) {
      return value;
    }
  }

  return serializeValue(value, redaction);
}

/**
 * Flatten a record into dotted attribute keys under a prefix.
 * Nested plain objects recurse; sensitive keys become [REDACTED].
 *
 * @example
 * flattenAttributes('beacon.metadata', { user: { tier: 'pro' } })
 * // { 'beacon.metadata.user.tier': 'pro' }
 */
export function flattenAttributes(
  prefix: string,
  record: Record<string, unknown>,
  redaction: RedactionConfig = {},
  depth = 0
): Attributes {
  const attributes: Attributes = {};

  for (const [key, value] of Object.entries(record)) {
    const attributeKey = prefix ? `${prefix}.${key}` : key;

    if (isSensitiveKey(key, redaction)) {
      attributes[attributeKey] = '[REDACTED]';
      continue;
    }

    if (isPlainObject(value) && depth < MAX_DEPTH) {
      Object.assign(attributes, flattenAttributes(attributeKey, value, redaction, depth + 1));
      continue;
    }

    const attributeValue = toAttributeValue(value, redaction);
    if (attributeValue !== undefined) {
      attributes[attributeKey] = attributeValue;
    }
  }

  return attributes;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

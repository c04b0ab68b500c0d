/**
 * Transport Layer
 *
 * HTTP client for the Beacon API. Covers the two calls the tracer
 * depends on: starting a session and enriching a session.
 * Features:
 * - Bearer authentication
 * - Per-request timeout protection
 */

import type {
  BackendClient,
  EnrichSessionResponse,
  SessionEnrichment,
  StartSessionRequest,
  StartSessionResponse,
} from './types';
import { isRecord } from './config';
import { MAX_TIMER_DELAY_MS } from './flush';
import { requestDetails, responseDetails } from './logger';

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

export interface ApiClientConfig {
  apiKey: string;
  serverUrl: string;
  requestTimeoutMs?: number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

// ─────────────────────────────────────────────────────────────
// ApiClient
// ─────────────────────────────────────────────────────────────

export class ApiClient implements BackendClient {
  private readonly config: Required<ApiClientConfig>;

  constructor(config: ApiClientConfig) {
    this.config = {
      apiKey: config.apiKey,
      serverUrl: config.serverUrl.replace(/\/+$/, ''),
      requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    };
  }

  /**
   * POST /session/start
   */
  async startSession(request: StartSessionRequest): Promise<StartSessionResponse> {
    const data = await this.request('POST', '/session/start', {
      session: {
        project: request.project,
        session_name: request.sessionName,
        source: request.source,
        ...(request.sessionId ? { session_id: request.sessionId } : {}),
        inputs: request.inputs ?? {},
        metadata: request.metadata ?? {},
      },
    });

    const sessionId = extractSessionId(data);
    if (!sessionId) {
      throw new ApiError('Session start response did not include a session_id');
    }
    return { sessionId };
  }

  /**
   * PUT /events, addressed at the session event
   */
  async enrichSession(sessionId: string, payload: SessionEnrichment): Promise<EnrichSessionResponse> {
    await this.request('PUT', '/events', {
      event_id: sessionId,
      metadata: payload.metadata,
      feedback: payload.feedback,
      metrics: payload.metrics,
      config: payload.config,
      inputs: payload.inputs,
      outputs: payload.outputs,
      user_properties: payload.userProperties,
    });
    return { ok: true };
  }

  // ─────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.config.serverUrl}${path}`;
    const payload = body === undefined ? undefined : JSON.stringify(body);
    const controller = new AbortController();
    const startTime = Date.now();

    const timeoutId = setTimeout(() => {
      controller.abort();
    }, Math.min(this.config.requestTimeoutMs, MAX_TIMER_DELAY_MS));

    requestDetails(method, url, payload?.length ?? 0);

    try {
      const response = await fetch(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.config.apiKey}`,
        },
        body: payload,
        signal: controller.signal,
      });

      clearTimeout(timeoutId);
      responseDetails(response.status, Date.now() - startTime);

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        throw new ApiError(`HTTP ${response.status}: ${errorText}`, response.status);
      }

      const text = await response.text();
      const parsed: unknown = text ? JSON.parse(text) : {};
      return parsed;
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof Error && error.name === 'AbortError') {
        throw new ApiError(`Request timeout after ${this.config.requestTimeoutMs}ms`);
      }

      throw error;
    }
  }
}

/**
 * Session id from either { session_id } or { session: { session_id } }
 */
function extractSessionId(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  if (typeof data.session_id === 'string' && data.session_id) return data.session_id;
  if (isRecord(data.session) && typeof data.session.session_id === 'string' && data.session.session_id) {
    return data.session.session_id;
  }
  return undefined;
}

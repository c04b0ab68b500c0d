/**
 * Session Lifecycle Manager
 *
 * Starts the remote session a tracer's spans are grouped under.
 * Failure never propagates: the tracer keeps working without a session id.
 */

import type { BackendClient } from './types';
import { withTimeout } from './flush';
import { sessionCreated, sessionFailed } from './logger';

export interface SessionParams {
  project: string;
  source: string;
  sessionName: string;
  inputs?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

/**
 * Create a session through the API client.
 * Resolves to the new session id, or null on any failure.
 */
export async function startSession(
  client: BackendClient,
  params: SessionParams,
  timeoutMs: number
): Promise<string | null> {
  try {
    const response = await withTimeout(
      client.startSession({
        project: params.project,
        source: params.source,
        sessionName: params.sessionName,
        inputs: params.inputs,
        metadata: params.metadata,
      }),
      timeoutMs,
      'Session start'
    );

    if (!response.sessionId) {
      throw new Error('Backend returned an empty session id');
    }

    sessionCreated(response.sessionId, params.project);
    return response.sessionId;
  } catch (err) {
    sessionFailed(params.project, err);
    return null;
  }
}

import type {
  BackendClient,
  EnrichSessionResponse,
  SessionEnrichment,
  StartSessionRequest,
  StartSessionResponse,
} from '../../src/core/types';

export interface FakeClientBehavior {
  sessionId?: string;
  startError?: Error;
  enrichError?: Error;
  /** Never settle startSession */
  hangStart?: boolean;
}

export interface EnrichCall {
  sessionId: string;
  payload: SessionEnrichment;
}

/**
 * In-process stand-in for the Beacon API
 */
export class FakeBackendClient implements BackendClient {
  public startCalls: StartSessionRequest[] = [];
  public enrichCalls: EnrichCall[] = [];

  constructor(private readonly behavior: FakeClientBehavior = {}) {}

  startSession(request: StartSessionRequest): Promise<StartSessionResponse> {
    this.startCalls.push(request);
    if (this.behavior.hangStart) return new Promise(() => undefined);
    if (this.behavior.startError) return Promise.reject(this.behavior.startError);
    return Promise.resolve({ sessionId: this.behavior.sessionId ?? 'sess-fake' });
  }

  enrichSession(sessionId: string, payload: SessionEnrichment): Promise<EnrichSessionResponse> {
    this.enrichCalls.push({ sessionId, payload });
    if (this.behavior.enrichError) return Promise.reject(this.behavior.enrichError);
    return Promise.resolve({ ok: true });
  }
}

export function createFakeClient(behavior: FakeClientBehavior = {}): FakeBackendClient {
  return new FakeBackendClient(behavior);
}

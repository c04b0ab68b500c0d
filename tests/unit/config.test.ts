import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  resolveConfig,
  detectExperimentContext,
  getEnvBool,
  getEnvJson,
  DEFAULT_SERVER_URL,
} from '../../src/core/config';
import { ConfigurationError } from '../../src/core/errors';

describe('Config Module', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('resolveConfig', () => {
    it('should apply defaults', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-02T03:04:05Z'));

      const config = resolveConfig({ apiKey: 'test-secret' }, {});

      expect(config.apiKey).toBe('test-secret');
      expect(config.project).toBe('default');
      expect(config.source).toBe('dev');
      expect(config.serverUrl).toBe(DEFAULT_SERVER_URL);
      expect(config.sessionName).toBe('tracer_session_1767323045');
      expect(config.sessionId).toBeNull();
      expect(config.testMode).toBe(false);
      expect(config.httpTracingEnabled).toBe(false);
      expect(config.otlpEnabled).toBe(true);
      expect(config.requestTimeoutMs).toBe(10000);
      expect(config.flushOnExit).toBe(false);
    });

    it('should prefer explicit options over environment', () => {
      const config = resolveConfig(
        { apiKey: 'option-key', project: 'from-options' },
        { BEACON_API_KEY: 'env-key', BEACON_PROJECT: 'from-env', BEACON_SOURCE: 'staging' }
      );

      expect(config.apiKey).toBe('option-key');
      expect(config.project).toBe('from-options');
      expect(config.source).toBe('staging');
    });

    it('should read environment variables', () => {
      const config = resolveConfig(
        {},
        {
          BEACON_API_KEY: 'test-secret',
          BEACON_API_URL: 'http://localhost:8080/',
          BEACON_SESSION_NAME: 'nightly',
          BEACON_DISABLE_HTTP_TRACING: 'false',
          BEACON_OTLP_ENABLED: 'off',
        }
      );

      expect(config.serverUrl).toBe('http://localhost:8080');
      expect(config.sessionName).toBe('nightly');
      expect(config.httpTracingEnabled).toBe(true);
      expect(config.otlpEnabled).toBe(false);
    });

    it('should throw ConfigurationError without an API key', () => {
      expect(() => resolveConfig({}, {})).toThrow(ConfigurationError);
      expect(() => resolveConfig({}, {})).toThrow('API key is required');
    });

    it('should use a placeholder key in test mode', () => {
      expect(resolveConfig({ testMode: true }, {}).apiKey).toBe('test-api-key');
      expect(resolveConfig({}, { BEACON_TEST_MODE: 'yes' }).apiKey).toBe('test-api-key');
    });

    it('should keep an explicit session id', () => {
      const config = resolveConfig({ testMode: true, sessionId: 'sess-123' }, {});
      expect(config.sessionId).toBe('sess-123');
    });

    it('should return a frozen object', () => {
      const config = resolveConfig({ testMode: true }, {});
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.experiment)).toBe(true);
    });
  });

  describe('getEnvBool', () => {
    it.each(['true', '1', 'yes', 'on', ' TRUE '])('should parse %j as true', (value) => {
      expect(getEnvBool({ FLAG: value }, 'FLAG')).toBe(true);
    });

    it.each(['false', '0', 'no', 'off'])('should parse %j as false', (value) => {
      expect(getEnvBool({ FLAG: value }, 'FLAG')).toBe(false);
    });

    it('should return undefined for unset or unknown values', () => {
      expect(getEnvBool({}, 'FLAG')).toBeUndefined();
      expect(getEnvBool({ FLAG: 'maybe' }, 'FLAG')).toBeUndefined();
    });
  });

  describe('getEnvJson', () => {
    it('should parse JSON objects only', () => {
      expect(getEnvJson({ META: '{"team":"search"}' }, 'META')).toEqual({ team: 'search' });
      expect(getEnvJson({ META: '[1,2]' }, 'META')).toBeUndefined();
      expect(getEnvJson({ META: 'not json' }, 'META')).toBeUndefined();
    });
  });

  describe('detectExperimentContext', () => {
    it('should return an empty context without variables', () => {
      expect(detectExperimentContext({})).toEqual({});
    });

    it('should read the BEACON_* variables', () => {
      const context = detectExperimentContext({
        BEACON_EXPERIMENT_ID: 'exp-1',
        BEACON_EXPERIMENT_NAME: 'prompt-v2',
        BEACON_EXPERIMENT_VARIANT: 'treatment',
        BEACON_EXPERIMENT_GROUP: 'cohort-a',
        BEACON_EXPERIMENT_METADATA: '{"owner":"search"}',
      });

      expect(context).toEqual({
        experimentId: 'exp-1',
        experimentName: 'prompt-v2',
        experimentVariant: 'treatment',
        experimentGroup: 'cohort-a',
        experimentMetadata: { owner: 'search' },
      });
    });

    it('should let the first declared variable win', () => {
      const context = detectExperimentContext({
        MLFLOW_EXPERIMENT_ID: 'mlflow-7',
        WANDB_RUN_ID: 'wandb-run',
        WANDB_PROJECT: 'wandb-project',
        COMET_PROJECT_NAME: 'comet-project',
        AB_TEST_VARIANT: 'b',
        TREATMENT: 'c',
        COHORT: 'late',
      });

      expect(context.experimentId).toBe('mlflow-7');
      expect(context.experimentName).toBe('wandb-project');
      expect(context.experimentVariant).toBe('b');
      expect(context.experimentGroup).toBe('late');
    });

    it('should skip invalid metadata and use the next source', () => {
      const context = detectExperimentContext({
        EXPERIMENT_METADATA: 'oops',
        WANDB_TAGS: '{"sweep":"lr"}',
      });

      expect(context.experimentMetadata).toEqual({ sweep: 'lr' });
    });
  });
});

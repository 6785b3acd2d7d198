import { loadEnv } from '../../config/env';
import { InvalidConfigurationError } from '../../middleware/errorHandler';

describe('Environment Configuration', () => {
  it('should apply defaults', () => {
    const env = loadEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(3000);
    expect(env.OPENAI_MODEL).toBe('gpt-4o');
    expect(env.CLASSIFIER_TIMEOUT_MS).toBe(30000);
    expect(env.PROTOCOLS_PATH).toBe('data/protocols.json');
    expect(env.EXEMPLARS_DIR).toBe('compiled');
    expect(env.PROTOCOL_TOP_K).toBe(3);
    expect(env.ROUTER_MIN_CONFIDENCE).toBeUndefined();
    expect(env.SAFETY_OVER_TRIAGE_SCORE).toBe(0.7);
    expect(env.SAFETY_UNDER_TRIAGE_SCORE).toBe(0.3);
    expect(env.MAX_BOOTSTRAPPED_DEMOS).toBe(8);
    expect(env.MAX_LABELED_DEMOS).toBe(4);
    expect(env.COMPILE_CONCURRENCY).toBe(2);
  });

  it('should parse numeric overrides', () => {
    const env = loadEnv({
      NODE_ENV: 'production',
      PORT: '8080',
      ROUTER_MIN_CONFIDENCE: '0.25',
      SAFETY_OVER_TRIAGE_SCORE: '0.8',
      SAFETY_UNDER_TRIAGE_SCORE: '0.4',
      COMPILE_CONCURRENCY: '4',
    });

    expect(env.PORT).toBe(8080);
    expect(env.ROUTER_MIN_CONFIDENCE).toBe(0.25);
    expect(env.SAFETY_OVER_TRIAGE_SCORE).toBe(0.8);
    expect(env.SAFETY_UNDER_TRIAGE_SCORE).toBe(0.4);
    expect(env.COMPILE_CONCURRENCY).toBe(4);
  });

  it('should reject invalid values', () => {
    expect(() => loadEnv({ PORT: 'abc' })).toThrow(InvalidConfigurationError);
    expect(() => loadEnv({ CLASSIFIER_TIMEOUT_MS: '0' })).toThrow('CLASSIFIER_TIMEOUT_MS');
    expect(() => loadEnv({ SAFETY_OVER_TRIAGE_SCORE: '1.5' })).toThrow(InvalidConfigurationError);
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow('LOG_LEVEL');
  });

  it('should require over-triage to score above under-triage', () => {
    expect(() =>
      loadEnv({ SAFETY_OVER_TRIAGE_SCORE: '0.3', SAFETY_UNDER_TRIAGE_SCORE: '0.3' })
    ).toThrow('SAFETY_OVER_TRIAGE_SCORE must be greater than SAFETY_UNDER_TRIAGE_SCORE');
  });
});

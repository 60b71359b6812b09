import { describe, test, expect } from '@jest/globals';
import path from 'path';
import { MAX_TIMER_MS, loadGeneratorConfig } from '../generator-config';
import { BACKEND_ROOT } from '../load-env';

describe('loadGeneratorConfig', () => {
  test('falls back to the documented defaults', () => {
    const config = loadGeneratorConfig({});

    expect(config.openai.apiKey).toBeNull();
    expect(config.models).toEqual(['gpt-4.1-mini', 'gpt-4.1', 'gpt-4o-mini', 'gpt-4o']);
    expect(config.defaultModel).toBe('gpt-4.1-mini');
    expect(config.tokens).toEqual({ min: 1024, max: 8000, defaultValue: 6000, step: 256 });
    expect(config.defaultTemperature).toBe(0.2);
    expect(config.apiTimeoutMs).toBe(120_000);
    expect(config.retry).toMatchObject({ maxAttempts: 4, initialDelayMs: 2000, maxDelayMs: 30_000, backoffMultiplier: 2 });
    expect([...config.retry.retryable]).toEqual(['RateLimited', 'ConnectionError', 'Timeout', 'ServiceUnavailable']);
    expect(config.limits).toEqual({ maxFileBytes: 8_000_000, maxBriefLength: 10_000, maxImageSide: 2048, jpegQuality: 85 });
    expect(config.defaultAccentColor).toBe('#0b3a6e');
    expect(config.systemPromptPath).toBe(path.join(BACKEND_ROOT, 'prompts', 'system-prompt.md'));
    expect(Object.isFrozen(config)).toBe(true);
  });

  test('reads overrides from the env map', () => {
    const config = loadGeneratorConfig({
      OPENAI_API_KEY: ' test-secret ',
      RESUME_MODELS: 'gpt-4o, gpt-4o-mini',
      MAX_TOKENS: '4000',
      MAX_RETRIES: '0',
      RETRYABLE_FAILURES: 'RateLimited,AuthenticationFailed',
    });

    expect(config.openai.apiKey).toBe('test-secret');
    expect(config.models).toEqual(['gpt-4o', 'gpt-4o-mini']);
    expect(config.defaultModel).toBe('gpt-4o');
    expect(config.tokens.defaultValue).toBe(4000);
    expect(config.retry.maxAttempts).toBe(1);
    expect([...config.retry.retryable]).toEqual(['RateLimited', 'AuthenticationFailed']);
  });

  test('accepts timer values up to the setTimeout limit', () => {
    const config = loadGeneratorConfig({
      API_TIMEOUT_MS: String(MAX_TIMER_MS),
      INITIAL_RETRY_DELAY_MS: '1',
      MAX_RETRY_DELAY_MS: String(MAX_TIMER_MS),
    });

    expect(config.apiTimeoutMs).toBe(MAX_TIMER_MS);
    expect(config.retry).toMatchObject({ initialDelayMs: 1, maxDelayMs: MAX_TIMER_MS });
  });

  test.each<[Record<string, string>, string]>([
    [{ MAX_TOKENS: 'abc' }, 'Invalid MAX_TOKENS="abc"'],
    [{ MIN_TOKENS: '9000' }, 'Token bounds must satisfy'],
    [{ DEFAULT_MAX_TOKENS: '9000' }, 'Token bounds must satisfy'],
    [{ MAX_RETRIES: '-1' }, 'Invalid MAX_RETRIES="-1"'],
    [{ RESUME_DEFAULT_MODEL: 'gpt-2' }, 'is not in RESUME_MODELS'],
    [{ RETRYABLE_FAILURES: 'RateLimited,Nope' }, 'Unknown RETRYABLE_FAILURES entries: Nope'],
    [{ DEFAULT_ACCENT_COLOR: 'blue' }, 'Invalid DEFAULT_ACCENT_COLOR="blue"'],
    [{ JPEG_QUALITY: '150' }, 'JPEG_QUALITY must be between 1 and 100'],
    [{ API_TIMEOUT_MS: '2147483648' }, 'Invalid API_TIMEOUT_MS="2147483648"'],
    [{ INITIAL_RETRY_DELAY_MS: '0' }, 'Invalid INITIAL_RETRY_DELAY_MS="0"'],
    [{ MAX_RETRY_DELAY_MS: '2147483648' }, 'Invalid MAX_RETRY_DELAY_MS="2147483648"'],
    [{ INITIAL_RETRY_DELAY_MS: '60000' }, 'MAX_RETRY_DELAY_MS must not be below INITIAL_RETRY_DELAY_MS'],
  ])('rejects %p', (env, message) => {
    expect(() => loadGeneratorConfig(env)).toThrow(message);
  });
});

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.language).toBe('java');
    expect(config.maxAttempts).toBe(3);
    expect(config.workspace).toBe('workspace');
    expect(config.toolchainTimeoutMs).toBe(120_000);
    expect(config.provider).toBe('ollama');
    expect(config.analyzeFailures).toBe(false);
    expect(config.models.planner.id).toBe('qwen3:14b');
    expect(config.models.generator.id).toBe('codellama:13b');
  });

  it('reads overrides', () => {
    const config = loadConfig({
      CURLGEN_LANGUAGE: 'kotlin',
      CURLGEN_MAX_ATTEMPTS: '5',
      CURLGEN_ANALYZE_FAILURES: 'yes',
      CURLGEN_PROVIDER: 'anthropic',
      CURLGEN_GENERATOR_MODEL: 'claude-custom',
    });

    expect(config.language).toBe('kotlin');
    expect(config.maxAttempts).toBe(5);
    expect(config.analyzeFailures).toBe(true);
    expect(config.models.generator.id).toBe('claude-custom');
    expect(config.models.generator.provider).toBe('anthropic');
    expect(config.models.planner.id).toBe('claude-3-5-haiku-20241022');
  });

  it('points every role at a custom base URL', () => {
    const config = loadConfig({ CURLGEN_BASE_URL: 'http://gpu-box:11434/v1' });

    expect(config.models.planner.baseURL).toBe('http://gpu-box:11434/v1');
    expect(config.models.analyst.baseURL).toBe('http://gpu-box:11434/v1');
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ CURLGEN_LANGUAGE: '' }).language).toBe('java');
  });

  it('rejects a non-positive attempt count', () => {
    expect(() => loadConfig({ CURLGEN_MAX_ATTEMPTS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ CURLGEN_MAX_ATTEMPTS: '0' })).toThrow(/^Invalid configuration: CURLGEN_MAX_ATTEMPTS:/);
  });

  it('rejects an unknown language', () => {
    expect(() => loadConfig({ CURLGEN_LANGUAGE: 'cobol' })).toThrow(ConfigError);
  });
});

import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  it('applies defaults when only the OpenAI key is set', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-openai-key' });

    expect(config).toEqual({
      port: 8000,
      llm: {
        provider: 'openai',
        apiKey: 'test-openai-key',
        model: 'gpt-4o-mini',
        temperature: 0,
        useBeta: false,
      },
      tools: {
        githubToken: undefined,
        openWeatherApiKey: undefined,
        newsApiKey: undefined,
      },
      executor: { maxAttempts: 3, retryDelayMs: 0 },
    });
  });

  it('fails when the selected provider has no API key', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'deepseek', OPENAI_API_KEY: 'test-openai-key' })).toThrow(
      'DEEPSEEK_API_KEY is required when LLM_PROVIDER=deepseek'
    );

    let caught: unknown;
    try {
      loadConfig({});
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ missing: ['OPENAI_API_KEY'] });
  });

  it('treats empty values and .env.example placeholders as missing', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-openai-key',
      GITHUB_TOKEN: '',
      OPENWEATHER_API_KEY: 'test-weather-key',
      NEWS_API_KEY: 'your_news_api_key_here',
    });

    expect(config.tools).toEqual({
      githubToken: undefined,
      openWeatherApiKey: 'test-weather-key',
      newsApiKey: undefined,
    });
  });

  it('falls back to defaults for blank settings', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-openai-key',
      PORT: '',
      LLM_PROVIDER: '',
      LLM_TEMPERATURE: ' ',
      DEEPSEEK_USE_BETA: '',
      EXECUTOR_MAX_ATTEMPTS: '',
      EXECUTOR_RETRY_DELAY_MS: '',
    });

    expect(config.port).toBe(8000);
    expect(config.llm).toMatchObject({ provider: 'openai', model: 'gpt-4o-mini', temperature: 0, useBeta: false });
    expect(config.executor).toEqual({ maxAttempts: 3, retryDelayMs: 0 });
  });

  it('still rejects a malformed non-blank setting', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-openai-key', PORT: 'eighty' })).toThrow(
      'Invalid configuration: PORT: Expected number, received nan'
    );
  });

  it('selects the provider case-insensitively and uses its default model', () => {
    const config = loadConfig({ LLM_PROVIDER: 'GROQ', GROQ_API_KEY: 'test-groq-key' });

    expect(config.llm.provider).toBe('groq');
    expect(config.llm.model).toBe('llama-3.3-70b-versatile');
    expect(config.llm.apiKey).toBe('test-groq-key');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '3001',
      OPENAI_API_KEY: 'test-openai-key',
      OPENAI_BASE_URL: 'http://localhost:11434/v1',
      LLM_MODEL: 'gpt-4o',
      LLM_TEMPERATURE: '0.2',
      EXECUTOR_MAX_ATTEMPTS: '5',
      EXECUTOR_RETRY_DELAY_MS: '250',
    });

    expect(config.port).toBe(3001);
    expect(config.llm).toMatchObject({ model: 'gpt-4o', temperature: 0.2, baseURL: 'http://localhost:11434/v1' });
    expect(config.executor).toEqual({ maxAttempts: 5, retryDelayMs: 250 });
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'mystery', OPENAI_API_KEY: 'test-openai-key' })).toThrow(
      /^Invalid configuration: LLM_PROVIDER: /
    );
  });
});

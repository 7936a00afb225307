import { describe, expect, it, vi } from 'vitest';
import type { LLMConfig } from '../config';
import { DeepSeekAdapter } from '../llm/adapters/deepseek';
import { GroqAdapter } from '../llm/adapters/groq';
import { OpenAIAdapter } from '../llm/adapters/openai';
import { createLLMAdapter } from '../llm/provider';

const base: LLMConfig = { provider: 'openai', apiKey: 'test-key', model: 'gpt-4o-mini', temperature: 0, useBeta: false };

describe('createLLMAdapter', () => {
  it('creates the adapter for the configured provider', () => {
    const openai = createLLMAdapter(base);
    const groq = createLLMAdapter({ ...base, provider: 'groq', model: 'llama-3.3-70b-versatile' });
    const deepseek = createLLMAdapter({ ...base, provider: 'deepseek', model: 'deepseek-chat', useBeta: true });

    expect(openai).toBeInstanceOf(OpenAIAdapter);
    expect(groq).toBeInstanceOf(GroqAdapter);
    expect(deepseek).toBeInstanceOf(DeepSeekAdapter);
    expect([openai, groq, deepseek].map((a) => `${a.provider}/${a.model}`)).toEqual([
      'openai/gpt-4o-mini',
      'groq/llama-3.3-70b-versatile',
      'deepseek/deepseek-chat',
    ]);
  });

  it('takes endpoints from the config, not the process environment', () => {
    vi.stubEnv('DEEPSEEK_USE_BETA', 'true');
    vi.stubEnv('OPENAI_BASE_URL', 'http://localhost:9999/v1');

    const deepseek = new DeepSeekAdapter({ apiKey: 'test-key', useBeta: false });
    const beta = new DeepSeekAdapter({ apiKey: 'test-key', useBeta: true });
    const groq = new GroqAdapter({ apiKey: 'test-key' });
    const openai = new OpenAIAdapter({ apiKey: 'test-key', baseURL: 'http://localhost:11434/v1' });

    expect(deepseek.baseURL).toBe('https://api.deepseek.com');
    expect(beta.baseURL).toBe('https://api.deepseek.com/beta');
    expect(groq.baseURL).toBe('https://api.groq.com/openai/v1');
    expect(openai.baseURL).toBe('http://localhost:11434/v1');
  });
});

import type { LLMConfig } from '../config';
import type { LLMAdapter } from './types';
import { OpenAIAdapter } from './adapters/openai';
import { DeepSeekAdapter } from './adapters/deepseek';
import { GroqAdapter } from './adapters/groq';

/**
 * 根据配置创建对应 provider 的 LLM 适配器
 */
export function createLLMAdapter(config: LLMConfig): LLMAdapter {
  console.log(`[LLM] Initializing ${config.provider} adapter (model: ${config.model})`);
  const { apiKey, model, temperature } = config;

  switch (config.provider) {
    case 'deepseek':
      return new DeepSeekAdapter({ apiKey, model, temperature, useBeta: config.useBeta });
    case 'groq':
      return new GroqAdapter({ apiKey, model, temperature });
    case 'openai':
      return new OpenAIAdapter({ apiKey, model, temperature, baseURL: config.baseURL });
  }
}

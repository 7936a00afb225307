import { OpenAIAdapter } from './openai';

export interface GroqAdapterOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
}

/**
 * Groq 提供 OpenAI 兼容的接口 (https://api.groq.com/openai/v1)。
 */
export class GroqAdapter extends OpenAIAdapter {
  readonly provider: string = 'groq';

  constructor({ apiKey, model = 'llama-3.3-70b-versatile', temperature }: GroqAdapterOptions) {
    super({
      baseURL: 'https://api.groq.com/openai/v1',
      apiKey,
      model,
      temperature,
    });
  }
}

import OpenAI from 'openai';
import type { ChatOptions, LLMAdapter } from '../types';

export interface OpenAIAdapterOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  temperature?: number;
}

export class OpenAIAdapter implements LLMAdapter {
  readonly provider: string = 'openai';
  readonly model: string;
  private openai: OpenAI;
  private temperature: number;

  constructor({ apiKey, model = 'gpt-4o-mini', baseURL, temperature = 0 }: OpenAIAdapterOptions) {
    this.openai = new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) });
    this.model = model;
    this.temperature = temperature;
  }

  get baseURL(): string {
    return this.openai.baseURL;
  }

  async chat(
    messages: OpenAI.Chat.ChatCompletionMessageParam[],
    options: ChatOptions = {}
  ): Promise<OpenAI.Chat.ChatCompletion> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages,
      temperature: this.temperature,
    };
    if (options.json) params.response_format = { type: 'json_object' };

    return this.openai.chat.completions.create(params);
  }
}

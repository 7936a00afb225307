import type OpenAI from 'openai';

export interface ChatOptions {
  /** 要求模型只输出一个 JSON 对象 (response_format: json_object) */
  json?: boolean;
}

export interface LLMAdapter {
  readonly provider: string;
  readonly model: string;
  chat(
    messages: OpenAI.Chat.ChatCompletionMessageParam[],
    options?: ChatOptions
  ): Promise<OpenAI.Chat.ChatCompletion>;
}

import type OpenAI from 'openai';
import type { z } from 'zod';
import { LLMResponseError, errorMessage } from '../errors';
import type { LLMAdapter } from './types';

export type CompletionMode = 'text' | 'json';

const DEFAULT_SYSTEM_PROMPT = 'You are a precise assistant that helps answer user requests using external tools.';
const JSON_INSTRUCTION = ' Respond with a single valid JSON object and nothing else.';

const FENCED_BLOCK = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * 从 LLM 输出中解析 JSON。
 * 去掉 Markdown 代码块包裹；如果前后还有多余文字，截取第一个 "{" 到最后一个 "}" 再试一次。
 */
export function parseJsonContent(content: string): unknown {
  const trimmed = content.trim();
  const text = FENCED_BLOCK.exec(trimmed)?.[1] ?? trimmed;

  try {
    return JSON.parse(text);
  } catch (error) {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new LLMResponseError(`LLM output is not valid JSON: ${errorMessage(error)}`, content);
    }
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch (innerError) {
      throw new LLMResponseError(`LLM output is not valid JSON: ${errorMessage(innerError)}`, content);
    }
  }
}

/**
 * 统一的补全接口，屏蔽不同 provider 的差异。
 * JSON 模式下只做一次本地解析和 schema 校验，失败直接抛出 LLMResponseError，不重试。
 */
export class LLMClient {
  constructor(
    private adapter: LLMAdapter,
    private systemPrompt: string = DEFAULT_SYSTEM_PROMPT
  ) {}

  get provider(): string {
    return this.adapter.provider;
  }

  get model(): string {
    return this.adapter.model;
  }

  async complete(prompt: string, mode: CompletionMode = 'text'): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: mode === 'json' ? this.systemPrompt + JSON_INSTRUCTION : this.systemPrompt },
      { role: 'user', content: prompt },
    ];

    const completion = await this.adapter.chat(messages, { json: mode === 'json' });
    const content = completion.choices[0]?.message.content?.trim();
    if (!content) {
      throw new LLMResponseError(`${this.adapter.provider} returned an empty completion`);
    }
    return content;
  }

  async completeJson<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const content = await this.complete(prompt, 'json');
    const result = schema.safeParse(parseJsonContent(content));
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      });
      throw new LLMResponseError(`LLM output does not match the expected shape: ${issues.join('; ')}`, content);
    }
    return result.data;
  }
}

import type OpenAI from 'openai';
import { vi } from 'vitest';
import { ToolInvocationError } from '../errors';
import type { ChatOptions, LLMAdapter } from '../llm/types';
import type { Tool, ToolFunction } from '../types';

export function completion(content: string | null): OpenAI.Chat.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'fake-model',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

/**
 * 按顺序返回预先设定的回复；Error 会被抛出，模拟 provider 调用失败。
 */
export class FakeLLMAdapter implements LLMAdapter {
  readonly provider = 'fake';
  readonly model = 'fake-model';
  calls: { messages: OpenAI.Chat.ChatCompletionMessageParam[]; options?: ChatOptions }[] = [];

  constructor(private replies: Array<string | null | Error> = []) {}

  async chat(messages: OpenAI.Chat.ChatCompletionMessageParam[], options?: ChatOptions) {
    this.calls.push({ messages, options });
    const next = this.replies.shift();
    if (next === undefined) throw new Error('FakeLLMAdapter: no reply queued');
    if (next instanceof Error) throw next;
    return completion(next);
  }
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = responses.shift();
    if (!next) throw new Error('stubFetch: unexpected request');
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function requestedUrl(fetchMock: ReturnType<typeof stubFetch>, index = 0): URL {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`no fetch call #${index}`);
  return new URL(String(call[0]));
}

export function requestedHeaders(fetchMock: ReturnType<typeof stubFetch>, index = 0): Headers {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`no fetch call #${index}`);
  return new Headers(call[1]?.headers);
}

export function getFunction(tool: Tool, name: string): ToolFunction {
  const fn = tool.functions.find((f) => f.name === name);
  if (!fn) throw new Error(`${tool.name} has no function ${name}`);
  return fn;
}

export async function captureToolError(promise: Promise<unknown>): Promise<ToolInvocationError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ToolInvocationError) return error;
    throw error;
  }
  throw new Error('expected a ToolInvocationError');
}

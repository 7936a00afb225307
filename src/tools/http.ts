import { z } from 'zod';
import { ToolInvocationError, errorMessage, type ToolErrorKind } from '../errors';

export const REQUEST_TIMEOUT_MS = 30_000;

export type QueryParams = Record<string, string | number | undefined>;

export interface GetJsonOptions {
  /** 用于错误归属和日志的工具名 */
  tool: string;
  params?: QueryParams;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

const ERROR_LABELS: Record<ToolErrorKind, string> = {
  auth: 'authentication failed',
  rate_limit: 'rate limit exceeded',
  not_found: 'resource not found',
  timeout: 'request timed out',
  network: 'network error',
  upstream: 'request failed',
};

/** GitHub、NewsAPI、OpenWeatherMap 的错误响应里都有 message 字段 */
const ErrorBody = z.object({ message: z.string() });

function classifyStatus(response: Response): ToolErrorKind {
  switch (response.status) {
    case 401:
      return 'auth';
    case 403:
      // GitHub 用 403 + X-RateLimit-Remaining: 0 表示限流
      return response.headers.get('x-ratelimit-remaining') === '0' ? 'rate_limit' : 'auth';
    case 404:
      return 'not_found';
    case 429:
      return 'rate_limit';
    default:
      return 'upstream';
  }
}

async function readErrorDetail(response: Response): Promise<string | undefined> {
  const text = await response.text();
  try {
    const body = ErrorBody.safeParse(JSON.parse(text));
    return body.success ? body.data.message : undefined;
  } catch {
    return text.trim().slice(0, 200) || undefined;
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * 发送 GET 请求并返回解析后的 JSON。
 * 所有失败都转换成带 kind 的 ToolInvocationError，由 Executor 决定是否重试。
 */
export async function getJson(
  url: string,
  { tool, params = {}, headers = {}, timeoutMs = REQUEST_TIMEOUT_MS }: GetJsonOptions
): Promise<unknown> {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) target.searchParams.set(key, String(value));
  }

  let response: Response;
  try {
    response = await fetch(target, {
      headers: { Accept: 'application/json', ...headers },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (isTimeout(error)) {
      throw new ToolInvocationError(tool, 'timeout', `${tool}: ${ERROR_LABELS.timeout} after ${timeoutMs}ms`);
    }
    throw new ToolInvocationError(tool, 'network', `${tool}: ${ERROR_LABELS.network} - ${errorMessage(error)}`);
  }

  if (!response.ok) {
    const kind = classifyStatus(response);
    const detail = await readErrorDetail(response);
    const message = `${tool}: ${ERROR_LABELS[kind]} (HTTP ${response.status})${detail ? ` - ${detail}` : ''}`;
    throw new ToolInvocationError(tool, kind, message, response.status);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ToolInvocationError(
      tool,
      'upstream',
      `${tool}: unreadable response body - ${errorMessage(error)}`,
      response.status
    );
  }
}

/**
 * 用 zod schema 校验第三方响应，结构不符时视为 upstream 错误。
 */
export function parseResponse<T>(tool: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ToolInvocationError(tool, 'upstream', `${tool}: unexpected response shape${where}`);
  }
  return result.data;
}

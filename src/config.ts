import { z } from 'zod';
import { ConfigError } from './errors';

export type LLMProvider = 'openai' | 'groq' | 'deepseek';

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o-mini',
  groq: 'llama-3.3-70b-versatile',
  deepseek: 'deepseek-chat',
};

const API_KEY_VARIABLES: Record<LLMProvider, string> = {
  openai: 'OPENAI_API_KEY',
  groq: 'GROQ_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
};

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  baseURL?: string;
  /** 仅 deepseek 使用 */
  useBeta: boolean;
}

export interface ToolsConfig {
  githubToken?: string;
  openWeatherApiKey?: string;
  newsApiKey?: string;
}

export interface ExecutorConfig {
  maxAttempts: number;
  retryDelayMs: number;
}

export interface AppConfig {
  port: number;
  llm: LLMConfig;
  tools: ToolsConfig;
  executor: ExecutorConfig;
}

/** 空字符串和 .env.example 里的 "your_xxx" 占位符都视为未配置 */
const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (!value || value.startsWith('your_') ? undefined : value));

/** 空值 (如 `PORT=`) 视为未设置，使用默认值 */
const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const setting = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankAsUnset, schema);

const EnvSchema = z.object({
  PORT: setting(z.coerce.number().int().min(1).max(65535).default(8000)),
  LLM_PROVIDER: setting(z.string().trim().toLowerCase().pipe(z.enum(['openai', 'groq', 'deepseek'])).default('openai')),
  LLM_MODEL: optionalSecret,
  LLM_TEMPERATURE: setting(z.coerce.number().min(0).max(2).default(0)),
  OPENAI_API_KEY: optionalSecret,
  OPENAI_BASE_URL: optionalSecret,
  GROQ_API_KEY: optionalSecret,
  DEEPSEEK_API_KEY: optionalSecret,
  DEEPSEEK_USE_BETA: setting(z.string().trim().toLowerCase().pipe(z.enum(['true', 'false'])).default('false')),
  GITHUB_TOKEN: optionalSecret,
  OPENWEATHER_API_KEY: optionalSecret,
  NEWS_API_KEY: optionalSecret,
  EXECUTOR_MAX_ATTEMPTS: setting(z.coerce.number().int().min(1).max(10).default(3)),
  EXECUTOR_RETRY_DELAY_MS: setting(z.coerce.number().int().min(0).default(0)),
});

/**
 * 从环境变量读取配置。
 * 只有所选 LLM provider 的 API Key 是必需的，其余工具 Key 缺失时只会禁用对应工具。
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;
  const provider = vars.LLM_PROVIDER;

  const apiKeys: Record<LLMProvider, string | undefined> = {
    openai: vars.OPENAI_API_KEY,
    groq: vars.GROQ_API_KEY,
    deepseek: vars.DEEPSEEK_API_KEY,
  };
  const apiKey = apiKeys[provider];
  if (!apiKey) {
    const variable = API_KEY_VARIABLES[provider];
    throw new ConfigError(`${variable} is required when LLM_PROVIDER=${provider}`, [variable]);
  }

  return {
    port: vars.PORT,
    llm: {
      provider,
      apiKey,
      model: vars.LLM_MODEL ?? DEFAULT_MODELS[provider],
      temperature: vars.LLM_TEMPERATURE,
      ...(provider === 'openai' && vars.OPENAI_BASE_URL ? { baseURL: vars.OPENAI_BASE_URL } : {}),
      useBeta: vars.DEEPSEEK_USE_BETA === 'true',
    },
    tools: {
      githubToken: vars.GITHUB_TOKEN,
      openWeatherApiKey: vars.OPENWEATHER_API_KEY,
      newsApiKey: vars.NEWS_API_KEY,
    },
    executor: {
      maxAttempts: vars.EXECUTOR_MAX_ATTEMPTS,
      retryDelayMs: vars.EXECUTOR_RETRY_DELAY_MS,
    },
  };
}

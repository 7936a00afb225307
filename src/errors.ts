/**
 * 错误类型
 *
 * 每一类错误对应流水线中一种不同的处理方式：
 * - ConfigError: 启动时配置缺失，进程直接退出
 * - RequestValidationError / PlanValidationError: 直接返回给调用方 (400)，不重试
 * - ToolInvocationError: 由 Executor 重试，重试耗尽后记为该步骤失败
 * - LLMResponseError: LLM 输出为空、无法解析或不符合 schema
 * - VerificationDegradation: Verifier 回退到原始结果格式化，只记录日志
 */

export class ConfigError extends Error {
  constructor(message: string, public readonly missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export class PlanValidationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'PlanValidationError';
  }
}

export type ToolErrorKind = 'auth' | 'rate_limit' | 'not_found' | 'timeout' | 'network' | 'upstream';

export class ToolInvocationError extends Error {
  constructor(
    public readonly tool: string,
    public readonly kind: ToolErrorKind,
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'ToolInvocationError';
  }
}

export class LLMResponseError extends Error {
  constructor(message: string, public readonly content?: string) {
    super(message);
    this.name = 'LLMResponseError';
  }
}

export class VerificationDegradation extends Error {
  constructor(cause: unknown) {
    super(`Verification fell back to raw results: ${errorMessage(cause)}`, { cause });
    this.name = 'VerificationDegradation';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : JSON.stringify(error);
}

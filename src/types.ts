import type { z } from 'zod';

/**
 * 工具返回的结构化数据。
 * 每个工具都把第三方 API 的原始响应转换成自己的统一结构。
 */
export type ToolPayload = Record<string, unknown>;

export type ToolOutput = {
  data: ToolPayload;
  /** 纯文本摘要，Verifier 在 LLM 不可用时直接拼接它 */
  summary: string;
};

export type ParameterInfo = {
  name: string;
  required: boolean;
  description?: string;
};

export type ValidationResult =
  | { ok: true; params: Record<string, unknown> }
  | { ok: false; issues: string[] };

/**
 * 工具下的一个具体操作，例如 github.search_repositories。
 */
export type ToolFunction = {
  name: string;
  description: string;
  /** 参数说明，Planner 会把它写进提示词 */
  parameters: ParameterInfo[];
  /** 去掉多余参数、做类型转换；不合法时返回问题列表 */
  validate(raw: Record<string, unknown>): ValidationResult;
  invoke(params: Record<string, unknown>): Promise<ToolOutput>;
};

/**
 * 定义 Agent 可使用的工具结构
 *
 * 一个工具对应一个外部 API。Planner 只能引用注册表里存在的工具，
 * Executor 按步骤调用它们，Verifier 汇总结果。
 */
export type Tool = {
  /** 工具名称，LLM 会根据这个名字来引用工具 */
  name: string;
  /**
   * 工具描述。
   * LLM 决定是否使用该工具的主要依据，应该说明工具的功能和适用场景。
   */
  description: string;
  functions: ToolFunction[];
  /**
   * LLM 没给出操作名 (或给错了) 时，根据参数和步骤描述推断应该调用哪个操作。
   */
  inferFunction?: (parameters: Record<string, unknown>, description: string) => string | undefined;
};

type FunctionDefinition<S extends z.AnyZodObject, T extends ToolPayload> = {
  name: string;
  description: string;
  parameters: S;
  handler: (args: z.infer<S>) => Promise<T>;
  summarize: (data: T) => string;
};

/**
 * 把带类型的 handler 包装成注册表使用的 ToolFunction。
 * 参数 schema 同时负责校验、默认值和类型转换 (例如 "5" -> 5)。
 */
export function defineFunction<S extends z.AnyZodObject, T extends ToolPayload>(
  definition: FunctionDefinition<S, T>,
): ToolFunction {
  const { name, description, parameters: schema, handler, summarize } = definition;

  const parameters = Object.entries<z.ZodTypeAny>(schema.shape).map(([key, field]) => ({
    name: key,
    required: !field.isOptional(),
    ...(field.description ? { description: field.description } : {}),
  }));

  return {
    name,
    description,
    parameters,
    validate(raw) {
      const result = schema.safeParse(raw);
      if (result.success) {
        return { ok: true, params: result.data };
      }
      return {
        ok: false,
        issues: result.error.issues.map((issue) => {
          const path = issue.path.join('.');
          return path ? `${path}: ${issue.message}` : issue.message;
        }),
      };
    },
    async invoke(params) {
      const data = await handler(schema.parse(params));
      return { data, summary: summarize(data) };
    },
  };
}

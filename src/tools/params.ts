import { z } from 'zod';

/**
 * 可选参数：LLM 经常把没设置的参数写成 null，这里按未提供处理，
 * 让 optional / default 生效。
 */
export function omitNull<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => value ?? undefined, schema);
}

/**
 * 数量参数：接受数字或数字字符串，取整后限制在 [1, max]。
 */
export function limitParam(defaultValue: number, max = 100) {
  return omitNull(
    z.coerce
      .number()
      .finite()
      .transform((value) => Math.min(Math.max(Math.trunc(value), 1), max))
      .default(defaultValue)
  );
}

/** 两位字母代码 (语言或国家)，统一小写 */
export function twoLetterCode(fallback: string) {
  return omitNull(z.string().trim().toLowerCase().length(2).default(fallback));
}

/** 把 null / undefined 统一成 null，方便序列化 */
export function nullable<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? null);
}

export function hasParams(parameters: Record<string, unknown>, ...names: string[]): boolean {
  return names.every((name) => parameters[name] !== undefined && parameters[name] !== null);
}

import { z } from 'zod';
import type { ToolErrorKind } from '../errors';
import type { ToolPayload } from '../types';

export const MAX_PLAN_STEPS = 10;

export interface PlanStep {
  readonly id: number;                 // 从 1 开始，按计划顺序编号
  readonly tool: string;               // 注册表中的工具名
  readonly function: string;           // 工具下的操作名
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly description: string;        // 这一步要做什么 (给人看的)
}

export interface Plan {
  readonly task: string;               // 总体目标
  readonly reasoning?: string;
  readonly steps: readonly PlanStep[];
}

export interface StepResult {
  stepId: number;
  tool: string;
  function: string;
  description: string;
  success: boolean;
  data?: ToolPayload;
  summary?: string;
  error?: string;
  errorKind?: ToolErrorKind | 'unknown';
  attempts: number;
}

export interface ExecutionReport {
  stepResults: StepResult[];
  totalSteps: number;
  successfulSteps: number;
  failedSteps: number;
  toolsUsed: string[];
  executionTimeMs: number;
}

/**
 * LLM 直接输出的计划结构，校验工具名之前的原始形态。
 */
export const RawPlanSchema = z.object({
  task: z.string().optional(),
  reasoning: z.string().optional(),
  steps: z.array(
    z.object({
      step_id: z.union([z.number(), z.string()]).optional(),
      tool: z.string().min(1),
      function: z.string().optional(),
      action: z.string().optional(),
      description: z.string().optional(),
      parameters: z.record(z.unknown()).nullish().transform((value) => value ?? {}),
    })
  ),
});

export type RawPlan = z.infer<typeof RawPlanSchema>;

/** 计划生成后不可修改 */
export function freezePlan(plan: Plan): Plan {
  for (const step of plan.steps) {
    Object.freeze(step.parameters);
    Object.freeze(step);
  }
  Object.freeze(plan.steps);
  return Object.freeze(plan);
}

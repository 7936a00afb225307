import { LLMResponseError, PlanValidationError } from './errors';
import type { LLMClient } from './llm/client';
import { buildPlannerPrompt } from './prompts';
import type { ToolRegistry } from './tools';
import type { Tool, ToolFunction } from './types';
import { MAX_PLAN_STEPS, RawPlanSchema, freezePlan, type Plan, type PlanStep, type RawPlan } from './utils/plan';

/**
 * Planner：把自然语言请求转换成结构化的执行计划。
 *
 * LLM 输出的计划必须通过校验才会交给 Executor：
 * 工具必须已注册，操作名必须存在 (或能被推断出来)，参数必须符合 schema。
 * 校验失败直接抛出 PlanValidationError，不重试。
 */
export class Planner {
  constructor(
    private llm: LLMClient,
    private registry: ToolRegistry
  ) {}

  async createPlan(query: string): Promise<Plan> {
    console.log(`[Planner] Creating plan for: ${query.slice(0, 100)}`);
    const prompt = buildPlannerPrompt(query, this.registry.describe());

    let raw: RawPlan;
    try {
      raw = await this.llm.completeJson(prompt, RawPlanSchema);
    } catch (error) {
      if (error instanceof LLMResponseError) {
        throw new PlanValidationError('LLM returned a malformed plan', [error.message]);
      }
      throw error;
    }

    const plan = this.validate(raw, query);
    console.log(
      `[Planner] Plan created with ${plan.steps.length} step(s): ${plan.steps.map((s) => `${s.tool}.${s.function}`).join(', ')}`
    );
    return plan;
  }

  /**
   * 校验 LLM 给出的原始计划，收集所有步骤的问题后一次性报告。
   */
  validate(raw: RawPlan, query: string): Plan {
    if (raw.steps.length === 0) {
      throw new PlanValidationError('Plan contains no executable steps');
    }
    if (raw.steps.length > MAX_PLAN_STEPS) {
      throw new PlanValidationError(`Plan has ${raw.steps.length} steps, the maximum is ${MAX_PLAN_STEPS}`);
    }

    const issues: string[] = [];
    const steps: PlanStep[] = [];

    raw.steps.forEach((rawStep, index) => {
      const id = index + 1;
      const tool = this.registry.get(rawStep.tool);
      if (!tool) {
        issues.push(`step ${id}: unknown tool "${rawStep.tool}" (available: ${this.registry.names().join(', ')})`);
        return;
      }

      const description = (rawStep.description ?? rawStep.action ?? '').trim();
      const fn = this.resolveFunction(tool, rawStep.function, rawStep.parameters, description);
      if (!fn) {
        issues.push(`step ${id}: unknown function "${rawStep.function ?? ''}" for tool "${tool.name}"`);
        return;
      }

      const validation = fn.validate(rawStep.parameters);
      if (!validation.ok) {
        issues.push(...validation.issues.map((issue) => `step ${id} (${tool.name}.${fn.name}): ${issue}`));
        return;
      }

      steps.push({
        id,
        tool: tool.name,
        function: fn.name,
        parameters: validation.params,
        description: description || `${tool.name}.${fn.name}`,
      });
    });

    if (issues.length > 0) {
      throw new PlanValidationError('Plan failed validation', issues);
    }

    return freezePlan({
      task: raw.task?.trim() || query,
      ...(raw.reasoning ? { reasoning: raw.reasoning } : {}),
      steps,
    });
  }

  private resolveFunction(
    tool: Tool,
    name: string | undefined,
    parameters: Record<string, unknown>,
    description: string
  ): ToolFunction | undefined {
    const requested = name?.trim();
    const exact = requested ? tool.functions.find((fn) => fn.name === requested) : undefined;
    if (exact) return exact;

    const inferred = tool.inferFunction?.(parameters, description);
    if (!inferred) return undefined;
    console.log(`[Planner] Inferred ${tool.name}.${inferred} (requested: "${requested ?? ''}")`);
    return tool.functions.find((fn) => fn.name === inferred);
  }
}

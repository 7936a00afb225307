import { setTimeout as sleep } from 'timers/promises';
import { ToolInvocationError, errorMessage } from './errors';
import type { ToolRegistry } from './tools';
import type { ExecutionReport, Plan, PlanStep, StepResult } from './utils/plan';

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface ExecutorOptions {
  /** 每个步骤的最大尝试次数 (含第一次) */
  maxAttempts?: number;
  /** 重试前的等待时间，默认立即重试 */
  retryDelayMs?: number;
}

/**
 * Executor：按顺序执行计划中的每一步。
 *
 * 单个步骤失败会立即重试，直到用完 maxAttempts；
 * 仍然失败的步骤记为失败结果，然后继续执行下一步 (允许部分失败)。
 * 输出与计划一一对应，顺序一致。
 */
export class Executor {
  private maxAttempts: number;
  private retryDelayMs: number;

  constructor(
    private registry: ToolRegistry,
    { maxAttempts = DEFAULT_MAX_ATTEMPTS, retryDelayMs = 0 }: ExecutorOptions = {}
  ) {
    this.maxAttempts = Math.max(1, maxAttempts);
    this.retryDelayMs = retryDelayMs;
  }

  async execute(plan: Plan): Promise<ExecutionReport> {
    const startedAt = Date.now();
    console.log(`[Executor] Executing plan: ${plan.task}`);

    const stepResults: StepResult[] = [];
    for (const step of plan.steps) {
      stepResults.push(await this.executeStep(step));
    }

    const successfulSteps = stepResults.filter((r) => r.success).length;
    const toolsUsed = Array.from(new Set(stepResults.filter((r) => r.success).map((r) => r.tool)));

    console.log(`[Executor] Plan execution completed: ${successfulSteps}/${stepResults.length} steps successful`);

    return {
      stepResults,
      totalSteps: stepResults.length,
      successfulSteps,
      failedSteps: stepResults.length - successfulSteps,
      toolsUsed,
      executionTimeMs: Date.now() - startedAt,
    };
  }

  async executeStep(step: PlanStep): Promise<StepResult> {
    const base = {
      stepId: step.id,
      tool: step.tool,
      function: step.function,
      description: step.description,
    };

    const fn = this.registry.getFunction(step.tool, step.function);
    if (!fn) {
      const error = `Unknown function ${step.tool}.${step.function}`;
      console.error(`[Executor] Step ${step.id} failed: ${error}`);
      return { ...base, success: false, error, errorKind: 'unknown', attempts: 0 };
    }

    console.log(`[Executor] Step ${step.id}: ${step.description}`);
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const output = await fn.invoke(step.parameters);
        console.log(`[Executor] Step ${step.id} completed (attempt ${attempt})`);
        return { ...base, success: true, data: output.data, summary: output.summary, attempts: attempt };
      } catch (error) {
        lastError = error;
        if (attempt < this.maxAttempts) {
          console.warn(`[Executor] Step ${step.id} attempt ${attempt} failed: ${errorMessage(error)}. Retrying...`);
          if (this.retryDelayMs > 0) await sleep(this.retryDelayMs);
        }
      }
    }

    console.error(`[Executor] Step ${step.id} failed after ${this.maxAttempts} attempts: ${errorMessage(lastError)}`);
    return {
      ...base,
      success: false,
      error: errorMessage(lastError),
      errorKind: lastError instanceof ToolInvocationError ? lastError.kind : 'unknown',
      attempts: this.maxAttempts,
    };
  }
}

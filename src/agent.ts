import type { Executor } from './executor';
import type { Planner } from './planner';
import type { Plan, StepResult } from './utils/plan';
import type { Verifier } from './verifier';

export interface Pipeline {
  planner: Pick<Planner, 'createPlan'>;
  executor: Pick<Executor, 'execute'>;
  verifier: Pick<Verifier, 'verify'>;
}

export interface QueryResponse {
  success: boolean;
  query: string;
  plan: Plan;
  results: StepResult[];
  answer: string;
  isComplete: boolean;
  missingInfo: string[];
  suggestions: string[];
  degraded: boolean;
  metadata: {
    stepsExecuted: number;
    successfulSteps: number;
    failedSteps: number;
    toolsUsed: string[];
    executionTimeMs: number;
  };
}

/**
 * 核心 Agent 逻辑
 *
 * 流程概览 (严格串行，每个请求独立)：
 * 1. 【规划(Plan)】: Planner 把问题转成经过校验的步骤列表。
 * 2. 【执行(Execute)】: Executor 逐步调用工具，失败重试，允许部分失败。
 * 3. 【校验(Verify)】: Verifier 检查完整性并生成最终回答。
 *
 * PlanValidationError 会直接抛给调用方；工具失败和 Verifier 失败都不会抛出。
 */
export async function runAgent(pipeline: Pipeline, query: string): Promise<QueryResponse> {
  const startedAt = Date.now();
  console.log(`[Agent] Processing query: ${query.slice(0, 100)}`);

  console.log('[Agent] Step 1: Creating execution plan...');
  const plan = await pipeline.planner.createPlan(query);

  console.log('[Agent] Step 2: Executing plan...');
  const report = await pipeline.executor.execute(plan);

  console.log('[Agent] Step 3: Verifying and formatting results...');
  const verification = await pipeline.verifier.verify(query, plan, report);

  const executionTimeMs = Date.now() - startedAt;
  console.log(`[Agent] Query processed in ${executionTimeMs}ms`);

  return {
    success: verification.isComplete || report.successfulSteps > 0,
    query,
    plan,
    results: report.stepResults,
    answer: verification.answer,
    isComplete: verification.isComplete,
    missingInfo: verification.missingInfo,
    suggestions: verification.suggestions,
    degraded: verification.degraded,
    metadata: {
      stepsExecuted: report.totalSteps,
      successfulSteps: report.successfulSteps,
      failedSteps: report.failedSteps,
      toolsUsed: report.toolsUsed,
      executionTimeMs,
    },
  };
}

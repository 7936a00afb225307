import { z } from 'zod';
import { VerificationDegradation } from './errors';
import type { LLMClient } from './llm/client';
import { buildVerifierPrompt } from './prompts';
import type { ExecutionReport, Plan, PlanStep, StepResult } from './utils/plan';

export type FailedStep = {
  stepId: number;
  description: string;
  error: string;
};

export interface Verification {
  isComplete: boolean;
  answer: string;
  missingInfo: string[];
  suggestions: string[];
  failedSteps: FailedStep[];
  /** LLM 没参与或失败，answer 由本地模板拼出 */
  degraded: boolean;
}

const VerificationSchema = z.object({
  is_complete: z.boolean(),
  formatted_answer: z.string().trim().min(1),
  missing_info: z.array(z.string()).default([]),
  suggestions: z.array(z.string()).default([]),
});

export const NO_RESULTS_ANSWER = 'No results were obtained. The execution plan was empty or all steps failed.';

const ALL_FAILED_SUGGESTIONS = [
  'Verify API keys are configured',
  'Check internet connection',
  'Try a simpler query',
];

function toFailedStep(result: StepResult): FailedStep {
  return { stepId: result.stepId, description: result.description, error: result.error ?? 'Unknown error' };
}

/** 计划中没有成功结果的步骤 (失败或根本没有结果) */
function findUncoveredSteps(plan: Plan, results: StepResult[]): PlanStep[] {
  const succeeded = new Set(results.filter((r) => r.success).map((r) => r.stepId));
  return plan.steps.filter((step) => !succeeded.has(step.id));
}

export function formatFailureNote(failedSteps: FailedStep[]): string {
  if (failedSteps.length === 0) return '';
  const lines = failedSteps.map((step) => `- ${step.description}: ${step.error}`);
  return ['', '', '**Note:** Some information could not be retrieved:', ...lines].join('\n');
}

/**
 * Verifier：检查执行结果是否覆盖了计划的每一步，并生成最终回答。
 *
 * 任何情况下都返回 Verification，不抛异常：
 * - 没有结果 / 全部失败：直接用模板说明原因，不调用 LLM
 * - LLM 调用失败或输出不合法：降级为按工具拼接的原始结果
 */
export class Verifier {
  constructor(private llm: LLMClient) {}

  async verify(query: string, plan: Plan, report: ExecutionReport): Promise<Verification> {
    console.log('[Verifier] Verifying and formatting execution results');
    const results = report.stepResults;

    if (results.length === 0) {
      return {
        isComplete: false,
        answer: NO_RESULTS_ANSWER,
        missingInfo: ['All requested information'],
        suggestions: ['Please try rephrasing your query'],
        failedSteps: [],
        degraded: true,
      };
    }

    const failedSteps = results.filter((r) => !r.success).map(toFailedStep);
    if (failedSteps.length === results.length) {
      console.warn('[Verifier] All steps failed, skipping LLM verification');
      return this.formatAllFailed(query, failedSteps);
    }

    const uncovered = findUncoveredSteps(plan, results);

    try {
      const verdict = await this.llm.completeJson(buildVerifierPrompt(query, plan, results), VerificationSchema);
      return {
        isComplete: verdict.is_complete && uncovered.length === 0,
        answer: verdict.formatted_answer + formatFailureNote(failedSteps),
        missingInfo: Array.from(new Set([...verdict.missing_info, ...uncovered.map((s) => s.description)])),
        suggestions: verdict.suggestions,
        failedSteps,
        degraded: false,
      };
    } catch (error) {
      const degradation = new VerificationDegradation(error);
      console.warn(`[Verifier] ${degradation.message}`);
      return this.basicFormat(query, results, failedSteps, uncovered);
    }
  }

  private formatAllFailed(query: string, failedSteps: FailedStep[]): Verification {
    const answer = [
      `I was unable to complete your request: "${query}"`,
      '',
      'All execution steps failed with the following errors:',
      ...failedSteps.map((step) => `- Step ${step.stepId}: ${step.error}`),
      '',
      '**Suggestions:**',
      '- Check that all required API keys are configured in your .env file',
      '- Verify your internet connection',
      '- Try simplifying your query',
      '- Check if the requested resources exist (e.g., valid city names, repository names)',
    ].join('\n');

    return {
      isComplete: false,
      answer,
      missingInfo: ['All requested information due to execution failures'],
      suggestions: [...ALL_FAILED_SUGGESTIONS],
      failedSteps,
      degraded: true,
    };
  }

  /** LLM 不可用时，直接拼接每个成功步骤的摘要 */
  private basicFormat(
    query: string,
    results: StepResult[],
    failedSteps: FailedStep[],
    uncovered: PlanStep[]
  ): Verification {
    const parts = [`**Results for:** ${query}`];
    for (const result of results) {
      if (!result.success) continue;
      parts.push('', `**${result.tool.toUpperCase()} Results:**`, result.summary ?? JSON.stringify(result.data ?? {}));
    }

    return {
      isComplete: uncovered.length === 0,
      answer: parts.join('\n') + formatFailureNote(failedSteps),
      missingInfo: uncovered.map((step) => step.description),
      suggestions: [],
      failedSteps,
      degraded: true,
    };
  }
}

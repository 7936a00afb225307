import type { ToolDescription } from './tools';
import type { Plan, StepResult } from './utils/plan';
import { MAX_PLAN_STEPS } from './utils/plan';

/** 单个步骤结果写进提示词时的最大长度，避免超出上下文 */
const MAX_RESULT_CHARS = 4000;

function describeTools(tools: ToolDescription[]): string {
  return tools
    .map((tool) => {
      const functions = tool.functions.map((fn) => {
        const params = fn.parameters
          .map((p) => `${p.name}${p.required ? '' : '?'}${p.description ? ` (${p.description})` : ''}`)
          .join(', ');
        return `  - ${fn.name}(${params}): ${fn.description}`;
      });
      return [`- ${tool.name}: ${tool.description}`, ...functions].join('\n');
    })
    .join('\n');
}

export function buildPlannerPrompt(query: string, tools: ToolDescription[]): string {
  return `Convert the user request into an execution plan that uses only the tools below.

[Available Tools]
${describeTools(tools)}

[Output Format]
{
  "task": "short restatement of the request",
  "reasoning": "why these steps answer it",
  "steps": [
    {
      "step_id": 1,
      "tool": "<tool name>",
      "function": "<function name>",
      "description": "what this step retrieves",
      "parameters": { "<name>": "<value>" }
    }
  ]
}

[Rules]
- Use only the tools and functions listed above; parameters marked "?" are optional.
- Use at most ${MAX_PLAN_STEPS} steps, in the order they should run.
- Extract parameter values from the request; do not invent values the user did not imply.
- If no tool can help, return an empty "steps" array.

[Example]
Request: Get the latest technology news
Plan: {"task":"Latest technology news","steps":[{"step_id":1,"tool":"news","function":"get_top_headlines","description":"Top technology headlines","parameters":{"category":"technology"}}]}

[User Request]
${query}`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...(truncated)` : text;
}

export function buildVerifierPrompt(query: string, plan: Plan, results: StepResult[]): string {
  const steps = plan.steps
    .map((step) => `${step.id}. ${step.tool}.${step.function}: ${step.description}`)
    .join('\n');

  const outcomes = results
    .map((result) => {
      const body = result.success
        ? truncate(JSON.stringify(result.data ?? {}), MAX_RESULT_CHARS)
        : `FAILED after ${result.attempts} attempt(s): ${result.error ?? 'unknown error'}`;
      return `Step ${result.stepId} (${result.tool}.${result.function}):\n${body}`;
    })
    .join('\n\n');

  return `Check whether the results below fully answer the user request, then write the final answer.

[User Request]
${query}

[Plan]
${steps}

[Results]
${outcomes}

[Output Format]
{
  "is_complete": true,
  "formatted_answer": "Markdown answer for the user, built only from the results",
  "missing_info": ["information that was requested but not obtained"],
  "suggestions": ["optional follow-up suggestions"]
}`;
}

import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { z } from 'zod';
import { runAgent, type Pipeline } from './agent';
import { PlanValidationError, RequestValidationError } from './errors';
import type { ToolRegistry } from './tools';

export const VERSION = '1.0.0';

export interface AppDependencies extends Pipeline {
  registry: ToolRegistry;
}

const QueryRequest = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'query must not be empty')
    .max(2000, 'query must be at most 2000 characters'),
});

async function readQuery(c: Context): Promise<string> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError('Request body must be valid JSON');
  }

  const parsed = QueryRequest.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new RequestValidationError(issues.join('; '));
  }
  return parsed.data.query;
}

export function createApp(deps: AppDependencies) {
  const app = new Hono();

  app.use('*', logger());
  app.use('*', cors());

  // ---------------------------------------------------------
  // 1. 系统信息
  // ---------------------------------------------------------

  app.get('/', (c) =>
    c.json({ message: 'Operations Assistant API', health: '/health', tools: '/tools' })
  );

  app.get('/health', (c) =>
    c.json({ status: 'healthy', message: 'Operations Assistant is running', version: VERSION })
  );

  // 已启用的工具，以及因缺少 Key 被禁用的工具
  app.get('/tools', (c) =>
    c.json({ availableTools: deps.registry.describe(), disabledTools: deps.registry.disabled })
  );

  // ---------------------------------------------------------
  // 2. 查询 API：规划 -> 执行 -> 校验
  // ---------------------------------------------------------
  app.post('/query', async (c) => {
    const query = await readQuery(c);
    return c.json(await runAgent(deps, query));
  });

  // 只生成计划不执行，方便调试 LLM 如何理解请求
  app.post('/plan', async (c) => {
    const query = await readQuery(c);
    const plan = await deps.planner.createPlan(query);
    return c.json({ success: true, query, plan });
  });

  app.notFound((c) =>
    c.json({ error: 'Not found', message: `No route for ${c.req.method} ${c.req.path}` }, 404)
  );

  app.onError((err, c) => {
    if (err instanceof RequestValidationError) {
      return c.json({ error: 'Invalid request', message: err.message }, 400);
    }
    if (err instanceof PlanValidationError) {
      console.warn(`[Server] ${err.message}`);
      return c.json(
        {
          error: 'Failed to create execution plan',
          message: err.message,
          issues: err.issues,
          suggestion: 'Try rephrasing your query to be more specific',
        },
        400
      );
    }
    console.error('[Server] Error processing request:', err);
    return c.json(
      { error: 'Internal server error', message: err.message, suggestion: 'Check your API keys and try again' },
      500
    );
  });

  return app;
}

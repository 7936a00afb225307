import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './config';
import { ConfigError } from './errors';
import { Executor } from './executor';
import { LLMClient } from './llm/client';
import { createLLMAdapter } from './llm/provider';
import { Planner } from './planner';
import { createToolRegistry } from './tools';
import { Verifier } from './verifier';

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`[System] ${error.message}`);
    process.exit(1);
  }
  throw error;
}

const llm = new LLMClient(createLLMAdapter(config.llm));
const registry = createToolRegistry(config.tools);

const app = createApp({
  planner: new Planner(llm, registry),
  executor: new Executor(registry, config.executor),
  verifier: new Verifier(llm),
  registry,
});

console.log(`[System] Operations Assistant initialized (LLM: ${llm.provider}/${llm.model})`);

serve({ fetch: app.fetch, port: config.port });
console.log(`Assistant ready → POST http://localhost:${config.port}/query`);

import type { ToolsConfig } from '../config';
import type { ParameterInfo, Tool, ToolFunction } from '../types';
import { createGitHubTool } from './github';
import { createNewsTool } from './news';
import { createWeatherTool } from './weather';

export type DisabledTool = { name: string; reason: string };

export type ToolDescription = {
  name: string;
  description: string;
  functions: { name: string; description: string; parameters: ParameterInfo[] }[];
};

/**
 * 已启用工具的注册表。
 * Planner 只能引用这里的工具；缺少 API Key 的工具不会出现在这里，而是记录在 disabled 中。
 */
export class ToolRegistry {
  private tools = new Map<string, Tool>();

  constructor(tools: Tool[], readonly disabled: DisabledTool[] = []) {
    for (const tool of tools) {
      this.tools.set(tool.name.toLowerCase(), tool);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name.trim().toLowerCase());
  }

  getFunction(toolName: string, functionName: string): ToolFunction | undefined {
    return this.get(toolName)?.functions.find((fn) => fn.name === functionName);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  describe(): ToolDescription[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      functions: tool.functions.map(({ name, description, parameters }) => ({ name, description, parameters })),
    }));
  }
}

export function createToolRegistry(config: ToolsConfig): ToolRegistry {
  const tools: Tool[] = [createGitHubTool({ token: config.githubToken })];
  const disabled: DisabledTool[] = [];

  if (config.openWeatherApiKey) {
    tools.push(createWeatherTool({ apiKey: config.openWeatherApiKey }));
  } else {
    disabled.push({ name: 'weather', reason: 'OPENWEATHER_API_KEY is not set' });
  }

  if (config.newsApiKey) {
    tools.push(createNewsTool({ apiKey: config.newsApiKey }));
  } else {
    disabled.push({ name: 'news', reason: 'NEWS_API_KEY is not set' });
  }

  console.log(`[Tools] Enabled: ${tools.map((t) => t.name).join(', ')}`);
  for (const { name, reason } of disabled) {
    console.warn(`[Tools] Disabled ${name}: ${reason}`);
  }
  if (!config.githubToken) {
    console.warn('[Tools] GITHUB_TOKEN is not set, GitHub requests are limited to 60 per hour');
  }

  return new ToolRegistry(tools, disabled);
}

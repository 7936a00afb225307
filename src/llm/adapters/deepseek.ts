import { OpenAIAdapter } from './openai';

export interface DeepSeekAdapterOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  /** 是否使用 Beta 版 API (https://api.deepseek.com/beta)，用于支持 strict 模式等新特性 */
  useBeta?: boolean;
}

/**
 * DeepSeek 兼容 OpenAI 协议，只需要替换 baseURL。
 */
export class DeepSeekAdapter extends OpenAIAdapter {
  readonly provider: string = 'deepseek';

  constructor({ apiKey, model = 'deepseek-chat', temperature, useBeta = false }: DeepSeekAdapterOptions) {
    super({
      baseURL: useBeta ? 'https://api.deepseek.com/beta' : 'https://api.deepseek.com',
      apiKey,
      model,
      temperature,
    });
  }
}

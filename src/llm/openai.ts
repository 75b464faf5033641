import OpenAI from 'openai';
import type { AppConfig } from '../config.js';
import { LLMUnavailableError } from '../errors.js';
import type { CompleteOptions, LLM } from './interfaces.js';

const DEFAULT_SYSTEM = 'You are a SOC analyst. Write concise, actionable answers.';

export class OpenAILLM implements LLM {
  name = 'openai';
  private client?: OpenAI;
  private model: string;

  constructor(cfg: AppConfig, modelOverride?: string) {
    if (cfg.OPENAI_API_KEY) {
      this.client = new OpenAI({
        apiKey: cfg.OPENAI_API_KEY,
        baseURL: cfg.OPENAI_BASE_URL,
        timeout: cfg.PLANNER_TIMEOUT_MS,
        maxRetries: 1,
      });
    }
    this.model = modelOverride || cfg.OPENAI_MODEL;
  }

  get available(): boolean {
    return this.client !== undefined;
  }

  async complete(prompt: string, opts: CompleteOptions = {}): Promise<string> {
    if (!this.client) throw new LLMUnavailableError('OPENAI_API_KEY is not configured');
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: opts.system ?? DEFAULT_SYSTEM },
      { role: 'user', content: prompt },
    ];
    if (opts.json) {
      try {
        const res = await this.client.chat.completions.create({
          model: this.model,
          messages,
          temperature: 0.2,
          response_format: { type: 'json_object' },
        });
        return res.choices[0]?.message?.content ?? '';
      } catch (err) {
        // some compatible endpoints reject JSON mode; retry without it below
        if (err instanceof OpenAI.APIError && err.status !== undefined && err.status >= 500) throw err;
      }
    }
    const res = await this.client.chat.completions.create({ model: this.model, messages, temperature: 0.2 });
    return res.choices[0]?.message?.content ?? '';
  }
}

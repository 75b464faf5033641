import { loadConfig, type AppConfig } from '../config.js';
import { LLMUnavailableError } from '../errors.js';
import type { CompleteOptions, LLM } from '../llm/interfaces.js';
import { silentLogger } from '../observability/logger.js';
import { createRuntime, type Runtime, type RuntimeOverrides } from '../runtime.js';
import type { FetchLike, SearchBackend, SearchRequest, SearchResponse } from '../search/backend.js';

export const GOAL = 'Investigate ssh brute force in last 24h';

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ LOG_LEVEL: 'silent', ...env });
}

/** Replies in order; an Error entry is thrown instead of returned. */
export class ScriptedLLM implements LLM {
  name = 'scripted';
  readonly available = true;
  prompts: string[] = [];
  options: CompleteOptions[] = [];

  constructor(private replies: Array<string | Error>) {}

  async complete(prompt: string, opts: CompleteOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(opts);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next instanceof Error) throw next;
    return next;
  }
}

export const offlineLLM: LLM = {
  name: 'offline',
  available: false,
  complete: async () => {
    throw new LLMUnavailableError();
  },
};

export class StubSearchBackend implements SearchBackend {
  calls: Array<{ index: string; body: SearchRequest }> = [];

  constructor(private respond: (index: string, body: SearchRequest) => SearchResponse | Promise<SearchResponse>) {}

  async search(index: string, body: SearchRequest): Promise<SearchResponse> {
    this.calls.push({ index, body });
    return this.respond(index, body);
  }
}

export function unreachableBackend(): StubSearchBackend {
  return new StubSearchBackend(() => {
    throw new Error('connect ECONNREFUSED 127.0.0.1:9200');
  });
}

export const offlineFetch: FetchLike = async () => {
  throw new Error('network disabled in tests');
};

export function useTool(tool: string, args: Record<string, unknown>, rationale?: string): string {
  return JSON.stringify({ type: 'use_tool', tool, args, rationale });
}

export function finalAnswer(output: string): string {
  return JSON.stringify({ type: 'final_answer', output });
}

export function testRuntime(overrides: RuntimeOverrides = {}, env: Record<string, string> = {}): Runtime {
  return createRuntime(testConfig(env), {
    llm: offlineLLM,
    searchBackend: unreachableBackend(),
    fetchImpl: offlineFetch,
    logger: silentLogger,
    ...overrides,
  });
}

import type { AppConfig } from './config.js';
import { ToolExecutor } from './agent/executor.js';
import { InMemorySessionMemory, type SessionMemory } from './agent/memory.js';
import { Orchestrator } from './agent/orchestrator.js';
import { Planner } from './agent/planner.js';
import { Analyzer } from './analysis/analyze.js';
import type { LLM } from './llm/interfaces.js';
import { OpenAILLM } from './llm/openai.js';
import { createLogger, type Logger } from './observability/logger.js';
import { MetricsCollector } from './observability/metrics.js';
import { HttpSearchBackend, type FetchLike, type SearchBackend } from './search/backend.js';
import { createDefaultRegistry } from './tools/index.js';
import type { ToolRegistry } from './tools/registry.js';

export interface RuntimeOverrides {
  llm?: LLM;
  searchBackend?: SearchBackend;
  fetchImpl?: FetchLike;
  memory?: SessionMemory;
  registry?: ToolRegistry;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface Runtime {
  cfg: AppConfig;
  orchestrator: Orchestrator;
  analyzer: Analyzer;
  registry: ToolRegistry;
  memory: SessionMemory;
  metrics: MetricsCollector;
  logger: Logger;
  shutdown(): Promise<void>;
}

/** Wire the agent core from explicit configuration; any collaborator can be swapped. */
export function createRuntime(cfg: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? createLogger(cfg.LOG_LEVEL);
  const metrics = overrides.metrics ?? new MetricsCollector();
  const llm = overrides.llm ?? new OpenAILLM(cfg);
  const searchBackend =
    overrides.searchBackend ?? new HttpSearchBackend({ url: cfg.SEARCH_URL, timeoutMs: cfg.SEARCH_TIMEOUT_MS, fetchImpl: overrides.fetchImpl });
  const registry = overrides.registry ?? createDefaultRegistry(cfg, { searchBackend, fetchImpl: overrides.fetchImpl, logger });
  const memory =
    overrides.memory ??
    new InMemorySessionMemory({ threshold: cfg.HISTORY_COMPACT_THRESHOLD, keepRecent: cfg.HISTORY_KEEP_RECENT });

  const planner = new Planner(llm, registry, {
    contextMessages: cfg.PLANNER_CONTEXT_MESSAGES,
    timeoutMs: cfg.PLANNER_TIMEOUT_MS,
    logger: logger.child('planner'),
  });
  const executor = new ToolExecutor({ registry, memory, metrics, logger: logger.child('executor') });
  const orchestrator = new Orchestrator({ cfg, memory, registry, planner, executor, metrics, logger: logger.child('orchestrator') });
  const analyzer = new Analyzer({ cfg, llm, backend: searchBackend, logger: logger.child('analyze') });

  return {
    cfg,
    orchestrator,
    analyzer,
    registry,
    memory,
    metrics,
    logger,
    shutdown: () => orchestrator.dispose(),
  };
}

export { loadConfig, type AppConfig } from './config.js';
export { AgentError, ToolExecutionError } from './errors.js';
export { Orchestrator } from './agent/orchestrator.js';
export { InMemorySessionMemory } from './agent/memory.js';
export type { SessionMemory } from './agent/memory.js';
export type * from './agent/types.js';

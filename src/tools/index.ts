import type { AppConfig } from '../config.js';
import type { Logger } from '../observability/logger.js';
import type { FetchLike, SearchBackend } from '../search/backend.js';
import { ToolRegistry } from './registry.js';
import { createEsSearchTool } from './impl/es_search.js';
import { createHttpGetTool } from './impl/http_get.js';
import { createSleepTool } from './impl/sleep.js';

export { ToolRegistry, describeSchema } from './registry.js';
export type { ToolSpec, ToolDescriptor, ArgumentSpec } from './types.js';

export interface DefaultToolDeps {
  searchBackend: SearchBackend;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/** The read-only investigation catalog: es_search, http_get, sleep. */
export function createDefaultRegistry(cfg: AppConfig, deps: DefaultToolDeps): ToolRegistry {
  return new ToolRegistry(cfg.TOOL_TIMEOUT_MS).registerTools([
    createEsSearchTool({
      backend: deps.searchBackend,
      defaultIndex: cfg.SEARCH_INDEX,
      maxResults: cfg.SEARCH_MAX_RESULTS,
      allowPartial: cfg.SEARCH_ALLOW_PARTIAL,
      logger: deps.logger?.child('es_search'),
    }),
    createHttpGetTool({ timeoutMs: cfg.FETCH_TIMEOUT_MS, maxBytes: cfg.FETCH_MAX_BYTES, fetchImpl: deps.fetchImpl }),
    createSleepTool(cfg.SLEEP_MAX_SECONDS),
  ]);
}

import { z } from 'zod';
import type { Logger } from '../../observability/logger.js';
import { silentLogger } from '../../observability/logger.js';
import type { SearchBackend } from '../../search/backend.js';
import { ToolExecutionError, errorMessage } from '../../errors.js';
import type { ToolSpec } from '../types.js';

export interface EsSearchOptions {
  backend: SearchBackend;
  defaultIndex: string;
  maxResults: number;
  /** On backend failure, answer with an empty result instead of failing. */
  allowPartial: boolean;
  logger?: Logger;
}

export function createEsSearchTool(opts: EsSearchOptions) {
  const log = opts.logger ?? silentLogger;
  const schema = z.object({
    index: z.string().min(1).optional().describe(`index or pattern, defaults to ${opts.defaultIndex}`),
    query: z.record(z.unknown()).describe('query clause in the backend DSL, e.g. {"match":{"message":"sshd"}}'),
    size: z.number().int().min(1).max(opts.maxResults).optional().describe('maximum hits to return'),
  });

  const tool: ToolSpec<typeof schema> = {
    name: 'es_search',
    description: 'Search the alert/event index with a query in the search backend DSL; newest first.',
    schema,
    async run({ index, query, size }) {
      const target = index ?? opts.defaultIndex;
      const limit = size ?? opts.maxResults;
      try {
        const res = await opts.backend.search(target, { query, size: limit, sort: [{ '@timestamp': 'desc' }] });
        const hits = res.hits.slice(0, limit);
        return { index: target, total: res.total, hits };
      } catch (err) {
        if (!opts.allowPartial) throw new ToolExecutionError('es_search', `search backend error: ${errorMessage(err)}`, { cause: err });
        log.warn('search backend unavailable, returning empty result', { index: target, error: errorMessage(err) });
        return { index: target, total: 0, hits: [], degraded: true };
      }
    },
  };
  return tool;
}

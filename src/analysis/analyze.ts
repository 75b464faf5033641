import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import type { LLM } from '../llm/interfaces.js';
import type { Logger } from '../observability/logger.js';
import { silentLogger } from '../observability/logger.js';
import type { SearchBackend, SearchHit, SearchRequest } from '../search/backend.js';
import { extractJsonObject, isRecord } from '../utils/json.js';

export interface AnalyzeRequest {
  query: string;
  index?: string;
  /** Relative window such as `24h` or `7d`; becomes `now-<range>` on @timestamp. */
  timeRange?: string;
}

export interface EventSample {
  '@timestamp': unknown;
  host: string | null;
  message: string | null;
}

export interface AnalyzeResult {
  dsl: SearchRequest;
  total: number;
  insights: string;
  samples: EventSample[];
}

const SEARCH_FIELDS = ['message^2', 'event.original^2', 'source_event_json', 'raw_text', 'host.name', 'process.name'];

const TranslatedDsl = z.object({
  query: z.record(z.unknown()),
  sort: z.array(z.record(z.unknown())).optional(),
  size: z.number().int().positive().optional(),
});

const NO_MATCHES = 'No matching events found. Consider broadening the time range or keywords.';

/**
 * Natural-language question in, search + summary out. Every LLM call has a
 * deterministic fallback, so this works without a reasoning backend.
 */
export class Analyzer {
  private log: Logger;

  constructor(private deps: { cfg: Pick<AppConfig, 'SEARCH_INDEX' | 'SEARCH_ALLOW_PARTIAL' | 'SEARCH_MAX_RESULTS'>; llm: LLM; backend: SearchBackend; logger?: Logger }) {
    this.log = deps.logger ?? silentLogger;
  }

  async analyze(req: AnalyzeRequest): Promise<AnalyzeResult> {
    const index = req.index ?? this.deps.cfg.SEARCH_INDEX;
    const dsl = await this.translateToDsl(req.query, req.timeRange);

    let hits: SearchHit[] = [];
    let total = 0;
    try {
      const res = await this.deps.backend.search(index, dsl);
      hits = res.hits;
      total = res.total;
    } catch (err) {
      if (!this.deps.cfg.SEARCH_ALLOW_PARTIAL) throw new Error(`search backend error: ${errorMessage(err)}`, { cause: err });
      // offline/partial mode: empty result, same response shape
      this.log.warn('search backend unavailable, answering from zero hits', { index, error: errorMessage(err) });
    }

    const insights = await this.formatInsights(hits, req.query);
    const samples = hits.slice(0, 5).map(h => {
      const src: Record<string, unknown> = h._source ?? {};
      return { '@timestamp': src['@timestamp'], host: hostOf(src), message: messageOf(src) };
    });
    return { dsl, total, insights, samples };
  }

  async translateToDsl(query: string, timeRange?: string): Promise<SearchRequest> {
    const fallback: SearchRequest = { query: defaultQuery(query, timeRange), sort: [{ '@timestamp': 'desc' }], size: Math.min(50, this.deps.cfg.SEARCH_MAX_RESULTS) };
    if (!this.deps.llm.available) return fallback;
    const prompt = [
      'You translate a natural-language SOC question into an Elasticsearch 8 DSL JSON.',
      "Return ONLY valid JSON with a top-level 'query' field and optional 'sort' and 'size'.",
      "Use a time range filter on '@timestamp' if provided. Fields include 'message', 'event.original', 'source_event_json', 'host.name', 'process.name'.",
      `NL query: ${query}`,
      `Time range: ${timeRange || 'none'}`,
    ].join('\n');
    try {
      const parsed = TranslatedDsl.safeParse(extractJsonObject(await this.deps.llm.complete(prompt, { json: true })));
      if (!parsed.success) return fallback;
      return {
        query: parsed.data.query,
        sort: parsed.data.sort ?? fallback.sort,
        size: Math.min(parsed.data.size ?? fallback.size, this.deps.cfg.SEARCH_MAX_RESULTS),
      };
    } catch (err) {
      this.log.warn('query translation failed, using default query', { error: errorMessage(err) });
      return fallback;
    }
  }

  async formatInsights(hits: SearchHit[], question: string): Promise<string> {
    if (hits.length === 0) return NO_MATCHES;
    if (this.deps.llm.available) {
      const compact = hits.slice(0, 20).map(h => {
        const src: Record<string, unknown> = h._source ?? {};
        return { '@ts': src['@timestamp'], host: hostOf(src), proc: processOf(src), msg: messageOf(src) };
      });
      const prompt =
        'You are a SOC analyst. Summarize patterns and provide 2-3 concise, actionable next steps.\n' +
        `Question: ${question}\n` +
        `Sample events: ${JSON.stringify(compact)}\n`;
      try {
        const text = (await this.deps.llm.complete(prompt)).trim();
        if (text) return text;
      } catch (err) {
        this.log.warn('insight summary failed, using heuristic', { error: errorMessage(err) });
      }
    }
    return heuristicInsights(hits);
  }
}

export function defaultQuery(query: string, timeRange?: string): Record<string, unknown> {
  const must: Array<Record<string, unknown>> = [{ multi_match: { query, fields: SEARCH_FIELDS } }];
  if (timeRange) must.push({ range: { '@timestamp': { gte: `now-${timeRange}` } } });
  return { bool: { must } };
}

export function heuristicInsights(hits: SearchHit[]): string {
  if (hits.length === 0) return NO_MATCHES;
  const byHost = new Map<string, number>();
  for (const h of hits) {
    const host = hostOf(h._source ?? {});
    if (host) byHost.set(host, (byHost.get(host) ?? 0) + 1);
  }
  const top = [...byHost.entries()].sort((a, b) => b[1] - a[1]).slice(0, 3);
  const parts = [`Matches: ${hits.length}`];
  if (top.length) parts.push('Top hosts: ' + top.map(([h, c]) => `${h}(${c})`).join(', '));
  parts.push('Next: refine keywords, review top hosts, pivot by process.');
  return parts.join('; ');
}

function nameField(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (isRecord(value) && typeof value.name === 'string') return value.name;
  return null;
}

function hostOf(src: Record<string, unknown>): string | null {
  return nameField(src.host);
}

function processOf(src: Record<string, unknown>): string | null {
  return nameField(src.process);
}

function messageOf(src: Record<string, unknown>): string | null {
  if (typeof src.message === 'string') return src.message;
  if (isRecord(src.event) && typeof src.event.original === 'string') return src.event.original;
  if (typeof src.raw_text === 'string') return src.raw_text;
  return null;
}

import { z } from 'zod';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SearchHit {
  _id?: string;
  _index?: string;
  _score?: number | null;
  _source?: Record<string, unknown>;
}

export interface SearchRequest {
  query: Record<string, unknown>;
  size: number;
  sort?: Array<Record<string, unknown>>;
}

export interface SearchResponse {
  total: number;
  hits: SearchHit[];
}

export interface SearchBackend {
  search(index: string, body: SearchRequest): Promise<SearchResponse>;
}

const EsSearchResponse = z.object({
  hits: z.object({
    total: z.union([z.number(), z.object({ value: z.number() })]).optional(),
    hits: z.array(
      z.object({
        _id: z.string().optional(),
        _index: z.string().optional(),
        _score: z.number().nullable().optional(),
        _source: z.record(z.unknown()).optional(),
      }),
    ),
  }),
});

/** Elasticsearch `_search` over plain HTTP. */
export class HttpSearchBackend implements SearchBackend {
  private fetchImpl: FetchLike;

  constructor(private opts: { url: string; timeoutMs: number; fetchImpl?: FetchLike }) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async search(index: string, body: SearchRequest): Promise<SearchResponse> {
    const base = this.opts.url.replace(/\/+$/, '');
    const res = await this.fetchImpl(`${base}/${encodeURIComponent(index)}/_search`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.opts.timeoutMs),
    });
    if (!res.ok) {
      const detail = (await res.text()).slice(0, 200);
      throw new Error(`search backend HTTP ${res.status}${detail ? `: ${detail}` : ''}`);
    }
    const parsed = EsSearchResponse.safeParse(await res.json());
    if (!parsed.success) throw new Error('search backend returned an unexpected response shape');
    const { total, hits } = parsed.data.hits;
    return {
      total: typeof total === 'number' ? total : total?.value ?? hits.length,
      hits,
    };
  }
}

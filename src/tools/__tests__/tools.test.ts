import { describe, it, expect } from 'vitest';
import { ToolExecutionError } from '../../errors.js';
import type { SearchHit } from '../../search/backend.js';
import { createEsSearchTool } from '../impl/es_search.js';
import { createHttpGetTool } from '../impl/http_get.js';
import { createSleepTool } from '../impl/sleep.js';
import { StubSearchBackend, unreachableBackend } from '../../__tests__/helpers.js';

const hits: SearchHit[] = [
  { _id: 'a', _source: { host: { name: 'web-1' }, message: 'Failed password for root' } },
  { _id: 'b', _source: { host: { name: 'web-1' }, message: 'Failed password for admin' } },
  { _id: 'c', _source: { host: { name: 'db-1' }, message: 'Accepted publickey' } },
];

describe('es_search', () => {
  it('should search newest first and cap the hits', async () => {
    const backend = new StubSearchBackend(() => ({ total: 3, hits }));
    const tool = createEsSearchTool({ backend, defaultIndex: 'alerts-enriched', maxResults: 50, allowPartial: true });

    const result = await tool.run({ query: { match: { message: 'Failed password' } }, size: 2 });
    expect(result).toEqual({ index: 'alerts-enriched', total: 3, hits: hits.slice(0, 2) });
    expect(backend.calls).toEqual([
      {
        index: 'alerts-enriched',
        body: { query: { match: { message: 'Failed password' } }, size: 2, sort: [{ '@timestamp': 'desc' }] },
      },
    ]);
  });

  it('should search the requested index', async () => {
    const backend = new StubSearchBackend(() => ({ total: 0, hits: [] }));
    const tool = createEsSearchTool({ backend, defaultIndex: 'alerts-enriched', maxResults: 10, allowPartial: true });
    await tool.run({ index: 'auth-*', query: { match_all: {} } });
    expect(backend.calls[0]).toMatchObject({ index: 'auth-*', body: { size: 10 } });
  });

  it('should return an empty degraded result when the backend is unreachable', async () => {
    const tool = createEsSearchTool({ backend: unreachableBackend(), defaultIndex: 'alerts-enriched', maxResults: 50, allowPartial: true });
    const result = await tool.run({ query: { match_all: {} } });
    expect(result).toEqual({ index: 'alerts-enriched', total: 0, hits: [], degraded: true });
  });

  it('should fail when partial results are not allowed', async () => {
    const tool = createEsSearchTool({ backend: unreachableBackend(), defaultIndex: 'alerts-enriched', maxResults: 50, allowPartial: false });
    const call = tool.run({ query: { match_all: {} } });
    await expect(call).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(call).rejects.toThrow('search backend error: connect ECONNREFUSED 127.0.0.1:9200');
  });

  it('should bound the size argument', () => {
    const tool = createEsSearchTool({ backend: unreachableBackend(), defaultIndex: 'alerts-enriched', maxResults: 50, allowPartial: true });
    expect(tool.schema.safeParse({ query: {}, size: 51 }).success).toBe(false);
    expect(tool.schema.safeParse({ query: {}, size: 0 }).success).toBe(false);
    expect(tool.schema.safeParse({ size: 5 }).success).toBe(false);
  });
});

describe('http_get', () => {
  it('should return status, headers and a truncated body', async () => {
    const requests: Array<{ url: string; init?: RequestInit }> = [];
    const tool = createHttpGetTool({
      timeoutMs: 5_000,
      maxBytes: 10,
      fetchImpl: async (url, init) => {
        requests.push({ url, init });
        return new Response('x'.repeat(30), { status: 200, headers: { 'content-type': 'text/plain' } });
      },
    });

    const result = await tool.run({ url: 'https://intel.example.test/ip/10.0.0.5', headers: { accept: 'text/plain' } });
    expect(result).toEqual({
      url: 'https://intel.example.test/ip/10.0.0.5',
      status: 200,
      headers: { 'content-type': 'text/plain' },
      text: 'xxxxxxxxxx',
      truncated: true,
    });
    expect(requests).toHaveLength(1);
    expect(requests[0].init).toMatchObject({ method: 'GET', headers: { accept: 'text/plain' } });
    expect(requests[0].init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should count the limit in bytes and drop a character cut in half', async () => {
    const tool = createHttpGetTool({ timeoutMs: 5_000, maxBytes: 5, fetchImpl: async () => new Response('é'.repeat(10)) });
    const result = await tool.run({ url: 'https://intel.example.test/utf8' });
    expect(result).toMatchObject({ text: 'éé', truncated: true });
  });

  it('should stop reading a body once the limit is reached', async () => {
    let pulls = 0;
    const endless = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls += 1;
        controller.enqueue(new Uint8Array(1024).fill(97));
      },
    });
    const tool = createHttpGetTool({ timeoutMs: 5_000, maxBytes: 4_000, fetchImpl: async () => new Response(endless) });

    const result = await tool.run({ url: 'https://intel.example.test/stream' });
    expect(result).toMatchObject({ text: 'a'.repeat(4_000), truncated: true });
    expect(pulls).toBeLessThan(10);
  });

  it('should not flag a body that fits exactly', async () => {
    const tool = createHttpGetTool({ timeoutMs: 5_000, maxBytes: 4, fetchImpl: async () => new Response('abcd') });
    expect(await tool.run({ url: 'https://intel.example.test/exact' })).toMatchObject({ text: 'abcd', truncated: false });
  });

  it('should pass non-2xx responses through', async () => {
    const tool = createHttpGetTool({ timeoutMs: 5_000, maxBytes: 100, fetchImpl: async () => new Response('gone', { status: 404 }) });
    const result = await tool.run({ url: 'http://intel.example.test/missing' });
    expect(result).toMatchObject({ status: 404, text: 'gone', truncated: false });
  });

  it('should only accept http and https URLs', () => {
    const tool = createHttpGetTool({ timeoutMs: 5_000, maxBytes: 100 });
    expect(tool.schema.safeParse({ url: 'ftp://files.example.test/a' }).success).toBe(false);
    expect(tool.schema.safeParse({ url: 'not a url' }).success).toBe(false);
    expect(tool.schema.safeParse({ url: 'https://intel.example.test', timeout: 2 }).success).toBe(true);
  });
});

describe('sleep', () => {
  it('should wait and report the duration', async () => {
    const tool = createSleepTool(30);
    expect(await tool.run({ seconds: 0 })).toEqual({ slept: 0 });
    expect(tool.timeoutMs).toBe(31_000);
  });

  it('should bound the duration', () => {
    const tool = createSleepTool(30);
    expect(tool.schema.safeParse({ seconds: 31 }).success).toBe(false);
    expect(tool.schema.safeParse({ seconds: -1 }).success).toBe(false);
    expect(tool.schema.safeParse({ seconds: 1.5 }).success).toBe(true);
  });
});

import { z } from 'zod';
import type { FetchLike } from '../../search/backend.js';
import type { ToolSpec } from '../types.js';

export interface HttpGetOptions {
  timeoutMs: number;
  maxBytes: number;
  fetchImpl?: FetchLike;
}

export function createHttpGetTool(opts: HttpGetOptions) {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const schema = z.object({
    url: z.string().url().refine(u => /^https?:\/\//i.test(u), 'only http and https URLs are allowed'),
    headers: z.record(z.string()).optional(),
    timeout: z.number().positive().optional().describe('seconds; can only lower the configured timeout'),
  });

  const tool: ToolSpec<typeof schema> = {
    name: 'http_get',
    description: 'HTTP GET for enrichment (threat intel, reputation lookups). Returns status and a truncated body.',
    schema,
    retry: { retries: 1, baseDelayMs: 250 },
    async run({ url, headers, timeout }) {
      const timeoutMs = Math.min(opts.timeoutMs, timeout ? Math.round(timeout * 1000) : opts.timeoutMs);
      const res = await fetchImpl(url, { method: 'GET', headers, signal: AbortSignal.timeout(timeoutMs) });
      const { text, truncated } = await readCapped(res, opts.maxBytes);
      return {
        url,
        status: res.status,
        headers: Object.fromEntries(res.headers.entries()),
        text,
        truncated,
      };
    },
  };
  return tool;
}

/** Read at most `maxBytes` of the body; the rest is never pulled off the socket. */
async function readCapped(res: Response, maxBytes: number): Promise<{ text: string; truncated: boolean }> {
  if (!res.body) return { text: '', truncated: false };
  const reader = res.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  let truncated = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
      size += value.byteLength;
      if (size > maxBytes) {
        truncated = true;
        break;
      }
    }
  } finally {
    if (truncated) await reader.cancel();
    else reader.releaseLock();
  }
  // stream mode holds back a multi-byte character cut at the limit
  const text = new TextDecoder().decode(Buffer.concat(chunks).subarray(0, maxBytes), { stream: true });
  return { text, truncated };
}

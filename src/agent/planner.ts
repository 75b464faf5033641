import { z } from 'zod';
import type { LLM } from '../llm/interfaces.js';
import type { Logger } from '../observability/logger.js';
import { silentLogger } from '../observability/logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolDescriptor } from '../tools/types.js';
import { errorMessage, LLMUnavailableError, TimeoutError } from '../errors.js';
import { extractJsonObject } from '../utils/json.js';
import { preview, truncateMiddle } from '../utils/text.js';
import { withTimeout } from '../utils/timeout.js';
import { renderContent } from './messages.js';
import type { Message, PlanOutcome } from './types.js';

const PLANNER_SYSTEM =
  'You are a tool-use planner for security investigations. Respond with ONLY a single JSON object matching one of the schemas provided. No prose, no markdown.';

const PlannerReply = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('use_tool'),
    tool: z.string().min(1),
    args: z.record(z.unknown()).default({}),
    rationale: z.string().optional(),
  }),
  z.object({
    type: z.literal('final_answer'),
    output: z.string().trim().min(1),
    rationale: z.string().optional(),
  }),
]);

export interface PlannerOptions {
  /** Most recent history entries shown to the backend. */
  contextMessages: number;
  timeoutMs: number;
  logger?: Logger;
}

const FALLBACK_TAIL = 3;
const ENTRY_MAX_CHARS = 2000;

export class Planner {
  private log: Logger;

  constructor(private llm: LLM, private registry: ToolRegistry, private opts: PlannerOptions) {
    this.log = opts.logger ?? silentLogger;
  }

  async proposeNext(history: Message[], catalog: ToolDescriptor[] = this.registry.describe()): Promise<PlanOutcome> {
    if (!this.llm.available) {
      return this.fallback(history, 'reasoning backend not configured');
    }

    let raw: string;
    try {
      const prompt = this.buildReActPrompt(selectContext(history, this.opts.contextMessages), catalog);
      raw = await withTimeout(this.llm.complete(prompt, { system: PLANNER_SYSTEM, json: true }), this.opts.timeoutMs, 'planner');
    } catch (err) {
      const kind = err instanceof TimeoutError ? 'timeout' : err instanceof LLMUnavailableError ? 'unavailable' : 'error';
      return this.fallback(history, `llm_${kind}: ${errorMessage(err)}`);
    }

    const json = extractJsonObject(raw);
    const parsed = PlannerReply.safeParse(json);
    if (!parsed.success) {
      return this.fallback(history, `malformed planner reply: ${preview(raw, 120)}`);
    }
    const reply = parsed.data;
    if (reply.type === 'final_answer') {
      return { decision: { type: 'final_answer', output: reply.output, rationale: reply.rationale }, source: 'backend' };
    }

    const checked = this.registry.check(reply.tool, reply.args);
    if (!checked.ok) {
      return this.fallback(history, `${checked.kind} ${reply.tool}: ${checked.issues.join('; ')}`);
    }
    return {
      decision: { type: 'use_tool', tool: reply.tool, args: checked.args, rationale: reply.rationale },
      source: 'backend',
    };
  }

  private fallback(history: Message[], reason: string): PlanOutcome {
    this.log.warn('planner fallback', { reason });
    return { decision: { type: 'final_answer', output: fallbackAnswer(history), rationale: 'fallback' }, source: 'fallback', reason };
  }

  private buildReActPrompt(context: Message[], catalog: ToolDescriptor[]): string {
    const tools = catalog.map(t => `- ${t.name}: ${t.description} args: ${formatArguments(t)}`).join('\n');
    const dialogue = JSON.stringify(
      context.map(m => ({ role: m.role, content: truncateMiddle(renderContent(m, ENTRY_MAX_CHARS), ENTRY_MAX_CHARS) })),
    );

    return `You are an autonomous SOC assistant. Work step by step: use tools to fetch data, then decide the next action.

AVAILABLE TOOLS:
${tools}

DIALOGUE (JSON array, oldest first):
${dialogue}

INSTRUCTIONS:
1. Choose the single most useful tool call to make progress on the latest user goal
2. Do not repeat a call whose result is already in the dialogue
3. When the dialogue holds enough evidence, give the final answer with concrete next steps

Respond with EXACTLY ONE of these JSON formats:
{ "type": "use_tool", "tool": "tool_name", "args": {...}, "rationale": "why this tool helps" }
{ "type": "final_answer", "output": "complete answer", "rationale": "why this completes the task" }`;
  }
}

/**
 * Keep the newest `limit` entries. The most recent user goal is prepended
 * when it is older than that window, so the context can hold `limit + 1`.
 */
export function selectContext(history: Message[], limit: number): Message[] {
  if (history.length <= limit) return history;
  const recent = history.slice(-limit);
  const lastUser = [...history].reverse().find(m => m.role === 'user');
  if (lastUser && !recent.includes(lastUser)) return [lastUser, ...recent];
  return recent;
}

export function fallbackAnswer(history: Message[]): string {
  const tail = history.slice(-FALLBACK_TAIL);
  if (tail.length === 0) {
    return 'Reasoning backend unavailable and no investigation goal has been posted yet.';
  }
  const lines = tail.map(m => `${m.role}: ${renderContent(m, 300)}`);
  return `Reasoning backend unavailable. Recent context:\n${lines.join('\n')}`;
}

function formatArguments(t: ToolDescriptor): string {
  if (t.arguments.length === 0) return 'none';
  return t.arguments
    .map(a => {
      const range = a.enum ? `(${a.enum.join('|')})` : a.min !== undefined || a.max !== undefined ? `(${a.min ?? ''}..${a.max ?? ''})` : '';
      return `${a.name}${a.required ? '' : '?'}:${a.type}${range}`;
    })
    .join(', ');
}

import { preview } from '../utils/text.js';
import type { Message, PlanDecision, ToolOutcome } from './types.js';

export function renderOutcome(outcome: ToolOutcome, max = 300): string {
  return outcome.ok
    ? `${outcome.tool} ok: ${preview(outcome.output, max)}`
    : `${outcome.tool} failed: ${preview(outcome.error, max)}`;
}

/** Single-line text form of a message, for prompts and summaries. */
export function renderContent(message: Message, max = 300): string {
  if (message.role === 'tool') return renderOutcome(message.content, max);
  return preview(message.content, max);
}

export function describeAction(tool: string, args: Record<string, unknown>, max = 120): string {
  return `${tool}(${preview(args, max)})`;
}

export function describeDecision(decision: PlanDecision): string {
  if (decision.type === 'final_answer') return decision.output;
  const action = `Action: ${describeAction(decision.tool, decision.args, 500)}`;
  return decision.rationale ? `Thought: ${decision.rationale}\n${action}` : action;
}

import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import type { PlanDecision } from '../agent/types.js';

export type ApprovalMode = 'auto' | 'manual';

export type BlockReason = 'manual_mode' | 'sensitive_tool';

// unevaluated -> cleared | blocked; blocked -> cleared (approve) | discarded (reject, session deleted)
export type GateVerdict = { state: 'cleared' } | { state: 'blocked'; reason: BlockReason };

export function isApprovalMode(value: unknown): value is ApprovalMode {
  return value === 'auto' || value === 'manual';
}

export function evaluateDecision(decision: PlanDecision, mode: ApprovalMode, tool?: { sensitive?: boolean }): GateVerdict {
  // a final answer has no side effect to gate
  if (decision.type === 'final_answer') return { state: 'cleared' };
  if (mode === 'manual') return { state: 'blocked', reason: 'manual_mode' };
  if (tool?.sensitive) return { state: 'blocked', reason: 'sensitive_tool' };
  return { state: 'cleared' };
}

export async function promptApproval(actionSummary: string): Promise<boolean> {
  const rl = readline.createInterface({ input, output });
  try {
    const ans = await rl.question(`\nApproval needed: ${actionSummary}\nApprove? [y/N] `);
    return ans.trim().toLowerCase().startsWith('y');
  } finally {
    rl.close();
  }
}

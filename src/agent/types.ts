import type { AgentErrorPayload } from '../errors.js';
import type { ApprovalMode, BlockReason } from '../policy/approvals.js';

export type { ApprovalMode } from '../policy/approvals.js';

export type PlanDecision =
  | { type: 'use_tool'; tool: string; args: Record<string, unknown>; rationale?: string }
  | { type: 'final_answer'; output: string; rationale?: string };

export type ToolInvocation = Extract<PlanDecision, { type: 'use_tool' }>;

export type PlanOutcome = {
  decision: PlanDecision;
  source: 'backend' | 'fallback';
  /** Why the fallback was taken. */
  reason?: string;
};

export type ToolOutcome =
  | { ok: true; tool: string; output: unknown; durationMs: number }
  | { ok: false; tool: string; error: string; durationMs: number };

type MessageBase = { id: string; index: number; ts: number };

export type Message =
  | (MessageBase & { role: 'user'; content: string })
  | (MessageBase & { role: 'agent'; content: string; decision?: PlanDecision; compacted?: number })
  | (MessageBase & { role: 'tool'; content: ToolOutcome });

type Unstamped<M> = M extends Message ? Omit<M, keyof MessageBase> : never;
export type NewMessage = Unstamped<Message>;

export type PendingAction = {
  sessionId: string;
  tool: string;
  args: Record<string, unknown>;
  rationale?: string;
  reason: BlockReason;
  createdAt: number;
};

export type Session = {
  id: string;
  approvalMode: ApprovalMode;
  messages: Message[];
  pendingAction: PendingAction | null;
  done: boolean;
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
};

export type SessionPatch = Partial<Pick<Session, 'approvalMode' | 'pendingAction' | 'done' | 'lastError'>>;

export type SessionChange = {
  append?: NewMessage[];
  set?: SessionPatch;
};

export type StepResult =
  | { status: 'executed'; decision: ToolInvocation; result: ToolOutcome; session: Session }
  | { status: 'final'; answer: string; source: PlanOutcome['source']; session: Session }
  | { status: 'awaiting_approval'; pendingAction: PendingAction; session: Session }
  | { status: 'discarded'; pendingAction: PendingAction; session: Session };

export type RunStatus = 'final' | 'awaiting_approval' | 'step_limit_reached' | 'stopped' | 'error';

export type RunResult = {
  status: RunStatus;
  steps: StepResult[];
  session: Session;
  error?: AgentErrorPayload;
};

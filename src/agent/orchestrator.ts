import PQueue from 'p-queue';
import type { AppConfig } from '../config.js';
import { AgentError } from '../errors.js';
import type { Logger } from '../observability/logger.js';
import { silentLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { evaluateDecision, isApprovalMode } from '../policy/approvals.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolDescriptor } from '../tools/types.js';
import type { ToolExecutor } from './executor.js';
import type { SessionMemory } from './memory.js';
import { describeAction, describeDecision } from './messages.js';
import type { Planner } from './planner.js';
import type { PendingAction, RunResult, Session, StepResult } from './types.js';

export interface OrchestratorDeps {
  cfg: Pick<AppConfig, 'APPROVAL_MODE' | 'MAX_STEPS'>;
  memory: SessionMemory;
  registry: ToolRegistry;
  planner: Planner;
  executor: ToolExecutor;
  metrics?: MetricsCollector;
  logger?: Logger;
}

export interface RunOptions {
  maxSteps?: number;
  /** Checked between steps; a tool call that has started always finishes. */
  signal?: AbortSignal;
}

/**
 * Perceive-reason-act loop over in-process sessions. Calls on one session are
 * serialized on that session's queue; different sessions never wait on each
 * other.
 */
export class Orchestrator {
  private queues = new Map<string, PQueue>();
  private log: Logger;

  constructor(private deps: OrchestratorDeps) {
    this.log = deps.logger ?? silentLogger;
  }

  async createSession(approvalMode?: string): Promise<Session> {
    const mode = approvalMode ?? this.deps.cfg.APPROVAL_MODE;
    if (!isApprovalMode(mode)) throw AgentError.invalidArgument(`approval mode must be "auto" or "manual", got "${mode}"`);
    const session = await this.deps.memory.create(mode);
    this.log.info('session created', { sessionId: session.id, approvalMode: mode });
    return session;
  }

  async getSession(sessionId: string): Promise<Session> {
    return this.deps.memory.get(sessionId);
  }

  async postMessage(sessionId: string, content: string): Promise<Session> {
    if (typeof content !== 'string' || content.trim() === '') throw AgentError.invalidArgument('message content must be a non-empty string');
    return this.exclusive(sessionId, () => this.deps.memory.apply(sessionId, { append: [{ role: 'user', content }] }));
  }

  async setApprovalMode(sessionId: string, mode: string): Promise<Session> {
    if (!isApprovalMode(mode)) throw AgentError.invalidArgument(`approval mode must be "auto" or "manual", got "${mode}"`);
    return this.exclusive(sessionId, () => this.deps.memory.apply(sessionId, { set: { approvalMode: mode } }));
  }

  listTools(): ToolDescriptor[] {
    return this.deps.registry.describe();
  }

  async step(sessionId: string): Promise<StepResult> {
    const result = await this.exclusive(sessionId, () => this.stepLocked(sessionId));
    this.deps.metrics?.incrementCounter('agent_steps_total', { status: result.status });
    return result;
  }

  async run(sessionId: string, opts: RunOptions = {}): Promise<RunResult> {
    const maxSteps = opts.maxSteps ?? this.deps.cfg.MAX_STEPS;
    if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
      throw AgentError.invalidArgument(`max_steps must be a positive integer, got ${maxSteps}`);
    }

    const steps: StepResult[] = [];
    for (let i = 0; i < maxSteps; i++) {
      let result: StepResult;
      try {
        result = await this.step(sessionId);
      } catch (err) {
        // nothing done yet: the caller gets the contract violation itself
        if (steps.length === 0 || !(err instanceof AgentError)) throw err;
        this.log.warn('run stopped on error', { sessionId, kind: err.kind });
        // the session may be gone (not_found); the last completed step still holds a snapshot
        const session = err.kind === 'not_found' ? steps[steps.length - 1].session : await this.deps.memory.get(sessionId);
        return { status: 'error', steps, error: err.toJSON(), session };
      }
      steps.push(result);
      if (result.status === 'final' || result.status === 'awaiting_approval') {
        return { status: result.status, steps, session: result.session };
      }
      if (opts.signal?.aborted) {
        return { status: 'stopped', steps, session: result.session };
      }
    }
    this.log.info(`step limit reached (${maxSteps})`, { sessionId });
    return { status: 'step_limit_reached', steps, session: await this.deps.memory.get(sessionId) };
  }

  async approve(sessionId: string): Promise<StepResult> {
    return this.exclusive(sessionId, async () => {
      const session = await this.deps.memory.get(sessionId);
      const pending = session.pendingAction;
      if (!pending) throw AgentError.noPendingAction(sessionId);
      this.log.info(`approved ${describeAction(pending.tool, pending.args)}`, { sessionId });
      const result = await this.deps.executor.execute(sessionId, pending.tool, pending.args, { clearPending: true });
      return {
        status: 'executed',
        decision: { type: 'use_tool', tool: pending.tool, args: pending.args, rationale: pending.rationale },
        result,
        session: await this.deps.memory.get(sessionId),
      };
    });
  }

  async reject(sessionId: string, reason?: string): Promise<StepResult> {
    return this.exclusive(sessionId, async () => {
      const session = await this.deps.memory.get(sessionId);
      const pending = session.pendingAction;
      if (!pending) throw AgentError.noPendingAction(sessionId);
      const note = `Rejected ${describeAction(pending.tool, pending.args)}${reason ? `: ${reason}` : ''}`;
      const updated = await this.deps.memory.apply(sessionId, {
        append: [{ role: 'agent', content: note }],
        set: { pendingAction: null },
      });
      this.log.info(note, { sessionId });
      return { status: 'discarded', pendingAction: pending, session: updated };
    });
  }

  async deleteSession(sessionId: string): Promise<void> {
    await this.exclusive(sessionId, async () => {
      if (!(await this.deps.memory.delete(sessionId))) throw AgentError.notFound(sessionId);
    });
    this.queues.delete(sessionId);
  }

  async dispose(): Promise<void> {
    await Promise.all([...this.queues.values()].map(q => q.onIdle()));
    this.queues.clear();
    await this.deps.memory.clear();
  }

  private async stepLocked(sessionId: string): Promise<StepResult> {
    const session = await this.deps.memory.get(sessionId);
    if (session.done) throw AgentError.sessionDone(sessionId);
    if (session.pendingAction) throw AgentError.actionAlreadyPending(sessionId, session.pendingAction.tool);

    const folded = await this.deps.memory.compact(sessionId);
    if (folded > 0) this.log.debug(`compacted ${folded} messages`, { sessionId });
    const history = folded > 0 ? (await this.deps.memory.get(sessionId)).messages : session.messages;

    const plan = await this.deps.planner.proposeNext(history);
    this.deps.metrics?.incrementCounter('planner_decisions_total', { source: plan.source });
    const lastError = plan.reason ? { lastError: plan.reason } : {};
    const { decision } = plan;

    if (decision.type === 'final_answer') {
      const updated = await this.deps.memory.apply(sessionId, {
        append: [{ role: 'agent', content: decision.output, decision }],
        set: { done: true, ...lastError },
      });
      this.log.info('final answer recorded', { sessionId, source: plan.source });
      return { status: 'final', answer: decision.output, source: plan.source, session: updated };
    }

    const { tool, args } = this.deps.registry.resolve(decision.tool, decision.args);
    const verdict = evaluateDecision(decision, session.approvalMode, tool);
    const record = { role: 'agent' as const, content: describeDecision(decision), decision };

    if (verdict.state === 'blocked') {
      const pendingAction: PendingAction = {
        sessionId,
        tool: tool.name,
        args,
        rationale: decision.rationale,
        reason: verdict.reason,
        createdAt: Date.now(),
      };
      const updated = await this.deps.memory.apply(sessionId, { append: [record], set: { pendingAction, ...lastError } });
      this.log.info(`awaiting approval for ${describeAction(tool.name, args)}`, { sessionId, reason: verdict.reason });
      return { status: 'awaiting_approval', pendingAction, session: updated };
    }

    await this.deps.memory.apply(sessionId, { append: [record], set: lastError });
    const result = await this.deps.executor.execute(sessionId, tool.name, args);
    return {
      status: 'executed',
      decision: { ...decision, args },
      result,
      session: await this.deps.memory.get(sessionId),
    };
  }

  private exclusive<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(sessionId);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(sessionId, queue);
    }
    const q = queue;
    return q.add(work, { throwOnTimeout: true }).catch((err: unknown) => {
      // unknown ids must not leave a queue behind
      if (err instanceof AgentError && err.kind === 'not_found' && q.size === 0 && q.pending === 0) this.queues.delete(sessionId);
      throw err;
    });
  }
}

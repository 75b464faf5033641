import { randomUUID } from 'node:crypto';
import { nanoid } from 'nanoid';
import { AgentError } from '../errors.js';
import { truncateMiddle } from '../utils/text.js';
import { renderContent } from './messages.js';
import type { ApprovalMode, Message, NewMessage, Session, SessionChange } from './types.js';

/**
 * Per-session event log. Async so that a durable or shared store can stand in
 * for the in-memory one without touching the orchestrator. Every read returns
 * a snapshot; writes go through `append` or the atomic `apply`.
 */
export interface SessionMemory {
  create(mode: ApprovalMode): Promise<Session>;
  get(sessionId: string): Promise<Session>;
  append(sessionId: string, message: NewMessage): Promise<Message>;
  apply(sessionId: string, change: SessionChange): Promise<Session>;
  /** Collapse old history once it passes the threshold; returns how many entries were folded. */
  compact(sessionId: string): Promise<number>;
  delete(sessionId: string): Promise<boolean>;
  clear(): Promise<void>;
  size(): Promise<number>;
}

export interface CompactionPolicy {
  /** Compact once a session holds more than this many messages. */
  threshold: number;
  /** Most recent messages always kept verbatim. */
  keepRecent: number;
}

type Entry = { session: Session; nextIndex: number };

export class InMemorySessionMemory implements SessionMemory {
  private sessions = new Map<string, Entry>();

  constructor(private policy: CompactionPolicy = { threshold: 40, keepRecent: 12 }) {
    if (policy.keepRecent < 1 || policy.keepRecent >= policy.threshold) {
      throw new Error('keepRecent must be at least 1 and lower than threshold');
    }
  }

  async create(mode: ApprovalMode): Promise<Session> {
    const now = Date.now();
    const session: Session = {
      id: randomUUID(),
      approvalMode: mode,
      messages: [],
      pendingAction: null,
      done: false,
      lastError: null,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(session.id, { session, nextIndex: 0 });
    return structuredClone(session);
  }

  async get(sessionId: string): Promise<Session> {
    return structuredClone(this.entry(sessionId).session);
  }

  async append(sessionId: string, message: NewMessage): Promise<Message> {
    const session = await this.apply(sessionId, { append: [message] });
    return session.messages[session.messages.length - 1];
  }

  async apply(sessionId: string, incoming: SessionChange): Promise<Session> {
    const entry = this.entry(sessionId);
    // stored state never shares objects with the caller
    const change = structuredClone(incoming);
    const now = Date.now();
    let nextIndex = entry.nextIndex;
    const stamped: Message[] = (change.append ?? []).map(m => ({ ...m, id: nanoid(), index: nextIndex++, ts: now }));
    const next: Session = {
      ...entry.session,
      ...change.set,
      messages: stamped.length ? [...entry.session.messages, ...stamped] : entry.session.messages,
      updatedAt: now,
    };
    if (next.done && next.pendingAction) {
      throw new Error(`session ${sessionId}: a finished session cannot hold a pending action`);
    }
    // commit only after the whole change checked out
    entry.session = next;
    entry.nextIndex = nextIndex;
    return structuredClone(next);
  }

  async compact(sessionId: string): Promise<number> {
    const entry = this.entry(sessionId);
    const { messages } = entry.session;
    if (messages.length <= this.policy.threshold) return 0;

    const cut = messages.length - this.policy.keepRecent;
    const older = messages.slice(0, cut);
    const recent = messages.slice(cut);

    // the latest goal stays verbatim even when it is older than the kept tail
    const lastUser = [...messages].reverse().find(m => m.role === 'user');
    const pinned = lastUser && older.includes(lastUser) ? lastUser : undefined;
    const folded = older.filter(m => m !== pinned);
    if (folded.length === 0) return 0;

    const lines = folded.map(m => `- ${m.role}: ${renderContent(m, 160)}`).join('\n');
    const summary: Message = {
      id: nanoid(),
      index: folded[0].index,
      ts: Date.now(),
      role: 'agent',
      content: truncateMiddle(`Compacted ${folded.length} earlier messages:\n${lines}`, 4000),
      compacted: folded.length,
    };
    const head = pinned ? [summary, pinned].sort((a, b) => a.index - b.index) : [summary];
    entry.session = { ...entry.session, messages: [...head, ...recent], updatedAt: Date.now() };
    return folded.length;
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async clear(): Promise<void> {
    this.sessions.clear();
  }

  async size(): Promise<number> {
    return this.sessions.size;
  }

  private entry(sessionId: string): Entry {
    const entry = this.sessions.get(sessionId);
    if (!entry) throw AgentError.notFound(sessionId);
    return entry;
  }
}

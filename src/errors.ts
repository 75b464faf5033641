export type AgentErrorKind =
  | 'not_found'
  | 'session_done'
  | 'action_already_pending'
  | 'no_pending_action'
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'invalid_argument';

export interface AgentErrorPayload {
  kind: AgentErrorKind;
  message: string;
  details?: unknown;
}

/**
 * Contract violation reported to the caller. `kind` is stable and meant for
 * programmatic handling; `message` is for humans.
 */
export class AgentError extends Error {
  constructor(
    public readonly kind: AgentErrorKind,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AgentError';
  }

  static notFound(sessionId: string): AgentError {
    return new AgentError('not_found', `Session not found: ${sessionId}`, { sessionId });
  }

  static sessionDone(sessionId: string): AgentError {
    return new AgentError('session_done', `Session ${sessionId} already has a final answer`, { sessionId });
  }

  static actionAlreadyPending(sessionId: string, tool: string): AgentError {
    return new AgentError(
      'action_already_pending',
      `Session ${sessionId} has a pending ${tool} action; approve or reject it first`,
      { sessionId, tool },
    );
  }

  static noPendingAction(sessionId: string): AgentError {
    return new AgentError('no_pending_action', `Session ${sessionId} has no pending action`, { sessionId });
  }

  static unknownTool(name: string): AgentError {
    return new AgentError('unknown_tool', `Unknown tool: ${name}`, { tool: name });
  }

  static invalidArguments(tool: string, issues: string[]): AgentError {
    return new AgentError('invalid_arguments', `Invalid arguments for ${tool}: ${issues.join('; ')}`, { tool, issues });
  }

  static invalidArgument(message: string): AgentError {
    return new AgentError('invalid_argument', message);
  }

  toJSON(): AgentErrorPayload {
    return this.details === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, details: this.details };
  }
}

/** A tool ran and failed (network, backend, timeout). Recorded, never fatal. */
export class ToolExecutionError extends Error {
  constructor(
    public readonly tool: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ToolExecutionError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class LLMUnavailableError extends Error {
  constructor(message = 'Reasoning backend is not configured') {
    super(message);
    this.name = 'LLMUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

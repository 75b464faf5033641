import { ToolExecutionError, errorMessage } from '../errors.js';
import type { Logger } from '../observability/logger.js';
import { silentLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolSpec } from '../tools/types.js';
import { delay } from '../utils/timeout.js';
import type { SessionMemory } from './memory.js';
import type { ToolOutcome } from './types.js';

type BreakerState = { failures: number; openedUntil?: number };

export interface ExecuteOptions {
  /** Clear the session's pending action in the same write as the tool message. */
  clearPending?: boolean;
}

export class ToolExecutor {
  private breaker = new Map<string, BreakerState>();
  private log: Logger;

  constructor(private deps: { registry: ToolRegistry; memory: SessionMemory; metrics?: MetricsCollector; logger?: Logger }) {
    this.log = deps.logger ?? silentLogger;
  }

  /**
   * Validate, run and record one tool call. Contract violations (unknown
   * session, unknown tool, bad arguments) throw before anything is written;
   * tool failures come back as `{ ok: false }` and are recorded like results.
   */
  async execute(sessionId: string, toolName: string, args: Record<string, unknown>, opts: ExecuteOptions = {}): Promise<ToolOutcome> {
    await this.deps.memory.get(sessionId);
    const { tool } = this.deps.registry.resolve(toolName, args);

    const started = Date.now();
    let outcome: ToolOutcome;
    try {
      const output = await this.invokeWithRetry(tool, args);
      outcome = { ok: true, tool: tool.name, output, durationMs: Date.now() - started };
    } catch (err) {
      outcome = { ok: false, tool: tool.name, error: errorMessage(err), durationMs: Date.now() - started };
      this.log.warn(`tool ${tool.name} failed`, { sessionId, error: outcome.error });
    }

    this.deps.metrics?.incrementCounter('tool_calls_total', { tool: tool.name, outcome: outcome.ok ? 'ok' : 'error' });
    this.deps.metrics?.recordHistogram('tool_duration_ms', outcome.durationMs, { tool: tool.name });

    await this.deps.memory.apply(sessionId, {
      append: [{ role: 'tool', content: outcome }],
      set: opts.clearPending ? { pendingAction: null } : undefined,
    });
    return outcome;
  }

  private async invokeWithRetry(tool: ToolSpec, args: Record<string, unknown>): Promise<unknown> {
    const name = tool.name;
    const state = this.breaker.get(name) ?? { failures: 0 };
    if (state.openedUntil && Date.now() < state.openedUntil) {
      throw new ToolExecutionError(name, `circuit_open:${name}`);
    }
    const retries = tool.retry?.retries ?? 0;
    const baseDelayMs = tool.retry?.baseDelayMs ?? 400;
    let lastErr: unknown;
    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        const res = await this.deps.registry.invoke(name, args);
        this.breaker.set(name, { failures: 0 });
        return res;
      } catch (err) {
        lastErr = err;
        if (attempt < retries) await delay(baseDelayMs * Math.pow(2, attempt));
      }
    }
    // record failure and maybe open circuit
    const breakerCfg = tool.breaker ?? { failureThreshold: 3, cooldownMs: 30_000 };
    const failures = state.failures + 1;
    if (failures >= breakerCfg.failureThreshold) {
      this.breaker.set(name, { failures: 0, openedUntil: Date.now() + breakerCfg.cooldownMs });
      this.log.warn(`circuit opened for ${name}`, { cooldownMs: breakerCfg.cooldownMs });
    } else {
      this.breaker.set(name, { failures });
    }
    throw lastErr;
  }
}

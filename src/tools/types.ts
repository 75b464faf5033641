import type { z } from 'zod';

export interface ToolSpec<T extends z.AnyZodObject = z.AnyZodObject> {
  name: string;
  description: string;
  schema: T;
  /** Requires approval even when the session runs in auto mode. */
  sensitive?: boolean;
  timeoutMs?: number;
  retry?: { retries: number; baseDelayMs: number };
  breaker?: { failureThreshold: number; cooldownMs: number };
  run(args: z.infer<T>): Promise<unknown>;
}

export type ArgumentType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'enum' | 'unknown';

export interface ArgumentSpec {
  name: string;
  type: ArgumentType;
  required: boolean;
  description?: string;
  enum?: string[];
  min?: number;
  max?: number;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  sensitive: boolean;
  arguments: ArgumentSpec[];
}

export type ToolCheck =
  | { ok: true; tool: ToolSpec; args: Record<string, unknown> }
  | { ok: false; kind: 'unknown_tool' | 'invalid_arguments'; issues: string[] };

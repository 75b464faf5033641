import { z } from 'zod';
import { AgentError, ToolExecutionError, errorMessage } from '../errors.js';
import { withTimeout } from '../utils/timeout.js';
import type { ArgumentSpec, ArgumentType, ToolCheck, ToolDescriptor, ToolSpec } from './types.js';

/**
 * Process-wide tool catalog. Registration order is the listing order, so the
 * planner always sees the action space in the same sequence.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolSpec>();

  constructor(private defaultTimeoutMs = 60_000) {}

  register(tool: ToolSpec): this {
    if (!tool.name) throw new Error('Tool name is required');
    if (this.tools.has(tool.name)) throw new Error(`Tool already registered: ${tool.name}`);
    this.tools.set(tool.name, tool);
    return this;
  }

  registerTools(tools: ToolSpec[]): this {
    for (const tool of tools) this.register(tool);
    return this;
  }

  list(): ToolSpec[] {
    return Array.from(this.tools.values());
  }

  get(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  describe(): ToolDescriptor[] {
    return this.list().map(t => ({
      name: t.name,
      description: t.description,
      sensitive: !!t.sensitive,
      arguments: describeSchema(t.schema),
    }));
  }

  check(name: string, args: unknown): ToolCheck {
    const tool = this.tools.get(name);
    if (!tool) return { ok: false, kind: 'unknown_tool', issues: [`no tool named "${name}"`] };
    const parsed = tool.schema.safeParse(args ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
      return { ok: false, kind: 'invalid_arguments', issues };
    }
    return { ok: true, tool, args: parsed.data };
  }

  /** Validated tool and arguments, or the contract violation as an AgentError. */
  resolve(name: string, args: unknown): { tool: ToolSpec; args: Record<string, unknown> } {
    const checked = this.check(name, args);
    if (!checked.ok) {
      throw checked.kind === 'unknown_tool' ? AgentError.unknownTool(name) : AgentError.invalidArguments(name, checked.issues);
    }
    return { tool: checked.tool, args: checked.args };
  }

  async invoke(name: string, args: unknown, opts: { timeoutMs?: number } = {}): Promise<unknown> {
    const resolved = this.resolve(name, args);
    const timeoutMs = opts.timeoutMs ?? resolved.tool.timeoutMs ?? this.defaultTimeoutMs;
    try {
      return await withTimeout(resolved.tool.run(resolved.args), timeoutMs, `tool ${name}`);
    } catch (err) {
      if (err instanceof ToolExecutionError) throw err;
      throw new ToolExecutionError(name, errorMessage(err), { cause: err });
    }
  }
}

export function describeSchema(schema: z.AnyZodObject): ArgumentSpec[] {
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  return Object.entries(shape).map(([name, field]) => {
    const spec: ArgumentSpec = { name, type: 'unknown', required: !field.isOptional() };
    if (field.description) spec.description = field.description;

    let inner: z.ZodTypeAny = field;
    for (;;) {
      if (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) inner = inner.unwrap();
      else if (inner instanceof z.ZodDefault) inner = inner.removeDefault();
      else if (inner instanceof z.ZodEffects) inner = inner.innerType();
      else break;
    }
    if (!spec.description && inner.description) spec.description = inner.description;

    if (inner instanceof z.ZodString) {
      spec.type = 'string';
      if (inner.minLength !== null) spec.min = inner.minLength;
      if (inner.maxLength !== null) spec.max = inner.maxLength;
    } else if (inner instanceof z.ZodNumber) {
      spec.type = inner.isInt ? 'integer' : 'number';
      if (inner.minValue !== null) spec.min = inner.minValue;
      if (inner.maxValue !== null) spec.max = inner.maxValue;
    } else if (inner instanceof z.ZodEnum) {
      spec.type = 'enum';
      spec.enum = [...inner.options];
    } else {
      spec.type = simpleType(inner);
    }
    return spec;
  });
}

function simpleType(t: z.ZodTypeAny): ArgumentType {
  if (t instanceof z.ZodBoolean) return 'boolean';
  if (t instanceof z.ZodArray) return 'array';
  if (t instanceof z.ZodObject || t instanceof z.ZodRecord) return 'object';
  return 'unknown';
}

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { AgentError, ToolExecutionError } from '../../errors.js';
import { createDefaultRegistry } from '../index.js';
import { ToolRegistry, describeSchema } from '../registry.js';
import { createSleepTool } from '../impl/sleep.js';
import { testConfig, unreachableBackend } from '../../__tests__/helpers.js';

describe('ToolRegistry', () => {
  it('should reject duplicate names', () => {
    const registry = new ToolRegistry().register(createSleepTool(5));
    expect(() => registry.register(createSleepTool(5))).toThrow('Tool already registered: sleep');
  });

  it('should list tools in registration order', () => {
    const registry = createDefaultRegistry(testConfig(), { searchBackend: unreachableBackend() });
    expect(registry.list().map(t => t.name)).toEqual(['es_search', 'http_get', 'sleep']);
    expect(registry.get('http_get')?.retry).toEqual({ retries: 1, baseDelayMs: 250 });
    expect(registry.get('whois')).toBeUndefined();
  });

  it('should describe argument schemas', () => {
    const registry = createDefaultRegistry(testConfig(), { searchBackend: unreachableBackend() });
    const [esSearch, , sleep] = registry.describe();

    expect(sleep).toEqual({
      name: 'sleep',
      description: 'Wait before polling again (data still arriving, rate limits). At most 30 seconds.',
      sensitive: false,
      arguments: [{ name: 'seconds', type: 'number', required: true, min: 0, max: 30 }],
    });
    expect(esSearch.arguments).toEqual([
      { name: 'index', type: 'string', required: false, description: 'index or pattern, defaults to alerts-enriched', min: 1 },
      {
        name: 'query',
        type: 'object',
        required: true,
        description: 'query clause in the backend DSL, e.g. {"match":{"message":"sshd"}}',
      },
      { name: 'size', type: 'integer', required: false, description: 'maximum hits to return', min: 1, max: 50 },
    ]);
  });

  it('should describe enums, booleans and arrays', () => {
    const specs = describeSchema(
      z.object({
        severity: z.enum(['low', 'high']).default('low'),
        dryRun: z.boolean().optional(),
        hosts: z.array(z.string()),
      }),
    );
    expect(specs).toEqual([
      { name: 'severity', type: 'enum', required: false, enum: ['low', 'high'] },
      { name: 'dryRun', type: 'boolean', required: false },
      { name: 'hosts', type: 'array', required: true },
    ]);
  });

  it('should check names and arguments', () => {
    const registry = new ToolRegistry().register(createSleepTool(30));

    expect(registry.check('nope', {})).toEqual({ ok: false, kind: 'unknown_tool', issues: ['no tool named "nope"'] });
    expect(registry.check('sleep', { seconds: -1 })).toEqual({
      ok: false,
      kind: 'invalid_arguments',
      issues: ['seconds: Number must be greater than or equal to 0'],
    });
    expect(registry.check('sleep', {})).toEqual({ ok: false, kind: 'invalid_arguments', issues: ['seconds: Required'] });

    const ok = registry.check('sleep', { seconds: 1, extra: true });
    expect(ok.ok).toBe(true);
    if (ok.ok) expect(ok.args).toEqual({ seconds: 1 });
  });

  it('should resolve contract violations to agent errors', () => {
    const registry = new ToolRegistry().register(createSleepTool(30));
    expect(() => registry.resolve('nope', {})).toThrow(AgentError);
    expect(() => registry.resolve('sleep', { seconds: 'x' })).toThrow('Invalid arguments for sleep: seconds: Expected number, received string');
  });

  it('should time out slow tools', async () => {
    const registry = new ToolRegistry().register({
      name: 'slow',
      description: 'never finishes',
      schema: z.object({}),
      run: () => new Promise<unknown>(() => {}),
    });

    const call = registry.invoke('slow', {}, { timeoutMs: 20 });
    await expect(call).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(call).rejects.toThrow('tool slow timed out after 20ms');
  });

  it('should wrap tool errors', async () => {
    const registry = new ToolRegistry().register({
      name: 'broken',
      description: 'fails',
      schema: z.object({}),
      run: async () => {
        throw new TypeError('bad state');
      },
    });

    await expect(registry.invoke('broken', {})).rejects.toMatchObject({ name: 'ToolExecutionError', tool: 'broken', message: 'bad state' });
  });
});

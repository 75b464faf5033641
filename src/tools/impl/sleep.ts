import { z } from 'zod';
import { delay } from '../../utils/timeout.js';
import type { ToolSpec } from '../types.js';

export function createSleepTool(maxSeconds: number) {
  const schema = z.object({ seconds: z.number().min(0).max(maxSeconds) });

  const tool: ToolSpec<typeof schema> = {
    name: 'sleep',
    description: `Wait before polling again (data still arriving, rate limits). At most ${maxSeconds} seconds.`,
    schema,
    timeoutMs: maxSeconds * 1000 + 1_000,
    async run({ seconds }) {
      await delay(seconds * 1000);
      return { slept: seconds };
    },
  };
  return tool;
}
